/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import chalk from 'chalk';
import { contrastRatio, contrastRating, parseHexColor, type ContrastRating } from '../ansi/index.js';
import { colorRating, colorSwatch, formatRatio } from '../ui/displayUtils.js';

export interface ContrastResult {
  foreground: string;
  ratio: number;
  rating: ContrastRating;
}

/**
 * Grade each foreground against the background. All colors are validated
 * before anything is computed.
 */
export function evaluateContrast(background: string, foregrounds: readonly string[]): ContrastResult[] {
  parseHexColor(background);
  foregrounds.forEach(parseHexColor);

  return foregrounds.map(foreground => {
    const ratio = contrastRatio(foreground, background);
    return { foreground, ratio, rating: contrastRating(ratio) };
  });
}

export function checkContrast(background: string, foregrounds: readonly string[]): ContrastResult[] {
  const results = evaluateContrast(background, foregrounds);

  console.log(chalk.gray(`Background ${background}`));
  for (const result of results) {
    console.log(
      `${colorSwatch(withHash(result.foreground))} ${result.foreground.padEnd(8)} ${formatRatio(result.ratio).padStart(8)}  ${colorRating(result.rating)}`
    );
  }

  return results;
}

function withHash(hex: string): string {
  return hex.startsWith('#') ? hex : `#${hex}`;
}
