/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 *
 * Display utilities for color listings
 */
import chalk from 'chalk';
import type { ContrastRating } from '../ansi/contrast.js';
import { isHexColor } from '../theme/types.js';

const SWATCH = '██';

/**
 * Drop the alpha channel: #rgba -> #rgb, #rrggbbaa -> #rrggbb.
 */
export function stripAlpha(hex: string): string {
  if (hex.length === 5) return hex.slice(0, 4);
  if (hex.length === 9) return hex.slice(0, 7);
  return hex;
}

/**
 * Two-cell block painted in the given color; blank for unknown colors.
 */
export function colorSwatch(hex: string | null): string {
  if (!hex || !isHexColor(hex)) {
    return ' '.repeat(SWATCH.length);
  }
  return chalk.hex(stripAlpha(hex))(SWATCH);
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

export function formatRatio(ratio: number): string {
  return `${ratio.toFixed(2)}:1`;
}

export function colorRating(rating: ContrastRating): string {
  switch (rating) {
    case 'AAA':
      return chalk.green(rating);
    case 'AA':
      return chalk.yellow(rating);
    case 'FAIL':
      return chalk.red(rating);
  }
}
