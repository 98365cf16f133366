/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { InvalidColorError } from '../errors.js';

/**
 * WCAG grade of a contrast ratio.
 */
export type ContrastRating = 'AAA' | 'AA' | 'FAIL';

export const AAA_MIN_RATIO = 7.0;
export const AA_MIN_RATIO = 4.5;

const HEX6_PATTERN = /^#?([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/;

/**
 * Channels of a `#RRGGBB` (or `RRGGBB`) color, each in [0, 1].
 */
export function parseHexColor(hex: string): [number, number, number] {
  const match = HEX6_PATTERN.exec(hex.trim());
  if (!match) {
    throw new InvalidColorError(hex);
  }
  return [
    parseInt(match[1], 16) / 255,
    parseInt(match[2], 16) / 255,
    parseInt(match[3], 16) / 255,
  ];
}

function linearize(c: number): number {
  return c <= 0.03928 ? c / 12.92 : ((c + 0.055) / 1.055) ** 2.4;
}

/**
 * WCAG relative luminance (0 = black, 1 = white).
 */
export function relativeLuminance(hex: string): number {
  const [r, g, b] = parseHexColor(hex);
  return 0.2126 * linearize(r) + 0.7152 * linearize(g) + 0.0722 * linearize(b);
}

/**
 * WCAG contrast ratio, from 1 (no contrast) to 21 (black on white).
 * The order of the two colors does not matter.
 */
export function contrastRatio(fg: string, bg: string): number {
  const fgLum = relativeLuminance(fg);
  const bgLum = relativeLuminance(bg);
  const lighter = Math.max(fgLum, bgLum);
  const darker = Math.min(fgLum, bgLum);
  return (lighter + 0.05) / (darker + 0.05);
}

export function contrastRating(ratio: number): ContrastRating {
  if (ratio >= AAA_MIN_RATIO) return 'AAA';
  if (ratio >= AA_MIN_RATIO) return 'AA';
  return 'FAIL';
}
