/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { isHexColor, ruleScopes, type ColorTheme } from '../theme/types.js';
import type { AnsiMapping } from './mapping.js';

export const DEFAULT_ANSI_NAME_SUFFIX = ' (ANSI)';

export type UsageSite =
  | { kind: 'ui'; name: string }
  | { kind: 'scope'; scope: string | null };

/**
 * A color that was left as is because the mapping has no slot for it.
 * Reported, never thrown.
 */
export interface UnmappedColorWarning {
  colorCode: string;
  site: UsageSite;
}

export interface ApplyResult<T extends ColorTheme> {
  theme: T;
  unmappedColors: UnmappedColorWarning[];
}

export interface ApplyOptions {
  nameSuffix?: string;
}

/**
 * Replace every mapped color of a theme with its slot placeholder.
 * The input theme is not modified.
 */
export function applyAnsiMapping<T extends ColorTheme>(
  theme: T,
  mapping: AnsiMapping,
  options: ApplyOptions = {}
): ApplyResult<T> {
  const ansiTheme = structuredClone(theme);
  const unmappedColors: UnmappedColorWarning[] = [];

  const lookup = (color: string, site: UsageSite): string => {
    const slot = mapping.get(color)?.ansiColor;
    if (!slot) {
      unmappedColors.push({ colorCode: color, site });
      return color;
    }
    return slot.ansiHex;
  };

  for (const [name, color] of Object.entries(ansiTheme.uiSettings)) {
    if (!isHexColor(color)) continue;
    ansiTheme.uiSettings[name] = lookup(color, { kind: 'ui', name });
  }

  for (const rule of ansiTheme.tokenRules) {
    const color = rule.settings.foreground;
    if (!color) continue;
    const scope = ruleScopes(rule).join(', ') || null;
    rule.settings.foreground = lookup(color, { kind: 'scope', scope });
  }

  ansiTheme.name = `${theme.name}${options.nameSuffix ?? DEFAULT_ANSI_NAME_SUFFIX}`;

  return { theme: ansiTheme, unmappedColors };
}

export function isUnmapped(report: readonly UnmappedColorWarning[], colorCode: string): boolean {
  return report.some(warning => warning.colorCode === colorCode);
}

/**
 * Distinct unmapped colors with how often each was skipped, in first-seen order.
 */
export function unmappedColorCodes(report: readonly UnmappedColorWarning[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const warning of report) {
    counts.set(warning.colorCode, (counts.get(warning.colorCode) ?? 0) + 1);
  }
  return counts;
}
