/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { isHexColor, ruleScopes, type ColorTheme } from '../theme/types.js';
import { AnsiMapping } from './mapping.js';

/**
 * Gather every distinct color of a theme with the UI settings and scopes
 * that use it. Colors are compared as written (no case or shorthand
 * normalization); rules without a foreground are skipped.
 */
export function collectColorUsages(theme: ColorTheme): AnsiMapping {
  const mapping = new AnsiMapping(theme.name);

  for (const [setting, color] of Object.entries(theme.uiSettings)) {
    if (!isHexColor(color)) continue;
    mapping.ensure(color).uiSettings.add(setting);
  }

  for (const rule of theme.tokenRules) {
    const color = rule.settings.foreground;
    if (!color) continue;

    const entry = mapping.ensure(color);
    for (const scope of ruleScopes(rule)) {
      entry.scopes.add(scope);
    }
  }

  return mapping;
}
