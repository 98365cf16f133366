/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export type {
  AnyTheme,
  ColorTheme,
  ThemeKind,
  TmTheme,
  TokenRule,
  TokenRuleSettings,
  VSCodeTheme,
} from './types.js';
export { isHexColor, ruleScopes } from './types.js';

export { loadTheme, detectThemeFormat, type ThemeFormat } from './loader.js';
export { loadVSCodeTheme, parseVSCodeTheme, normalizeTokenColors } from './vscodeTheme.js';
export { loadTmTheme, parseTmTheme, buildTmTheme, saveTmTheme } from './tmTheme.js';
export { vscodeToTmTheme, toTmTheme, TM_TO_VSCODE_SETTINGS, VSCODE_TO_TM_SETTINGS } from './converter.js';
