/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { AnyTheme, TmTheme, VSCodeTheme } from './types.js';

/**
 * TextMate global settings and their VS Code editor counterparts.
 * null means VS Code has no direct equivalent.
 * See https://www.sublimetext.com/docs/color_schemes_tmtheme.html#global_settings
 */
export const TM_TO_VSCODE_SETTINGS: Readonly<Record<string, string | null>> = {
  // Core colors
  background: 'editor.background',
  foreground: 'editor.foreground',
  caret: 'editorCursor.foreground',
  lineHighlight: 'editor.lineHighlightBackground',
  invisibles: 'editorWhitespace.foreground',
  // Selection
  selection: 'editor.selectionBackground',
  selectionForeground: 'editor.selectionForeground',
  selectionBorder: null,
  inactiveSelection: 'editor.inactiveSelectionBackground',
  inactiveSelectionForeground: null,
  // Find
  highlight: 'editor.findMatchBorder',
  findHighlight: 'editor.findMatchBackground',
  findHighlightForeground: 'editor.findMatchForeground',
  // Guides
  guide: 'editorIndentGuide.background',
  activeGuide: 'editorIndentGuide.activeBackground',
  stackGuide: null,
  // Brackets and tags use a different highlighting system in VS Code
  bracketsOptions: null,
  bracketsForeground: null,
  bracketContentsOptions: null,
  bracketContentsForeground: null,
  tagsOptions: null,
  tagsForeground: null,
  // Accents
  shadow: null,
  shadowWidth: null,
  misspelling: null,
  minimapBorder: null,
  accent: null,
  // Gutter
  gutter: 'editorGutter.background',
  gutterForeground: 'editorLineNumber.foreground',
};

export const VSCODE_TO_TM_SETTINGS: Readonly<Record<string, string>> = Object.fromEntries(
  Object.entries(TM_TO_VSCODE_SETTINGS).flatMap(([tmKey, vscodeKey]): [string, string][] =>
    vscodeKey === null ? [] : [[vscodeKey, tmKey]]
  )
);

/**
 * Convert a VS Code theme to a TextMate theme. Editor colors without a
 * TextMate counterpart are dropped; list scopes are joined with ", ".
 */
export function vscodeToTmTheme(theme: VSCodeTheme): TmTheme {
  const uiSettings: Record<string, string> = {};
  for (const [vscodeKey, color] of Object.entries(theme.uiSettings)) {
    if (Object.hasOwn(VSCODE_TO_TM_SETTINGS, vscodeKey)) {
      uiSettings[VSCODE_TO_TM_SETTINGS[vscodeKey]] = color;
    }
  }

  return {
    format: 'tmtheme',
    name: theme.name || 'Converted Theme',
    uiSettings,
    tokenRules: theme.tokenRules.map(rule => ({
      ...(rule.name !== undefined ? { name: rule.name } : {}),
      ...(rule.scope !== undefined
        ? { scope: Array.isArray(rule.scope) ? rule.scope.join(', ') : rule.scope }
        : {}),
      settings: { ...rule.settings },
    })),
  };
}

/**
 * Bring either theme format to TextMate.
 */
export function toTmTheme(theme: AnyTheme): TmTheme {
  return theme.format === 'tmtheme' ? theme : vscodeToTmTheme(theme);
}
