/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect } from 'vitest';
import { VSCODE_TO_TM_SETTINGS, toTmTheme, vscodeToTmTheme } from '../../src/theme/converter.js';
import type { TmTheme, VSCodeTheme } from '../../src/theme/types.js';

describe('VSCODE_TO_TM_SETTINGS', () => {
  it('maps editor colors back to TextMate keys', () => {
    expect(VSCODE_TO_TM_SETTINGS['editor.background']).toBe('background');
    expect(VSCODE_TO_TM_SETTINGS['editorLineNumber.foreground']).toBe('gutterForeground');
    expect(Object.hasOwn(VSCODE_TO_TM_SETTINGS, 'activityBar.background')).toBe(false);
  });
});

describe('vscodeToTmTheme', () => {
  const theme: VSCodeTheme = {
    format: 'vscode',
    name: 'Harbor Night',
    type: 'dark',
    uiSettings: {
      'editor.background': '#1b2b34',
      'editor.foreground': '#cdd3de',
      'editorCursor.foreground': '#c0c5ce',
      'activityBar.background': '#1b2b34',
    },
    tokenRules: [
      { name: 'Comment', scope: 'comment', settings: { foreground: '#65737e', fontStyle: 'italic' } },
      { scope: ['string', 'string.quoted'], settings: { foreground: '#99c794' } },
    ],
  };

  it('keeps editor colors that TextMate knows', () => {
    expect(vscodeToTmTheme(theme).uiSettings).toEqual({
      background: '#1b2b34',
      foreground: '#cdd3de',
      caret: '#c0c5ce',
    });
  });

  it('joins list scopes', () => {
    expect(vscodeToTmTheme(theme).tokenRules).toEqual([
      { name: 'Comment', scope: 'comment', settings: { foreground: '#65737e', fontStyle: 'italic' } },
      { scope: 'string, string.quoted', settings: { foreground: '#99c794' } },
    ]);
  });

  it('keeps the name and switches the format', () => {
    const converted = vscodeToTmTheme(theme);

    expect(converted.format).toBe('tmtheme');
    expect(converted.name).toBe('Harbor Night');
  });

  it('falls back to a generic name', () => {
    expect(vscodeToTmTheme({ ...theme, name: '' }).name).toBe('Converted Theme');
  });

  it('does not share rule settings with the input', () => {
    const converted = vscodeToTmTheme(theme);
    converted.tokenRules[0].settings.foreground = '#000000';

    expect(theme.tokenRules[0].settings.foreground).toBe('#65737e');
  });
});

describe('toTmTheme', () => {
  it('returns TextMate themes unchanged', () => {
    const theme: TmTheme = { format: 'tmtheme', name: 'Already', uiSettings: {}, tokenRules: [] };

    expect(toTmTheme(theme)).toBe(theme);
  });
});
