/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect } from 'vitest';
import { normalizeTokenColors, parseVSCodeTheme } from '../../src/theme/vscodeTheme.js';
import { ThemeLoadError } from '../../src/errors.js';

const SAMPLE_THEME = `{
  // Generated from current settings
  "$schema": "vscode://schemas/color-theme",
  "type": "dark",
  "name": "Harbor Night",
  "colors": {
    "editor.background": "#1b2b34",
    "editor.foreground": "#cdd3de",
    "editorCursor.foreground": null,
  },
  "tokenColors": [
    { "scope": ["comment", "punctuation.definition.comment"], "settings": { "foreground": "#65737e", "fontStyle": "italic" } },
    { "name": "Keywords", "scope": "keyword", "settings": { "foreground": "#c594c5" } },
  ],
  "semanticHighlighting": true,
}`;

describe('normalizeTokenColors', () => {
  it('splits list scopes into one rule each', () => {
    expect(
      normalizeTokenColors([{ name: 'Strings', scope: ['string', 'string.quoted'], settings: { foreground: '#99c794' } }])
    ).toEqual([
      { name: 'Strings', scope: 'string', settings: { foreground: '#99c794' } },
      { name: 'Strings', scope: 'string.quoted', settings: { foreground: '#99c794' } },
    ]);
  });

  it('keeps the last rule for a repeated scope at its first position', () => {
    expect(
      normalizeTokenColors([
        { scope: ['a', 'b'], settings: { foreground: '#111111' } },
        { scope: 'a', settings: { foreground: '#222222' } },
      ])
    ).toEqual([
      { scope: 'a', settings: { foreground: '#222222' } },
      { scope: 'b', settings: { foreground: '#111111' } },
    ]);
  });

  it('drops rules without a scope or settings', () => {
    expect(
      normalizeTokenColors([
        { name: 'Global', settings: { foreground: '#ffffff' } },
        { scope: 'variable' },
      ])
    ).toEqual([]);
  });
});

describe('parseVSCodeTheme', () => {
  it('reads JSON with comments and trailing commas', () => {
    const theme = parseVSCodeTheme(SAMPLE_THEME, '/themes/harbor.json');

    expect(theme).toEqual({
      format: 'vscode',
      name: 'Harbor Night',
      schema: 'vscode://schemas/color-theme',
      type: 'dark',
      semanticHighlighting: true,
      uiSettings: {
        'editor.background': '#1b2b34',
        'editor.foreground': '#cdd3de',
      },
      tokenRules: [
        { scope: 'comment', settings: { foreground: '#65737e', fontStyle: 'italic' } },
        { scope: 'punctuation.definition.comment', settings: { foreground: '#65737e', fontStyle: 'italic' } },
        { name: 'Keywords', scope: 'keyword', settings: { foreground: '#c594c5' } },
      ],
    });
  });

  it('names the theme after its file when it has no name', () => {
    const theme = parseVSCodeTheme('{ "colors": {} }', '/themes/quiet-light.jsonc');

    expect(theme.name).toBe('quiet-light');
    expect(theme.tokenRules).toEqual([]);
  });

  it('refuses themes that include another theme', () => {
    expect(() => parseVSCodeTheme('{ "include": "./base.json" }', 'child.json')).toThrow(ThemeLoadError);
    expect(() => parseVSCodeTheme('{ "include": "./base.json" }', 'child.json')).toThrow(/Generate Color Theme/);
  });

  it('reports malformed JSON with the file path', () => {
    expect(() => parseVSCodeTheme('{ "colors": ', 'broken.json')).toThrow(/^Invalid JSON in theme file: .* \(broken\.json\)$/);
  });

  it('reports values of the wrong type', () => {
    expect(() => parseVSCodeTheme('{ "colors": { "editor.background": 12 } }', 'bad.json')).toThrow(
      /^Invalid VS Code theme: colors\.editor\.background: /
    );
  });
});
