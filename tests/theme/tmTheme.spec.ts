/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import path from 'node:path';
import os from 'node:os';
import plist from 'plist';
import { buildTmTheme, loadTmTheme, parseTmTheme, saveTmTheme } from '../../src/theme/tmTheme.js';
import { ThemeLoadError } from '../../src/errors.js';
import type { TmTheme } from '../../src/theme/types.js';

const SAMPLE_XML = `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">
<plist version="1.0">
<dict>
  <key>name</key>
  <string>Paper Ink</string>
  <key>author</key>
  <string>Test Author</string>
  <key>settings</key>
  <array>
    <dict>
      <key>settings</key>
      <dict>
        <key>background</key>
        <string>#fdf6e3</string>
        <key>foreground</key>
        <string>#586e75</string>
      </dict>
    </dict>
    <dict>
      <key>name</key>
      <string>Comment</string>
      <key>scope</key>
      <string>comment, punctuation.definition.comment</string>
      <key>settings</key>
      <dict>
        <key>foreground</key>
        <string>#93a1a1</string>
        <key>fontStyle</key>
        <string>italic</string>
      </dict>
    </dict>
  </array>
</dict>
</plist>`;

describe('parseTmTheme', () => {
  it('reads the global settings and rules', () => {
    expect(parseTmTheme(SAMPLE_XML, 'paper.tmTheme')).toEqual({
      format: 'tmtheme',
      name: 'Paper Ink',
      author: 'Test Author',
      uiSettings: { background: '#fdf6e3', foreground: '#586e75' },
      tokenRules: [
        {
          name: 'Comment',
          scope: 'comment, punctuation.definition.comment',
          settings: { foreground: '#93a1a1', fontStyle: 'italic' },
        },
      ],
    });
  });

  it('treats every entry as a rule when the first one has a scope', () => {
    const xml = plist.build({
      name: 'Rules Only',
      settings: [{ scope: 'string', settings: { foreground: '#859900' } }],
    });

    const theme = parseTmTheme(xml, 'rules.tmTheme');

    expect(theme.uiSettings).toEqual({});
    expect(theme.tokenRules).toEqual([{ scope: 'string', settings: { foreground: '#859900' } }]);
  });

  it('keeps only known rule settings', () => {
    const xml = plist.build({
      name: 'Extra',
      settings: [
        { settings: {} },
        { scope: 'markup.underline', settings: { fontStyle: 'underline', selectionForeground: '#ffffff' } },
      ],
    });

    expect(parseTmTheme(xml, 'extra.tmTheme').tokenRules).toEqual([
      { scope: 'markup.underline', settings: { fontStyle: 'underline' } },
    ]);
  });

  it('names the theme after its file when it has no name', () => {
    const xml = plist.build({ settings: [{ settings: { background: '#000000' } }] });

    expect(parseTmTheme(xml, '/themes/unnamed.tmTheme').name).toBe('unnamed');
  });

  it('rejects documents that are not themes', () => {
    expect(() => parseTmTheme(plist.build({ name: 'No settings' }), 'bad.tmTheme')).toThrow(
      /^Invalid TextMate theme: settings: /
    );
  });

  it('rejects malformed XML', () => {
    expect(() => parseTmTheme('<plist><dict>', 'broken.tmTheme')).toThrow(ThemeLoadError);
  });
});

describe('buildTmTheme', () => {
  const theme: TmTheme = {
    format: 'tmtheme',
    name: 'Round Trip',
    uuid: '00000000-0000-0000-0000-000000000001',
    uiSettings: { background: '#002b36', caret: '#839496' },
    tokenRules: [
      { name: 'Keyword', scope: 'keyword', settings: { foreground: '#859900' } },
      { scope: 'constant', settings: { foreground: '#2aa198', fontStyle: 'bold' } },
    ],
  };

  it('produces XML that parses back to the same theme', () => {
    expect(parseTmTheme(buildTmTheme(theme), 'round.tmTheme')).toEqual(theme);
  });

  it('puts the global settings first without a scope', () => {
    const document = plist.parse(buildTmTheme(theme));

    expect(document).toMatchObject({
      settings: [{ settings: { background: '#002b36', caret: '#839496' } }, { scope: 'keyword' }, { scope: 'constant' }],
    });
  });

  it('joins list scopes and leaves out empty values', () => {
    const xml = buildTmTheme({
      format: 'tmtheme',
      name: 'Lists',
      uiSettings: {},
      tokenRules: [{ name: '', scope: ['entity.name', 'support.type'], settings: { foreground: '#b58900', fontStyle: '' } }],
    });

    expect(plist.parse(xml)).toEqual({
      name: 'Lists',
      settings: [{ settings: {} }, { scope: 'entity.name, support.type', settings: { foreground: '#b58900' } }],
    });
  });
});

describe('tmTheme files', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tmtheme-test-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('saves and loads a theme', async () => {
    const filePath = path.join(tempDir, 'out', 'theme.tmTheme');
    const theme: TmTheme = {
      format: 'tmtheme',
      name: 'Saved',
      uiSettings: { foreground: '#eeeeee' },
      tokenRules: [{ scope: 'comment', settings: { foreground: '#777777' } }],
    };

    await saveTmTheme(filePath, theme);

    expect(await loadTmTheme(filePath)).toEqual(theme);
  });

  it('reports a missing file', async () => {
    await expect(loadTmTheme(path.join(tempDir, 'missing.tmTheme'))).rejects.toThrow(/^Failed to read theme file: /);
  });
});
