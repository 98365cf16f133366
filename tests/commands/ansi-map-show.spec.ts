/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import fs from 'fs-extra';
import path from 'node:path';
import os from 'node:os';
import { ColorMapping } from '../../src/ansi/mapping.js';
import { PaletteRegistry, type TerminalColorSource } from '../../src/ansi/palette.js';
import { ansiMapShow, formatMappingEntry } from '../../src/commands/ansi-map-show.js';
import type { CommandContext } from '../../src/types.js';

const registry = new PaletteRegistry();

function createContext(colorSource: TerminalColorSource | null = null): CommandContext {
  return {
    config: {
      configPath: '/tmp/ansi-theme-test/config.json',
      terminal: { queryTimeoutMs: 100, retries: 2, enabled: colorSource !== null },
      ansiNameSuffix: ' (ANSI)',
    },
    registry: new PaletteRegistry(colorSource),
  };
}

describe('formatMappingEntry', () => {
  const entry = new ColorMapping('#ff0000', {
    ansiColor: registry.byName('RED'),
    uiSettings: ['editor.foreground'],
    scopes: ['storage', 'keyword'],
  });

  it('shows the slot and the usage sites', () => {
    expect(formatMappingEntry(entry, { slotColor: null, background: null })).toBe(
      '██ #ff0000   → RED (3 uses)\n    ui: editor.foreground\n    scopes: keyword, storage'
    );
  });

  it('hides the usage sites when quiet', () => {
    expect(formatMappingEntry(entry, { slotColor: null, background: null }, { quiet: true })).toBe(
      '██ #ff0000   → RED (3 uses)'
    );
  });

  it("grades the terminal's color for the slot against its background", () => {
    expect(
      formatMappingEntry(entry, { slotColor: '#cd0000', background: '#000000' }, { quiet: true })
    ).toBe('██ #ff0000   → ██ RED #cd0000 3.60:1 FAIL (3 uses)');
  });

  it('does not grade the default colors', () => {
    const background = new ColorMapping('#101010', {
      ansiColor: registry.byName('BACKGROUND'),
      uiSettings: ['editor.background'],
    });

    expect(
      formatMappingEntry(background, { slotColor: '#000000', background: '#000000' }, { quiet: true })
    ).toBe('██ #101010   → ██ BACKGROUND #000000 (1 use)');
  });

  it('marks colors without a slot', () => {
    expect(formatMappingEntry(new ColorMapping('#abcdef'), { slotColor: null, background: null })).toBe(
      '██ #abcdef   unassigned (0 uses)'
    );
  });
});

describe('ansi-map-show command', () => {
  let tempDir: string;
  let mappingPath: string;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ansi-map-show-test-'));
    mappingPath = path.join(tempDir, 'sample.ansi.json');
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    await fs.writeJson(mappingPath, {
      theme_name: 'Show Sample',
      color_mappings: [
        { color_code: '#999999', ansi_color: null, scopes: ['comment'] },
        { color_code: '#ff0000', ansi_color: 'RED', scopes: ['keyword'] },
        { color_code: '#000000', ansi_color: 'BACKGROUND', ui_settings: ['background'] },
      ],
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(tempDir);
  });

  it('lists entries in palette order', async () => {
    await ansiMapShow(mappingPath, { quiet: true }, createContext());

    expect(logSpy.mock.calls.map(call => call[0])).toEqual([
      '\nANSI mapping for Show Sample',
      '3 colors, 1 unassigned\n',
      '██ #000000   → BACKGROUND (1 use)',
      '██ #ff0000   → RED (1 use)',
      '██ #999999   unassigned (1 use)',
      undefined,
    ]);
  });

  it("asks the terminal for the colors it shows", async () => {
    const queryColor = vi.fn(async (num: number): Promise<string | null> => (num === -2 ? '#000000' : '#cd0000'));

    await ansiMapShow(mappingPath, { quiet: true }, createContext({ queryColor }));

    expect(logSpy).toHaveBeenCalledWith('██ #ff0000   → ██ RED #cd0000 3.60:1 FAIL (1 use)');
    expect(queryColor.mock.calls.map(call => call[0]).sort((a, b) => a - b)).toEqual([-2, 1]);
  });
});
