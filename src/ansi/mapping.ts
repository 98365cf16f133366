/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';
import { InvalidSlotError, MappingError } from '../errors.js';
import type { PaletteRegistry, PaletteSlot, SlotName } from './palette.js';

/**
 * One distinct color of a theme, the palette slot a human assigned to it,
 * and where the theme uses it.
 */
export class ColorMapping {
  ansiColor: PaletteSlot | null;
  readonly uiSettings: Set<string>;
  readonly scopes: Set<string>;

  constructor(
    readonly colorCode: string,
    init: { ansiColor?: PaletteSlot | null; uiSettings?: Iterable<string>; scopes?: Iterable<string> } = {}
  ) {
    this.ansiColor = init.ansiColor ?? null;
    this.uiSettings = new Set(init.uiSettings);
    this.scopes = new Set(init.scopes);
  }

  /** Total number of places this color is used */
  get usageCount(): number {
    return this.uiSettings.size + this.scopes.size;
  }

  get isAssigned(): boolean {
    return this.ansiColor !== null;
  }
}

/**
 * All color mappings of one theme, keyed by color code.
 */
export class AnsiMapping {
  private readonly byColor = new Map<string, ColorMapping>();

  constructor(
    public themeName: string,
    mappings: Iterable<ColorMapping> = []
  ) {
    for (const mapping of mappings) {
      if (this.byColor.has(mapping.colorCode)) {
        throw new MappingError('Duplicate color in mapping', mapping.colorCode);
      }
      this.byColor.set(mapping.colorCode, mapping);
    }
  }

  get size(): number {
    return this.byColor.size;
  }

  get(colorCode: string): ColorMapping | undefined {
    return this.byColor.get(colorCode);
  }

  has(colorCode: string): boolean {
    return this.byColor.has(colorCode);
  }

  /**
   * Entry for a color, created empty on first use.
   */
  ensure(colorCode: string): ColorMapping {
    let mapping = this.byColor.get(colorCode);
    if (!mapping) {
      mapping = new ColorMapping(colorCode);
      this.byColor.set(colorCode, mapping);
    }
    return mapping;
  }

  assign(colorCode: string, slot: PaletteSlot | null): void {
    const mapping = this.byColor.get(colorCode);
    if (!mapping) {
      throw new MappingError('Color not in mapping', colorCode);
    }
    mapping.ansiColor = slot;
  }

  entries(): ColorMapping[] {
    return Array.from(this.byColor.values());
  }

  unassigned(): ColorMapping[] {
    return this.entries().filter(mapping => !mapping.isAssigned);
  }

  /**
   * Carry slot assignments over from a previous mapping of the same theme.
   * Usages always come from this (fresh) mapping, and colors the theme no
   * longer uses are not brought back. Returns the number of carried slots.
   */
  mergeFrom(prior: AnsiMapping): number {
    let carried = 0;
    for (const mapping of this.byColor.values()) {
      const previous = prior.get(mapping.colorCode);
      if (previous?.ansiColor) {
        mapping.ansiColor = previous.ansiColor;
        carried++;
      }
    }
    return carried;
  }

  /**
   * Assigned entries in palette family order, then the unassigned ones.
   * Within a slot, most used first.
   */
  sortedByFamily(registry: PaletteRegistry): ColorMapping[] {
    const rank = (mapping: ColorMapping) =>
      mapping.ansiColor ? registry.familyIndex(mapping.ansiColor) : Number.MAX_SAFE_INTEGER;

    return this.entries().sort(
      (a, b) => rank(a) - rank(b) || compareByUsage(a, b)
    );
  }
}

function compareByUsage(a: ColorMapping, b: ColorMapping): number {
  return b.usageCount - a.usageCount || compareStrings(a.colorCode, b.colorCode);
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

//
// Persisted format
//

export const ColorMappingFileEntrySchema = z.object({
  color_code: z.string().min(1),
  ansi_color: z.union([z.string(), z.number().int()]).nullable().optional(),
  ui_settings: z.array(z.string()).default([]),
  scopes: z.array(z.string()).default([]),
});

export const AnsiMappingFileSchema = z.object({
  theme_name: z.string(),
  color_mappings: z.array(ColorMappingFileEntrySchema),
});

/**
 * JSON shape written to disk.
 */
export interface SerializedColorMapping {
  color_code: string;
  ansi_color: SlotName | null;
  ui_settings: string[];
  scopes: string[];
}

export interface SerializedAnsiMapping {
  theme_name: string;
  color_mappings: SerializedColorMapping[];
}

/**
 * Serialize with sorted usage lists; entries most used first, ties by color.
 */
export function serializeAnsiMapping(mapping: AnsiMapping): SerializedAnsiMapping {
  return {
    theme_name: mapping.themeName,
    color_mappings: mapping
      .entries()
      .sort(compareByUsage)
      .map(entry => ({
        color_code: entry.colorCode,
        ansi_color: entry.ansiColor?.name ?? null,
        ui_settings: Array.from(entry.uiSettings).sort(compareStrings),
        scopes: Array.from(entry.scopes).sort(compareStrings),
      })),
  };
}

/**
 * Problem found while reading a mapping document, with the offending value.
 */
export class MappingParseError extends Error {
  constructor(
    message: string,
    public readonly value: unknown
  ) {
    super(message);
    this.name = 'MappingParseError';
  }
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Build a mapping from parsed JSON. Slots may be given by name (any case),
 * number, or numeric string.
 */
export function parseAnsiMapping(data: unknown, registry: PaletteRegistry): AnsiMapping {
  const parsed = AnsiMappingFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new MappingParseError(`Invalid mapping document: ${formatZodIssues(parsed.error)}`, data);
  }

  const mapping = new AnsiMapping(parsed.data.theme_name);
  for (const entry of parsed.data.color_mappings) {
    if (mapping.has(entry.color_code)) {
      throw new MappingParseError(`Duplicate color_code: ${entry.color_code}`, entry.color_code);
    }

    let ansiColor: PaletteSlot | null = null;
    if (entry.ansi_color !== null && entry.ansi_color !== undefined) {
      try {
        ansiColor = registry.parse(entry.ansi_color);
      } catch (error) {
        if (error instanceof InvalidSlotError) {
          throw new MappingParseError(
            `Invalid ansi_color for ${entry.color_code}: ${error.value}`,
            entry.ansi_color
          );
        }
        throw error;
      }
    }

    const colorMapping = mapping.ensure(entry.color_code);
    colorMapping.ansiColor = ansiColor;
    entry.ui_settings.forEach(setting => colorMapping.uiSettings.add(setting));
    entry.scopes.forEach(scope => colorMapping.scopes.add(scope));
  }

  return mapping;
}
