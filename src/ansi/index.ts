/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * ANSI color mapping
 *
 * Maps the colors of an editor theme onto the terminal's 16-color palette:
 * - Palette registry with the 16 ANSI slots plus default foreground/background
 * - Collection of every distinct theme color and where it is used
 * - Curated mapping file (color -> slot) with merge across regenerations
 * - Application of a mapping, replacing colors with slot placeholders
 * - WCAG contrast helpers for grading assignments
 *
 * @example
 * ```typescript
 * const registry = getPaletteRegistry();
 * const mapping = collectColorUsages(theme);
 * mapping.assign('#ff0000', registry.byName('red'));
 * const { theme: ansiTheme, unmappedColors } = applyAnsiMapping(theme, mapping);
 * ```
 */

export type {
  PaletteSlot,
  SlotName,
  SlotNumber,
  SlotDefinition,
  TerminalColorSource,
  PaletteRegistryOptions,
} from './palette.js';

export {
  ANSI_SLOT_NUMBERS,
  SLOT_DEFINITIONS,
  PaletteRegistry,
  encodeAnsiHex,
  decodeAnsiHex,
  initPaletteRegistry,
  getPaletteRegistry,
  resetPaletteRegistry,
} from './palette.js';

export type { SerializedAnsiMapping, SerializedColorMapping } from './mapping.js';
export { AnsiMapping, ColorMapping, parseAnsiMapping, serializeAnsiMapping, MappingParseError } from './mapping.js';
export { loadAnsiMapping, saveAnsiMapping } from './mappingFile.js';
export { collectColorUsages } from './collector.js';

export type { ApplyOptions, ApplyResult, UnmappedColorWarning, UsageSite } from './applier.js';
export { applyAnsiMapping, isUnmapped, unmappedColorCodes, DEFAULT_ANSI_NAME_SUFFIX } from './applier.js';

export type { ContrastRating } from './contrast.js';
export { contrastRatio, contrastRating, relativeLuminance, parseHexColor } from './contrast.js';
