/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ConfigurationError, InvalidSlotError } from '../errors.js';

/**
 * Slot numbers of the terminal palette.
 * BACKGROUND and FOREGROUND are the terminal's default colors, 0-15 are the
 * 16 standard ANSI colors (8 normal + 8 bright).
 */
export const ANSI_SLOT_NUMBERS = {
  // Special colors
  BACKGROUND: -2,
  FOREGROUND: -1,
  // Normal colors (0-7)
  BLACK: 0,
  RED: 1,
  GREEN: 2,
  YELLOW: 3,
  BLUE: 4,
  MAGENTA: 5,
  CYAN: 6,
  WHITE: 7,
  // Bright colors (8-15)
  BLACK_BRIGHT: 8,
  RED_BRIGHT: 9,
  GREEN_BRIGHT: 10,
  YELLOW_BRIGHT: 11,
  BLUE_BRIGHT: 12,
  MAGENTA_BRIGHT: 13,
  CYAN_BRIGHT: 14,
  WHITE_BRIGHT: 15,
} as const;

export type SlotName = keyof typeof ANSI_SLOT_NUMBERS;
export type SlotNumber = (typeof ANSI_SLOT_NUMBERS)[SlotName];

export type SlotDefinition = readonly [SlotName, SlotNumber];

export const SLOT_DEFINITIONS: readonly SlotDefinition[] = Object.entries(ANSI_SLOT_NUMBERS).filter(
  (entry): entry is [SlotName, SlotNumber] => isSlotName(entry[0])
);

export const MIN_SLOT_NUMBER = -2;
export const MAX_SLOT_NUMBER = 15;

const FOREGROUND_HEX = '#00000001';
const BACKGROUND_HEX = '#00000002';
const PALETTE_HEX_PATTERN = /^#([0-9a-fA-F]{2})000000$/;

/**
 * One palette slot. There is exactly one instance per slot in a registry.
 */
export interface PaletteSlot {
  readonly num: SlotNumber;
  readonly name: SlotName;
  /** Display name, e.g. "Red Bright" */
  readonly title: string;
  readonly isBright: boolean;
  readonly isSpecial: boolean;
  readonly isForeground: boolean;
  readonly isBackground: boolean;
  /** Placeholder color that encodes the slot number */
  readonly ansiHex: string;
}

function isSlotName(value: string): value is SlotName {
  return Object.prototype.hasOwnProperty.call(ANSI_SLOT_NUMBERS, value);
}

function isSlotNumber(value: number): value is SlotNumber {
  return Number.isInteger(value) && value >= MIN_SLOT_NUMBER && value <= MAX_SLOT_NUMBER;
}

function toTitle(name: string): string {
  return name
    .split('_')
    .map(word => word.charAt(0) + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Encode a slot number the way bat reads ANSI themes: the red channel holds
 * the palette index with a zero alpha, and the two default colors use
 * alpha 01/02.
 */
export function encodeAnsiHex(num: SlotNumber): string {
  if (num === ANSI_SLOT_NUMBERS.FOREGROUND) return FOREGROUND_HEX;
  if (num === ANSI_SLOT_NUMBERS.BACKGROUND) return BACKGROUND_HEX;
  return `#${num.toString(16).padStart(2, '0')}000000`;
}

/**
 * Recover the slot number from a placeholder color, or null if the value
 * is not a placeholder.
 */
export function decodeAnsiHex(hex: string): SlotNumber | null {
  const lower = hex.toLowerCase();
  if (lower === FOREGROUND_HEX) return ANSI_SLOT_NUMBERS.FOREGROUND;
  if (lower === BACKGROUND_HEX) return ANSI_SLOT_NUMBERS.BACKGROUND;

  const match = PALETTE_HEX_PATTERN.exec(hex);
  if (!match) return null;

  const num = parseInt(match[1], 16);
  return num >= 0 && isSlotNumber(num) ? num : null;
}

function createSlot(name: SlotName, num: SlotNumber): PaletteSlot {
  return Object.freeze({
    num,
    name,
    title: toTitle(name),
    isBright: num >= 8,
    isSpecial: num < 0,
    isForeground: num === ANSI_SLOT_NUMBERS.FOREGROUND,
    isBackground: num === ANSI_SLOT_NUMBERS.BACKGROUND,
    ansiHex: encodeAnsiHex(num),
  });
}

/**
 * Supplies the real color the terminal renders for a slot.
 * Resolves to null when the terminal does not answer.
 */
export interface TerminalColorSource {
  queryColor(num: SlotNumber): Promise<string | null>;
}

/**
 * Immutable lookup tables for the 18 palette slots, plus a cache of the
 * colors the terminal reports for them.
 */
export class PaletteRegistry {
  readonly definitions: readonly SlotDefinition[];
  private readonly byNum = new Map<number, PaletteSlot>();
  private readonly byNameUpper = new Map<string, PaletteSlot>();
  private readonly byFamily: readonly PaletteSlot[];
  private readonly resolved = new Map<SlotNumber, Promise<string | null>>();

  constructor(
    readonly colorSource: TerminalColorSource | null = null,
    definitions: readonly SlotDefinition[] = SLOT_DEFINITIONS
  ) {
    validateDefinitions(definitions);
    this.definitions = definitions;

    for (const [name, num] of definitions) {
      const slot = createSlot(name, num);
      this.byNum.set(num, slot);
      this.byNameUpper.set(name, slot);
    }

    const family: PaletteSlot[] = [
      this.bySlotNumber(ANSI_SLOT_NUMBERS.BACKGROUND),
      this.bySlotNumber(ANSI_SLOT_NUMBERS.FOREGROUND),
    ];
    for (let num = 0; num < 8; num++) {
      family.push(this.bySlotNumber(num), this.bySlotNumber(num + 8));
    }
    this.byFamily = family;
  }

  get size(): number {
    return this.byNum.size;
  }

  bySlotNumber(num: number): PaletteSlot {
    const slot = this.byNum.get(num);
    if (!slot) {
      throw new InvalidSlotError(num);
    }
    return slot;
  }

  byName(name: string): PaletteSlot {
    const slot = this.byNameUpper.get(name.trim().toUpperCase());
    if (!slot) {
      throw new InvalidSlotError(name);
    }
    return slot;
  }

  /**
   * Accept a slot name (any case), a number, or a numeric string.
   */
  parse(value: string | number): PaletteSlot {
    if (typeof value === 'number') {
      return this.bySlotNumber(value);
    }
    const trimmed = value.trim();
    if (/^-?\d+$/.test(trimmed)) {
      return this.bySlotNumber(parseInt(trimmed, 10));
    }
    return this.byName(trimmed);
  }

  encode(slot: PaletteSlot): string {
    return this.bySlotNumber(slot.num).ansiHex;
  }

  decode(hex: string): PaletteSlot | null {
    const num = decodeAnsiHex(hex);
    return num === null ? null : this.bySlotNumber(num);
  }

  /**
   * Non-bright variant of a slot. Special slots are their own base.
   */
  baseSlot(slot: PaletteSlot): PaletteSlot {
    return slot.isBright ? this.bySlotNumber(slot.num - 8) : slot;
  }

  /**
   * BACKGROUND, FOREGROUND, then each hue followed by its bright variant.
   */
  *familyOrder(): Generator<PaletteSlot> {
    yield* this.byFamily;
  }

  *numericOrder(): Generator<PaletteSlot> {
    for (let num = MIN_SLOT_NUMBER; num <= MAX_SLOT_NUMBER; num++) {
      yield this.bySlotNumber(num);
    }
  }

  familyIndex(slot: PaletteSlot): number {
    return this.byFamily.indexOf(this.bySlotNumber(slot.num));
  }

  /**
   * Color the terminal currently renders for the slot. Asked once per slot;
   * a failed or unanswered query is remembered as null.
   */
  resolvedColor(slot: PaletteSlot): Promise<string | null> {
    const cached = this.resolved.get(slot.num);
    if (cached) return cached;

    const pending = this.colorSource
      ? this.colorSource.queryColor(slot.num).catch((): null => null)
      : Promise.resolve(null);
    this.resolved.set(slot.num, pending);
    return pending;
  }

  resetResolvedColors(): void {
    this.resolved.clear();
  }
}

function validateDefinitions(definitions: readonly SlotDefinition[]): void {
  const expected = Object.keys(ANSI_SLOT_NUMBERS).length;
  if (definitions.length !== expected) {
    throw new ConfigurationError(`Expected ${expected} palette slots, got ${definitions.length}`);
  }

  const names = new Set<string>();
  const nums = new Set<number>();
  for (const [name, num] of definitions) {
    if (!isSlotName(name)) {
      throw new ConfigurationError(`Unknown palette slot: ${name}`);
    }
    if (ANSI_SLOT_NUMBERS[name] !== num) {
      throw new ConfigurationError(`Palette slot ${name} must have number ${ANSI_SLOT_NUMBERS[name]}, got ${num}`);
    }
    if (names.has(name) || nums.has(num)) {
      throw new ConfigurationError(`Duplicate palette slot: ${name} (${num})`);
    }
    names.add(name);
    nums.add(num);
  }
}

function sameDefinitions(a: readonly SlotDefinition[], b: readonly SlotDefinition[]): boolean {
  return a.length === b.length && a.every(([name, num], i) => b[i][0] === name && b[i][1] === num);
}

let registry: PaletteRegistry | null = null;

export interface PaletteRegistryOptions {
  colorSource?: TerminalColorSource | null;
  definitions?: readonly SlotDefinition[];
}

/**
 * Build the process-wide registry. Later calls return the same instance;
 * a later call with a different slot table or color source is a
 * configuration error. Leaving `colorSource` out accepts whichever source
 * the registry has.
 */
export function initPaletteRegistry(options: PaletteRegistryOptions = {}): PaletteRegistry {
  const definitions = options.definitions ?? SLOT_DEFINITIONS;
  if (registry) {
    if (!sameDefinitions(registry.definitions, definitions)) {
      throw new ConfigurationError('Palette registry already initialized with different slot definitions');
    }
    if (options.colorSource !== undefined && options.colorSource !== registry.colorSource) {
      throw new ConfigurationError('Palette registry already initialized with a different color source');
    }
    return registry;
  }

  registry = new PaletteRegistry(options.colorSource ?? null, definitions);
  return registry;
}

export function getPaletteRegistry(): PaletteRegistry {
  return registry ?? initPaletteRegistry();
}

/**
 * Drop the process-wide registry. Only meant for tests.
 */
export function resetPaletteRegistry(): void {
  registry = null;
}
