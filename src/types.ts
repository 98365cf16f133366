/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { z } from 'zod';
import type { PaletteRegistry } from './ansi/palette.js';

export const TerminalSettingsSchema = z.object({
  /** Per-attempt wait for a color query reply */
  queryTimeoutMs: z.number().int().positive().optional(),
  /** Extra attempts after a query times out */
  retries: z.number().int().nonnegative().optional(),
  /** Set to false to never query the terminal */
  enabled: z.boolean().optional(),
});

export const AnsiThemeConfigSchema = z.object({
  terminal: TerminalSettingsSchema.optional(),
  /** Appended to the name of a theme after a mapping is applied */
  ansiNameSuffix: z.string().optional(),
});
export type AnsiThemeConfig = z.infer<typeof AnsiThemeConfigSchema>;

/**
 * Config with every default filled in.
 */
export interface LoadedConfig {
  configPath: string;
  terminal: {
    queryTimeoutMs: number;
    retries: number;
    enabled: boolean;
  };
  ansiNameSuffix: string;
}

export interface GlobalOptions {
  config?: string;
}

/**
 * Shared state handed to every command.
 */
export interface CommandContext {
  config: LoadedConfig;
  registry: PaletteRegistry;
}
