/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Base class for every error this tool raises on purpose.
 * The CLI prints these as a single red line; anything else is a crash.
 */
export class AnsiThemeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AnsiThemeError';
  }
}

/**
 * A palette slot number or name that does not exist.
 */
export class InvalidSlotError extends AnsiThemeError {
  constructor(public readonly value: string | number) {
    super(`Invalid ANSI color name or number: ${value}`);
    this.name = 'InvalidSlotError';
  }
}

/**
 * A malformed hex color.
 */
export class InvalidColorError extends AnsiThemeError {
  constructor(public readonly value: string) {
    super(`Invalid hex color: "${value}" (expected #RRGGBB)`);
    this.name = 'InvalidColorError';
  }
}

/**
 * The slot table itself is broken, or was built twice with different tables.
 */
export class ConfigurationError extends AnsiThemeError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A color that is duplicated in, or missing from, an in-memory mapping.
 */
export class MappingError extends AnsiThemeError {
  constructor(
    message: string,
    public readonly colorCode: string
  ) {
    super(`${message}: ${colorCode}`);
    this.name = 'MappingError';
  }
}

export class MappingFileError extends AnsiThemeError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown
  ) {
    super(`${message} (${filePath})`, cause === undefined ? undefined : { cause });
    this.name = 'MappingFileError';
  }
}

export class ThemeLoadError extends AnsiThemeError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown
  ) {
    super(`${message} (${filePath})`, cause === undefined ? undefined : { cause });
    this.name = 'ThemeLoadError';
  }
}

/**
 * The user config file exists but cannot be used.
 */
export class ConfigError extends AnsiThemeError {
  constructor(
    message: string,
    public readonly configPath: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ConfigError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
