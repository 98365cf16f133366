/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 *
 * Centralized constants for the ansi-theme CLI
 */
import os from 'node:os';
import path from 'node:path';

/**
 * Base directory for user configuration and logs.
 * Default: ~/.ansi-theme/
 * Override: Set ANSI_THEME_HOME environment variable
 */
export const ANSI_THEME_HOME = process.env.ANSI_THEME_HOME || path.join(os.homedir(), '.ansi-theme');

export const ANSI_THEME_PATHS = {
  /** config.json */
  config: path.join(ANSI_THEME_HOME, 'config.json'),

  /** Crash reports written by the CLI */
  errorLog: path.join(ANSI_THEME_HOME, 'error.log'),
} as const;

/** Environment variable naming an alternative config file */
export const CONFIG_ENV_VAR = 'ANSI_THEME_CONFIG';
