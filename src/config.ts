/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import fs from 'fs-extra';
import path from 'node:path';
import { DEFAULT_ANSI_NAME_SUFFIX } from './ansi/applier.js';
import { ANSI_THEME_PATHS, CONFIG_ENV_VAR } from './constants.js';
import { ConfigError, errorMessage } from './errors.js';
import { DEFAULT_QUERY_RETRIES, DEFAULT_QUERY_TIMEOUT_MS } from './terminal/oscColors.js';
import { AnsiThemeConfigSchema, type AnsiThemeConfig, type LoadedConfig } from './types.js';

export function getDefaultConfigPath(): string {
  return ANSI_THEME_PATHS.config;
}

/**
 * Resolve the config path: explicit path, then ANSI_THEME_CONFIG, then the
 * default under ~/.ansi-theme.
 */
export function resolveConfigPath(customPath?: string): string {
  const envPath = process.env[CONFIG_ENV_VAR];
  return path.resolve(customPath ?? envPath ?? getDefaultConfigPath());
}

/**
 * Load the user config. A missing file means defaults.
 */
export async function loadConfig(customPath?: string): Promise<LoadedConfig> {
  const configPath = resolveConfigPath(customPath);

  if (!(await fs.pathExists(configPath))) {
    return withDefaults({}, configPath);
  }

  let raw: unknown;
  try {
    raw = await fs.readJSON(configPath);
  } catch (error) {
    throw new ConfigError(`Failed to parse config at ${configPath}: ${errorMessage(error)}`, configPath, error);
  }

  const parsed = AnsiThemeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`${issue.path.join('.') || 'config'}: ${issue.message} in ${configPath}`, configPath);
  }

  return withDefaults(parsed.data, configPath);
}

function withDefaults(config: AnsiThemeConfig, configPath: string): LoadedConfig {
  return {
    configPath,
    terminal: {
      queryTimeoutMs: config.terminal?.queryTimeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS,
      retries: config.terminal?.retries ?? DEFAULT_QUERY_RETRIES,
      enabled: config.terminal?.enabled ?? true,
    },
    ansiNameSuffix: config.ansiNameSuffix ?? DEFAULT_ANSI_NAME_SUFFIX,
  };
}
