/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'fs-extra';
import path from 'node:path';
import JSON5 from 'json5';
import { z } from 'zod';
import { ThemeLoadError, errorMessage } from '../errors.js';
import type { TokenRule, VSCodeTheme } from './types.js';

const TokenColorSchema = z.object({
  name: z.string().optional(),
  scope: z.union([z.string(), z.array(z.string())]).optional(),
  settings: z
    .object({
      foreground: z.string().optional(),
      background: z.string().optional(),
      fontStyle: z.string().optional(),
    })
    .optional(),
});
export type VSCodeTokenColor = z.infer<typeof TokenColorSchema>;

export const VSCodeThemeFileSchema = z.object({
  $schema: z.string().optional(),
  type: z.enum(['light', 'dark']).optional(),
  name: z.string().optional(),
  include: z.unknown().optional(),
  semanticHighlighting: z.boolean().optional(),
  semanticTokenColors: z.record(z.unknown()).optional(),
  colors: z.record(z.string().nullable()).default({}),
  tokenColors: z.array(TokenColorSchema).default([]),
});

/**
 * Themes generated by VS Code's "Generate Color Theme From Current Settings"
 * repeat scopes when one theme overrides another; VS Code uses the last rule
 * for a scope. Split list scopes into one rule each, drop rules without a
 * scope or settings, and keep only the last rule per scope.
 */
export function normalizeTokenColors(tokenColors: readonly VSCodeTokenColor[]): TokenRule[] {
  const byScope = new Map<string, TokenRule>();

  for (const token of tokenColors) {
    if (token.scope === undefined || token.settings === undefined) continue;

    const scopes = Array.isArray(token.scope) ? token.scope : [token.scope];
    for (const scope of scopes) {
      const rule: TokenRule = { scope, settings: { ...token.settings } };
      if (token.name !== undefined) rule.name = token.name;
      byScope.set(scope, rule);
    }
  }

  return Array.from(byScope.values());
}

/**
 * Parse the text of a compiled VS Code theme (JSON with comments).
 */
export function parseVSCodeTheme(content: string, filePath: string): VSCodeTheme {
  let raw: unknown;
  try {
    raw = JSON5.parse(content);
  } catch (error) {
    throw new ThemeLoadError(`Invalid JSON in theme file: ${errorMessage(error)}`, filePath, error);
  }

  const parsed = VSCodeThemeFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ThemeLoadError(
      `Invalid VS Code theme: ${issue.path.join('.') || '(root)'}: ${issue.message}`,
      filePath,
      parsed.error
    );
  }

  const data = parsed.data;
  if (data.include !== undefined) {
    throw new ThemeLoadError(
      "Theme uses `include`; generate a compiled theme with VS Code's " +
        '`Developer: Generate Color Theme From Current Settings` first',
      filePath
    );
  }

  const uiSettings: Record<string, string> = {};
  for (const [key, value] of Object.entries(data.colors)) {
    if (value) uiSettings[key] = value;
  }

  const theme: VSCodeTheme = {
    format: 'vscode',
    name: data.name || path.parse(filePath).name,
    uiSettings,
    tokenRules: normalizeTokenColors(data.tokenColors),
  };
  if (data.$schema !== undefined) theme.schema = data.$schema;
  if (data.type !== undefined) theme.type = data.type;
  if (data.semanticHighlighting !== undefined) theme.semanticHighlighting = data.semanticHighlighting;
  if (data.semanticTokenColors !== undefined) theme.semanticTokenColors = data.semanticTokenColors;

  return theme;
}

export async function loadVSCodeTheme(filePath: string): Promise<VSCodeTheme> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ThemeLoadError(`Failed to read theme file: ${errorMessage(error)}`, filePath, error);
  }
  return parseVSCodeTheme(content, filePath);
}
