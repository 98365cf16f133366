/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'fs-extra';
import path from 'node:path';
import plist, { type PlistObject, type PlistValue } from 'plist';
import { z } from 'zod';
import { ThemeLoadError, errorMessage } from '../errors.js';
import type { TmTheme, TokenRule, TokenRuleSettings } from './types.js';

const TmSettingsItemSchema = z.object({
  name: z.string().optional(),
  scope: z.string().optional(),
  settings: z.record(z.string()),
});

export const TmThemeFileSchema = z.object({
  name: z.string().optional(),
  uuid: z.string().optional(),
  author: z.string().optional(),
  comment: z.string().optional(),
  semanticClass: z.string().optional(),
  settings: z.array(TmSettingsItemSchema),
});

function pickRuleSettings(settings: Record<string, string>): TokenRuleSettings {
  const result: TokenRuleSettings = {};
  if (settings.foreground !== undefined) result.foreground = settings.foreground;
  if (settings.background !== undefined) result.background = settings.background;
  if (settings.fontStyle !== undefined) result.fontStyle = settings.fontStyle;
  return result;
}

/**
 * Parse the XML of a .tmTheme property list. The first settings entry
 * without a scope holds the global (UI) settings.
 */
export function parseTmTheme(xml: string, filePath: string): TmTheme {
  let raw: PlistValue;
  try {
    raw = plist.parse(xml);
  } catch (error) {
    throw new ThemeLoadError(`Invalid property list: ${errorMessage(error)}`, filePath, error);
  }

  const parsed = TmThemeFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ThemeLoadError(
      `Invalid TextMate theme: ${issue.path.join('.') || '(root)'}: ${issue.message}`,
      filePath,
      parsed.error
    );
  }

  const data = parsed.data;
  const [first, ...rest] = data.settings;
  const hasGlobals = first !== undefined && first.scope === undefined;
  const ruleItems = hasGlobals ? rest : data.settings;

  const theme: TmTheme = {
    format: 'tmtheme',
    name: data.name || path.parse(filePath).name,
    uiSettings: hasGlobals ? { ...first.settings } : {},
    tokenRules: ruleItems.map(item => {
      const rule: TokenRule = { settings: pickRuleSettings(item.settings) };
      if (item.name !== undefined) rule.name = item.name;
      if (item.scope !== undefined) rule.scope = item.scope;
      return rule;
    }),
  };
  if (data.uuid !== undefined) theme.uuid = data.uuid;
  if (data.author !== undefined) theme.author = data.author;
  if (data.comment !== undefined) theme.comment = data.comment;
  if (data.semanticClass !== undefined) theme.semanticClass = data.semanticClass;

  return theme;
}

function compact(record: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined && value !== '') result[key] = value;
  }
  return result;
}

/**
 * Build the .tmTheme XML. Absent values are left out.
 */
export function buildTmTheme(theme: TmTheme): string {
  const rules: PlistObject[] = theme.tokenRules.map(rule => {
    const scope = Array.isArray(rule.scope) ? rule.scope.join(', ') : rule.scope;
    return {
      ...compact({ name: rule.name, scope }),
      settings: compact({ ...rule.settings }),
    };
  });

  const document: PlistObject = {
    ...compact({
      name: theme.name,
      uuid: theme.uuid,
      author: theme.author,
      comment: theme.comment,
      semanticClass: theme.semanticClass,
    }),
    settings: [{ settings: compact(theme.uiSettings) }, ...rules],
  };

  return plist.build(document);
}

export async function loadTmTheme(filePath: string): Promise<TmTheme> {
  let xml: string;
  try {
    xml = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ThemeLoadError(`Failed to read theme file: ${errorMessage(error)}`, filePath, error);
  }
  return parseTmTheme(xml, filePath);
}

export async function saveTmTheme(filePath: string, theme: TmTheme): Promise<void> {
  await fs.ensureDir(path.dirname(path.resolve(filePath)));
  await fs.writeFile(filePath, buildTmTheme(theme), 'utf-8');
}
