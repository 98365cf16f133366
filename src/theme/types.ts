/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Settings of a syntax highlighting rule.
 */
export interface TokenRuleSettings {
  foreground?: string;
  background?: string;
  fontStyle?: string;
}

/**
 * A syntax highlighting rule. The scope may be a single selector or a list.
 */
export interface TokenRule {
  name?: string;
  scope?: string | string[];
  settings: TokenRuleSettings;
}

/**
 * Format-independent view of a color theme: named UI settings and
 * token rules. Both theme formats extend this.
 */
export interface ColorTheme {
  name: string;
  uiSettings: Record<string, string>;
  tokenRules: TokenRule[];
}

export type ThemeKind = 'light' | 'dark';

/**
 * Compiled VS Code color theme.
 */
export interface VSCodeTheme extends ColorTheme {
  format: 'vscode';
  schema?: string;
  type?: ThemeKind;
  semanticHighlighting?: boolean;
  semanticTokenColors?: Record<string, unknown>;
}

/**
 * TextMate theme (.tmTheme property list).
 */
export interface TmTheme extends ColorTheme {
  format: 'tmtheme';
  uuid?: string;
  author?: string;
  comment?: string;
  semanticClass?: string;
}

export type AnyTheme = VSCodeTheme | TmTheme;

/**
 * Check if a value looks like a hex color: #rgb, #rgba, #rrggbb or #rrggbbaa.
 */
export function isHexColor(value: unknown): value is string {
  if (typeof value !== 'string') return false;
  return /^#([0-9a-fA-F]{3,4}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/.test(value);
}

/**
 * Non-empty scopes of a rule as a list.
 */
export function ruleScopes(rule: TokenRule): string[] {
  if (rule.scope === undefined) return [];
  const scopes = Array.isArray(rule.scope) ? rule.scope : [rule.scope];
  return scopes.filter(scope => scope.trim() !== '');
}
