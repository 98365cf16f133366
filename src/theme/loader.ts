/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import path from 'node:path';
import { ThemeLoadError } from '../errors.js';
import { loadTmTheme } from './tmTheme.js';
import type { AnyTheme } from './types.js';
import { loadVSCodeTheme } from './vscodeTheme.js';

export type ThemeFormat = AnyTheme['format'];

const FORMAT_BY_EXTENSION: Record<string, ThemeFormat> = {
  '.json': 'vscode',
  '.jsonc': 'vscode',
  '.tmtheme': 'tmtheme',
  '.plist': 'tmtheme',
};

/**
 * Theme format of a file, judged by its extension.
 */
export function detectThemeFormat(filePath: string): ThemeFormat | null {
  const extension = path.extname(filePath).toLowerCase();
  return Object.hasOwn(FORMAT_BY_EXTENSION, extension) ? FORMAT_BY_EXTENSION[extension] : null;
}

/**
 * Load a VS Code (.json/.jsonc) or TextMate (.tmTheme/.plist) theme.
 */
export async function loadTheme(filePath: string): Promise<AnyTheme> {
  const format = detectThemeFormat(filePath);
  if (format === 'vscode') {
    return loadVSCodeTheme(filePath);
  }
  if (format === 'tmtheme') {
    return loadTmTheme(filePath);
  }
  throw new ThemeLoadError(
    'Unsupported theme file extension (expected .json, .jsonc, .tmTheme or .plist)',
    filePath
  );
}
