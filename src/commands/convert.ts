/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import chalk from 'chalk';
import { applyAnsiMapping, loadAnsiMapping, unmappedColorCodes, type UnmappedColorWarning } from '../ansi/index.js';
import { loadTheme, saveTmTheme, toTmTheme } from '../theme/index.js';
import type { TmTheme } from '../theme/types.js';
import type { CommandContext } from '../types.js';
import { pluralize } from '../ui/displayUtils.js';

export interface ConvertOptions {
  ansiMapping?: string;
}

export interface ConvertResult {
  theme: TmTheme;
  unmappedColors: UnmappedColorWarning[];
}

/**
 * Warning block listing each distinct unmapped color once.
 */
export function formatUnmappedWarning(report: readonly UnmappedColorWarning[]): string {
  const counts = unmappedColorCodes(report);
  const lines = [chalk.yellow(`⚠ ${pluralize(counts.size, 'color')} left unmapped:`)];
  for (const [colorCode, count] of counts) {
    lines.push(chalk.yellow(`  ${colorCode}`) + chalk.gray(` (${pluralize(count, 'use')})`));
  }
  return lines.join('\n');
}

export async function convert(
  input: string,
  output: string,
  options: ConvertOptions,
  ctx: CommandContext
): Promise<ConvertResult> {
  const source = await loadTheme(input);
  let theme = toTmTheme(source);
  let unmappedColors: UnmappedColorWarning[] = [];

  if (options.ansiMapping) {
    const mapping = await loadAnsiMapping(options.ansiMapping, ctx.registry);
    const result = applyAnsiMapping(theme, mapping, { nameSuffix: ctx.config.ansiNameSuffix });
    theme = result.theme;
    unmappedColors = result.unmappedColors;
  }

  await saveTmTheme(output, theme);

  console.log(chalk.green(`✓ Converted ${input} → ${output}`));
  if (unmappedColors.length > 0) {
    console.log(formatUnmappedWarning(unmappedColors));
  }

  return { theme, unmappedColors };
}
