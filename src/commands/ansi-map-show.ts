/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import chalk from 'chalk';
import {
  contrastRatio,
  contrastRating,
  loadAnsiMapping,
  type ColorMapping,
  type PaletteRegistry,
} from '../ansi/index.js';
import type { CommandContext } from '../types.js';
import { colorRating, colorSwatch, formatRatio, pluralize } from '../ui/displayUtils.js';

export interface AnsiMapShowOptions {
  quiet?: boolean;
}

export interface MappingLineColors {
  /** Terminal's real color for the assigned slot */
  slotColor: string | null;
  /** Terminal's real background */
  background: string | null;
}

function slotLabel(entry: ColorMapping, colors: MappingLineColors): string {
  if (!entry.ansiColor) {
    return chalk.yellow('unassigned');
  }

  const name = chalk.bold(entry.ansiColor.name);
  if (!colors.slotColor) {
    return `→ ${name}`;
  }

  let label = `→ ${colorSwatch(colors.slotColor)} ${name}` + chalk.gray(` ${colors.slotColor}`);
  if (colors.background && !entry.ansiColor.isSpecial) {
    const ratio = contrastRatio(colors.slotColor, colors.background);
    label += chalk.gray(` ${formatRatio(ratio)} `) + colorRating(contrastRating(ratio));
  }
  return label;
}

/**
 * One entry: swatch, color, assigned slot and usage count, followed by
 * the usage sites unless quiet.
 */
export function formatMappingEntry(
  entry: ColorMapping,
  colors: MappingLineColors,
  options: AnsiMapShowOptions = {}
): string {
  const lines = [
    `${colorSwatch(entry.colorCode)} ${entry.colorCode.padEnd(9)} ${slotLabel(entry, colors)} ` +
      chalk.gray(`(${pluralize(entry.usageCount, 'use')})`),
  ];

  if (!options.quiet) {
    if (entry.uiSettings.size > 0) {
      lines.push(chalk.gray(`    ui: ${Array.from(entry.uiSettings).sort().join(', ')}`));
    }
    if (entry.scopes.size > 0) {
      lines.push(chalk.gray(`    scopes: ${Array.from(entry.scopes).sort().join(', ')}`));
    }
  }

  return lines.join('\n');
}

async function lineColors(entry: ColorMapping, registry: PaletteRegistry, background: string | null): Promise<MappingLineColors> {
  const slotColor = entry.ansiColor ? await registry.resolvedColor(entry.ansiColor) : null;
  return { slotColor, background };
}

export async function ansiMapShow(file: string, options: AnsiMapShowOptions, ctx: CommandContext): Promise<void> {
  const { registry } = ctx;
  const mapping = await loadAnsiMapping(file, registry);
  const entries = mapping.sortedByFamily(registry);
  const background = await registry.resolvedColor(registry.byName('BACKGROUND'));

  console.log(chalk.cyan(`\nANSI mapping for ${mapping.themeName}`));
  console.log(
    chalk.gray(`${pluralize(mapping.size, 'color')}, ${mapping.unassigned().length} unassigned\n`)
  );

  for (const entry of entries) {
    console.log(formatMappingEntry(entry, await lineColors(entry, registry, background), options));
  }
  console.log();
}
