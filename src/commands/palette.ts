/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import chalk from 'chalk';
import type { PaletteSlot } from '../ansi/index.js';
import type { CommandContext } from '../types.js';
import { colorSwatch } from '../ui/displayUtils.js';

export function formatPaletteSlot(slot: PaletteSlot, color: string | null): string {
  const num = String(slot.num).padStart(3);
  return `${num}  ${colorSwatch(color)} ${slot.title.padEnd(14)} ${slot.ansiHex}  ${color ?? chalk.gray('unknown')}`;
}

export async function palette(ctx: CommandContext): Promise<void> {
  const { registry } = ctx;
  console.log(chalk.cyan('\nTerminal palette\n'));
  for (const slot of registry.familyOrder()) {
    console.log(formatPaletteSlot(slot, await registry.resolvedColor(slot)));
  }
  console.log();
}
