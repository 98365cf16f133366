/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import fs from 'fs-extra';
import chalk from 'chalk';
import enquirer from 'enquirer';
import { collectColorUsages, loadAnsiMapping, saveAnsiMapping, type AnsiMapping } from '../ansi/index.js';
import { loadTheme } from '../theme/index.js';
import type { CommandContext } from '../types.js';
import { pluralize } from '../ui/displayUtils.js';

export type ConfirmFn = (message: string) => Promise<boolean>;

export interface AnsiMapGenOptions {
  /** Overwrite an existing mapping without asking */
  force?: boolean;
  confirm?: ConfirmFn;
}

export interface AnsiMapGenResult {
  written: boolean;
  mapping: AnsiMapping;
  carried: number;
}

async function promptConfirm(message: string): Promise<boolean> {
  const answer = await enquirer.prompt<{ overwrite: boolean }>({
    type: 'confirm',
    name: 'overwrite',
    message,
    initial: false
  });
  return answer.overwrite;
}

/**
 * Collect a theme's colors and write them as a mapping file. Slots already
 * assigned in an existing file at the output path are carried over.
 */
export async function ansiMapGen(
  input: string,
  output: string,
  options: AnsiMapGenOptions,
  ctx: CommandContext
): Promise<AnsiMapGenResult> {
  const theme = await loadTheme(input);
  const mapping = collectColorUsages(theme);
  let carried = 0;

  if (await fs.pathExists(output)) {
    const prior = await loadAnsiMapping(output, ctx.registry);
    if (!options.force) {
      const confirm = options.confirm ?? promptConfirm;
      const overwrite = await confirm(`${output} exists. Update it (existing assignments are kept)?`);
      if (!overwrite) {
        console.log(chalk.gray('Canceled: mapping file left unchanged.'));
        return { written: false, mapping, carried };
      }
    }
    carried = mapping.mergeFrom(prior);
  }

  await saveAnsiMapping(output, mapping);

  console.log(chalk.green(`✓ Wrote ${pluralize(mapping.size, 'color')} of "${mapping.themeName}" to ${output}`));
  if (carried > 0) {
    console.log(chalk.gray(`  Kept ${pluralize(carried, 'existing assignment')}`));
  }
  const unassigned = mapping.unassigned().length;
  if (unassigned > 0) {
    console.log(chalk.gray(`  ${pluralize(unassigned, 'color')} still need an ansi_color`));
  }

  return { written: true, mapping, carried };
}
