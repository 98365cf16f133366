#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
process.title = 'ansi-theme';
import { Command } from 'commander';
import chalk from 'chalk';
import packageJson from '../package.json' with { type: 'json' };
import { initPaletteRegistry } from './ansi/palette.js';
import { ansiMapGen } from './commands/ansi-map-gen.js';
import { ansiMapShow } from './commands/ansi-map-show.js';
import { checkContrast } from './commands/check-contrast.js';
import { convert } from './commands/convert.js';
import { palette } from './commands/palette.js';
import { loadConfig } from './config.js';
import { ANSI_THEME_PATHS } from './constants.js';
import { ErrorLogger } from './core/errorLogger.js';
import { AnsiThemeError } from './errors.js';
import { createStdioColorSource } from './terminal/oscColors.js';
import type { CommandContext, GlobalOptions } from './types.js';

const program = new Command();

async function createContext(): Promise<CommandContext> {
  const { config: configPath } = program.opts<GlobalOptions>();
  const config = await loadConfig(configPath);
  const colorSource = config.terminal.enabled
    ? createStdioColorSource({ timeoutMs: config.terminal.queryTimeoutMs, retries: config.terminal.retries })
    : null;
  return { config, registry: initPaletteRegistry({ colorSource }) };
}

/**
 * Print an error and set a failing exit code. Errors we did not raise
 * ourselves are also written to the error log.
 */
async function handleError(error: unknown): Promise<void> {
  process.exitCode = 1;
  if (error instanceof AnsiThemeError) {
    console.error(chalk.red(error.message));
    return;
  }

  const logger = new ErrorLogger(packageJson.version, ANSI_THEME_PATHS.errorLog);
  await logger.log(error);
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  console.error(chalk.gray(`Details were written to ${logger.getLogPath()}`));
}

function run<TArgs extends unknown[]>(action: (...args: TArgs) => Promise<unknown>) {
  return async (...args: TArgs): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      await handleError(error);
    }
  };
}

program
  .name('ansi-theme')
  .description('Convert editor color themes and map their colors onto the terminal ANSI palette')
  .version(packageJson.version)
  .option('--config <path>', 'Path to config file (default ~/.ansi-theme/config.json)');

program
  .command('convert')
  .description('Convert a VS Code (.json/.jsonc) or TextMate theme to a TextMate .tmTheme')
  .argument('<input>', 'Theme file to read')
  .argument('<output>', 'TextMate theme file to write')
  .option('--ansi-mapping <file>', 'Replace colors with ANSI placeholders using this mapping file')
  .action(run(async (input: string, output: string, opts: { ansiMapping?: string }) => {
    await convert(input, output, opts, await createContext());
  }));

program
  .command('ansi-map-gen')
  .description('Collect the colors of a theme into an ANSI mapping file, keeping existing assignments')
  .argument('<input-theme>', 'Theme file to read')
  .argument('<output-mapping-file>', 'Mapping JSON file to write')
  .option('-f, --force', 'Update an existing mapping file without asking', false)
  .action(run(async (input: string, output: string, opts: { force?: boolean }) => {
    await ansiMapGen(input, output, { force: opts.force }, await createContext());
  }));

program
  .command('ansi-map-show')
  .description('List the entries of a mapping file grouped by palette color')
  .argument('<mapping-file>', 'Mapping JSON file to read')
  .option('-q, --quiet', 'Hide the UI settings and scopes of each color', false)
  .action(run(async (file: string, opts: { quiet?: boolean }) => {
    await ansiMapShow(file, opts, await createContext());
  }));

program
  .command('check-contrast')
  .description('Print the WCAG contrast ratio of each foreground against a background')
  .argument('<bg-hex>', 'Background color (#RRGGBB)')
  .argument('<fg-hex...>', 'Foreground colors (#RRGGBB)')
  .action(run(async (background: string, foregrounds: string[]) => {
    checkContrast(background, foregrounds);
  }));

program
  .command('palette')
  .description("Show the terminal's palette and the placeholder color of each slot")
  .action(run(async () => {
    await palette(await createContext());
  }));

program.parseAsync(process.argv).catch(handleError);
