/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 *
 * Global test setup:
 * - Turns chalk colouring off so command output can be asserted as plain text
 */
import chalk from 'chalk';

chalk.level = 0;
