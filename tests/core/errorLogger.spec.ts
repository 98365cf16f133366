/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import path from 'node:path';
import os from 'node:os';
import { ErrorLogger, type ErrorLogEntry } from '../../src/core/errorLogger.js';

describe('ErrorLogger', () => {
  let tempDir: string;
  let logPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'error-logger-test-'));
    logPath = path.join(tempDir, 'logs', 'error.log');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(tempDir);
  });

  it('appends entries with error, context and version', async () => {
    const logger = new ErrorLogger('1.2.3', logPath);

    await logger.log(new TypeError('first failure'), { command: 'convert' });
    await logger.log('second failure');

    const content = await fs.readFile(logPath, 'utf-8');
    const entries: ErrorLogEntry[] = content
      .split('\n---\n')
      .filter(chunk => chunk.trim() !== '')
      .map(chunk => JSON.parse(chunk));
    expect(entries).toHaveLength(2);
    expect(entries[0].error).toMatchObject({ name: 'TypeError', message: 'first failure' });
    expect(entries[0].context).toEqual({ command: 'convert' });
    expect(entries[0].cli.version).toBe('1.2.3');
    expect(entries[1].error).toMatchObject({ name: 'Error', message: 'second failure' });
  });

  it('does not throw when the log cannot be written', async () => {
    const blocker = path.join(tempDir, 'blocker');
    await fs.writeFile(blocker, '');
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ErrorLogger('1.0.0', path.join(blocker, 'error.log'));

    await expect(logger.log(new Error('lost'))).resolves.toBeUndefined();
    expect(consoleError).toHaveBeenCalledTimes(1);
  });

  it('exposes its log path', () => {
    expect(new ErrorLogger('1.0.0', logPath).getLogPath()).toBe(logPath);
  });
});
