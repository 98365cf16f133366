/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';

export interface ErrorLogEntry {
    timestamp: string;
    error: {
        name: string;
        message: string;
        stack?: string;
    };
    context?: Record<string, unknown>;
    system: {
        platform: string;
        arch: string;
        release: string;
        nodeVersion: string;
    };
    cli: {
        version: string;
        cwd: string;
        command: string;
    };
}

const ENTRY_SEPARATOR = '\n---\n';

/**
 * Appends crash reports for unexpected errors to a log file.
 */
export class ErrorLogger {
    private readonly logPath: string;

    constructor(private readonly cliVersion: string, logPath: string) {
        this.logPath = logPath;
    }

    async log(error: unknown, context?: Record<string, unknown>): Promise<void> {
        const err = error instanceof Error ? error : new Error(String(error));
        try {
            await fs.ensureDir(path.dirname(this.logPath));

            const entry: ErrorLogEntry = {
                timestamp: new Date().toISOString(),
                error: {
                    name: err.name,
                    message: err.message,
                    stack: err.stack
                },
                context,
                system: {
                    platform: os.platform(),
                    arch: os.arch(),
                    release: os.release(),
                    nodeVersion: process.version
                },
                cli: {
                    version: this.cliVersion,
                    cwd: process.cwd(),
                    command: process.argv.slice(2).join(' ')
                }
            };

            await fs.appendFile(this.logPath, JSON.stringify(entry, null, 2) + ENTRY_SEPARATOR, 'utf-8');
        } catch (logError) {
            // Don't throw if logging fails - just console.error
            console.error('[ErrorLogger] Failed to write to error log:', logError);
        }
    }

    getLogPath(): string {
        return this.logPath;
    }
}
