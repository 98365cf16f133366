/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ANSI_SLOT_NUMBERS, type SlotNumber, type TerminalColorSource } from '../ansi/palette.js';
import { safeSetRawMode, type RawModeInput } from './rawMode.js';

const ESC = '\x1b';
const BEL = '\x07';
const ST = `${ESC}\\`;
const MAX_REPLY_LENGTH = 128;

const REPLY_PATTERN = /\](4;\d+|10|11);rgb:([0-9a-fA-F]{1,4})\/([0-9a-fA-F]{1,4})\/([0-9a-fA-F]{1,4})/;

type DataListener = (chunk: Buffer | string) => void;

export interface TerminalInput extends RawModeInput {
  on(event: 'data', listener: DataListener): unknown;
  removeListener(event: 'data', listener: DataListener): unknown;
  resume(): unknown;
  pause(): unknown;
  readonly readableFlowing?: boolean | null;
}

export interface TerminalOutput {
  isTTY?: boolean;
  write(data: string): unknown;
}

export interface OscQueryOptions {
  /** Per-attempt wait for the terminal's reply */
  timeoutMs?: number;
  /** Extra attempts after a timeout */
  retries?: number;
}

export const DEFAULT_QUERY_TIMEOUT_MS = 100;
export const DEFAULT_QUERY_RETRIES = 2;

/**
 * OSC query for a slot: 4;n for the palette, 10 for the default
 * foreground and 11 for the default background.
 */
export function buildOscQuery(num: SlotNumber): string {
  if (num === ANSI_SLOT_NUMBERS.FOREGROUND) return `${ESC}]10;?${BEL}`;
  if (num === ANSI_SLOT_NUMBERS.BACKGROUND) return `${ESC}]11;?${BEL}`;
  return `${ESC}]4;${num};?${BEL}`;
}

/**
 * Selector a reply to the query for a slot starts with, e.g. `4;1`.
 */
function replySelector(num: SlotNumber): string {
  if (num === ANSI_SLOT_NUMBERS.FOREGROUND) return '10';
  if (num === ANSI_SLOT_NUMBERS.BACKGROUND) return '11';
  return `4;${num}`;
}

function scaleChannel(hex: string): number {
  const max = 16 ** hex.length - 1;
  return Math.round((parseInt(hex, 16) / max) * 255);
}

/**
 * Parse a reply like `ESC]4;1;rgb:cdcd/0000/0000 BEL` into `#cd0000`.
 * With a slot, replies to any other query are rejected.
 */
export function parseOscColorReply(reply: string, num?: SlotNumber): string | null {
  const match = REPLY_PATTERN.exec(reply);
  if (!match) return null;
  if (num !== undefined && match[1] !== replySelector(num)) return null;

  const channels = [match[2], match[3], match[4]].map(scaleChannel);
  return `#${channels.map(c => c.toString(16).padStart(2, '0')).join('')}`;
}

/**
 * Position and length of the first reply terminator (BEL or ST).
 */
function replyEnd(buffer: string): { index: number; length: number } | null {
  const bel = buffer.indexOf(BEL);
  const st = buffer.indexOf(ST);
  if (bel !== -1 && (st === -1 || bel < st)) return { index: bel, length: BEL.length };
  if (st !== -1) return { index: st, length: ST.length };
  return null;
}

function readReply(
  input: TerminalInput,
  output: TerminalOutput,
  num: SlotNumber,
  timeoutMs: number
): Promise<string | null> {
  return new Promise(resolve => {
    let buffer = '';

    // Replies to earlier queries (late or retried) are skipped.
    const onData: DataListener = chunk => {
      buffer += chunk.toString();
      let end = replyEnd(buffer);
      while (end) {
        const color = parseOscColorReply(buffer.slice(0, end.index), num);
        buffer = buffer.slice(end.index + end.length);
        if (color) {
          finish(color);
          return;
        }
        end = replyEnd(buffer);
      }
      if (buffer.length > MAX_REPLY_LENGTH) {
        finish(null);
      }
    };

    const timer = setTimeout(() => finish(null), timeoutMs);

    const finish = (color: string | null) => {
      clearTimeout(timer);
      input.removeListener('data', onData);
      resolve(color);
    };

    input.on('data', onData);
    input.resume();
    output.write(buildOscQuery(num));
  });
}

/**
 * Asks the terminal for its colors with OSC 4/10/11 escape sequences.
 * Queries run one at a time; a terminal that does not answer yields null.
 */
export class OscTerminalColorSource implements TerminalColorSource {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly input: TerminalInput,
    private readonly output: TerminalOutput,
    options: OscQueryOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
    this.retries = options.retries ?? DEFAULT_QUERY_RETRIES;
  }

  queryColor(num: SlotNumber): Promise<string | null> {
    const next = this.queue.then(() => this.runQuery(num));
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async runQuery(num: SlotNumber): Promise<string | null> {
    if (!this.input.isTTY || !this.output.isTTY) {
      return null;
    }

    const wasRaw = this.input.isRaw ?? false;
    const wasFlowing = this.input.readableFlowing === true;
    if (!safeSetRawMode(this.input, true)) {
      return null;
    }

    try {
      for (let attempt = 0; attempt <= this.retries; attempt++) {
        const color = await readReply(this.input, this.output, num, this.timeoutMs);
        if (color) return color;
      }
      return null;
    } finally {
      safeSetRawMode(this.input, wasRaw);
      // A flowing stdin keeps the process alive
      if (!wasFlowing) {
        this.input.pause();
      }
    }
  }
}

/**
 * Color source bound to the process's own terminal.
 */
export function createStdioColorSource(options: OscQueryOptions = {}): OscTerminalColorSource {
  return new OscTerminalColorSource(process.stdin, process.stdout, options);
}
