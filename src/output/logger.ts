/**
 * compliance-csv — Diagnostic logging.
 *
 * Writers and output sessions take a Logger instead of printing directly,
 * so the CLI decides where diagnostics go and tests can capture them.
 */

import chalk from 'chalk';
import type { WriteFailure } from '../types/index.js';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  /** Suppress info messages; warnings and errors still print */
  quiet?: boolean;
}

/** Logger that prints to stderr, coloured like the CLI's diagnostics. */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  return {
    info(message) {
      if (!options.quiet) console.error(message);
    },
    warn(message) {
      console.error(chalk.yellow(`⚠ ${message}`));
    },
    error(message) {
      console.error(chalk.red(`✗ ${message}`));
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};

// ─── Error description ───────────────────────────────────────────────

// First "file:line:col" in a V8 stack frame
const FRAME_LINE = /:(\d+):\d+\)?$/;

/**
 * Extract class name, originating line and message from a thrown value.
 * The line comes from the first stack frame that carries a position.
 */
export function describeError(err: unknown): WriteFailure {
  if (!(err instanceof Error)) {
    return { name: 'Error', line: 0, message: String(err) };
  }
  let line = 0;
  const frames = (err.stack ?? '').split('\n').slice(1);
  for (const frame of frames) {
    const m = frame.trim().match(FRAME_LINE);
    if (m) {
      line = Number(m[1]);
      break;
    }
  }
  return { name: err.constructor.name || err.name, line, message: err.message };
}

export function formatFailure(failure: WriteFailure): string {
  return `${failure.name}[${failure.line}]: ${failure.message}`;
}
