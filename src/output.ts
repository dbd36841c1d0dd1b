import pc from 'picocolors';
import type { PrereqFailure } from './types.js';

/** Leveled logger handed to every long-running component */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

function timestamp(): string {
  return pc.dim(new Date().toISOString().slice(11, 19));
}

/**
 * Console logger with colored levels.
 * Debug lines are only printed when `verbose` is set.
 */
export function createConsoleLogger(verbose = false): Logger {
  return {
    debug(message) {
      if (verbose) console.log(`${timestamp()} ${pc.dim(`[debug] ${message}`)}`);
    },
    info(message) {
      console.log(`${timestamp()} ${message}`);
    },
    warn(message) {
      console.error(`${timestamp()} ${pc.yellow(`⚠ ${message}`)}`);
    },
    error(message) {
      console.error(`${timestamp()} ${pc.red(`✖ ${message}`)}`);
    },
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Print prerequisite failures as red errors with actionable help.
 */
export function printErrors(failures: PrereqFailure[]): void {
  for (const f of failures) {
    console.error(pc.red(`✖ ${f.message}`));
    console.error(pc.dim(`  ${f.help}`));
  }
}

/**
 * Format milliseconds as human-readable duration.
 * Under 60s: "1.2s", over 60s: "1m 12s"
 */
export function formatDuration(ms: number): string {
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}
