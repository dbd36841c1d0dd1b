import { sanitizeError } from './errors.js';
import type { Logger } from './output.js';

/** The user actions an interactive session can trigger */
export interface CommandTarget {
  markAllSeen(): void;
  refreshNow(): Promise<void>;
  openPR(url: string): void;
}

export interface CommandContext {
  target: CommandTarget;
  /** URL of the 1-based menu row, if there is one */
  urlAt(position: number): string | undefined;
  openUrl(url: string): void;
  logger: Logger;
}

export type CommandResult = 'continue' | 'quit';

export const HELP_TEXT = [
  'm        mark all seen',
  'r        refresh now',
  '<n>      open PR number n in the browser',
  'q        quit',
  'h, ?     show this help',
].join('\n');

/**
 * Dispatch one line typed by the user.
 * Unknown input is reported and otherwise ignored.
 */
export function handleCommand(input: string, ctx: CommandContext): CommandResult {
  const command = input.trim().toLowerCase();

  if (command === '') return 'continue';

  if (command === 'q' || command === 'quit') return 'quit';

  if (command === 'm') {
    ctx.target.markAllSeen();
    return 'continue';
  }

  if (command === 'r') {
    ctx.logger.info('Refreshing...');
    ctx.target.refreshNow().catch((error: unknown) => {
      ctx.logger.error(`Refresh failed: ${sanitizeError(error)}`);
    });
    return 'continue';
  }

  if (command === 'h' || command === '?') {
    console.log(HELP_TEXT);
    return 'continue';
  }

  if (/^\d+$/.test(command)) {
    const url = ctx.urlAt(parseInt(command, 10));
    if (!url) {
      ctx.logger.warn(`No PR at row ${command}`);
      return 'continue';
    }
    ctx.target.openPR(url);
    ctx.openUrl(url);
    return 'continue';
  }

  ctx.logger.warn(`Unknown command '${command}' (h for help)`);
  return 'continue';
}
