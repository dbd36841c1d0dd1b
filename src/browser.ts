import { execFile } from 'node:child_process';
import { sanitizeError } from './errors.js';
import { silentLogger, type Logger } from './output.js';

/**
 * Open a PR URL in the default browser.
 * Uses execFile with an argument array (no shell). Only http(s) URLs are opened.
 */
export function openInBrowser(url: string, logger: Logger = silentLogger): void {
  if (!/^https?:\/\//.test(url)) {
    logger.warn(`Refusing to open non-http URL: ${url}`);
    return;
  }

  const onExit = (error: Error | null) => {
    if (error) logger.warn(`Could not open browser: ${sanitizeError(error)}`);
  };

  switch (process.platform) {
    case 'darwin':
      execFile('open', [url], onExit);
      break;
    case 'win32':
      execFile('cmd', ['/c', 'start', '', url], onExit);
      break;
    default:
      execFile('xdg-open', [url], onExit);
      break;
  }
}
