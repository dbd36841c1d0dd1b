import { execFile } from 'node:child_process';
import { platform } from 'node:os';
import { repoShortName } from './menu.js';
import { silentLogger, type Logger } from './output.js';
import type { NotificationEvent } from './types.js';

/** Where notifications go */
export interface Notifier {
  notify(title: string, subtitle: string, message: string, playSound: boolean): Promise<void>;
}

export interface NotificationContent {
  title: string;
  subtitle: string;
  message: string;
}

/** Title, subtitle and message for one event */
export function formatNotification(event: NotificationEvent): NotificationContent {
  const { pr } = event;
  const subtitle = `${repoShortName(pr.repo)}#${pr.number}`;

  switch (event.kind) {
    case 'NewPR':
      return { title: 'New PR', subtitle, message: `${pr.title} (by @${pr.author})` };
    case 'ReviewApproved':
      return { title: 'PR Approved', subtitle, message: pr.title };
    case 'ReviewChangesRequested':
      return { title: 'Changes Requested', subtitle, message: pr.title };
    case 'CIPassing':
      return { title: 'CI Passing', subtitle, message: pr.title };
    case 'CIFailing':
      return { title: 'CI Failing', subtitle, message: pr.title };
    case 'NewComments': {
      const noun = event.count === 1 ? 'comment' : 'comments';
      return {
        title: `New ${noun} on PR`,
        subtitle,
        message: `${event.count} new ${noun}: ${pr.title}`,
      };
    }
  }
}

export function escapeAppleScript(s: string): string {
  return s.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Send a desktop notification using osascript (macOS) or notify-send (Linux).
 * Other platforms get a warning and nothing else.
 *
 * notify-send has no subtitle, so it is folded into the title.
 */
export class DesktopNotifier implements Notifier {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? silentLogger;
  }

  notify(title: string, subtitle: string, message: string, playSound: boolean): Promise<void> {
    return new Promise((resolve, reject) => {
      const os = platform();

      if (os === 'darwin') {
        const soundClause = playSound ? ' sound name "default"' : '';
        const script =
          `display notification "${escapeAppleScript(message)}" ` +
          `with title "${escapeAppleScript(title)}" ` +
          `subtitle "${escapeAppleScript(subtitle)}"${soundClause}`;
        execFile('osascript', ['-e', script], (err) => {
          if (err) reject(err);
          else resolve();
        });
      } else if (os === 'linux') {
        const args: string[] = [];
        if (playSound) {
          args.push('--urgency=critical');
        }
        args.push(`${title} (${subtitle})`, message);
        execFile('notify-send', args, (err) => {
          if (err) reject(err);
          else resolve();
        });
      } else {
        this.logger.warn(`Desktop notifications not supported on ${os}`);
        resolve();
      }
    });
  }
}
