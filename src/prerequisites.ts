import { execFileSync } from 'node:child_process';
import type { PrereqFailure } from './types.js';

/**
 * Check all prerequisites and collect failures.
 *
 * Checks in order: gh CLI existence, then gh auth status.
 * Returns an empty array when all checks pass (silent on success).
 */
export function checkPrerequisites(): PrereqFailure[] {
  const failures: PrereqFailure[] = [];
  const whichCmd = process.platform === 'win32' ? 'where' : 'which';

  // 1. Check gh CLI exists
  try {
    execFileSync(whichCmd, ['gh'], { stdio: 'pipe' });
  } catch {
    failures.push({
      name: 'gh',
      message: 'gh CLI not found',
      help: 'Install it: https://cli.github.com',
    });
    return failures;
  }

  // 2. gh exists, check authentication
  try {
    execFileSync('gh', ['auth', 'status'], { stdio: 'pipe' });
  } catch {
    failures.push({
      name: 'gh-auth',
      message: 'gh CLI is not authenticated',
      help: 'Run: gh auth login',
    });
  }

  return failures;
}
