import type { CheckRecord, CIState, ClassifiedPullRequest, PullRequest } from './types.js';
import type { GhCheck } from './schemas.js';

/** Check-run conclusions that count as a pass */
const PASSING_CONCLUSIONS = new Set(['success', 'neutral', 'skipped']);

/** What the status column shows for a PR */
export type StatusIndicator = 'draft' | CIState;

/**
 * Normalize one raw rollup entry into a CheckRecord.
 * Returns null for entry types we don't know how to read.
 */
export function normalizeCheck(raw: GhCheck): CheckRecord | null {
  const name = raw.name ?? raw.context ?? '';
  switch (raw.__typename) {
    case 'CheckRun':
      return {
        kind: 'check-run',
        name,
        status: (raw.status ?? '').toLowerCase(),
        conclusion: (raw.conclusion ?? '').toLowerCase(),
      };
    case 'StatusContext':
      return {
        kind: 'status-context',
        name,
        state: (raw.state ?? '').toLowerCase(),
      };
    default:
      return null;
  }
}

/**
 * Aggregate every check into one CI state.
 *
 * Starts at passing. Anything still running downgrades to pending and the
 * scan continues; the first failed check returns failing straight away.
 */
export function getCIState(checks: readonly CheckRecord[]): CIState {
  let state: CIState = 'passing';

  for (const check of checks) {
    if (check.kind === 'check-run') {
      if (check.status !== 'completed') {
        state = 'pending';
      } else if (!PASSING_CONCLUSIONS.has(check.conclusion)) {
        return 'failing';
      }
    } else {
      if (check.state === 'pending') {
        state = 'pending';
      } else if (check.state !== 'success') {
        return 'failing';
      }
    }
  }

  return state;
}

/** Attach the derived CI state to a PR */
export function classify(pr: PullRequest): ClassifiedPullRequest {
  return { ...pr, ciState: getCIState(pr.checks) };
}

/**
 * Display priority for the status column.
 * Drafts are always neutral, whatever CI says.
 */
export function getStatusIndicator(pr: ClassifiedPullRequest): StatusIndicator {
  if (pr.isDraft) return 'draft';
  return pr.ciState;
}
