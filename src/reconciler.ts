import { sanitizeError } from './errors.js';
import { silentLogger, type Logger } from './output.js';
import type { ClassifiedPullRequest, NotificationEvent, Snapshot } from './types.js';

/** Where the engine keeps its snapshot between runs */
export interface SnapshotPersistence {
  /** The stored snapshot, or null when there is none (or it is unreadable) */
  restore(): Promise<Snapshot | null>;
  save(snapshot: Snapshot): Promise<void>;
}

export interface ReconcileResult {
  events: NotificationEvent[];
  snapshot: Snapshot;
}

export function emptySnapshot(): Snapshot {
  return {
    seen: new Set(),
    commentCount: new Map(),
    reviewState: new Map(),
    ciState: new Map(),
  };
}

/** Snapshot describing exactly the given PRs */
export function snapshotOf(prs: readonly ClassifiedPullRequest[]): Snapshot {
  const snapshot = emptySnapshot();
  for (const pr of prs) {
    snapshot.seen.add(pr.url);
    snapshot.commentCount.set(pr.url, pr.commentCount);
    snapshot.reviewState.set(pr.url, pr.reviewDecision);
    snapshot.ciState.set(pr.url, pr.ciState);
  }
  return snapshot;
}

/**
 * Diff the current PRs against the previous snapshot.
 *
 * A PR not in `previous.seen` yields `NewPR` and skips the review and CI
 * checks. For the rest, a review decision change yields an event only
 * when the new value is APPROVED or CHANGES_REQUESTED, and a CI change
 * only when there was an earlier value and the new one is passing or
 * failing. Comment growth is checked for every PR, new ones included.
 *
 * The returned snapshot holds only the current PRs; closed ones are forgotten.
 */
export function diffSnapshots(
  prs: readonly ClassifiedPullRequest[],
  previous: Snapshot,
): ReconcileResult {
  const events: NotificationEvent[] = [];

  for (const pr of prs) {
    if (!previous.seen.has(pr.url)) {
      events.push({ kind: 'NewPR', pr, count: 1 });
      continue;
    }

    const oldReview = previous.reviewState.get(pr.url) ?? '';
    const newReview = pr.reviewDecision;
    if (newReview && newReview !== oldReview) {
      if (newReview === 'APPROVED') {
        events.push({ kind: 'ReviewApproved', pr, count: 1 });
      } else if (newReview === 'CHANGES_REQUESTED') {
        events.push({ kind: 'ReviewChangesRequested', pr, count: 1 });
      }
    }

    const oldCI = previous.ciState.get(pr.url);
    if (oldCI && oldCI !== pr.ciState) {
      if (pr.ciState === 'passing') {
        events.push({ kind: 'CIPassing', pr, count: 1 });
      } else if (pr.ciState === 'failing') {
        events.push({ kind: 'CIFailing', pr, count: 1 });
      }
    }
  }

  for (const pr of prs) {
    const delta = pr.commentCount - (previous.commentCount.get(pr.url) ?? 0);
    if (delta > 0) {
      events.push({ kind: 'NewComments', pr, count: delta });
    }
  }

  return { events, snapshot: snapshotOf(prs) };
}

/**
 * One reconciliation step. With no previous snapshot the PRs are taken
 * as a baseline: everything is recorded and nothing is reported.
 */
export function reconcile(
  prs: readonly ClassifiedPullRequest[],
  previous: Snapshot | null,
): ReconcileResult {
  if (previous === null) {
    return { events: [], snapshot: snapshotOf(prs) };
  }
  return diffSnapshots(prs, previous);
}

export interface EngineOptions {
  /**
   * Diff the first cycle against the snapshot restored from disk instead
   * of treating it as a baseline. Ignored when nothing was restored.
   */
  notifyChangesSinceLastRun?: boolean;
  logger?: Logger;
}

/**
 * Owns the snapshot. The first cycle after `init()` is a baseline unless
 * configured otherwise; every later cycle is diffed against the previous one.
 * Callers must not run two reconciliations at once.
 */
export class ReconciliationEngine {
  private current: Snapshot = emptySnapshot();
  private restored: Snapshot | null = null;
  private baselineDone = false;
  private readonly logger: Logger;

  constructor(
    private readonly persistence: SnapshotPersistence,
    private readonly options: EngineOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /** Load the stored snapshot. Call once at startup. */
  async init(): Promise<void> {
    this.restored = await this.persistence.restore();
    this.current = this.restored ?? emptySnapshot();
    this.baselineDone = false;
  }

  get snapshot(): Snapshot {
    return this.current;
  }

  /** True until the first reconciliation has run */
  get isBaselinePending(): boolean {
    return !this.baselineDone;
  }

  /**
   * Diff `prs` against the current snapshot, adopt the result and persist it.
   * A failed save is logged; the events are returned regardless and the
   * next cycle saves the then-current snapshot.
   */
  async reconcile(prs: readonly ClassifiedPullRequest[]): Promise<NotificationEvent[]> {
    const previous = this.baselineDone ? this.current : this.firstCycleBaseline();
    const result = reconcile(prs, previous);

    this.current = result.snapshot;
    this.baselineDone = true;

    try {
      await this.persistence.save(result.snapshot);
    } catch (error: unknown) {
      this.logger.error(`Failed to save state: ${sanitizeError(error)}`);
    }

    return result.events;
  }

  private firstCycleBaseline(): Snapshot | null {
    if (this.options.notifyChangesSinceLastRun && this.restored) {
      return this.restored;
    }
    return null;
  }
}
