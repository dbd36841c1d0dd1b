import type { PRSource } from './github.js';
import { QUERY_TIMEOUT_MS } from './github.js';
import { sanitizeError } from './errors.js';
import { silentLogger, type Logger } from './output.js';
import type { PullRequest } from './types.js';

/** Deadline for the whole fetch across all repositories: 60 seconds */
export const FETCH_TIMEOUT_MS = 60_000;

export interface FetchOptions {
  /** Per-repository budget; a repo that exceeds it contributes nothing */
  repoTimeoutMs?: number;
  /** Overall budget; repos still running when it expires are abandoned */
  totalTimeoutMs?: number;
  logger?: Logger;
}

/** Reject after `ms` unless `promise` settles first. */
function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Fetch authored and review-requested PRs for one repository.
 * Authored results come first so they win deduplication.
 *
 * The two queries stand alone: when one fails it is logged and the other's
 * results are still returned.
 */
export async function fetchRepoPRs(
  source: PRSource,
  repo: string,
  user: string,
  signal?: AbortSignal,
  logger: Logger = silentLogger,
): Promise<PullRequest[]> {
  const queries = [
    { label: 'authored PRs', run: source.listAuthoredOpenPRs(repo, user, signal) },
    { label: 'review requests', run: source.listReviewRequestedOpenPRs(repo, user, signal) },
  ];
  const outcomes = await Promise.allSettled(queries.map((q) => q.run));

  const prs: PullRequest[] = [];
  outcomes.forEach((outcome, i) => {
    if (outcome.status === 'fulfilled') {
      prs.push(...outcome.value);
    } else if (!signal?.aborted) {
      logger.warn(`Error fetching ${queries[i].label} for ${repo}: ${sanitizeError(outcome.reason)}`);
    }
  });
  return prs;
}

/**
 * Fetch open PRs for every repository concurrently.
 *
 * Failures and timeouts are logged and count as zero results for that
 * repository. When the overall deadline passes, whatever finished is used
 * and the rest is aborted. Output is deduplicated by URL (first seen wins,
 * authored before reviewer) and sorted by `updatedAt`, newest first.
 */
export async function fetchAllPRs(
  source: PRSource,
  repos: readonly string[],
  user: string,
  options: FetchOptions = {},
): Promise<PullRequest[]> {
  const repoTimeoutMs = options.repoTimeoutMs ?? QUERY_TIMEOUT_MS;
  const totalTimeoutMs = options.totalTimeoutMs ?? FETCH_TIMEOUT_MS;
  const logger = options.logger ?? silentLogger;

  const controller = new AbortController();
  const results: Array<PullRequest[] | undefined> = repos.map(() => undefined);
  const settled: boolean[] = repos.map(() => false);

  const tasks = repos.map(async (repo, index) => {
    try {
      const prs = await withTimeout(
        fetchRepoPRs(source, repo, user, controller.signal, logger),
        repoTimeoutMs,
        `Fetching ${repo}`,
      );
      if (!controller.signal.aborted) {
        results[index] = prs;
      }
    } catch (error: unknown) {
      if (!controller.signal.aborted) {
        logger.warn(`Error fetching PRs for ${repo}: ${sanitizeError(error)}`);
      }
    } finally {
      settled[index] = true;
    }
  });

  let deadline: NodeJS.Timeout | undefined;
  const timedOut = await Promise.race([
    Promise.all(tasks).then(() => false),
    new Promise<boolean>((resolve) => {
      deadline = setTimeout(() => resolve(true), totalTimeoutMs);
    }),
  ]);
  clearTimeout(deadline);

  if (timedOut) {
    const pending = repos.filter((_, i) => !settled[i]);
    controller.abort();
    logger.warn(`Fetch deadline of ${totalTimeoutMs}ms passed; abandoned: ${pending.join(', ')}`);
  }

  return mergeResults(results);
}

/**
 * Flatten per-repo results in repository order, dropping duplicate URLs
 * (first occurrence wins), then sort newest first. The sort is stable, so
 * equal timestamps keep insertion order.
 */
export function mergeResults(results: ReadonlyArray<readonly PullRequest[] | undefined>): PullRequest[] {
  const byUrl = new Map<string, PullRequest>();
  for (const prs of results) {
    for (const pr of prs ?? []) {
      if (!byUrl.has(pr.url)) byUrl.set(pr.url, pr);
    }
  }

  return [...byUrl.values()].sort((a, b) => compareUpdatedDesc(a.updatedAt, b.updatedAt));
}

function compareUpdatedDesc(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? 1 : -1;
}
