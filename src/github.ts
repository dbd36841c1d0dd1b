import { execFile as execFileCb, execFileSync } from 'node:child_process';
import { promisify } from 'node:util';
import { Octokit } from '@octokit/rest';
import { GhPullRequestListSchema, type GhPullRequest } from './schemas.js';
import { normalizeCheck } from './status.js';
import type { CheckRecord, MembershipReason, PullRequest } from './types.js';

const execFile = promisify(execFileCb);

/** Per-query cap on returned PRs */
export const PR_LIMIT = 50;

/** Per-query timeout: 30 seconds */
export const QUERY_TIMEOUT_MS = 30_000;

/** Max buffer for `gh pr list` output: 10MB */
const MAX_BUFFER = 10 * 1024 * 1024;

/** Fields requested from `gh pr list --json` */
export const PR_FIELDS =
  'number,title,url,updatedAt,isDraft,reviewDecision,statusCheckRollup,author,comments';

const REPO_REGEX = /^[A-Za-z0-9][A-Za-z0-9_.-]*\/[A-Za-z0-9_.-]+$/;
const LOGIN_REGEX = /^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?(?:\[bot\])?$/;

/** Where open PRs come from. One call per repository and membership reason. */
export interface PRSource {
  listAuthoredOpenPRs(repo: string, user: string, signal?: AbortSignal): Promise<PullRequest[]>;
  listReviewRequestedOpenPRs(repo: string, user: string, signal?: AbortSignal): Promise<PullRequest[]>;
}

/**
 * Get a GitHub auth token from the gh CLI.
 * Requires gh to be installed and authenticated.
 */
function getGitHubToken(): string {
  const token = execFileSync('gh', ['auth', 'token'], {
    encoding: 'utf-8',
    stdio: ['pipe', 'pipe', 'pipe'],
  }).trim();

  if (!token) {
    throw new Error('gh auth token returned empty string');
  }

  return token;
}

/**
 * Create an authenticated Octokit instance using the gh CLI token.
 */
export function createOctokit(): Octokit {
  const token = getGitHubToken();
  return new Octokit({ auth: token });
}

/**
 * Resolve the login of the authenticated user.
 */
export async function getViewerLogin(octokit: Octokit): Promise<string> {
  const response = await octokit.users.getAuthenticated();
  const login = response.data.login;
  if (!login) {
    throw new Error('GitHub returned an empty login for the authenticated user');
  }
  return login;
}

/**
 * Reject values that are unsafe to pass to `gh` as arguments:
 * anything that does not look like `owner/name` (repos) or a GitHub login (users).
 */
export function validateGhArg(value: string, kind: 'repo' | 'user'): void {
  const pattern = kind === 'repo' ? REPO_REGEX : LOGIN_REGEX;
  if (!pattern.test(value)) {
    throw new Error(`Invalid ${kind === 'repo' ? 'repository' : 'user login'} '${value}'`);
  }
}

/**
 * Map a validated `gh` PR object onto our PullRequest shape.
 */
export function toPullRequest(raw: GhPullRequest, repo: string, reason: MembershipReason): PullRequest {
  const checks: CheckRecord[] = [];
  for (const entry of raw.statusCheckRollup ?? []) {
    const check = normalizeCheck(entry);
    if (check) checks.push(check);
  }

  return {
    repo,
    number: raw.number,
    title: raw.title,
    url: raw.url,
    author: raw.author?.login ?? 'unknown',
    isDraft: raw.isDraft,
    reviewDecision: raw.reviewDecision ?? '',
    checks,
    commentCount: raw.comments?.length ?? 0,
    updatedAt: raw.updatedAt,
    reason,
  };
}

/**
 * Parse `gh pr list --json` stdout. Empty output means no PRs.
 * Throws on malformed JSON or unexpected shape.
 */
export function parsePRList(stdout: string, repo: string, reason: MembershipReason): PullRequest[] {
  const text = stdout.trim();
  if (!text) return [];

  const parsed = GhPullRequestListSchema.parse(JSON.parse(text));
  return parsed.map((raw) => toPullRequest(raw, repo, reason));
}

/**
 * PR source backed by the gh CLI.
 */
export class GhPRSource implements PRSource {
  constructor(private readonly timeoutMs: number = QUERY_TIMEOUT_MS) {}

  async listAuthoredOpenPRs(repo: string, user: string, signal?: AbortSignal): Promise<PullRequest[]> {
    validateGhArg(repo, 'repo');
    validateGhArg(user, 'user');
    const stdout = await this.run(
      ['pr', 'list', '--repo', repo, '--author', user, '--state', 'open',
        '--json', PR_FIELDS, '--limit', String(PR_LIMIT)],
      signal,
    );
    return parsePRList(stdout, repo, 'author');
  }

  async listReviewRequestedOpenPRs(repo: string, user: string, signal?: AbortSignal): Promise<PullRequest[]> {
    validateGhArg(repo, 'repo');
    validateGhArg(user, 'user');
    const stdout = await this.run(
      ['pr', 'list', '--repo', repo, '--search', `is:open is:pr review-requested:${user}`,
        '--json', PR_FIELDS, '--limit', String(PR_LIMIT)],
      signal,
    );
    return parsePRList(stdout, repo, 'reviewer');
  }

  private async run(args: string[], signal?: AbortSignal): Promise<string> {
    const { stdout } = await execFile('gh', args, {
      encoding: 'utf-8',
      timeout: this.timeoutMs,
      maxBuffer: MAX_BUFFER,
      signal,
    });
    return stdout;
  }
}
