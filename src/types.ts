/** Why a PR is in the list: the user opened it, or their review was requested */
export type MembershipReason = 'author' | 'reviewer';

/** Aggregate CI verdict across every check on a PR */
export type CIState = 'passing' | 'pending' | 'failing';

/**
 * A single CI check, normalized from the two shapes GitHub reports in a
 * status check rollup. Values are lower-cased.
 */
export type CheckRecord =
  | { kind: 'check-run'; name: string; status: string; conclusion: string }
  | { kind: 'status-context'; name: string; state: string };

/** An open pull request as seen in one poll */
export interface PullRequest {
  /** Repository full name, `owner/name` */
  repo: string;
  number: number;
  title: string;
  url: string;
  author: string;
  isDraft: boolean;
  /** `""`, `APPROVED`, `CHANGES_REQUESTED`, or whatever else GitHub sends */
  reviewDecision: string;
  checks: CheckRecord[];
  commentCount: number;
  /** ISO-8601 timestamp */
  updatedAt: string;
  reason: MembershipReason;
}

/** A pull request after the status classifier has derived its CI state */
export interface ClassifiedPullRequest extends PullRequest {
  ciState: CIState;
}

/**
 * Durable diff baseline. Every map is keyed by PR URL.
 * Absence of a key means the PR has never been observed.
 */
export interface Snapshot {
  seen: Set<string>;
  commentCount: Map<string, number>;
  reviewState: Map<string, string>;
  ciState: Map<string, CIState>;
}

export type NotificationKind =
  | 'NewPR'
  | 'ReviewApproved'
  | 'ReviewChangesRequested'
  | 'CIPassing'
  | 'CIFailing'
  | 'NewComments';

/** A change worth telling the user about. Never persisted. */
export interface NotificationEvent {
  kind: NotificationKind;
  pr: ClassifiedPullRequest;
  /** Comment delta for `NewComments`, 1 otherwise */
  count: number;
}

/** A prerequisite check failure with actionable help */
export interface PrereqFailure {
  name: string;
  message: string;
  help: string;
}
