import { z } from 'zod';

/** Repository identifier as `owner/name` */
const RepoSchema = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9_.-]*\/[A-Za-z0-9_.-]+$/, 'expected owner/name');

/** Schema for the user's configuration file */
export const ConfigSchema = z.object({
  pollIntervalSeconds: z.number().int().min(10).default(300),
  repos: z.array(RepoSchema).default([]),
  sound: z.boolean().default(true),
  notifyChangesSinceLastRun: z.boolean().default(false),
});

/** Validated configuration */
export type Config = z.infer<typeof ConfigSchema>;

/** Schema for one entry of `statusCheckRollup` as returned by `gh pr list --json` */
export const GhCheckSchema = z.looseObject({
  __typename: z.string().optional(),
  name: z.string().nullish(),
  context: z.string().nullish(),
  status: z.string().nullish(),
  conclusion: z.string().nullish(),
  state: z.string().nullish(),
});

/** Schema for one PR object from `gh pr list --json` */
export const GhPullRequestSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  url: z.string(),
  updatedAt: z.string(),
  isDraft: z.boolean().default(false),
  reviewDecision: z.string().nullish(),
  statusCheckRollup: z.array(GhCheckSchema).nullish(),
  author: z.object({ login: z.string() }).nullish(),
  comments: z.array(z.unknown()).nullish(),
});

export const GhPullRequestListSchema = z.array(GhPullRequestSchema);

export type GhCheck = z.infer<typeof GhCheckSchema>;
export type GhPullRequest = z.infer<typeof GhPullRequestSchema>;

/** Schema for the persisted snapshot file */
export const SnapshotFileSchema = z.object({
  version: z.literal(1),
  seenUrls: z.array(z.string()),
  commentCounts: z.record(z.string(), z.number().int().nonnegative()),
  reviewStates: z.record(z.string(), z.string()),
  ciStates: z.record(z.string(), z.enum(['passing', 'pending', 'failing'])),
});

export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;
