/**
 * GitHub Repository Domain Model
 *
 * A tracked repository under a programming goal, with:
 * - Commit activity: weekly buckets, replaced wholesale on every sync
 * - Star history: append-only snapshots, one per sync
 */

import { z } from 'zod';

export const GitHubRepositorySchema = z.object({
  id: z.string(),
  goalId: z.string(),
  repoId: z.number().int().nonnegative(),
  name: z.string().min(1),
  fullName: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected "owner/name"'),
  description: z.string().optional(),
  htmlUrl: z.string(),
  language: z.string().optional(),
  starCount: z.number().int().nonnegative().default(0),
  forkCount: z.number().int().nonnegative().default(0),
  openIssuesCount: z.number().int().nonnegative().default(0),
  isPrivate: z.boolean().default(false),
  defaultBranch: z.string().default('main'),
  lastSyncedAt: z.string().datetime().optional(),
  createdAt: z.string().datetime(),
});

export type GitHubRepository = z.infer<typeof GitHubRepositorySchema>;

export const TrackRepositoryInputSchema = GitHubRepositorySchema.pick({
  fullName: true,
  description: true,
  language: true,
}).extend({
  repoId: z.number().int().nonnegative().optional(),
  htmlUrl: z.string().optional(),
});

export type TrackRepositoryInput = z.input<typeof TrackRepositoryInputSchema>;

/**
 * Weekly commit bucket. `weekStartDate` is unique per repository.
 */
export const CommitActivitySchema = z.object({
  id: z.string(),
  repositoryId: z.string(),
  weekStartDate: z.string().datetime(),
  commitCount: z.number().int().nonnegative(),
  additions: z.number().int().nonnegative().default(0),
  deletions: z.number().int().nonnegative().default(0),
});

export type CommitActivity = z.infer<typeof CommitActivitySchema>;

export const StarHistorySchema = z.object({
  id: z.string(),
  repositoryId: z.string(),
  date: z.string().datetime(),
  starCount: z.number().int().nonnegative(),
  forkCount: z.number().int().nonnegative().default(0),
  watcherCount: z.number().int().nonnegative().default(0),
  openIssuesCount: z.number().int().nonnegative().default(0),
  createdAt: z.string().datetime(),
});

export type StarHistory = z.infer<typeof StarHistorySchema>;

/**
 * Owner and repository name from a "owner/name" full name
 */
export function splitFullName(fullName: string): { owner: string; repo: string } {
  const [owner = '', repo = ''] = fullName.split('/');
  return { owner, repo };
}
