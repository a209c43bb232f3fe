import { z } from 'zod';

/**
 * Repository metadata as reported by the remote host
 */
export const RemoteRepositorySchema = z.object({
  id: z.number().int().nonnegative(),
  name: z.string(),
  fullName: z.string(),
  description: z.string().optional(),
  htmlUrl: z.string(),
  language: z.string().optional(),
  stars: z.number().int().nonnegative(),
  forks: z.number().int().nonnegative(),
  watchers: z.number().int().nonnegative().default(0),
  openIssues: z.number().int().nonnegative(),
  isPrivate: z.boolean(),
  defaultBranch: z.string(),
});

export type RemoteRepository = z.infer<typeof RemoteRepositorySchema>;

export interface WeeklyCommitCount {
  weekStart: string;
  commitCount: number;
  additions?: number;
  deletions?: number;
}

/**
 * Commit statistics are computed lazily by the host; until they are ready
 * it answers "pending" and the caller is expected to retry.
 */
export type CommitActivityResult =
  | { status: 'ready'; weeks: WeeklyCommitCount[] }
  | { status: 'pending' };

export interface RepositoryMetadataProvider {
  id: string;
  fetchRepository(
    owner: string,
    repo: string,
    token?: string,
    signal?: AbortSignal
  ): Promise<RemoteRepository>;
}

export interface CommitStatisticsProvider {
  id: string;
  fetchCommitActivity(
    owner: string,
    repo: string,
    token?: string,
    signal?: AbortSignal
  ): Promise<CommitActivityResult>;
}

export interface BookSearchResult {
  title: string;
  authors: string[];
  isbn10?: string;
  isbn13?: string;
  coverUrl?: string;
  pageCount?: number;
  description?: string;
  publishedDate?: string;
}

export interface BookMetadataProvider {
  id: string;
  search(query: string, limit?: number): Promise<BookSearchResult[]>;
  searchByIsbn(isbn: string): Promise<BookSearchResult | undefined>;
}

export interface TextGenerationOptions {
  maxTokens?: number;
  system?: string;
  signal?: AbortSignal;
}

export interface TextGenerationProvider {
  id: string;
  generate(prompt: string, options?: TextGenerationOptions): Promise<string>;
}
