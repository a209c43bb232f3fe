/**
 * GitHub REST Client
 *
 * Implements both GitHub contracts over `fetch`. Commit activity comes from
 * the participation endpoint, which answers 202 while GitHub is still
 * computing the numbers; that is reported as `pending`, never retried here.
 */

import { startOfWeek, subWeeks } from 'date-fns';
import { z } from 'zod';
import { config } from '../config';
import { GoalTrackerError, GoalTrackerErrorCode } from '../core-domain';
import type {
  CommitActivityResult,
  CommitStatisticsProvider,
  RemoteRepository,
  RepositoryMetadataProvider,
  WeeklyCommitCount,
} from './interfaces';

const GitHubRepoResponseSchema = z.object({
  id: z.number(),
  name: z.string(),
  full_name: z.string(),
  description: z.string().nullable().optional(),
  html_url: z.string(),
  language: z.string().nullable().optional(),
  stargazers_count: z.number(),
  forks_count: z.number(),
  watchers_count: z.number().optional(),
  open_issues_count: z.number(),
  private: z.boolean(),
  default_branch: z.string(),
});

const ParticipationResponseSchema = z.object({
  all: z.array(z.number()),
  owner: z.array(z.number()),
});

export interface GitHubRestClientOptions {
  baseUrl?: string;
  fetch?: typeof fetch;
  now?: () => Date;
}

/**
 * Error for a non-2xx answer
 */
export function errorForStatus(status: number, subject: string): GoalTrackerError {
  switch (status) {
    case 401:
      return new GoalTrackerError(GoalTrackerErrorCode.UNAUTHENTICATED);
    case 403:
      return new GoalTrackerError(GoalTrackerErrorCode.RATE_LIMITED);
    case 404:
      return new GoalTrackerError(GoalTrackerErrorCode.NOT_FOUND, `${subject} not found`);
    default:
      return new GoalTrackerError(
        GoalTrackerErrorCode.NETWORK_ERROR,
        `GitHub answered ${status} for ${subject}`
      );
  }
}

/**
 * Participation counts are oldest first and end at the current week.
 * Weeks are keyed by their Sunday so the same week keeps the same key
 * across syncs.
 */
export function participationToWeeks(counts: readonly number[], now: Date): WeeklyCommitCount[] {
  const currentWeek = startOfWeek(now, { weekStartsOn: 0 });
  return counts.map((commitCount, index) => ({
    weekStart: subWeeks(currentWeek, counts.length - 1 - index).toISOString(),
    commitCount,
  }));
}

export class GitHubRestClient implements RepositoryMetadataProvider, CommitStatisticsProvider {
  readonly id = 'github';

  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(options: GitHubRestClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.github.baseUrl).replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async fetchRepository(
    owner: string,
    repo: string,
    token?: string,
    signal?: AbortSignal
  ): Promise<RemoteRepository> {
    const subject = `${owner}/${repo}`;
    const response = await this.request(`/repos/${owner}/${repo}`, subject, token, signal);
    this.checkResponse(response, subject);

    const data = await this.parseBody(response, GitHubRepoResponseSchema, subject);
    return {
      id: data.id,
      name: data.name,
      fullName: data.full_name,
      description: data.description ?? undefined,
      htmlUrl: data.html_url,
      language: data.language ?? undefined,
      stars: data.stargazers_count,
      forks: data.forks_count,
      watchers: data.watchers_count ?? 0,
      openIssues: data.open_issues_count,
      isPrivate: data.private,
      defaultBranch: data.default_branch,
    };
  }

  async fetchCommitActivity(
    owner: string,
    repo: string,
    token?: string,
    signal?: AbortSignal
  ): Promise<CommitActivityResult> {
    const subject = `${owner}/${repo}`;
    const response = await this.request(
      `/repos/${owner}/${repo}/stats/participation`,
      subject,
      token,
      signal
    );

    if (response.status === 202) {
      return { status: 'pending' };
    }
    this.checkResponse(response, subject);

    const data = await this.parseBody(response, ParticipationResponseSchema, subject);
    return { status: 'ready', weeks: participationToWeeks(data.owner, this.now()) };
  }

  private async request(
    path: string,
    subject: string,
    token: string | undefined,
    signal: AbortSignal | undefined
  ): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    try {
      return await this.fetchImpl(`${this.baseUrl}${path}`, { headers, signal });
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new GoalTrackerError(
        GoalTrackerErrorCode.NETWORK_ERROR,
        `Request for ${subject} failed`,
        true,
        { cause: error }
      );
    }
  }

  private checkResponse(response: Response, subject: string): void {
    if (response.status >= 200 && response.status < 300) return;
    throw errorForStatus(response.status, subject);
  }

  private async parseBody<T>(response: Response, schema: z.ZodType<T>, subject: string): Promise<T> {
    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new GoalTrackerError(
        GoalTrackerErrorCode.PARSING_FAILED,
        `GitHub sent malformed JSON for ${subject}`,
        false,
        { cause: error }
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      throw new GoalTrackerError(
        GoalTrackerErrorCode.PARSING_FAILED,
        `Unexpected GitHub response for ${subject}`,
        false,
        { cause: result.error }
      );
    }
    return result.data;
  }
}
