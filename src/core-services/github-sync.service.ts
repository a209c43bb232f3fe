/**
 * GitHub Sync Service
 *
 * Pulls repository metadata and weekly commit counts from GitHub and merges
 * them into the store.
 *
 * Per repository a sync moves through
 *   idle -> fetching -> (pending_retry -> fetching)* -> applying -> idle
 *
 * - Commit statistics answered as "pending" are re-requested after a fixed
 *   delay, at most MAX_STATISTICS_RETRIES times. If they are still pending
 *   the metadata is applied anyway and the result carries
 *   STATISTICS_NOT_READY.
 * - A metadata failure writes nothing.
 * - Only one sync per repository runs at a time; a second caller gets the
 *   run already in flight.
 * - Before writing, the goal and repository are looked up again so a sync
 *   that outlives its goal does not resurrect it.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { needsSync } from '../analytics';
import { config } from '../config';
import type { CommitBucketInput, EventStore } from '../core-db';
import {
  GoalTrackerError,
  GoalTrackerErrorCode,
  splitFullName,
  type GitHubRepository,
} from '../core-domain';
import type {
  CommitActivityResult,
  CommitStatisticsProvider,
  RemoteRepository,
  RepositoryMetadataProvider,
  WeeklyCommitCount,
} from '../connectors/interfaces';
import { logger as defaultLogger, type Logger } from '../logger';
import { mapWithConcurrency } from '../utils/worker-pool';
import { GoalProgressService } from './goal-progress.service';

export const STATISTICS_RETRY_DELAY_MS = 2000;
export const MAX_STATISTICS_RETRIES = 3;

export type SyncState = 'idle' | 'fetching' | 'pending_retry' | 'applying';

/**
 * - synced: metadata and commit activity applied
 * - partial: metadata applied, commit activity left as it was
 * - failed: nothing applied
 * - cancelled: aborted before applying
 * - stale: goal or repository deleted while fetching, nothing applied
 * - skipped: not due for a sync
 */
export type RepositorySyncStatus = 'synced' | 'partial' | 'failed' | 'cancelled' | 'stale' | 'skipped';

export interface RepositorySyncResult {
  repositoryId: string;
  fullName: string;
  status: RepositorySyncStatus;
  retries: number;
  commitWeeks: number;
  error?: GoalTrackerError;
  syncedAt?: string;
}

export type Delay = (ms: number, signal?: AbortSignal) => Promise<void>;

export const abortableDelay: Delay = async (ms, signal) => {
  await sleep(ms, undefined, { signal });
};

export interface GitHubSyncServiceOptions {
  metadataProvider: RepositoryMetadataProvider;
  statisticsProvider: CommitStatisticsProvider;
  token?: string;
  delay?: Delay;
  now?: () => Date;
  logger?: Logger;
  concurrency?: number;
  onStateChange?: (repositoryId: string, state: SyncState) => void;
}

export interface SyncOptions {
  signal?: AbortSignal;
}

export interface SyncGoalOptions extends SyncOptions {
  onlyStale?: boolean;
  concurrency?: number;
}

type StatisticsOutcome =
  | { kind: 'ready'; weeks: WeeklyCommitCount[]; retries: number }
  | { kind: 'unavailable'; error: GoalTrackerError; retries: number };

function toBuckets(weeks: readonly WeeklyCommitCount[]): CommitBucketInput[] {
  return weeks
    .filter((week) => week.commitCount > 0)
    .map((week) => ({
      weekStartDate: week.weekStart,
      commitCount: week.commitCount,
      additions: week.additions,
      deletions: week.deletions,
    }));
}

export class GitHubSyncService {
  private readonly states = new Map<string, SyncState>();
  private readonly inFlight = new Map<string, Promise<RepositorySyncResult>>();

  private readonly metadataProvider: RepositoryMetadataProvider;
  private readonly statisticsProvider: CommitStatisticsProvider;
  private readonly token: string | undefined;
  private readonly delay: Delay;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly onStateChange?: (repositoryId: string, state: SyncState) => void;
  private readonly progress: GoalProgressService;

  constructor(
    private readonly store: EventStore,
    options: GitHubSyncServiceOptions
  ) {
    this.metadataProvider = options.metadataProvider;
    this.statisticsProvider = options.statisticsProvider;
    this.token = options.token ?? config.github.token;
    this.delay = options.delay ?? abortableDelay;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
    this.concurrency = options.concurrency ?? config.github.syncConcurrency;
    this.onStateChange = options.onStateChange;
    this.progress = new GoalProgressService(store, this.logger);
  }

  getSyncState(repositoryId: string): SyncState {
    return this.states.get(repositoryId) ?? 'idle';
  }

  isSyncing(repositoryId: string): boolean {
    return this.inFlight.has(repositoryId);
  }

  /**
   * Sync one repository. Concurrent calls for the same repository share a
   * single run; the signal of the caller that started it governs the run.
   */
  syncRepository(repositoryId: string, options: SyncOptions = {}): Promise<RepositorySyncResult> {
    const running = this.inFlight.get(repositoryId);
    if (running) {
      this.logger.debug({ repositoryId }, 'Sync already in flight, joining');
      return running;
    }

    const run = this.runSync(repositoryId, options.signal).finally(() => {
      this.inFlight.delete(repositoryId);
      this.setState(repositoryId, 'idle');
    });
    this.inFlight.set(repositoryId, run);
    return run;
  }

  /**
   * Sync every repository of a goal through a bounded pool. Each repository
   * gets a result; one failing repository never rejects the batch.
   */
  async syncGoal(goalId: string, options: SyncGoalOptions = {}): Promise<RepositorySyncResult[]> {
    const repositories = await this.store.listRepositories(goalId);
    const now = this.now();

    return mapWithConcurrency(repositories, options.concurrency ?? this.concurrency, async (repository) => {
      const result: RepositorySyncResult = {
        repositoryId: repository.id,
        fullName: repository.fullName,
        status: 'skipped',
        retries: 0,
        commitWeeks: 0,
      };
      if (options.onlyStale && !needsSync(repository, now)) return result;

      try {
        return await this.syncRepository(repository.id, { signal: options.signal });
      } catch (error) {
        const failure = GoalTrackerError.from(error);
        // removed while earlier repositories were syncing
        if (failure.code === GoalTrackerErrorCode.NOT_FOUND) return { ...result, status: 'stale' };
        this.logger.warn({ repositoryId: repository.id, code: failure.code }, 'Repository sync failed');
        return { ...result, status: 'failed', error: failure };
      }
    });
  }

  private setState(repositoryId: string, state: SyncState): void {
    if (state === 'idle') {
      this.states.delete(repositoryId);
    } else {
      this.states.set(repositoryId, state);
    }
    this.onStateChange?.(repositoryId, state);
  }

  private async runSync(
    repositoryId: string,
    signal: AbortSignal | undefined
  ): Promise<RepositorySyncResult> {
    const repository = await this.store.getRepository(repositoryId);
    if (!repository) {
      throw new GoalTrackerError(
        GoalTrackerErrorCode.NOT_FOUND,
        `Repository ${repositoryId} not found`,
        false
      );
    }

    const result: RepositorySyncResult = {
      repositoryId,
      fullName: repository.fullName,
      status: 'failed',
      retries: 0,
      commitWeeks: 0,
    };
    const { owner, repo } = splitFullName(repository.fullName);

    this.setState(repositoryId, 'fetching');

    let metadata: RemoteRepository;
    try {
      metadata = await this.metadataProvider.fetchRepository(owner, repo, this.token, signal);
    } catch (error) {
      if (signal?.aborted) return { ...result, status: 'cancelled' };
      const failure = GoalTrackerError.from(error);
      this.logger.warn(
        { repositoryId, fullName: repository.fullName, code: failure.code },
        'Repository metadata fetch failed'
      );
      return { ...result, error: failure };
    }

    let statistics: StatisticsOutcome;
    try {
      statistics = await this.fetchStatistics(repositoryId, owner, repo, signal);
    } catch (error) {
      // only an abort escapes fetchStatistics
      this.logger.info({ repositoryId, reason: String(error) }, 'Sync cancelled');
      return { ...result, status: 'cancelled' };
    }
    result.retries = statistics.retries;

    if (signal?.aborted) {
      return { ...result, status: 'cancelled' };
    }

    // Stale-write guard
    const current = await this.store.getRepository(repositoryId);
    const goal = current && (await this.store.getGoal(current.goalId));
    if (!current || !goal) {
      this.logger.info({ repositoryId }, 'Repository or goal deleted during sync, discarding');
      return { ...result, status: 'stale' };
    }

    this.setState(repositoryId, 'applying');
    const syncedAt = this.now().toISOString();
    await this.applyMetadata(current, metadata, syncedAt);

    if (statistics.kind === 'ready') {
      const buckets = await this.store.replaceCommitActivity(repositoryId, toBuckets(statistics.weeks));
      result.commitWeeks = buckets.length;
      result.status = 'synced';
    } else {
      result.status = 'partial';
      result.error = statistics.error;
    }

    await this.progress.recomputeProgress(current.goalId);

    this.logger.info(
      {
        repositoryId,
        fullName: current.fullName,
        status: result.status,
        retries: result.retries,
        commitWeeks: result.commitWeeks,
      },
      'Repository synced'
    );
    return { ...result, syncedAt };
  }

  /**
   * Bounded retry while GitHub is still computing statistics. Throws only
   * when aborted.
   */
  private async fetchStatistics(
    repositoryId: string,
    owner: string,
    repo: string,
    signal: AbortSignal | undefined
  ): Promise<StatisticsOutcome> {
    let retries = 0;

    for (;;) {
      let response: CommitActivityResult;
      try {
        response = await this.statisticsProvider.fetchCommitActivity(owner, repo, this.token, signal);
      } catch (error) {
        if (signal?.aborted) throw error;
        return { kind: 'unavailable', error: GoalTrackerError.from(error), retries };
      }

      if (response.status === 'ready') {
        return { kind: 'ready', weeks: response.weeks, retries };
      }

      if (retries >= MAX_STATISTICS_RETRIES) {
        this.logger.warn({ repositoryId, retries }, 'Commit statistics still pending, giving up');
        return {
          kind: 'unavailable',
          error: new GoalTrackerError(GoalTrackerErrorCode.STATISTICS_NOT_READY),
          retries,
        };
      }

      retries += 1;
      this.setState(repositoryId, 'pending_retry');
      await this.delay(STATISTICS_RETRY_DELAY_MS, signal);
      this.setState(repositoryId, 'fetching');
    }
  }

  private async applyMetadata(
    repository: GitHubRepository,
    metadata: RemoteRepository,
    syncedAt: string
  ): Promise<void> {
    await this.store.updateRepository(repository.id, {
      repoId: metadata.id,
      name: metadata.name,
      fullName: metadata.fullName,
      description: metadata.description,
      htmlUrl: metadata.htmlUrl,
      language: metadata.language,
      starCount: metadata.stars,
      forkCount: metadata.forks,
      openIssuesCount: metadata.openIssues,
      isPrivate: metadata.isPrivate,
      defaultBranch: metadata.defaultBranch,
      lastSyncedAt: syncedAt,
    });

    await this.store.appendStarHistory(repository.id, {
      date: syncedAt,
      starCount: metadata.stars,
      forkCount: metadata.forks,
      watcherCount: metadata.watchers,
      openIssuesCount: metadata.openIssues,
    });
  }
}
