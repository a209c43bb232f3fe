import { InMemoryEventStore } from '../src/core-db';
import {
  FitnessGoalType,
  PersonalRecordCategory,
  WorkoutType,
  type Book,
  type CommitActivity,
  type FitnessGoalConfig,
  type PersonalRecord,
  type ReadingSession,
  type StarHistory,
  type TrainingSession,
} from '../src/core-domain';
import type {
  CommitActivityResult,
  CommitStatisticsProvider,
  RemoteRepository,
  RepositoryMetadataProvider,
} from '../src/connectors/interfaces';

export const FIXED_NOW = new Date('2026-06-17T12:00:00.000Z');

export function createStore(now: Date = FIXED_NOW): InMemoryEventStore {
  let counter = 0;
  return new InMemoryEventStore(undefined, {
    now: () => now,
    generateId: () => `id-${++counter}`,
  });
}

export function remoteRepository(overrides: Partial<RemoteRepository> = {}): RemoteRepository {
  return {
    id: 42,
    name: 'widgets',
    fullName: 'octo/widgets',
    description: 'Widget toolkit',
    htmlUrl: 'https://github.com/octo/widgets',
    language: 'TypeScript',
    stars: 120,
    forks: 8,
    watchers: 15,
    openIssues: 3,
    isPrivate: false,
    defaultBranch: 'main',
    ...overrides,
  };
}

/**
 * Scripted GitHub stand-in. Statistics answers are consumed in order; the
 * last one repeats once the script runs out.
 */
export class FakeGitHub implements RepositoryMetadataProvider, CommitStatisticsProvider {
  readonly id = 'fake-github';

  metadataCalls = 0;
  statisticsCalls = 0;
  active = 0;
  maxActive = 0;
  gate?: Promise<void>;

  constructor(
    public metadata: RemoteRepository | Error = remoteRepository(),
    public statistics: Array<CommitActivityResult | Error> = [{ status: 'ready', weeks: [] }]
  ) {}

  async fetchRepository(): Promise<RemoteRepository> {
    this.metadataCalls += 1;
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      await new Promise<void>((resolve) => setImmediate(resolve));
      if (this.gate) await this.gate;
      if (this.metadata instanceof Error) throw this.metadata;
      return this.metadata;
    } finally {
      this.active -= 1;
    }
  }

  async fetchCommitActivity(): Promise<CommitActivityResult> {
    const index = Math.min(this.statisticsCalls, this.statistics.length - 1);
    this.statisticsCalls += 1;
    const answer = this.statistics[index];
    if (answer === undefined) return { status: 'pending' };
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// ============================================================================
// Record factories for the pure analytics
// ============================================================================

export function book(overrides: Partial<Book> = {}): Book {
  return {
    id: 'book-1',
    goalId: 'goal-1',
    title: 'The Pragmatic Reader',
    currentPage: 0,
    isCompleted: false,
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function readingSession(date: Date, overrides: Partial<ReadingSession> = {}): ReadingSession {
  return {
    id: `session-${date.getTime()}`,
    bookId: 'book-1',
    date: date.toISOString(),
    pagesRead: 20,
    durationMinutes: 30,
    startPage: 0,
    endPage: 20,
    createdAt: date.toISOString(),
    ...overrides,
  };
}

export function trainingSession(date: Date, overrides: Partial<TrainingSession> = {}): TrainingSession {
  return {
    id: `training-${date.getTime()}`,
    goalId: 'goal-1',
    workoutType: WorkoutType.RUN,
    date: date.toISOString(),
    durationMinutes: 30,
    isRace: false,
    createdAt: date.toISOString(),
    ...overrides,
  };
}

export function fitnessConfig(overrides: Partial<FitnessGoalConfig> = {}): FitnessGoalConfig {
  return {
    id: 'config-1',
    goalId: 'goal-1',
    fitnessGoalType: FitnessGoalType.RACE_TRAINING,
    weightUnit: 'kg',
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function personalRecord(overrides: Partial<PersonalRecord> = {}): PersonalRecord {
  return {
    id: 'record-1',
    goalId: 'goal-1',
    exercise: '5K',
    category: PersonalRecordCategory.RUNNING,
    value: 1500,
    unit: 'seconds',
    achievedDate: '2026-05-01T00:00:00.000Z',
    createdAt: '2026-05-01T00:00:00.000Z',
    ...overrides,
  };
}

export function starSnapshot(date: string, starCount: number): StarHistory {
  return {
    id: `star-${date}`,
    repositoryId: 'repo-1',
    date,
    starCount,
    forkCount: 0,
    watcherCount: 0,
    openIssuesCount: 0,
    createdAt: date,
  };
}

export function commitBucket(weekStartDate: string, commitCount: number): CommitActivity {
  return {
    id: `bucket-${weekStartDate}`,
    repositoryId: 'repo-1',
    weekStartDate,
    commitCount,
    additions: 0,
    deletions: 0,
  };
}
