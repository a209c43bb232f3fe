/**
 * Goal Tracker Event Store
 *
 * Durable records keyed under a parent goal. Every child carries its parent
 * id; lookups by parent id stand in for back-references, and deleting a
 * goal deletes every record whose parent chain leads to it.
 *
 * `InMemoryEventStore` keeps everything in maps and can be hydrated from, or
 * dumped to, a `StoreSnapshot` (see `snapshot-file.ts` for the file format).
 */

import { compareAsc, parseISO } from 'date-fns';
import { v4 as uuid } from 'uuid';
import { z, type ZodType, type ZodTypeDef } from 'zod';
import {
  AppMetricSnapshotSchema,
  AppProjectSchema,
  BookSchema,
  CommitActivitySchema,
  CreateAppProjectInputSchema,
  CreateBookInputSchema,
  CreateGoalInputSchema,
  CreateTrainingSessionInputSchema,
  FitnessGoalConfigInputSchema,
  FitnessGoalConfigSchema,
  GitHubRepositorySchema,
  GoalSchema,
  GoalTrackerError,
  GoalTrackerErrorCode,
  GoalType,
  PersonalRecordSchema,
  ReadingSessionSchema,
  RevenueEntrySchema,
  StarHistorySchema,
  TrackRepositoryInputSchema,
  TrainingSessionSchema,
  UpdateGoalInputSchema,
  splitFullName,
  type AppMetricSnapshot,
  type AppProject,
  type Book,
  type CommitActivity,
  type CreateAppProjectInput,
  type CreateBookInput,
  type CreateGoalInput,
  type CreateTrainingSessionInput,
  type FitnessGoalConfig,
  type FitnessGoalConfigInput,
  type GitHubRepository,
  type Goal,
  type PersonalRecord,
  type ReadingSession,
  type RevenueEntry,
  type StarHistory,
  type TrackRepositoryInput,
  type TrainingSession,
  type UpdateGoalInput,
} from './core-domain';

// ============================================================================
// Record shapes accepted by the append operations
// ============================================================================

export type NewReadingSession = Omit<ReadingSession, 'id' | 'bookId' | 'createdAt'>;
export type NewPersonalRecord = Omit<PersonalRecord, 'id' | 'goalId' | 'createdAt'>;
export type NewStarHistory = Omit<StarHistory, 'id' | 'repositoryId' | 'createdAt'>;
export type NewRevenueEntry = Omit<RevenueEntry, 'id' | 'projectId' | 'createdAt'>;
export type NewMetricSnapshot = Omit<AppMetricSnapshot, 'id' | 'projectId' | 'createdAt'>;

export interface CommitBucketInput {
  weekStartDate: string;
  commitCount: number;
  additions?: number;
  deletions?: number;
}

export type BookPatch = Partial<Omit<Book, 'id' | 'goalId' | 'createdAt'>>;
export type RepositoryPatch = Partial<Omit<GitHubRepository, 'id' | 'goalId' | 'createdAt'>>;

export interface GoalFilters {
  goalType?: GoalType;
  includeArchived?: boolean;
}

/**
 * Storage contract consumed by the services. Mutations validate their input
 * and fail with `INVALID_INPUT`; a missing parent fails with `NOT_FOUND`.
 */
export interface EventStore {
  // Goals
  createGoal(input: CreateGoalInput): Promise<Goal>;
  getGoal(id: string): Promise<Goal | undefined>;
  listGoals(filters?: GoalFilters): Promise<Goal[]>;
  updateGoal(id: string, input: UpdateGoalInput): Promise<Goal>;
  setGoalProgress(id: string, currentValue: number): Promise<Goal>;
  deleteGoal(id: string): Promise<boolean>;

  // Reading
  addBook(goalId: string, input: CreateBookInput): Promise<Book>;
  getBook(id: string): Promise<Book | undefined>;
  listBooks(goalId: string): Promise<Book[]>;
  updateBook(id: string, patch: BookPatch): Promise<Book>;
  deleteBook(id: string): Promise<boolean>;
  appendReadingSession(bookId: string, session: NewReadingSession): Promise<ReadingSession>;
  listReadingSessions(bookId: string): Promise<ReadingSession[]>;

  // Fitness
  addTrainingSession(goalId: string, input: CreateTrainingSessionInput): Promise<TrainingSession>;
  listTrainingSessions(goalId: string): Promise<TrainingSession[]>;
  getFitnessConfig(goalId: string): Promise<FitnessGoalConfig | undefined>;
  setFitnessConfig(goalId: string, input: FitnessGoalConfigInput): Promise<FitnessGoalConfig>;
  addPersonalRecord(goalId: string, record: NewPersonalRecord): Promise<PersonalRecord>;
  listPersonalRecords(goalId: string): Promise<PersonalRecord[]>;

  // Programming
  trackRepository(goalId: string, input: TrackRepositoryInput): Promise<GitHubRepository>;
  getRepository(id: string): Promise<GitHubRepository | undefined>;
  listRepositories(goalId: string): Promise<GitHubRepository[]>;
  updateRepository(id: string, patch: RepositoryPatch): Promise<GitHubRepository>;
  deleteRepository(id: string): Promise<boolean>;
  listCommitActivity(repositoryId: string): Promise<CommitActivity[]>;
  replaceCommitActivity(
    repositoryId: string,
    buckets: readonly CommitBucketInput[]
  ): Promise<CommitActivity[]>;
  appendStarHistory(repositoryId: string, snapshot: NewStarHistory): Promise<StarHistory>;
  listStarHistory(repositoryId: string): Promise<StarHistory[]>;

  // Apps
  addAppProject(goalId: string, input: CreateAppProjectInput): Promise<AppProject>;
  getAppProject(id: string): Promise<AppProject | undefined>;
  listAppProjects(goalId: string): Promise<AppProject[]>;
  appendRevenueEntry(projectId: string, entry: NewRevenueEntry): Promise<RevenueEntry>;
  listRevenueEntries(projectId: string): Promise<RevenueEntry[]>;
  appendMetricSnapshot(projectId: string, snapshot: NewMetricSnapshot): Promise<AppMetricSnapshot>;
  listMetricSnapshots(projectId: string): Promise<AppMetricSnapshot[]>;
}

// ============================================================================
// Snapshot
// ============================================================================

export const STORE_SNAPSHOT_VERSION = 1;

export const StoreSnapshotSchema = z.object({
  version: z.literal(STORE_SNAPSHOT_VERSION),
  goals: z.array(GoalSchema).default([]),
  books: z.array(BookSchema).default([]),
  readingSessions: z.array(ReadingSessionSchema).default([]),
  trainingSessions: z.array(TrainingSessionSchema).default([]),
  fitnessConfigs: z.array(FitnessGoalConfigSchema).default([]),
  personalRecords: z.array(PersonalRecordSchema).default([]),
  repositories: z.array(GitHubRepositorySchema).default([]),
  commitActivity: z.array(CommitActivitySchema).default([]),
  starHistory: z.array(StarHistorySchema).default([]),
  appProjects: z.array(AppProjectSchema).default([]),
  revenueEntries: z.array(RevenueEntrySchema).default([]),
  metricSnapshots: z.array(AppMetricSnapshotSchema).default([]),
});

export type StoreSnapshot = z.infer<typeof StoreSnapshotSchema>;

export function emptySnapshot(): StoreSnapshot {
  return StoreSnapshotSchema.parse({ version: STORE_SNAPSHOT_VERSION });
}

// ============================================================================
// In-memory implementation
// ============================================================================

export interface InMemoryEventStoreOptions {
  now?: () => Date;
  generateId?: () => string;
}

function validate<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  value: unknown,
  subject: string
): Output {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw GoalTrackerError.invalidInput(result.error, subject);
  }
  return result.data;
}

function notFound(subject: string, id: string): GoalTrackerError {
  return new GoalTrackerError(GoalTrackerErrorCode.NOT_FOUND, `${subject} ${id} not found`, false);
}

function selectWhere<T>(records: Map<string, T>, predicate: (record: T) => boolean): T[] {
  return Array.from(records.values()).filter(predicate);
}

function indexById<T extends { id: string }>(records: readonly T[]): Map<string, T> {
  return new Map(records.map((record) => [record.id, record]));
}

export class InMemoryEventStore implements EventStore {
  private goals: Map<string, Goal>;
  private books: Map<string, Book>;
  private readingSessions: Map<string, ReadingSession>;
  private trainingSessions: Map<string, TrainingSession>;
  private fitnessConfigs: Map<string, FitnessGoalConfig>;
  private personalRecords: Map<string, PersonalRecord>;
  private repositories: Map<string, GitHubRepository>;
  private commitActivity: Map<string, CommitActivity>;
  private starHistory: Map<string, StarHistory>;
  private appProjects: Map<string, AppProject>;
  private revenueEntries: Map<string, RevenueEntry>;
  private metricSnapshots: Map<string, AppMetricSnapshot>;

  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(snapshot: StoreSnapshot = emptySnapshot(), options: InMemoryEventStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? uuid;

    this.goals = indexById(snapshot.goals);
    this.books = indexById(snapshot.books);
    this.readingSessions = indexById(snapshot.readingSessions);
    this.trainingSessions = indexById(snapshot.trainingSessions);
    this.fitnessConfigs = indexById(snapshot.fitnessConfigs);
    this.personalRecords = indexById(snapshot.personalRecords);
    this.repositories = indexById(snapshot.repositories);
    this.commitActivity = indexById(snapshot.commitActivity);
    this.starHistory = indexById(snapshot.starHistory);
    this.appProjects = indexById(snapshot.appProjects);
    this.revenueEntries = indexById(snapshot.revenueEntries);
    this.metricSnapshots = indexById(snapshot.metricSnapshots);
  }

  toSnapshot(): StoreSnapshot {
    return {
      version: STORE_SNAPSHOT_VERSION,
      goals: Array.from(this.goals.values()),
      books: Array.from(this.books.values()),
      readingSessions: Array.from(this.readingSessions.values()),
      trainingSessions: Array.from(this.trainingSessions.values()),
      fitnessConfigs: Array.from(this.fitnessConfigs.values()),
      personalRecords: Array.from(this.personalRecords.values()),
      repositories: Array.from(this.repositories.values()),
      commitActivity: Array.from(this.commitActivity.values()),
      starHistory: Array.from(this.starHistory.values()),
      appProjects: Array.from(this.appProjects.values()),
      revenueEntries: Array.from(this.revenueEntries.values()),
      metricSnapshots: Array.from(this.metricSnapshots.values()),
    };
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private requireGoal(id: string): Goal {
    const goal = this.goals.get(id);
    if (!goal) throw notFound('Goal', id);
    return goal;
  }

  private requireProgrammingGoal(id: string): Goal {
    const goal = this.requireGoal(id);
    if (goal.goalType !== GoalType.PROGRAMMING) {
      throw new GoalTrackerError(
        GoalTrackerErrorCode.INVALID_INPUT,
        `Goal ${id} is a ${goal.goalType} goal, not a programming goal`
      );
    }
    return goal;
  }

  private requireBook(id: string): Book {
    const book = this.books.get(id);
    if (!book) throw notFound('Book', id);
    return book;
  }

  private requireRepository(id: string): GitHubRepository {
    const repository = this.repositories.get(id);
    if (!repository) throw notFound('Repository', id);
    return repository;
  }

  private requireAppProject(id: string): AppProject {
    const project = this.appProjects.get(id);
    if (!project) throw notFound('App project', id);
    return project;
  }

  // --------------------------------------------------------------------------
  // Goals
  // --------------------------------------------------------------------------

  async createGoal(input: CreateGoalInput): Promise<Goal> {
    const data = validate(CreateGoalInputSchema, input, 'goal');
    const now = this.timestamp();
    const goal = validate(
      GoalSchema,
      {
        ...data,
        id: this.generateId(),
        currentValue: 0,
        startDate: data.startDate ?? now,
        isArchived: data.isArchived ?? false,
        createdAt: now,
        updatedAt: now,
      },
      'goal'
    );
    this.goals.set(goal.id, goal);
    return goal;
  }

  async getGoal(id: string): Promise<Goal | undefined> {
    return this.goals.get(id);
  }

  async listGoals(filters: GoalFilters = {}): Promise<Goal[]> {
    return selectWhere(
      this.goals,
      (goal) =>
        (filters.goalType === undefined || goal.goalType === filters.goalType) &&
        (filters.includeArchived === true || !goal.isArchived)
    ).sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async updateGoal(id: string, input: UpdateGoalInput): Promise<Goal> {
    const goal = this.requireGoal(id);
    const data = validate(UpdateGoalInputSchema, input, 'goal update');
    const updated: Goal = { ...goal, ...data, updatedAt: this.timestamp() };
    this.goals.set(id, updated);
    return updated;
  }

  async setGoalProgress(id: string, currentValue: number): Promise<Goal> {
    const goal = this.requireGoal(id);
    const updated: Goal = { ...goal, currentValue, updatedAt: this.timestamp() };
    this.goals.set(id, updated);
    return updated;
  }

  async deleteGoal(id: string): Promise<boolean> {
    if (!this.goals.has(id)) return false;

    for (const book of selectWhere(this.books, (b) => b.goalId === id)) {
      this.removeBook(book.id);
    }
    for (const repository of selectWhere(this.repositories, (r) => r.goalId === id)) {
      this.removeRepository(repository.id);
    }
    for (const project of selectWhere(this.appProjects, (p) => p.goalId === id)) {
      this.removeAppProject(project.id);
    }
    this.deleteWhere(this.trainingSessions, (s) => s.goalId === id);
    this.deleteWhere(this.fitnessConfigs, (c) => c.goalId === id);
    this.deleteWhere(this.personalRecords, (r) => r.goalId === id);

    return this.goals.delete(id);
  }

  private deleteWhere<T extends { id: string }>(
    records: Map<string, T>,
    predicate: (record: T) => boolean
  ): void {
    for (const record of selectWhere(records, predicate)) {
      records.delete(record.id);
    }
  }

  // --------------------------------------------------------------------------
  // Reading
  // --------------------------------------------------------------------------

  async addBook(goalId: string, input: CreateBookInput): Promise<Book> {
    this.requireGoal(goalId);
    const data = validate(CreateBookInputSchema, input, 'book');
    const book = validate(
      BookSchema,
      {
        ...data,
        id: this.generateId(),
        goalId,
        isCompleted: false,
        createdAt: this.timestamp(),
      },
      'book'
    );
    this.books.set(book.id, book);
    return book;
  }

  async getBook(id: string): Promise<Book | undefined> {
    return this.books.get(id);
  }

  async listBooks(goalId: string): Promise<Book[]> {
    return selectWhere(this.books, (book) => book.goalId === goalId);
  }

  async updateBook(id: string, patch: BookPatch): Promise<Book> {
    const book = this.requireBook(id);
    const updated = validate(BookSchema, { ...book, ...patch }, 'book update');
    this.books.set(id, updated);
    return updated;
  }

  async deleteBook(id: string): Promise<boolean> {
    if (!this.books.has(id)) return false;
    this.removeBook(id);
    return true;
  }

  private removeBook(id: string): void {
    this.deleteWhere(this.readingSessions, (s) => s.bookId === id);
    this.books.delete(id);
  }

  async appendReadingSession(bookId: string, session: NewReadingSession): Promise<ReadingSession> {
    this.requireBook(bookId);
    const record = validate(
      ReadingSessionSchema,
      { ...session, id: this.generateId(), bookId, createdAt: this.timestamp() },
      'reading session'
    );
    this.readingSessions.set(record.id, record);
    return record;
  }

  async listReadingSessions(bookId: string): Promise<ReadingSession[]> {
    return selectWhere(this.readingSessions, (s) => s.bookId === bookId);
  }

  // --------------------------------------------------------------------------
  // Fitness
  // --------------------------------------------------------------------------

  async addTrainingSession(
    goalId: string,
    input: CreateTrainingSessionInput
  ): Promise<TrainingSession> {
    this.requireGoal(goalId);
    const data = validate(CreateTrainingSessionInputSchema, input, 'training session');
    const now = this.timestamp();
    const session = validate(
      TrainingSessionSchema,
      {
        ...data,
        id: this.generateId(),
        goalId,
        date: data.date ?? now,
        isRace: data.isRace ?? false,
        createdAt: now,
      },
      'training session'
    );
    this.trainingSessions.set(session.id, session);
    return session;
  }

  async listTrainingSessions(goalId: string): Promise<TrainingSession[]> {
    return selectWhere(this.trainingSessions, (s) => s.goalId === goalId);
  }

  async getFitnessConfig(goalId: string): Promise<FitnessGoalConfig | undefined> {
    return selectWhere(this.fitnessConfigs, (c) => c.goalId === goalId)[0];
  }

  async setFitnessConfig(goalId: string, input: FitnessGoalConfigInput): Promise<FitnessGoalConfig> {
    this.requireGoal(goalId);
    const data = validate(FitnessGoalConfigInputSchema, input, 'fitness config');
    const existing = await this.getFitnessConfig(goalId);
    const config = validate(
      FitnessGoalConfigSchema,
      {
        ...data,
        id: existing?.id ?? this.generateId(),
        goalId,
        createdAt: existing?.createdAt ?? this.timestamp(),
      },
      'fitness config'
    );
    this.fitnessConfigs.set(config.id, config);
    return config;
  }

  async addPersonalRecord(goalId: string, record: NewPersonalRecord): Promise<PersonalRecord> {
    this.requireGoal(goalId);
    const stored = validate(
      PersonalRecordSchema,
      { ...record, id: this.generateId(), goalId, createdAt: this.timestamp() },
      'personal record'
    );
    this.personalRecords.set(stored.id, stored);
    return stored;
  }

  async listPersonalRecords(goalId: string): Promise<PersonalRecord[]> {
    return selectWhere(this.personalRecords, (r) => r.goalId === goalId);
  }

  // --------------------------------------------------------------------------
  // Programming
  // --------------------------------------------------------------------------

  async trackRepository(goalId: string, input: TrackRepositoryInput): Promise<GitHubRepository> {
    this.requireProgrammingGoal(goalId);
    const data = validate(TrackRepositoryInputSchema, input, 'repository');
    const { repo } = splitFullName(data.fullName);
    const repository = validate(
      GitHubRepositorySchema,
      {
        ...data,
        id: this.generateId(),
        goalId,
        repoId: data.repoId ?? 0,
        name: repo,
        htmlUrl: data.htmlUrl ?? `https://github.com/${data.fullName}`,
        createdAt: this.timestamp(),
      },
      'repository'
    );
    this.repositories.set(repository.id, repository);
    return repository;
  }

  async getRepository(id: string): Promise<GitHubRepository | undefined> {
    return this.repositories.get(id);
  }

  async listRepositories(goalId: string): Promise<GitHubRepository[]> {
    return selectWhere(this.repositories, (r) => r.goalId === goalId);
  }

  async updateRepository(id: string, patch: RepositoryPatch): Promise<GitHubRepository> {
    const repository = this.requireRepository(id);
    const updated = validate(GitHubRepositorySchema, { ...repository, ...patch }, 'repository update');
    this.repositories.set(id, updated);
    return updated;
  }

  async deleteRepository(id: string): Promise<boolean> {
    if (!this.repositories.has(id)) return false;
    this.removeRepository(id);
    return true;
  }

  private removeRepository(id: string): void {
    this.deleteWhere(this.commitActivity, (c) => c.repositoryId === id);
    this.deleteWhere(this.starHistory, (s) => s.repositoryId === id);
    this.repositories.delete(id);
  }

  async listCommitActivity(repositoryId: string): Promise<CommitActivity[]> {
    return selectWhere(this.commitActivity, (c) => c.repositoryId === repositoryId).sort((a, b) =>
      compareAsc(parseISO(a.weekStartDate), parseISO(b.weekStartDate))
    );
  }

  /**
   * Replace every bucket of a repository. The new set is built and validated
   * in full before the old buckets are dropped, so a failure leaves the
   * previous set in place. Week starts are normalized to UTC ISO strings and
   * buckets sharing a week are merged by summing.
   */
  async replaceCommitActivity(
    repositoryId: string,
    buckets: readonly CommitBucketInput[]
  ): Promise<CommitActivity[]> {
    this.requireRepository(repositoryId);

    const byWeek = new Map<string, CommitActivity>();
    for (const bucket of buckets) {
      const weekStart = parseISO(bucket.weekStartDate);
      const weekStartDate = Number.isNaN(weekStart.getTime())
        ? bucket.weekStartDate
        : weekStart.toISOString();
      const existing = byWeek.get(weekStartDate);
      const merged = validate(
        CommitActivitySchema,
        {
          id: existing?.id ?? this.generateId(),
          repositoryId,
          weekStartDate,
          commitCount: (existing?.commitCount ?? 0) + bucket.commitCount,
          additions: (existing?.additions ?? 0) + (bucket.additions ?? 0),
          deletions: (existing?.deletions ?? 0) + (bucket.deletions ?? 0),
        },
        'commit activity'
      );
      byWeek.set(merged.weekStartDate, merged);
    }

    const next = new Map(this.commitActivity);
    for (const activity of selectWhere(next, (c) => c.repositoryId === repositoryId)) {
      next.delete(activity.id);
    }
    for (const activity of byWeek.values()) {
      next.set(activity.id, activity);
    }
    this.commitActivity = next;

    return this.listCommitActivity(repositoryId);
  }

  async appendStarHistory(repositoryId: string, snapshot: NewStarHistory): Promise<StarHistory> {
    this.requireRepository(repositoryId);
    const record = validate(
      StarHistorySchema,
      { ...snapshot, id: this.generateId(), repositoryId, createdAt: this.timestamp() },
      'star history'
    );
    this.starHistory.set(record.id, record);
    return record;
  }

  async listStarHistory(repositoryId: string): Promise<StarHistory[]> {
    return selectWhere(this.starHistory, (s) => s.repositoryId === repositoryId);
  }

  // --------------------------------------------------------------------------
  // Apps
  // --------------------------------------------------------------------------

  async addAppProject(goalId: string, input: CreateAppProjectInput): Promise<AppProject> {
    this.requireProgrammingGoal(goalId);
    const data = validate(CreateAppProjectInputSchema, input, 'app project');
    const project = validate(
      AppProjectSchema,
      { ...data, id: this.generateId(), goalId, createdAt: this.timestamp() },
      'app project'
    );
    this.appProjects.set(project.id, project);
    return project;
  }

  async getAppProject(id: string): Promise<AppProject | undefined> {
    return this.appProjects.get(id);
  }

  async listAppProjects(goalId: string): Promise<AppProject[]> {
    return selectWhere(this.appProjects, (p) => p.goalId === goalId);
  }

  private removeAppProject(id: string): void {
    this.deleteWhere(this.revenueEntries, (e) => e.projectId === id);
    this.deleteWhere(this.metricSnapshots, (s) => s.projectId === id);
    this.appProjects.delete(id);
  }

  async appendRevenueEntry(projectId: string, entry: NewRevenueEntry): Promise<RevenueEntry> {
    this.requireAppProject(projectId);
    const record = validate(
      RevenueEntrySchema,
      { ...entry, id: this.generateId(), projectId, createdAt: this.timestamp() },
      'revenue entry'
    );
    this.revenueEntries.set(record.id, record);
    return record;
  }

  async listRevenueEntries(projectId: string): Promise<RevenueEntry[]> {
    return selectWhere(this.revenueEntries, (e) => e.projectId === projectId);
  }

  async appendMetricSnapshot(
    projectId: string,
    snapshot: NewMetricSnapshot
  ): Promise<AppMetricSnapshot> {
    this.requireAppProject(projectId);
    const record = validate(
      AppMetricSnapshotSchema,
      { ...snapshot, id: this.generateId(), projectId, createdAt: this.timestamp() },
      'metric snapshot'
    );
    this.metricSnapshots.set(record.id, record);
    return record;
  }

  async listMetricSnapshots(projectId: string): Promise<AppMetricSnapshot[]> {
    return selectWhere(this.metricSnapshots, (s) => s.projectId === projectId);
  }
}
