#!/usr/bin/env node
import { Command } from 'commander';
import { formatISO } from 'date-fns';
import { z } from 'zod';
import { config } from '../config';
import {
  AiSdkTextGenerator,
  GitHubRestClient,
  GoogleBooksClient,
} from '../connectors';
import {
  AppPlatform,
  DEFAULT_GOAL_TARGETS,
  DistanceUnit,
  GoalType,
  WorkoutType,
  describeError,
  isGoalTrackerError,
} from '../core-domain';
import {
  FitnessService,
  GitHubSyncService,
  GoalAssistantService,
  GoalProgressService,
  GoalReportService,
  ReadingService,
  RevenueRecorderService,
} from '../core-services';
import { logger } from '../logger';
import { FileBackedEventStore } from '../snapshot-file';

const GlobalOptionsSchema = z.object({
  file: z.string().min(1),
});

const GoalAddOptionsSchema = z.object({
  type: z.nativeEnum(GoalType),
  title: z.string().min(1),
  target: z.coerce.number().int().positive().optional(),
  description: z.string().optional(),
  endDate: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value).toISOString())
    .optional(),
});

const BookAddOptionsSchema = z.object({
  title: z.string().min(1),
  author: z.string().optional(),
  isbn: z.string().optional(),
  pages: z.coerce.number().int().positive().optional(),
});

const ReadingLogOptionsSchema = z.object({
  pages: z.coerce.number().int().nonnegative(),
  minutes: z.coerce.number().int().nonnegative(),
  notes: z.string().optional(),
});

const WorkoutOptionsSchema = z.object({
  type: z.nativeEnum(WorkoutType),
  minutes: z.coerce.number().int().nonnegative(),
  distance: z.coerce.number().nonnegative().optional(),
  unit: z.nativeEnum(DistanceUnit).default(DistanceUnit.KILOMETERS),
  title: z.string().optional(),
});

const AppAddOptionsSchema = z.object({
  name: z.string().min(1),
  platform: z.nativeEnum(AppPlatform).default(AppPlatform.IOS),
});

const SyncOptionsSchema = z.object({
  force: z.boolean().default(false),
  concurrency: z.coerce.number().int().positive().optional(),
});

const RevenueOptionsSchema = z.object({
  gross: z.coerce.number().nonnegative(),
  net: z.coerce.number().nonnegative().optional(),
  date: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value).toISOString())
    .optional(),
  downloads: z.coerce.number().int().nonnegative().optional(),
});

const SuggestOptionsSchema = z.object({
  type: z.nativeEnum(GoalType),
  title: z.string().min(1),
  description: z.string().optional(),
});

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

const program = new Command();

program
  .name('goalpost')
  .description('Track reading, fitness and programming goals')
  .version('1.0.0')
  .option('-f, --file <path>', 'Snapshot file', config.storage.dataFile);

async function openStore(): Promise<FileBackedEventStore> {
  const { file } = GlobalOptionsSchema.parse(program.opts());
  return FileBackedEventStore.open(file);
}

const goal = program.command('goal').description('Manage goals');

goal
  .command('add')
  .description('Create a goal')
  .requiredOption('-t, --type <type>', 'reading | fitness | programming')
  .requiredOption('--title <title>', 'Goal title')
  .option('--target <n>', 'Target value (defaults per goal type)')
  .option('--description <text>', 'Description')
  .option('--end-date <date>', 'ISO end date')
  .action(async (options: unknown) => {
    const parsed = GoalAddOptionsSchema.parse(options);
    const store = await openStore();
    const created = await store.createGoal({
      title: parsed.title,
      description: parsed.description,
      goalType: parsed.type,
      targetValue: parsed.target ?? DEFAULT_GOAL_TARGETS[parsed.type],
      endDate: parsed.endDate,
    });
    await store.flush();
    print(created);
  });

goal
  .command('list')
  .description('List goals')
  .option('-a, --all', 'Include archived goals')
  .action(async (options: unknown) => {
    const { all } = z.object({ all: z.boolean().default(false) }).parse(options);
    const store = await openStore();
    print(await store.listGoals({ includeArchived: all }));
  });

goal
  .command('delete <goalId>')
  .description('Delete a goal and everything it owns')
  .action(async (goalId: string) => {
    const store = await openStore();
    const deleted = await store.deleteGoal(goalId);
    await store.flush();
    print({ goalId, deleted });
  });

const book = program.command('book').description('Books of a reading goal');

book
  .command('add <goalId>')
  .description('Add a book to a reading goal')
  .requiredOption('--title <title>', 'Book title')
  .option('--author <name>', 'Author')
  .option('--isbn <isbn>', 'ISBN')
  .option('-p, --pages <n>', 'Total pages')
  .action(async (goalId: string, options: unknown) => {
    const parsed = BookAddOptionsSchema.parse(options);
    const store = await openStore();
    const added = await new ReadingService(store).addBook(goalId, {
      title: parsed.title,
      author: parsed.author,
      isbn: parsed.isbn,
      totalPages: parsed.pages,
    });
    await store.flush();
    print(added);
  });

book
  .command('log <bookId>')
  .description('Log a reading session')
  .requiredOption('-p, --pages <n>', 'Pages read')
  .requiredOption('-m, --minutes <n>', 'Minutes spent reading')
  .option('--notes <text>', 'Notes')
  .action(async (bookId: string, options: unknown) => {
    const parsed = ReadingLogOptionsSchema.parse(options);
    const store = await openStore();
    const logged = await new ReadingService(store).logReadingSession(bookId, {
      pagesRead: parsed.pages,
      durationMinutes: parsed.minutes,
      notes: parsed.notes,
    });
    await store.flush();
    print(logged);
  });

book
  .command('done <bookId>')
  .description('Mark a book as completed')
  .action(async (bookId: string) => {
    const store = await openStore();
    const completed = await new ReadingService(store).markBookCompleted(bookId);
    await store.flush();
    print(completed);
  });

program
  .command('workout <goalId>')
  .description('Log a training session')
  .requiredOption('-t, --type <type>', 'swim | bike | run | strength | recovery')
  .requiredOption('-m, --minutes <n>', 'Duration in minutes')
  .option('-d, --distance <n>', 'Distance')
  .option('-u, --unit <unit>', 'km | mi | m | yd')
  .option('--title <title>', 'Title')
  .action(async (goalId: string, options: unknown) => {
    const parsed = WorkoutOptionsSchema.parse(options);
    const store = await openStore();
    const session = await new FitnessService(store).logTrainingSession(goalId, {
      workoutType: parsed.type,
      durationMinutes: parsed.minutes,
      distance: parsed.distance,
      distanceUnit: parsed.distance === undefined ? undefined : parsed.unit,
      title: parsed.title,
    });
    await store.flush();
    print(session);
  });

program
  .command('repo <goalId> <fullName>')
  .description('Track a GitHub repository ("owner/name") under a programming goal')
  .action(async (goalId: string, fullName: string) => {
    const store = await openStore();
    const repository = await store.trackRepository(goalId, { fullName });
    await store.flush();
    print(repository);
  });

program
  .command('app <goalId>')
  .description('Track an app project under a programming goal')
  .requiredOption('--name <name>', 'App name')
  .option('--platform <platform>', 'ios | macos | android | web | cross_platform')
  .action(async (goalId: string, options: unknown) => {
    const parsed = AppAddOptionsSchema.parse(options);
    const store = await openStore();
    const project = await store.addAppProject(goalId, parsed);
    await store.flush();
    print(project);
  });

program
  .command('progress')
  .description('Recompute progress of every goal')
  .action(async () => {
    const store = await openStore();
    const results = await new GoalProgressService(store).recomputeAll();
    await store.flush();
    print(
      results.map(({ goal: g, progress }) => ({
        id: g.id,
        title: g.title,
        goalType: g.goalType,
        currentValue: g.currentValue,
        targetValue: g.targetValue,
        progress,
      }))
    );
  });

program
  .command('report <goalId>')
  .description('Print analytics for a goal')
  .action(async (goalId: string) => {
    const store = await openStore();
    print(await new GoalReportService(store).buildReport(goalId));
  });

program
  .command('sync <goalId>')
  .description("Sync a programming goal's repositories with GitHub")
  .option('--force', 'Sync repositories synced within the last hour too')
  .option('-c, --concurrency <n>', 'Repositories synced in parallel')
  .action(async (goalId: string, options: unknown) => {
    const parsed = SyncOptionsSchema.parse(options);
    const store = await openStore();
    const client = new GitHubRestClient();
    const sync = new GitHubSyncService(store, {
      metadataProvider: client,
      statisticsProvider: client,
    });

    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const results = await sync.syncGoal(goalId, {
      onlyStale: !parsed.force,
      concurrency: parsed.concurrency,
      signal: controller.signal,
    });
    await store.flush();
    print(
      results.map((result) => ({
        ...result,
        error: result.error && { code: result.error.code, message: result.error.message },
      }))
    );
  });

program
  .command('revenue <projectId>')
  .description('Record revenue for an app project')
  .requiredOption('-g, --gross <amount>', 'Gross revenue')
  .option('-n, --net <amount>', 'Net revenue (defaults to gross minus platform fee)')
  .option('-d, --date <date>', 'ISO date', formatISO(new Date()))
  .option('--downloads <n>', 'Downloads in the period')
  .action(async (projectId: string, options: unknown) => {
    const parsed = RevenueOptionsSchema.parse(options);
    const store = await openStore();
    const entry = await new RevenueRecorderService(store).recordRevenue(projectId, {
      grossRevenue: parsed.gross,
      netRevenue: parsed.net,
      date: parsed.date,
      downloads: parsed.downloads,
    });
    await store.flush();
    print(entry);
  });

program
  .command('books <query>')
  .description('Search book metadata')
  .action(async (query: string) => {
    print(await new GoogleBooksClient().search(query));
  });

program
  .command('suggest')
  .description('Ask the assistant for a goal structure')
  .requiredOption('-t, --type <type>', 'reading | fitness | programming')
  .requiredOption('--title <title>', 'Goal title')
  .option('--description <text>', 'Description')
  .action(async (options: unknown) => {
    const parsed = SuggestOptionsSchema.parse(options);
    const store = await openStore();
    const assistant = new GoalAssistantService(new AiSdkTextGenerator(), store);
    print(
      await assistant.suggestStructure({
        goalType: parsed.type,
        title: parsed.title,
        description: parsed.description,
      })
    );
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (isGoalTrackerError(error)) {
    logger.error({ code: error.code }, error.message);
  } else {
    logger.error({ err: error }, describeError(error));
  }
  process.exitCode = 1;
});
