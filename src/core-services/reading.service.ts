/**
 * Reading Service
 *
 * Book lifecycle under a reading goal. Every call that can change the number
 * of completed books recomputes the owning goal.
 */

import type { EventStore } from '../core-db';
import {
  GoalTrackerError,
  GoalTrackerErrorCode,
  GoalType,
  LogReadingSessionInputSchema,
  type Book,
  type CreateBookInput,
  type LogReadingSessionInput,
  type ReadingSession,
} from '../core-domain';
import { logger as defaultLogger, type Logger } from '../logger';
import { GoalProgressService } from './goal-progress.service';

export interface ReadingServiceOptions {
  logger?: Logger;
  now?: () => Date;
}

export interface LoggedReadingSession {
  session: ReadingSession;
  book: Book;
}

export class ReadingService {
  private readonly progress: GoalProgressService;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: EventStore,
    options: ReadingServiceOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
    this.progress = new GoalProgressService(store, this.logger);
  }

  async addBook(goalId: string, input: CreateBookInput): Promise<Book> {
    const goal = await this.store.getGoal(goalId);
    if (goal && goal.goalType !== GoalType.READING) {
      throw new GoalTrackerError(
        GoalTrackerErrorCode.INVALID_INPUT,
        `Goal ${goalId} is a ${goal.goalType} goal, books belong to reading goals`
      );
    }
    const book = await this.store.addBook(goalId, input);
    this.logger.info({ goalId, bookId: book.id, title: book.title }, 'Book added');
    return book;
  }

  /**
   * Append a session and advance the book. The page position never runs
   * past the book's last page.
   */
  async logReadingSession(bookId: string, input: LogReadingSessionInput): Promise<LoggedReadingSession> {
    const parsed = LogReadingSessionInputSchema.safeParse(input);
    if (!parsed.success) {
      throw GoalTrackerError.invalidInput(parsed.error, 'reading session');
    }
    const book = await this.requireBook(bookId);
    const data = parsed.data;

    const date = data.date ?? this.now().toISOString();
    const startPage = book.currentPage;
    const advanced = startPage + data.pagesRead;
    const endPage = book.totalPages !== undefined ? Math.min(advanced, book.totalPages) : advanced;

    const session = await this.store.appendReadingSession(bookId, {
      date,
      pagesRead: data.pagesRead,
      durationMinutes: data.durationMinutes,
      startPage,
      endPage,
      notes: data.notes,
    });

    const updated = await this.store.updateBook(bookId, {
      currentPage: endPage,
      lastReadDate: date,
      startedReadingDate: book.startedReadingDate ?? date,
    });

    await this.progress.recomputeProgress(book.goalId);
    return { session, book: updated };
  }

  async markBookCompleted(bookId: string): Promise<Book> {
    const book = await this.requireBook(bookId);
    const updated = await this.store.updateBook(bookId, {
      isCompleted: true,
      completionDate: this.now().toISOString(),
      currentPage: book.totalPages ?? book.currentPage,
    });

    await this.progress.recomputeProgress(book.goalId);
    this.logger.info({ bookId, goalId: book.goalId }, 'Book completed');
    return updated;
  }

  async removeBook(bookId: string): Promise<boolean> {
    const book = await this.store.getBook(bookId);
    if (!book) return false;
    await this.store.deleteBook(bookId);
    await this.progress.recomputeProgress(book.goalId);
    return true;
  }

  private async requireBook(bookId: string): Promise<Book> {
    const book = await this.store.getBook(bookId);
    if (!book) {
      throw new GoalTrackerError(GoalTrackerErrorCode.NOT_FOUND, `Book ${bookId} not found`, false);
    }
    return book;
  }
}
