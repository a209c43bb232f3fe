/**
 * Reading Analytics
 *
 * Pace, streak and completion estimates for books. Everything is derived
 * from the book and its reading-session log; nothing here throws for missing
 * data, absent values come back as `undefined` or 0.
 */

import { addDays, differenceInDays, isSameDay, parseISO, startOfDay, subDays } from 'date-fns';
import type { Book, ReadingSession } from '../core-domain';

/**
 * Fraction of the book read, 0..1 for well-formed data
 */
export function readingProgress(book: Book): number {
  if (!book.totalPages || book.totalPages <= 0) return 0;
  return book.currentPage / book.totalPages;
}

export function pagesRemaining(book: Book): number | undefined {
  if (book.totalPages === undefined) return undefined;
  return Math.max(0, book.totalPages - book.currentPage);
}

/**
 * Whole days since reading started, at least 1 once started
 */
export function daysReading(book: Book, now: Date = new Date()): number {
  if (!book.startedReadingDate) return 0;
  return Math.max(1, differenceInDays(now, parseISO(book.startedReadingDate)));
}

export function averagePagesPerDay(book: Book, now: Date = new Date()): number {
  const days = daysReading(book, now);
  if (days === 0) return 0;
  return book.currentPage / days;
}

export function estimatedDaysToComplete(book: Book, now: Date = new Date()): number | undefined {
  const remaining = pagesRemaining(book);
  const pace = averagePagesPerDay(book, now);
  if (remaining === undefined || pace <= 0) return undefined;
  return Math.ceil(remaining / pace);
}

export function estimatedCompletionDate(book: Book, now: Date = new Date()): Date | undefined {
  const days = estimatedDaysToComplete(book, now);
  return days === undefined ? undefined : addDays(now, days);
}

export function pagesPerHour(session: ReadingSession): number {
  if (session.durationMinutes <= 0) return 0;
  return session.pagesRead / (session.durationMinutes / 60);
}

export function totalPagesRead(sessions: readonly ReadingSession[]): number {
  return sessions.reduce((sum, session) => sum + session.pagesRead, 0);
}

export function totalReadingTimeMinutes(sessions: readonly ReadingSession[]): number {
  return sessions.reduce((sum, session) => sum + session.durationMinutes, 0);
}

export function averagePagesPerHour(sessions: readonly ReadingSession[]): number {
  const minutes = totalReadingTimeMinutes(sessions);
  if (minutes <= 0) return 0;
  return totalPagesRead(sessions) / (minutes / 60);
}

/**
 * Consecutive local calendar days with at least one session, counting back
 * from today. A day without a session ends the streak, so a book last read
 * yesterday has a streak of 0.
 */
export function readingStreak(sessions: readonly ReadingSession[], now: Date = new Date()): number {
  const days = sessions
    .map((session) => startOfDay(parseISO(session.date)))
    .sort((a, b) => b.getTime() - a.getTime());

  let streak = 0;
  let expected = startOfDay(now);

  for (const day of days) {
    if (isSameDay(day, expected)) {
      streak += 1;
      expected = subDays(expected, 1);
    } else if (day < expected) {
      break;
    }
    // several sessions on an already-counted day (or future-dated ones) are skipped
  }

  return streak;
}

export function isCurrentlyReading(book: Book): boolean {
  return !book.isCompleted && book.currentPage > 0;
}

export interface ReadingStats {
  progress: number;
  pagesRemaining?: number;
  averagePagesPerDay: number;
  estimatedDaysToComplete?: number;
  estimatedCompletionDate?: string;
  totalPagesRead: number;
  totalReadingTimeMinutes: number;
  averagePagesPerHour: number;
  streak: number;
}

export function summarizeBook(
  book: Book,
  sessions: readonly ReadingSession[],
  now: Date = new Date()
): ReadingStats {
  const completion = estimatedCompletionDate(book, now);
  return {
    progress: readingProgress(book),
    pagesRemaining: pagesRemaining(book),
    averagePagesPerDay: averagePagesPerDay(book, now),
    estimatedDaysToComplete: estimatedDaysToComplete(book, now),
    estimatedCompletionDate: completion?.toISOString(),
    totalPagesRead: totalPagesRead(sessions),
    totalReadingTimeMinutes: totalReadingTimeMinutes(sessions),
    averagePagesPerHour: averagePagesPerHour(sessions),
    streak: readingStreak(sessions, now),
  };
}
