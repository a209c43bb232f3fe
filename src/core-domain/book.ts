/**
 * Book Domain Model
 *
 * Books belong to a reading goal. Each book keeps an append-only log of
 * reading sessions; page position and completion live on the book itself.
 */

import { z } from 'zod';

/**
 * Book Schema
 */
export const BookSchema = z.object({
  id: z.string(),
  goalId: z.string(),
  title: z.string().min(1).max(500),
  author: z.string().optional(),
  isbn: z.string().optional(),
  coverUrl: z.string().url().optional(),
  description: z.string().optional(),

  totalPages: z.number().int().positive().optional(),
  currentPage: z.number().int().nonnegative().default(0),
  isCompleted: z.boolean().default(false),
  dailyPageGoal: z.number().int().positive().optional(),

  startedReadingDate: z.string().datetime().optional(),
  lastReadDate: z.string().datetime().optional(),
  completionDate: z.string().datetime().optional(),

  createdAt: z.string().datetime(),
});

export type Book = z.infer<typeof BookSchema>;

export const CreateBookInputSchema = BookSchema.omit({
  id: true,
  goalId: true,
  isCompleted: true,
  completionDate: true,
  createdAt: true,
} as const).partial({
  currentPage: true,
});

export type CreateBookInput = z.input<typeof CreateBookInputSchema>;

/**
 * Reading Session Schema
 *
 * Immutable once logged.
 */
export const ReadingSessionSchema = z.object({
  id: z.string(),
  bookId: z.string(),
  date: z.string().datetime(),
  pagesRead: z.number().int().nonnegative(),
  durationMinutes: z.number().int().nonnegative(),
  startPage: z.number().int().nonnegative().default(0),
  endPage: z.number().int().nonnegative().default(0),
  notes: z.string().optional(),
  createdAt: z.string().datetime(),
});

export type ReadingSession = z.infer<typeof ReadingSessionSchema>;

export const LogReadingSessionInputSchema = ReadingSessionSchema.pick({
  pagesRead: true,
  durationMinutes: true,
  notes: true,
}).extend({
  date: z.string().datetime().optional(),
});

export type LogReadingSessionInput = z.input<typeof LogReadingSessionInputSchema>;
