/**
 * Goal Domain Model
 *
 * A goal belongs to one of three families:
 * - Reading (books completed)
 * - Fitness (training sessions logged)
 * - Programming (commits across tracked repositories)
 *
 * `currentValue` is a cache recomputed from the goal's owned collections;
 * it is never edited directly.
 */

import { z } from 'zod';

/**
 * Goal family
 */
export enum GoalType {
  READING = 'reading',
  FITNESS = 'fitness',
  PROGRAMMING = 'programming',
}

export const GOAL_TYPE_LABELS: Record<GoalType, string> = {
  [GoalType.READING]: 'Book Reading',
  [GoalType.FITNESS]: 'Fitness',
  [GoalType.PROGRAMMING]: 'Programming',
};

/**
 * Default targets offered when a goal is created without one
 */
export const DEFAULT_GOAL_TARGETS: Record<GoalType, number> = {
  [GoalType.READING]: 12,
  [GoalType.FITNESS]: 100,
  [GoalType.PROGRAMMING]: 500,
};

/**
 * Goal Schema
 */
export const GoalSchema = z.object({
  id: z.string(),
  title: z.string().min(1).max(500),
  description: z.string().optional(),
  goalType: z.nativeEnum(GoalType),

  // Progress tracking
  targetValue: z.number().int().nonnegative(),
  currentValue: z.number().int().nonnegative().default(0),

  // Time management
  startDate: z.string().datetime(),
  endDate: z.string().datetime().optional(),

  isArchived: z.boolean().default(false),

  // Raw JSON of an accepted AI structure suggestion
  aiGeneratedStructure: z.string().optional(),

  // Metadata
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export type Goal = z.infer<typeof GoalSchema>;

/**
 * Goal creation input
 */
export const CreateGoalInputSchema = GoalSchema.omit({
  id: true,
  currentValue: true,
  createdAt: true,
  updatedAt: true,
} as const)
  .extend({
    targetValue: z.number().int().positive(),
  })
  .partial({
    startDate: true,
    isArchived: true,
  });

export type CreateGoalInput = z.input<typeof CreateGoalInputSchema>;

/**
 * Goal update input
 */
export const UpdateGoalInputSchema = GoalSchema.pick({
  title: true,
  description: true,
  targetValue: true,
  endDate: true,
  isArchived: true,
  aiGeneratedStructure: true,
})
  .extend({
    targetValue: z.number().int().positive(),
  })
  .partial();

export type UpdateGoalInput = z.input<typeof UpdateGoalInputSchema>;
