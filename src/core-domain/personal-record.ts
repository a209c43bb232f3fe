/**
 * Personal Record Domain Model
 */

import { z } from 'zod';

export enum PersonalRecordCategory {
  RUNNING = 'running',
  CYCLING = 'cycling',
  SWIMMING = 'swimming',
  STRENGTH = 'strength',
  CUSTOM = 'custom',
}

/**
 * Time-based categories record seconds, so lower values are better.
 */
export const LOWER_IS_BETTER: ReadonlySet<PersonalRecordCategory> = new Set([
  PersonalRecordCategory.RUNNING,
  PersonalRecordCategory.CYCLING,
  PersonalRecordCategory.SWIMMING,
]);

export const DEFAULT_RECORD_UNIT: Record<PersonalRecordCategory, string> = {
  [PersonalRecordCategory.RUNNING]: 'seconds',
  [PersonalRecordCategory.CYCLING]: 'seconds',
  [PersonalRecordCategory.SWIMMING]: 'seconds',
  [PersonalRecordCategory.STRENGTH]: 'kg',
  [PersonalRecordCategory.CUSTOM]: '',
};

export const PersonalRecordSchema = z.object({
  id: z.string(),
  goalId: z.string(),
  exercise: z.string().min(1),
  category: z.nativeEnum(PersonalRecordCategory),
  value: z.number(),
  unit: z.string(),
  achievedDate: z.string().datetime(),
  notes: z.string().optional(),
  previousValue: z.number().optional(),
  previousDate: z.string().datetime().optional(),
  createdAt: z.string().datetime(),
});

export type PersonalRecord = z.infer<typeof PersonalRecordSchema>;

export const CreatePersonalRecordInputSchema = PersonalRecordSchema.pick({
  exercise: true,
  category: true,
  value: true,
  notes: true,
}).extend({
  unit: z.string().optional(),
  achievedDate: z.string().datetime().optional(),
});

export type CreatePersonalRecordInput = z.input<typeof CreatePersonalRecordInputSchema>;
