/**
 * Training Session Domain Model
 *
 * One logged workout under a fitness goal. Sessions are immutable.
 */

import { z } from 'zod';

/**
 * Workout discipline
 */
export enum WorkoutType {
  SWIM = 'swim',
  BIKE = 'bike',
  RUN = 'run',
  STRENGTH = 'strength',
  RECOVERY = 'recovery',
}

/**
 * Unit the distance was logged in
 */
export enum DistanceUnit {
  KILOMETERS = 'km',
  MILES = 'mi',
  METERS = 'm',
  YARDS = 'yd',
}

/**
 * Purpose of a workout
 */
export enum WorkoutIntent {
  EASY = 'easy',
  TEMPO = 'tempo',
  INTERVAL = 'interval',
  LONG_RUN = 'long_run',
  RECOVERY = 'recovery',
  RACE = 'race',
  STRENGTH = 'strength',
  CROSS_TRAINING = 'cross_training',
}

/**
 * Perceived-effort band (1-10) each intent is meant to be run at
 */
export const WORKOUT_INTENT_EFFORT: Record<WorkoutIntent, { min: number; max: number }> = {
  [WorkoutIntent.EASY]: { min: 1, max: 3 },
  [WorkoutIntent.TEMPO]: { min: 6, max: 7 },
  [WorkoutIntent.INTERVAL]: { min: 8, max: 9 },
  [WorkoutIntent.LONG_RUN]: { min: 4, max: 6 },
  [WorkoutIntent.RECOVERY]: { min: 1, max: 2 },
  [WorkoutIntent.RACE]: { min: 8, max: 10 },
  [WorkoutIntent.STRENGTH]: { min: 5, max: 8 },
  [WorkoutIntent.CROSS_TRAINING]: { min: 3, max: 6 },
};

/**
 * Training Session Schema
 */
export const TrainingSessionSchema = z
  .object({
    id: z.string(),
    goalId: z.string(),
    workoutType: z.nativeEnum(WorkoutType),
    title: z.string().optional(),
    date: z.string().datetime(),
    durationMinutes: z.number().int().nonnegative(),

    // Distance is a tagged value: both parts or neither
    distance: z.number().nonnegative().optional(),
    distanceUnit: z.nativeEnum(DistanceUnit).optional(),

    paceSecondsPerKm: z.number().int().positive().optional(),
    workoutIntent: z.nativeEnum(WorkoutIntent).optional(),
    perceivedEffort: z.number().int().min(1).max(10).optional(),
    heartRateAvg: z.number().int().positive().optional(),
    heartRateMax: z.number().int().positive().optional(),
    calories: z.number().int().nonnegative().optional(),
    elevationGain: z.number().nonnegative().optional(),

    isRace: z.boolean().default(false),
    racePosition: z.number().int().positive().optional(),
    raceFieldSize: z.number().int().positive().optional(),

    notes: z.string().optional(),
    createdAt: z.string().datetime(),
  })
  .refine((session) => (session.distance === undefined) === (session.distanceUnit === undefined), {
    message: 'distance and distanceUnit must be provided together',
    path: ['distanceUnit'],
  });

export type TrainingSession = z.infer<typeof TrainingSessionSchema>;

export const CreateTrainingSessionInputSchema = z
  .object({
    workoutType: z.nativeEnum(WorkoutType),
    title: z.string().optional(),
    date: z.string().datetime().optional(),
    durationMinutes: z.number().int().nonnegative(),
    distance: z.number().nonnegative().optional(),
    distanceUnit: z.nativeEnum(DistanceUnit).optional(),
    paceSecondsPerKm: z.number().int().positive().optional(),
    workoutIntent: z.nativeEnum(WorkoutIntent).optional(),
    perceivedEffort: z.number().int().min(1).max(10).optional(),
    heartRateAvg: z.number().int().positive().optional(),
    isRace: z.boolean().optional(),
    racePosition: z.number().int().positive().optional(),
    raceFieldSize: z.number().int().positive().optional(),
    notes: z.string().optional(),
  })
  .refine((session) => (session.distance === undefined) === (session.distanceUnit === undefined), {
    message: 'distance and distanceUnit must be provided together',
    path: ['distanceUnit'],
  });

export type CreateTrainingSessionInput = z.input<typeof CreateTrainingSessionInputSchema>;
