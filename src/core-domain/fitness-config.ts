/**
 * Fitness Goal Configuration
 *
 * At most one per fitness goal. Describes what kind of fitness goal it is
 * and carries the targets for that kind.
 */

import { z } from 'zod';

export enum FitnessGoalType {
  RACE_TRAINING = 'race_training',
  STRENGTH_GOAL = 'strength_goal',
  CONSISTENCY_GOAL = 'consistency_goal',
  CUSTOM_METRIC = 'custom_metric',
}

export enum RaceType {
  FIVE_K = '5k',
  TEN_K = '10k',
  HALF_MARATHON = 'half_marathon',
  MARATHON = 'marathon',
  TRIATHLON = 'triathlon',
  CUSTOM = 'custom',
}

/**
 * Canonical race distances. Triathlon is the Olympic total.
 * Custom races carry their distance on the config instead.
 */
export const RACE_DISTANCE_KM: Record<RaceType, number> = {
  [RaceType.FIVE_K]: 5.0,
  [RaceType.TEN_K]: 10.0,
  [RaceType.HALF_MARATHON]: 21.0975,
  [RaceType.MARATHON]: 42.195,
  [RaceType.TRIATHLON]: 51.5,
  [RaceType.CUSTOM]: 0,
};

export const RACE_TYPE_LABELS: Record<RaceType, string> = {
  [RaceType.FIVE_K]: '5K',
  [RaceType.TEN_K]: '10K',
  [RaceType.HALF_MARATHON]: 'Half Marathon',
  [RaceType.MARATHON]: 'Marathon',
  [RaceType.TRIATHLON]: 'Triathlon',
  [RaceType.CUSTOM]: 'Custom Distance',
};

/**
 * Training phase. Set by the athlete, never derived.
 */
export enum TrainingPhase {
  BASE = 'base',
  BUILD = 'build',
  PEAK = 'peak',
  TAPER = 'taper',
  RECOVERY = 'recovery',
}

export const TRAINING_PHASE_ORDER: readonly TrainingPhase[] = [
  TrainingPhase.BASE,
  TrainingPhase.BUILD,
  TrainingPhase.PEAK,
  TrainingPhase.TAPER,
  TrainingPhase.RECOVERY,
];

export interface TrainingPhaseInfo {
  label: string;
  description: string;
  intensityLevel: number;
}

export const TRAINING_PHASE_INFO: Record<TrainingPhase, TrainingPhaseInfo> = {
  [TrainingPhase.BASE]: {
    label: 'Base',
    description: 'Building aerobic foundation',
    intensityLevel: 1,
  },
  [TrainingPhase.BUILD]: {
    label: 'Build',
    description: 'Increasing intensity and volume',
    intensityLevel: 3,
  },
  [TrainingPhase.PEAK]: {
    label: 'Peak',
    description: 'Race-specific training',
    intensityLevel: 4,
  },
  [TrainingPhase.TAPER]: {
    label: 'Taper',
    description: 'Reducing volume before race',
    intensityLevel: 2,
  },
  [TrainingPhase.RECOVERY]: {
    label: 'Recovery',
    description: 'Post-race recovery',
    intensityLevel: 1,
  },
};

/**
 * Fitness Goal Config Schema
 */
export const FitnessGoalConfigSchema = z.object({
  id: z.string(),
  goalId: z.string(),
  fitnessGoalType: z.nativeEnum(FitnessGoalType).default(FitnessGoalType.CONSISTENCY_GOAL),

  // Race training
  raceType: z.nativeEnum(RaceType).optional(),
  raceDate: z.string().datetime().optional(),
  raceName: z.string().optional(),
  targetPaceSecondsPerKm: z.number().int().positive().optional(),
  targetFinishTimeSeconds: z.number().int().positive().optional(),
  customDistanceKm: z.number().positive().optional(),

  // Training plan
  currentPhase: z.nativeEnum(TrainingPhase).optional(),
  phaseStartDate: z.string().datetime().optional(),
  phaseEndDate: z.string().datetime().optional(),
  weeklyMileageTargetKm: z.number().positive().optional(),

  // Strength
  targetExercise: z.string().optional(),
  targetWeight: z.number().positive().optional(),
  targetReps: z.number().int().positive().optional(),
  weightUnit: z.string().default('kg'),

  // Consistency
  sessionsPerWeek: z.number().int().positive().optional(),
  minimumDurationMinutes: z.number().int().positive().optional(),

  // Custom metric
  metricName: z.string().optional(),
  metricUnit: z.string().optional(),
  targetMetricValue: z.number().optional(),

  createdAt: z.string().datetime(),
});

export type FitnessGoalConfig = z.infer<typeof FitnessGoalConfigSchema>;

export const FitnessGoalConfigInputSchema = FitnessGoalConfigSchema.omit({
  id: true,
  goalId: true,
  createdAt: true,
} as const).partial({
  fitnessGoalType: true,
  weightUnit: true,
});

export type FitnessGoalConfigInput = z.input<typeof FitnessGoalConfigInputSchema>;
