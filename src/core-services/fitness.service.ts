/**
 * Fitness Service
 *
 * Training log, goal configuration and personal records for fitness goals.
 */

import {
  bestRecord,
  daysUntilRace,
  isImprovement,
  paceDifference,
  predictedFinishSeconds,
  raceDistanceKm,
  recentPace,
  targetFinishSeconds,
  weeklyMileage,
  averageWeeklyMileage,
  type WeeklyMileage,
} from '../analytics';
import type { EventStore } from '../core-db';
import {
  CreatePersonalRecordInputSchema,
  DEFAULT_RECORD_UNIT,
  GoalTrackerError,
  GoalTrackerErrorCode,
  GoalType,
  type CreatePersonalRecordInput,
  type CreateTrainingSessionInput,
  type FitnessGoalConfig,
  type FitnessGoalConfigInput,
  type Goal,
  type PersonalRecord,
  type TrainingSession,
} from '../core-domain';
import { logger as defaultLogger, type Logger } from '../logger';
import { GoalProgressService } from './goal-progress.service';

export interface FitnessServiceOptions {
  logger?: Logger;
  now?: () => Date;
}

export interface RecordedPersonalRecord {
  record: PersonalRecord;
  isNewBest: boolean;
}

export interface FitnessSummary {
  sessionCount: number;
  recentPace?: number;
  weeklyMileage: WeeklyMileage[];
  averageWeeklyMileage: number;
  race?: {
    distanceKm?: number;
    daysUntilRace?: number;
    predictedFinishSeconds?: number;
    targetFinishSeconds?: number;
    paceDifference?: number;
  };
}

export class FitnessService {
  private readonly progress: GoalProgressService;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: EventStore,
    options: FitnessServiceOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
    this.progress = new GoalProgressService(store, this.logger);
  }

  async logTrainingSession(
    goalId: string,
    input: CreateTrainingSessionInput
  ): Promise<TrainingSession> {
    await this.requireFitnessGoal(goalId);
    const session = await this.store.addTrainingSession(goalId, input);
    await this.progress.recomputeProgress(goalId);
    this.logger.info(
      { goalId, sessionId: session.id, workoutType: session.workoutType },
      'Training session logged'
    );
    return session;
  }

  async configure(goalId: string, input: FitnessGoalConfigInput): Promise<FitnessGoalConfig> {
    await this.requireFitnessGoal(goalId);
    return this.store.setFitnessConfig(goalId, input);
  }

  /**
   * Store a record, carrying over the current best for the same exercise as
   * its previous value
   */
  async recordPersonalRecord(
    goalId: string,
    input: CreatePersonalRecordInput
  ): Promise<RecordedPersonalRecord> {
    const parsed = CreatePersonalRecordInputSchema.safeParse(input);
    if (!parsed.success) {
      throw GoalTrackerError.invalidInput(parsed.error, 'personal record');
    }
    await this.requireFitnessGoal(goalId);
    const data = parsed.data;

    const previous = bestRecord(await this.store.listPersonalRecords(goalId), data.exercise);
    const record = await this.store.addPersonalRecord(goalId, {
      exercise: data.exercise,
      category: data.category,
      value: data.value,
      unit: data.unit ?? DEFAULT_RECORD_UNIT[data.category],
      achievedDate: data.achievedDate ?? this.now().toISOString(),
      notes: data.notes,
      previousValue: previous?.value,
      previousDate: previous?.achievedDate,
    });

    const isNewBest = previous === undefined || isImprovement(data.category, data.value, previous.value);
    if (isNewBest) {
      this.logger.info({ goalId, exercise: data.exercise, value: data.value }, 'New personal record');
    }
    return { record, isNewBest };
  }

  async summarize(goalId: string): Promise<FitnessSummary> {
    await this.requireFitnessGoal(goalId);
    const now = this.now();
    const sessions = await this.store.listTrainingSessions(goalId);
    const config = await this.store.getFitnessConfig(goalId);
    const weeks = weeklyMileage(sessions, { now });

    return {
      sessionCount: sessions.length,
      recentPace: recentPace(sessions),
      weeklyMileage: weeks,
      averageWeeklyMileage: averageWeeklyMileage(weeks),
      race: config && {
        distanceKm: raceDistanceKm(config),
        daysUntilRace: daysUntilRace(config, now),
        predictedFinishSeconds: predictedFinishSeconds(config, sessions),
        targetFinishSeconds: targetFinishSeconds(config),
        paceDifference: paceDifference(config, sessions),
      },
    };
  }

  private async requireFitnessGoal(goalId: string): Promise<Goal> {
    const goal = await this.store.getGoal(goalId);
    if (!goal) {
      throw new GoalTrackerError(GoalTrackerErrorCode.NOT_FOUND, `Goal ${goalId} not found`, false);
    }
    if (goal.goalType !== GoalType.FITNESS) {
      throw new GoalTrackerError(
        GoalTrackerErrorCode.INVALID_INPUT,
        `Goal ${goalId} is a ${goal.goalType} goal, not a fitness goal`
      );
    }
    return goal;
  }
}
