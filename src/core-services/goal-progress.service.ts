/**
 * Goal Progress Service
 *
 * Materializes `Goal.currentValue` from the goal's owned collections. Call
 * `recomputeProgress` after any change to those collections; nothing
 * recomputes implicitly.
 */

import { computeCurrentValue, goalProgress, type GoalAggregate } from '../analytics';
import type { EventStore } from '../core-db';
import { GoalTrackerError, GoalTrackerErrorCode, GoalType, type Goal } from '../core-domain';
import { logger as defaultLogger, type Logger } from '../logger';

export interface GoalProgressResult {
  goal: Goal;
  progress: number;
}

/**
 * Load the collections the goal's type reads
 */
export async function loadGoalAggregate(store: EventStore, goal: Goal): Promise<GoalAggregate> {
  switch (goal.goalType) {
    case GoalType.READING:
      return {
        goalType: GoalType.READING,
        goal,
        collections: { books: await store.listBooks(goal.id) },
      };
    case GoalType.FITNESS:
      return {
        goalType: GoalType.FITNESS,
        goal,
        collections: {
          trainingSessions: await store.listTrainingSessions(goal.id),
          config: await store.getFitnessConfig(goal.id),
        },
      };
    case GoalType.PROGRAMMING: {
      const repositories = await store.listRepositories(goal.id);
      return {
        goalType: GoalType.PROGRAMMING,
        goal,
        collections: {
          repositories: await Promise.all(
            repositories.map(async (repository) => ({
              repository,
              commitActivity: await store.listCommitActivity(repository.id),
            }))
          ),
        },
      };
    }
  }
}

export class GoalProgressService {
  constructor(
    private readonly store: EventStore,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Recompute and store `currentValue`. Running it twice without new
   * events writes the same value.
   */
  async recomputeProgress(goalId: string): Promise<GoalProgressResult> {
    const goal = await this.store.getGoal(goalId);
    if (!goal) {
      throw new GoalTrackerError(GoalTrackerErrorCode.NOT_FOUND, `Goal ${goalId} not found`, false);
    }

    const aggregate = await loadGoalAggregate(this.store, goal);
    const currentValue = computeCurrentValue(aggregate);
    const updated = await this.store.setGoalProgress(goalId, currentValue);

    this.logger.debug(
      { goalId, goalType: goal.goalType, previous: goal.currentValue, currentValue },
      'Goal progress recomputed'
    );

    return { goal: updated, progress: goalProgress(updated) };
  }

  async recomputeAll(): Promise<GoalProgressResult[]> {
    const goals = await this.store.listGoals({ includeArchived: true });
    const results: GoalProgressResult[] = [];
    for (const goal of goals) {
      results.push(await this.recomputeProgress(goal.id));
    }
    return results;
  }
}
