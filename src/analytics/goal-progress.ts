/**
 * Goal Progress
 *
 * A goal's `currentValue` is derived from the collections it owns. Each goal
 * type has one entry in `PROGRESS_STRATEGIES`; `GoalAggregate<K>` pairs a
 * goal with the collections its strategy reads, so a strategy only ever sees
 * the shape it was written for.
 */

import {
  differenceInCalendarDays,
  endOfYear,
  getDayOfYear,
  getDaysInYear,
  parseISO,
  startOfDay,
} from 'date-fns';
import {
  GoalType,
  type Book,
  type CommitActivity,
  type FitnessGoalConfig,
  type GitHubRepository,
  type Goal,
  type TrainingSession,
} from '../core-domain';
import { totalCommits } from './programming';

export interface RepositoryActivity {
  repository: GitHubRepository;
  commitActivity: CommitActivity[];
}

/**
 * Collections each goal type reads
 */
export type GoalCollections = {
  [GoalType.READING]: { books: Book[] };
  [GoalType.FITNESS]: { trainingSessions: TrainingSession[]; config?: FitnessGoalConfig };
  [GoalType.PROGRAMMING]: { repositories: RepositoryActivity[] };
};

export type GoalAggregate<K extends GoalType = GoalType> = {
  [P in K]: { goalType: P; goal: Goal; collections: GoalCollections[P] };
}[K];

type ProgressStrategies = {
  [P in GoalType]: (collections: GoalCollections[P]) => number;
};

export const PROGRESS_STRATEGIES: ProgressStrategies = {
  [GoalType.READING]: ({ books }) => books.filter((book) => book.isCompleted).length,
  [GoalType.FITNESS]: ({ trainingSessions }) => trainingSessions.length,
  [GoalType.PROGRAMMING]: ({ repositories }) =>
    repositories.reduce((sum, { commitActivity }) => sum + totalCommits(commitActivity), 0),
};

export function computeCurrentValue<K extends GoalType>(aggregate: GoalAggregate<K>): number {
  return PROGRESS_STRATEGIES[aggregate.goalType](aggregate.collections);
}

/**
 * Fraction complete, clamped to 0..1. A goal without a positive target is 0.
 */
export function goalProgress(goal: Pick<Goal, 'currentValue' | 'targetValue'>): number {
  if (goal.targetValue <= 0) return 0;
  return Math.min(Math.max(goal.currentValue / goal.targetValue, 0), 1);
}

export function progressPercentage(goal: Pick<Goal, 'currentValue' | 'targetValue'>): number {
  return Math.floor(goalProgress(goal) * 100);
}

/**
 * Days left until the goal's end date, or until the end of the current year
 * when it has none
 */
export function daysRemaining(goal: Pick<Goal, 'endDate'>, now: Date = new Date()): number {
  const end = goal.endDate ? parseISO(goal.endDate) : endOfYear(now);
  return Math.max(0, differenceInCalendarDays(startOfDay(end), startOfDay(now)));
}

export function yearProgress(now: Date = new Date()): number {
  return getDayOfYear(now) / getDaysInYear(now);
}

export function isGoalComplete(goal: Pick<Goal, 'currentValue' | 'targetValue'>): boolean {
  return goal.targetValue > 0 && goal.currentValue >= goal.targetValue;
}
