import { describe, it, expect } from 'vitest';
import {
  computeCurrentValue,
  daysRemaining,
  goalProgress,
  isGoalComplete,
  progressPercentage,
  yearProgress,
} from '../src/analytics';
import { GoalType, WorkoutType } from '../src/core-domain';
import { GoalProgressService } from '../src/core-services';
import { book, commitBucket, createStore, trainingSession } from './helpers';

describe('Goal progress', () => {
  describe('computeCurrentValue', () => {
    it('should count completed books for reading goals', async () => {
      const store = createStore();
      const goal = await store.createGoal({ title: 'Read', goalType: GoalType.READING, targetValue: 12 });

      const value = computeCurrentValue({
        goalType: GoalType.READING,
        goal,
        collections: {
          books: [
            book({ id: 'a', isCompleted: true }),
            book({ id: 'b', isCompleted: false, currentPage: 40 }),
            book({ id: 'c', isCompleted: true }),
          ],
        },
      });

      expect(value).toBe(2);
    });

    it('should count training sessions for fitness goals', async () => {
      const store = createStore();
      const goal = await store.createGoal({ title: 'Train', goalType: GoalType.FITNESS, targetValue: 100 });
      const day = new Date(2026, 5, 1, 12);

      const value = computeCurrentValue({
        goalType: GoalType.FITNESS,
        goal,
        collections: {
          trainingSessions: [
            trainingSession(day),
            trainingSession(day, { id: 'swim', workoutType: WorkoutType.SWIM }),
          ],
        },
      });

      expect(value).toBe(2);
    });

    it('should sum commits across repositories for programming goals', async () => {
      const store = createStore();
      const goal = await store.createGoal({ title: 'Ship', goalType: GoalType.PROGRAMMING, targetValue: 500 });
      const repository = await store.trackRepository(goal.id, { fullName: 'octo/widgets' });

      const value = computeCurrentValue({
        goalType: GoalType.PROGRAMMING,
        goal,
        collections: {
          repositories: [
            {
              repository,
              commitActivity: [
                commitBucket('2026-05-31T00:00:00.000Z', 4),
                commitBucket('2026-06-07T00:00:00.000Z', 6),
              ],
            },
            { repository, commitActivity: [commitBucket('2026-06-07T00:00:00.000Z', 5)] },
          ],
        },
      });

      expect(value).toBe(15);
    });
  });

  describe('goalProgress', () => {
    it('should return the completed fraction', () => {
      expect(goalProgress({ currentValue: 6, targetValue: 12 })).toBe(0.5);
    });

    it('should clamp overshoot to 1', () => {
      expect(goalProgress({ currentValue: 20, targetValue: 12 })).toBe(1);
    });

    it('should return 0 without a positive target', () => {
      expect(goalProgress({ currentValue: 5, targetValue: 0 })).toBe(0);
    });

    it('should floor the percentage', () => {
      expect(progressPercentage({ currentValue: 1, targetValue: 3 })).toBe(33);
    });

    it('should report completion only at or above target', () => {
      expect(isGoalComplete({ currentValue: 11, targetValue: 12 })).toBe(false);
      expect(isGoalComplete({ currentValue: 12, targetValue: 12 })).toBe(true);
      expect(isGoalComplete({ currentValue: 0, targetValue: 0 })).toBe(false);
    });
  });

  describe('daysRemaining', () => {
    const now = new Date(2026, 5, 17, 12);

    it('should count calendar days to the end date', () => {
      expect(daysRemaining({ endDate: new Date(2026, 5, 27, 9).toISOString() }, now)).toBe(10);
    });

    it('should not go negative once the end date has passed', () => {
      expect(daysRemaining({ endDate: new Date(2026, 5, 1).toISOString() }, now)).toBe(0);
    });

    it('should fall back to the end of the year', () => {
      expect(daysRemaining({}, new Date(2026, 11, 30, 12))).toBe(1);
    });
  });

  it('should compute year progress from the day of year', () => {
    expect(yearProgress(new Date(2026, 0, 1, 12))).toBe(1 / 365);
  });

  describe('GoalProgressService', () => {
    it('should store the recomputed value and be idempotent', async () => {
      const store = createStore();
      const goal = await store.createGoal({ title: 'Read', goalType: GoalType.READING, targetValue: 4 });
      const added = await store.addBook(goal.id, { title: 'Dune' });
      await store.updateBook(added.id, { isCompleted: true });
      const service = new GoalProgressService(store);

      const first = await service.recomputeProgress(goal.id);
      const second = await service.recomputeProgress(goal.id);

      expect(first.goal.currentValue).toBe(1);
      expect(first.progress).toBe(0.25);
      expect(second.goal.currentValue).toBe(1);
    });

    it('should reject unknown goals', async () => {
      const service = new GoalProgressService(createStore());

      await expect(service.recomputeProgress('missing')).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });

    it('should recompute archived goals as well', async () => {
      const store = createStore();
      const goal = await store.createGoal({
        title: 'Old',
        goalType: GoalType.FITNESS,
        targetValue: 10,
        isArchived: true,
      });
      await store.addTrainingSession(goal.id, { workoutType: WorkoutType.RUN, durationMinutes: 20 });

      const results = await new GoalProgressService(store).recomputeAll();

      expect(results).toHaveLength(1);
      expect(results[0]?.goal.currentValue).toBe(1);
    });
  });
});
