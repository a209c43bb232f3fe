import { describe, it, expect } from 'vitest';
import {
  averageWeeklyMileage,
  bestRecord,
  calculatedPace,
  daysUntilRace,
  effectivePace,
  formatDuration,
  formatPace,
  improvement,
  improvementPercentage,
  paceDifference,
  peakWeeklyMileage,
  predictedFinishSeconds,
  raceDistanceKm,
  recentPace,
  requiredPace,
  targetFinishSeconds,
  totalMileageLast7Days,
  weeklyMileage,
  weeksUntilRace,
} from '../src/analytics';
import {
  DistanceUnit,
  GoalTrackerErrorCode,
  GoalType,
  PersonalRecordCategory,
  RaceType,
  TRAINING_PHASE_INFO,
  TRAINING_PHASE_ORDER,
  TrainingPhase,
  WorkoutType,
} from '../src/core-domain';
import { FitnessService } from '../src/core-services';
import {
  FIXED_NOW,
  createStore,
  fitnessConfig,
  personalRecord,
  trainingSession,
} from './helpers';

describe('Fitness analytics', () => {
  // Wednesday
  const now = new Date(2026, 5, 17, 12);

  describe('pace', () => {
    it('should derive pace from distance and duration', () => {
      const run = trainingSession(now, {
        durationMinutes: 50,
        distance: 10,
        distanceUnit: DistanceUnit.KILOMETERS,
      });

      expect(calculatedPace(run)).toBe(300);
    });

    it('should convert miles before dividing', () => {
      const run = trainingSession(now, {
        durationMinutes: 40,
        distance: 5,
        distanceUnit: DistanceUnit.MILES,
      });

      expect(calculatedPace(run)).toBe(298);
    });

    it('should have no pace without a distance', () => {
      expect(calculatedPace(trainingSession(now))).toBeUndefined();
    });

    it('should prefer a recorded pace', () => {
      const run = trainingSession(now, {
        durationMinutes: 50,
        distance: 10,
        distanceUnit: DistanceUnit.KILOMETERS,
        paceSecondsPerKm: 290,
      });

      expect(effectivePace(run)).toBe(290);
    });

    it('should average the five most recent runs', () => {
      const sessions = [
        trainingSession(new Date(2026, 5, 1), { id: 'old', paceSecondsPerKm: 100 }),
        ...[2, 3, 4, 5, 6].map((day) =>
          trainingSession(new Date(2026, 5, day), { id: `run-${day}`, paceSecondsPerKm: 360 })
        ),
        trainingSession(new Date(2026, 5, 7), {
          id: 'ride',
          workoutType: WorkoutType.BIKE,
          paceSecondsPerKm: 90,
        }),
      ];

      expect(recentPace(sessions)).toBe(360);
    });

    it('should have no recent pace without runs', () => {
      expect(recentPace([])).toBeUndefined();
    });
  });

  describe('weekly mileage', () => {
    const sessions = [
      trainingSession(new Date(2026, 5, 1, 12), { distance: 10, distanceUnit: DistanceUnit.KILOMETERS }),
      trainingSession(new Date(2026, 5, 15, 7), { distance: 5, distanceUnit: DistanceUnit.KILOMETERS }),
      trainingSession(new Date(2026, 5, 16, 7), { distance: 3, distanceUnit: DistanceUnit.MILES }),
    ];

    it('should bucket distance by Monday-started week, oldest first', () => {
      const weeks = weeklyMileage(sessions, { weeks: 4, now });

      expect(weeks.map((week) => week.weekStart)).toEqual([
        new Date(2026, 4, 25),
        new Date(2026, 5, 1),
        new Date(2026, 5, 8),
        new Date(2026, 5, 15),
      ]);
      expect(weeks.map((week) => week.isCurrentWeek)).toEqual([false, false, false, true]);
      expect(weeks[0]?.distanceKm).toBe(0);
      expect(weeks[1]?.distanceKm).toBe(10);
      expect(weeks[2]?.distanceKm).toBe(0);
      expect(weeks[3]?.distanceKm).toBeCloseTo(9.82802, 5);
    });

    it('should average only weeks with distance', () => {
      const weeks = weeklyMileage(sessions, { weeks: 4, now });

      expect(averageWeeklyMileage(weeks)).toBeCloseTo(9.91401, 5);
      expect(peakWeeklyMileage(weeks)).toBe(10);
    });

    it('should average to 0 without any distance', () => {
      expect(averageWeeklyMileage(weeklyMileage([], { weeks: 4, now }))).toBe(0);
    });

    it('should total the trailing seven days', () => {
      expect(totalMileageLast7Days(sessions, now)).toBeCloseTo(9.82802, 5);
    });
  });

  describe('race prediction', () => {
    const config = fitnessConfig({
      raceType: RaceType.HALF_MARATHON,
      targetPaceSecondsPerKm: 300,
      raceDate: new Date(2026, 6, 1, 8).toISOString(),
    });
    const runs = [trainingSession(now, { paceSecondsPerKm: 360 })];

    it('should use the canonical race distance', () => {
      expect(raceDistanceKm(config)).toBe(21.0975);
    });

    it('should prefer a custom distance', () => {
      expect(raceDistanceKm(fitnessConfig({ raceType: RaceType.MARATHON, customDistanceKm: 50 }))).toBe(50);
    });

    it('should have no distance for a custom race without one', () => {
      expect(raceDistanceKm(fitnessConfig({ raceType: RaceType.CUSTOM }))).toBeUndefined();
    });

    it('should predict finish times', () => {
      expect(targetFinishSeconds(config)).toBe(6329);
      expect(predictedFinishSeconds(config, runs)).toBe(7595);
      expect(paceDifference(config, runs)).toBe(60);
    });

    it('should compute the pace a finish time needs', () => {
      expect(requiredPace(fitnessConfig({ raceType: RaceType.TEN_K }), 3000)).toBe(300);
      expect(requiredPace(fitnessConfig({ raceType: RaceType.TEN_K }), 0)).toBeUndefined();
    });

    it('should count down to race day', () => {
      expect(daysUntilRace(config, now)).toBe(14);
      expect(weeksUntilRace(config, now)).toBe(2);
      expect(daysUntilRace(fitnessConfig({ raceDate: new Date(2026, 5, 1).toISOString() }), now)).toBe(0);
      expect(daysUntilRace(fitnessConfig(), now)).toBeUndefined();
    });
  });

  describe('personal records', () => {
    it('should measure time improvements as the seconds saved', () => {
      const record = personalRecord({ value: 1500, previousValue: 1560 });

      expect(improvement(record)).toBe(60);
      expect(improvementPercentage(record)).toBeCloseTo(3.846, 3);
    });

    it('should measure strength improvements as the weight gained', () => {
      const record = personalRecord({
        exercise: 'Deadlift',
        category: PersonalRecordCategory.STRENGTH,
        value: 100,
        previousValue: 90,
        unit: 'kg',
      });

      expect(improvement(record)).toBe(10);
      expect(improvementPercentage(record)).toBeCloseTo(11.111, 3);
    });

    it('should have no improvement for a first record', () => {
      expect(improvement(personalRecord())).toBeUndefined();
      expect(improvementPercentage(personalRecord({ previousValue: 0 }))).toBeUndefined();
    });

    it('should pick the best record by the category direction', () => {
      const records = [
        personalRecord({ id: 'a', value: 1560 }),
        personalRecord({ id: 'b', value: 1490 }),
        personalRecord({ id: 'c', value: 1520 }),
        personalRecord({ id: 'd', exercise: '10K', value: 1200 }),
      ];

      expect(bestRecord(records, '5K')?.id).toBe('b');
      expect(bestRecord(records, 'Marathon')).toBeUndefined();
    });
  });

  describe('formatting', () => {
    it('should format pace', () => {
      expect(formatPace(300)).toBe('5:00 /km');
      expect(formatPace(325)).toBe('5:25 /km');
    });

    it('should format durations with and without hours', () => {
      expect(formatDuration(3725)).toBe('1:02:05');
      expect(formatDuration(1500)).toBe('25:00');
    });
  });
});

describe('FitnessService', () => {
  async function setup() {
    const store = createStore();
    const goal = await store.createGoal({ title: 'Half marathon', goalType: GoalType.FITNESS, targetValue: 60 });
    const service = new FitnessService(store, { now: () => FIXED_NOW });
    return { store, goal, service };
  }

  it('should count each logged session towards the goal', async () => {
    const { store, goal, service } = await setup();

    await service.logTrainingSession(goal.id, { workoutType: WorkoutType.RUN, durationMinutes: 45 });
    await service.logTrainingSession(goal.id, {
      workoutType: WorkoutType.SWIM,
      durationMinutes: 30,
      distance: 1500,
      distanceUnit: DistanceUnit.METERS,
    });

    expect((await store.getGoal(goal.id))?.currentValue).toBe(2);
  });

  it('should reject a distance without a unit', async () => {
    const { goal, service } = await setup();

    await expect(
      service.logTrainingSession(goal.id, { workoutType: WorkoutType.RUN, durationMinutes: 45, distance: 5 })
    ).rejects.toMatchObject({ code: GoalTrackerErrorCode.INVALID_INPUT });
  });

  it('should refuse sessions on other goal types', async () => {
    const { store, service } = await setup();
    const reading = await store.createGoal({ title: 'Books', goalType: GoalType.READING, targetValue: 5 });

    await expect(
      service.logTrainingSession(reading.id, { workoutType: WorkoutType.RUN, durationMinutes: 45 })
    ).rejects.toMatchObject({ code: GoalTrackerErrorCode.INVALID_INPUT });
  });

  it('should carry the previous best into a new record', async () => {
    const { goal, service } = await setup();

    const first = await service.recordPersonalRecord(goal.id, {
      exercise: '5K',
      category: PersonalRecordCategory.RUNNING,
      value: 1560,
    });
    const faster = await service.recordPersonalRecord(goal.id, {
      exercise: '5K',
      category: PersonalRecordCategory.RUNNING,
      value: 1500,
    });
    const slower = await service.recordPersonalRecord(goal.id, {
      exercise: '5K',
      category: PersonalRecordCategory.RUNNING,
      value: 1600,
    });

    expect(first.isNewBest).toBe(true);
    expect(first.record.previousValue).toBeUndefined();
    expect(first.record.unit).toBe('seconds');
    expect(faster.isNewBest).toBe(true);
    expect(faster.record.previousValue).toBe(1560);
    expect(slower.isNewBest).toBe(false);
    expect(slower.record.previousValue).toBe(1500);
  });

  it('should keep one config per goal', async () => {
    const { store, goal, service } = await setup();

    const first = await service.configure(goal.id, { raceType: RaceType.TEN_K });
    const second = await service.configure(goal.id, { raceType: RaceType.HALF_MARATHON });

    expect(second.id).toBe(first.id);
    expect((await store.getFitnessConfig(goal.id))?.raceType).toBe(RaceType.HALF_MARATHON);
  });

  it('should summarize training and race outlook', async () => {
    const { goal, service } = await setup();
    await service.configure(goal.id, {
      raceType: RaceType.TEN_K,
      targetPaceSecondsPerKm: 300,
    });
    await service.logTrainingSession(goal.id, {
      workoutType: WorkoutType.RUN,
      durationMinutes: 55,
      distance: 10,
      distanceUnit: DistanceUnit.KILOMETERS,
      date: FIXED_NOW.toISOString(),
    });

    const summary = await service.summarize(goal.id);

    expect(summary.sessionCount).toBe(1);
    expect(summary.recentPace).toBe(330);
    expect(summary.weeklyMileage).toHaveLength(12);
    expect(summary.averageWeeklyMileage).toBe(10);
    expect(summary.race).toEqual({
      distanceKm: 10,
      daysUntilRace: undefined,
      predictedFinishSeconds: 3300,
      targetFinishSeconds: 3000,
      paceDifference: 30,
    });
  });
});

describe('Training phases', () => {
  it('should run from base to recovery', () => {
    expect(TRAINING_PHASE_ORDER).toEqual([
      TrainingPhase.BASE,
      TrainingPhase.BUILD,
      TrainingPhase.PEAK,
      TrainingPhase.TAPER,
      TrainingPhase.RECOVERY,
    ]);
    expect(TRAINING_PHASE_INFO[TrainingPhase.PEAK]).toEqual({
      label: 'Peak',
      description: 'Race-specific training',
      intensityLevel: 4,
    });
  });
});
