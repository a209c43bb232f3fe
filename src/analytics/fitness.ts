/**
 * Fitness Analytics
 *
 * Pace is integer seconds per kilometre throughout. Distances are normalised
 * to kilometres before any arithmetic.
 */

import {
  addWeeks,
  compareDesc,
  differenceInCalendarDays,
  isSameWeek,
  isWithinInterval,
  parseISO,
  startOfDay,
  startOfWeek,
  subDays,
  subWeeks,
} from 'date-fns';
import {
  DistanceUnit,
  LOWER_IS_BETTER,
  RACE_DISTANCE_KM,
  WorkoutType,
  type FitnessGoalConfig,
  type PersonalRecord,
  type PersonalRecordCategory,
  type TrainingSession,
} from '../core-domain';

const KM_PER_UNIT: Record<DistanceUnit, number> = {
  [DistanceUnit.KILOMETERS]: 1,
  [DistanceUnit.MILES]: 1.60934,
  [DistanceUnit.METERS]: 0.001,
  [DistanceUnit.YARDS]: 0.0009144,
};

const WEEK_OPTIONS = { weekStartsOn: 1 } as const;

const RECENT_PACE_SAMPLE = 5;

// ============================================================================
// Pace
// ============================================================================

export function distanceKm(session: TrainingSession): number | undefined {
  if (session.distance === undefined || session.distanceUnit === undefined) return undefined;
  return session.distance * KM_PER_UNIT[session.distanceUnit];
}

export function calculatedPace(session: TrainingSession): number | undefined {
  const km = distanceKm(session);
  if (km === undefined || km <= 0 || session.durationMinutes <= 0) return undefined;
  return Math.trunc((session.durationMinutes * 60) / km);
}

export function effectivePace(session: TrainingSession): number | undefined {
  return session.paceSecondsPerKm ?? calculatedPace(session);
}

function newestFirst(sessions: readonly TrainingSession[]): TrainingSession[] {
  return [...sessions].sort((a, b) => compareDesc(parseISO(a.date), parseISO(b.date)));
}

/**
 * Mean pace of the five most recent runs that have one
 */
export function recentPace(sessions: readonly TrainingSession[]): number | undefined {
  const paces = newestFirst(sessions)
    .filter((session) => session.workoutType === WorkoutType.RUN)
    .map(effectivePace)
    .filter((pace): pace is number => pace !== undefined)
    .slice(0, RECENT_PACE_SAMPLE);

  if (paces.length === 0) return undefined;
  return Math.trunc(paces.reduce((sum, pace) => sum + pace, 0) / paces.length);
}

// ============================================================================
// Weekly mileage
// ============================================================================

export interface WeeklyMileage {
  weekStart: Date;
  distanceKm: number;
  isCurrentWeek: boolean;
}

export interface WeeklyMileageOptions {
  weeks?: number;
  now?: Date;
}

/**
 * Distance per Monday-started week over the trailing window, oldest first.
 * Weeks without sessions are present with 0.
 */
export function weeklyMileage(
  sessions: readonly TrainingSession[],
  { weeks = 12, now = new Date() }: WeeklyMileageOptions = {}
): WeeklyMileage[] {
  const currentWeekStart = startOfWeek(now, WEEK_OPTIONS);
  const buckets: WeeklyMileage[] = [];

  for (let offset = weeks - 1; offset >= 0; offset -= 1) {
    const weekStart = subWeeks(currentWeekStart, offset);
    const weekEnd = addWeeks(weekStart, 1);
    const distance = sessions.reduce((sum, session) => {
      const km = distanceKm(session);
      const date = parseISO(session.date);
      return km !== undefined && date >= weekStart && date < weekEnd ? sum + km : sum;
    }, 0);

    buckets.push({
      weekStart,
      distanceKm: distance,
      isCurrentWeek: isSameWeek(weekStart, now, WEEK_OPTIONS),
    });
  }

  return buckets;
}

export function averageWeeklyMileage(weeks: readonly WeeklyMileage[]): number {
  const active = weeks.filter((week) => week.distanceKm > 0);
  if (active.length === 0) return 0;
  return active.reduce((sum, week) => sum + week.distanceKm, 0) / active.length;
}

export function peakWeeklyMileage(weeks: readonly WeeklyMileage[]): number {
  return weeks.reduce((peak, week) => Math.max(peak, week.distanceKm), 0);
}

export function totalMileageLast7Days(
  sessions: readonly TrainingSession[],
  now: Date = new Date()
): number {
  const interval = { start: subDays(now, 7), end: now };
  return sessions.reduce((sum, session) => {
    const km = distanceKm(session);
    return km !== undefined && isWithinInterval(parseISO(session.date), interval) ? sum + km : sum;
  }, 0);
}

// ============================================================================
// Race prediction
// ============================================================================

export function raceDistanceKm(config: FitnessGoalConfig): number | undefined {
  if (config.customDistanceKm !== undefined && config.customDistanceKm > 0) {
    return config.customDistanceKm;
  }
  if (config.raceType === undefined) return undefined;
  const distance = RACE_DISTANCE_KM[config.raceType];
  return distance > 0 ? distance : undefined;
}

export function predictedFinishSeconds(
  config: FitnessGoalConfig,
  sessions: readonly TrainingSession[]
): number | undefined {
  const distance = raceDistanceKm(config);
  const pace = recentPace(sessions);
  if (distance === undefined || pace === undefined) return undefined;
  return Math.trunc(distance * pace);
}

export function targetFinishSeconds(config: FitnessGoalConfig): number | undefined {
  const distance = raceDistanceKm(config);
  if (distance === undefined || config.targetPaceSecondsPerKm === undefined) return undefined;
  return Math.trunc(distance * config.targetPaceSecondsPerKm);
}

/**
 * Pace needed to finish the race in the given time
 */
export function requiredPace(config: FitnessGoalConfig, targetTimeSeconds: number): number | undefined {
  const distance = raceDistanceKm(config);
  if (distance === undefined || targetTimeSeconds <= 0) return undefined;
  return Math.trunc(targetTimeSeconds / distance);
}

/**
 * Current minus target pace. Negative means faster than target.
 */
export function paceDifference(
  config: FitnessGoalConfig,
  sessions: readonly TrainingSession[]
): number | undefined {
  const current = recentPace(sessions);
  if (current === undefined || config.targetPaceSecondsPerKm === undefined) return undefined;
  return current - config.targetPaceSecondsPerKm;
}

export function daysUntilRace(config: FitnessGoalConfig, now: Date = new Date()): number | undefined {
  if (!config.raceDate) return undefined;
  return Math.max(0, differenceInCalendarDays(startOfDay(parseISO(config.raceDate)), startOfDay(now)));
}

export function weeksUntilRace(config: FitnessGoalConfig, now: Date = new Date()): number | undefined {
  const days = daysUntilRace(config, now);
  return days === undefined ? undefined : Math.floor(days / 7);
}

// ============================================================================
// Personal records
// ============================================================================

export function isLowerBetter(category: PersonalRecordCategory): boolean {
  return LOWER_IS_BETTER.has(category);
}

export function isImprovement(
  category: PersonalRecordCategory,
  value: number,
  previous: number
): boolean {
  return isLowerBetter(category) ? value < previous : value > previous;
}

/**
 * Size of the gain over the previous value, positive when better
 */
export function improvement(record: PersonalRecord): number | undefined {
  if (record.previousValue === undefined) return undefined;
  return isLowerBetter(record.category)
    ? record.previousValue - record.value
    : record.value - record.previousValue;
}

export function improvementPercentage(record: PersonalRecord): number | undefined {
  const gain = improvement(record);
  if (gain === undefined || record.previousValue === undefined || record.previousValue <= 0) {
    return undefined;
  }
  return (gain / record.previousValue) * 100;
}

/**
 * Best record per exercise, by the category's direction
 */
export function bestRecord(
  records: readonly PersonalRecord[],
  exercise: string
): PersonalRecord | undefined {
  return records
    .filter((record) => record.exercise === exercise)
    .reduce<PersonalRecord | undefined>(
      (best, record) =>
        best === undefined || isImprovement(record.category, record.value, best.value) ? record : best,
      undefined
    );
}

// ============================================================================
// Formatting
// ============================================================================

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * 300 -> "5:00 /km"
 */
export function formatPace(secondsPerKm: number): string {
  const minutes = Math.floor(secondsPerKm / 60);
  return `${minutes}:${pad(secondsPerKm % 60)} /km`;
}

/**
 * 3725 -> "1:02:05", 1500 -> "25:00"
 */
export function formatDuration(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return hours > 0 ? `${hours}:${pad(minutes)}:${pad(seconds)}` : `${minutes}:${pad(seconds)}`;
}
