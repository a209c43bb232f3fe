/**
 * Programming Analytics
 *
 * Commit aggregation over weekly buckets and star-history growth. Projection
 * is a straight-line extrapolation of the average daily growth.
 */

import { compareAsc, differenceInDays, parseISO, subMonths, subWeeks } from 'date-fns';
import type { CommitActivity, GitHubRepository, StarHistory } from '../core-domain';

const RECENT_COMMIT_WEEKS = 4;
const SYNC_INTERVAL_HOURS = 1;

// ============================================================================
// Commits
// ============================================================================

export function totalCommits(buckets: readonly CommitActivity[]): number {
  return buckets.reduce((sum, bucket) => sum + bucket.commitCount, 0);
}

export function totalAdditions(buckets: readonly CommitActivity[]): number {
  return buckets.reduce((sum, bucket) => sum + bucket.additions, 0);
}

export function totalDeletions(buckets: readonly CommitActivity[]): number {
  return buckets.reduce((sum, bucket) => sum + bucket.deletions, 0);
}

/**
 * Commits in buckets starting within the last four weeks
 */
export function recentCommits(buckets: readonly CommitActivity[], now: Date = new Date()): number {
  const cutoff = subWeeks(now, RECENT_COMMIT_WEEKS);
  return buckets
    .filter((bucket) => parseISO(bucket.weekStartDate) >= cutoff)
    .reduce((sum, bucket) => sum + bucket.commitCount, 0);
}

// ============================================================================
// Stars
// ============================================================================

function oldestFirst(history: readonly StarHistory[]): StarHistory[] {
  return [...history].sort((a, b) => compareAsc(parseISO(a.date), parseISO(b.date)));
}

export function starGrowthOverWindow(history: readonly StarHistory[], windowStart: Date): number {
  const inWindow = oldestFirst(history).filter((entry) => parseISO(entry.date) >= windowStart);
  const first = inWindow[0];
  const last = inWindow[inWindow.length - 1];
  if (!first || !last) return 0;
  return last.starCount - first.starCount;
}

export function starGrowthThisWeek(history: readonly StarHistory[], now: Date = new Date()): number {
  return starGrowthOverWindow(history, subWeeks(now, 1));
}

export function starGrowthThisMonth(history: readonly StarHistory[], now: Date = new Date()): number {
  return starGrowthOverWindow(history, subMonths(now, 1));
}

export function averageDailyStarGrowth(history: readonly StarHistory[]): number {
  const sorted = oldestFirst(history);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (sorted.length < 2 || !first || !last) return 0;

  const days = differenceInDays(parseISO(last.date), parseISO(first.date));
  if (days <= 0) return 0;
  return (last.starCount - first.starCount) / days;
}

export function projectedStars(
  history: readonly StarHistory[],
  atDate: Date,
  now: Date = new Date()
): number | undefined {
  const sorted = oldestFirst(history);
  const latest = sorted[sorted.length - 1];
  if (!latest) return undefined;
  return latest.starCount + Math.trunc(averageDailyStarGrowth(sorted) * differenceInDays(atDate, now));
}

// ============================================================================
// Sync freshness
// ============================================================================

export function needsSync(repository: GitHubRepository, now: Date = new Date()): boolean {
  if (!repository.lastSyncedAt) return true;
  const elapsedMs = now.getTime() - parseISO(repository.lastSyncedAt).getTime();
  return elapsedMs >= SYNC_INTERVAL_HOURS * 60 * 60 * 1000;
}
