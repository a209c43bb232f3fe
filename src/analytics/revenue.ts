/**
 * Revenue Analytics
 *
 * Net revenue defaults to gross minus the platform's fee; an explicit net
 * on the entry always wins. Month sums run over net revenue.
 */

import { compareDesc, isWithinInterval, parseISO, endOfMonth, startOfMonth, subMonths } from 'date-fns';
import {
  PLATFORM_FEE_RATES,
  type AppMetricSnapshot,
  type AppPlatform,
  type RevenueEntry,
} from '../core-domain';

export function roundToCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function calculateNetRevenue(grossRevenue: number, platform: AppPlatform): number {
  return roundToCents(grossRevenue * (1 - PLATFORM_FEE_RATES[platform]));
}

export function platformFee(entry: Pick<RevenueEntry, 'grossRevenue' | 'netRevenue'>): number {
  return roundToCents(entry.grossRevenue - entry.netRevenue);
}

export function platformFeePercentage(
  entry: Pick<RevenueEntry, 'grossRevenue' | 'netRevenue'>
): number {
  if (entry.grossRevenue <= 0) return 0;
  return ((entry.grossRevenue - entry.netRevenue) * 100) / entry.grossRevenue;
}

function netRevenueBetween(entries: readonly RevenueEntry[], start: Date, end: Date): number {
  return entries
    .filter((entry) => isWithinInterval(parseISO(entry.date), { start, end }))
    .reduce((sum, entry) => sum + entry.netRevenue, 0);
}

export function thisMonthRevenue(entries: readonly RevenueEntry[], now: Date = new Date()): number {
  return netRevenueBetween(entries, startOfMonth(now), endOfMonth(now));
}

export function lastMonthRevenue(entries: readonly RevenueEntry[], now: Date = new Date()): number {
  const lastMonth = subMonths(now, 1);
  return netRevenueBetween(entries, startOfMonth(lastMonth), endOfMonth(lastMonth));
}

/**
 * Month-over-month change in percent, undefined when last month had nothing
 * to compare against
 */
export function revenueGrowthPercentage(
  entries: readonly RevenueEntry[],
  now: Date = new Date()
): number | undefined {
  const previous = lastMonthRevenue(entries, now);
  if (previous <= 0) return undefined;
  return ((thisMonthRevenue(entries, now) - previous) * 100) / previous;
}

export function totalRevenue(entries: readonly RevenueEntry[]): number {
  return entries.reduce((sum, entry) => sum + entry.netRevenue, 0);
}

export function totalGrossRevenue(entries: readonly RevenueEntry[]): number {
  return entries.reduce((sum, entry) => sum + entry.grossRevenue, 0);
}

export function totalDownloads(entries: readonly RevenueEntry[]): number {
  return entries.reduce((sum, entry) => sum + (entry.downloads ?? 0), 0);
}

export function latestMetricSnapshot(
  snapshots: readonly AppMetricSnapshot[]
): AppMetricSnapshot | undefined {
  return [...snapshots].sort((a, b) => compareDesc(parseISO(a.date), parseISO(b.date)))[0];
}
