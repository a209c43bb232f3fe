/**
 * App Project Domain Model
 *
 * Shipped apps tracked under a programming goal, each with periodic
 * revenue entries and metric snapshots.
 */

import { z } from 'zod';

export enum AppPlatform {
  IOS = 'ios',
  MACOS = 'macos',
  ANDROID = 'android',
  WEB = 'web',
  CROSS_PLATFORM = 'cross_platform',
}

/**
 * Default store/processor cut per platform, used when net revenue is not
 * entered by hand.
 */
export const PLATFORM_FEE_RATES: Record<AppPlatform, number> = {
  [AppPlatform.IOS]: 0.15,
  [AppPlatform.MACOS]: 0.15,
  [AppPlatform.ANDROID]: 0.15,
  [AppPlatform.WEB]: 0.03,
  [AppPlatform.CROSS_PLATFORM]: 0.03,
};

export enum RevenuePeriod {
  DAILY = 'daily',
  WEEKLY = 'weekly',
  MONTHLY = 'monthly',
  YEARLY = 'yearly',
}

export const AppProjectSchema = z.object({
  id: z.string(),
  goalId: z.string(),
  name: z.string().min(1),
  platform: z.nativeEnum(AppPlatform).default(AppPlatform.IOS),
  appStoreId: z.string().optional(),
  bundleId: z.string().optional(),
  description: z.string().optional(),
  websiteUrl: z.string().optional(),
  launchDate: z.string().datetime().optional(),
  currentVersion: z.string().optional(),
  createdAt: z.string().datetime(),
});

export type AppProject = z.infer<typeof AppProjectSchema>;

export const CreateAppProjectInputSchema = AppProjectSchema.omit({
  id: true,
  goalId: true,
  createdAt: true,
} as const).partial({
  platform: true,
});

export type CreateAppProjectInput = z.input<typeof CreateAppProjectInputSchema>;

/**
 * Revenue Entry Schema
 */
export const RevenueEntrySchema = z.object({
  id: z.string(),
  projectId: z.string(),
  date: z.string().datetime(),
  period: z.nativeEnum(RevenuePeriod).default(RevenuePeriod.MONTHLY),
  grossRevenue: z.number().nonnegative(),
  netRevenue: z.number().nonnegative(),
  currency: z.string().length(3).default('USD'),
  downloads: z.number().int().nonnegative().optional(),
  refunds: z.number().nonnegative().optional(),
  notes: z.string().optional(),
  createdAt: z.string().datetime(),
});

export type RevenueEntry = z.infer<typeof RevenueEntrySchema>;

export const RecordRevenueInputSchema = z.object({
  date: z.string().datetime().optional(),
  period: z.nativeEnum(RevenuePeriod).optional(),
  grossRevenue: z.number().nonnegative(),
  // When omitted, derived from the project's platform fee
  netRevenue: z.number().nonnegative().optional(),
  currency: z.string().length(3).optional(),
  downloads: z.number().int().nonnegative().optional(),
  refunds: z.number().nonnegative().optional(),
  notes: z.string().optional(),
});

export type RecordRevenueInput = z.input<typeof RecordRevenueInputSchema>;

/**
 * App Metric Snapshot Schema
 */
export const AppMetricSnapshotSchema = z.object({
  id: z.string(),
  projectId: z.string(),
  date: z.string().datetime(),
  downloads: z.number().int().nonnegative().default(0),
  dailyActiveUsers: z.number().int().nonnegative().optional(),
  monthlyActiveUsers: z.number().int().nonnegative().optional(),
  rating: z.number().min(0).max(5).optional(),
  ratingCount: z.number().int().nonnegative().optional(),
  crashFreeRate: z.number().min(0).max(100).optional(),
  createdAt: z.string().datetime(),
});

export type AppMetricSnapshot = z.infer<typeof AppMetricSnapshotSchema>;
