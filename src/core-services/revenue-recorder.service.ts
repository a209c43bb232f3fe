/**
 * Revenue Recorder Service
 *
 * Records revenue for an app project. Net revenue is taken as entered when
 * given; otherwise it is gross minus the project platform's fee.
 */

import {
  calculateNetRevenue,
  lastMonthRevenue,
  latestMetricSnapshot,
  revenueGrowthPercentage,
  thisMonthRevenue,
  totalDownloads,
  totalGrossRevenue,
  totalRevenue,
} from '../analytics';
import type { EventStore, NewMetricSnapshot } from '../core-db';
import {
  GoalTrackerError,
  GoalTrackerErrorCode,
  RecordRevenueInputSchema,
  RevenuePeriod,
  type AppMetricSnapshot,
  type AppProject,
  type RecordRevenueInput,
  type RevenueEntry,
} from '../core-domain';
import { logger as defaultLogger, type Logger } from '../logger';

export interface RevenueRecorderOptions {
  logger?: Logger;
  now?: () => Date;
}

export interface RevenueSummary {
  totalRevenue: number;
  totalGrossRevenue: number;
  totalDownloads: number;
  thisMonthRevenue: number;
  lastMonthRevenue: number;
  revenueGrowthPercentage?: number;
  latestSnapshot?: AppMetricSnapshot;
}

export class RevenueRecorderService {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly store: EventStore,
    options: RevenueRecorderOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  async recordRevenue(projectId: string, input: RecordRevenueInput): Promise<RevenueEntry> {
    const parsed = RecordRevenueInputSchema.safeParse(input);
    if (!parsed.success) {
      throw GoalTrackerError.invalidInput(parsed.error, 'revenue entry');
    }
    const project = await this.requireProject(projectId);
    const data = parsed.data;

    const netRevenue = data.netRevenue ?? calculateNetRevenue(data.grossRevenue, project.platform);
    const entry = await this.store.appendRevenueEntry(projectId, {
      date: data.date ?? this.now().toISOString(),
      period: data.period ?? RevenuePeriod.MONTHLY,
      grossRevenue: data.grossRevenue,
      netRevenue,
      currency: data.currency ?? 'USD',
      downloads: data.downloads,
      refunds: data.refunds,
      notes: data.notes,
    });

    this.logger.info(
      {
        projectId,
        grossRevenue: entry.grossRevenue,
        netRevenue: entry.netRevenue,
        netOverridden: data.netRevenue !== undefined,
      },
      'Revenue recorded'
    );
    return entry;
  }

  async recordMetrics(projectId: string, snapshot: Partial<NewMetricSnapshot>): Promise<AppMetricSnapshot> {
    await this.requireProject(projectId);
    return this.store.appendMetricSnapshot(projectId, {
      ...snapshot,
      date: snapshot.date ?? this.now().toISOString(),
      downloads: snapshot.downloads ?? 0,
    });
  }

  async summarize(projectId: string): Promise<RevenueSummary> {
    await this.requireProject(projectId);
    const now = this.now();
    const entries = await this.store.listRevenueEntries(projectId);
    const snapshots = await this.store.listMetricSnapshots(projectId);

    return {
      totalRevenue: totalRevenue(entries),
      totalGrossRevenue: totalGrossRevenue(entries),
      totalDownloads: totalDownloads(entries),
      thisMonthRevenue: thisMonthRevenue(entries, now),
      lastMonthRevenue: lastMonthRevenue(entries, now),
      revenueGrowthPercentage: revenueGrowthPercentage(entries, now),
      latestSnapshot: latestMetricSnapshot(snapshots),
    };
  }

  private async requireProject(projectId: string): Promise<AppProject> {
    const project = await this.store.getAppProject(projectId);
    if (!project) {
      throw new GoalTrackerError(
        GoalTrackerErrorCode.NOT_FOUND,
        `App project ${projectId} not found`,
        false
      );
    }
    return project;
  }
}
