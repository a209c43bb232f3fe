/**
 * Goal Report Service
 *
 * Read-side view of a goal: progress plus the analytics of its goal type.
 * Everything is computed on request from the stored logs.
 */

import {
  averageDailyStarGrowth,
  daysRemaining,
  goalProgress,
  needsSync,
  progressPercentage,
  projectedStars,
  recentCommits,
  starGrowthThisMonth,
  starGrowthThisWeek,
  summarizeBook,
  totalAdditions,
  totalCommits,
  totalDeletions,
  type ReadingStats,
} from '../analytics';
import { addDays } from 'date-fns';
import type { EventStore } from '../core-db';
import { GoalTrackerError, GoalTrackerErrorCode, GoalType, type Goal } from '../core-domain';
import { FitnessService, type FitnessSummary } from './fitness.service';
import { RevenueRecorderService, type RevenueSummary } from './revenue-recorder.service';

const STAR_PROJECTION_DAYS = 30;

export interface BookReport extends ReadingStats {
  bookId: string;
  title: string;
  isCompleted: boolean;
}

export interface RepositoryReport {
  repositoryId: string;
  fullName: string;
  starCount: number;
  totalCommits: number;
  totalAdditions: number;
  totalDeletions: number;
  recentCommits: number;
  starGrowthThisWeek: number;
  starGrowthThisMonth: number;
  averageDailyStarGrowth: number;
  projectedStarsIn30Days?: number;
  needsSync: boolean;
}

export interface ProjectReport extends RevenueSummary {
  projectId: string;
  name: string;
}

export type GoalDetails =
  | { goalType: GoalType.READING; books: BookReport[] }
  | { goalType: GoalType.FITNESS; fitness: FitnessSummary }
  | { goalType: GoalType.PROGRAMMING; repositories: RepositoryReport[]; projects: ProjectReport[] };

export interface GoalReport {
  goal: Goal;
  progress: number;
  progressPercentage: number;
  daysRemaining: number;
  details: GoalDetails;
}

export class GoalReportService {
  private readonly now: () => Date;
  private readonly fitness: FitnessService;
  private readonly revenue: RevenueRecorderService;

  constructor(
    private readonly store: EventStore,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.fitness = new FitnessService(store, { now: this.now });
    this.revenue = new RevenueRecorderService(store, { now: this.now });
  }

  async buildReport(goalId: string): Promise<GoalReport> {
    const goal = await this.store.getGoal(goalId);
    if (!goal) {
      throw new GoalTrackerError(GoalTrackerErrorCode.NOT_FOUND, `Goal ${goalId} not found`, false);
    }
    const now = this.now();

    return {
      goal,
      progress: goalProgress(goal),
      progressPercentage: progressPercentage(goal),
      daysRemaining: daysRemaining(goal, now),
      details: await this.buildDetails(goal, now),
    };
  }

  private async buildDetails(goal: Goal, now: Date): Promise<GoalDetails> {
    switch (goal.goalType) {
      case GoalType.READING: {
        const books = await this.store.listBooks(goal.id);
        return {
          goalType: GoalType.READING,
          books: await Promise.all(
            books.map(async (book) => ({
              bookId: book.id,
              title: book.title,
              isCompleted: book.isCompleted,
              ...summarizeBook(book, await this.store.listReadingSessions(book.id), now),
            }))
          ),
        };
      }
      case GoalType.FITNESS:
        return { goalType: GoalType.FITNESS, fitness: await this.fitness.summarize(goal.id) };
      case GoalType.PROGRAMMING: {
        const repositories = await this.store.listRepositories(goal.id);
        const projects = await this.store.listAppProjects(goal.id);
        return {
          goalType: GoalType.PROGRAMMING,
          repositories: await Promise.all(
            repositories.map(async (repository): Promise<RepositoryReport> => {
              const buckets = await this.store.listCommitActivity(repository.id);
              const history = await this.store.listStarHistory(repository.id);
              return {
                repositoryId: repository.id,
                fullName: repository.fullName,
                starCount: repository.starCount,
                totalCommits: totalCommits(buckets),
                totalAdditions: totalAdditions(buckets),
                totalDeletions: totalDeletions(buckets),
                recentCommits: recentCommits(buckets, now),
                starGrowthThisWeek: starGrowthThisWeek(history, now),
                starGrowthThisMonth: starGrowthThisMonth(history, now),
                averageDailyStarGrowth: averageDailyStarGrowth(history),
                projectedStarsIn30Days: projectedStars(history, addDays(now, STAR_PROJECTION_DAYS), now),
                needsSync: needsSync(repository, now),
              };
            })
          ),
          projects: await Promise.all(
            projects.map(async (project) => ({
              projectId: project.id,
              name: project.name,
              ...(await this.revenue.summarize(project.id)),
            }))
          ),
        };
      }
    }
  }
}
