import { describe, it, expect } from 'vitest';
import { addDays } from 'date-fns';
import { GoalTrackerErrorCode, GoalType } from '../src/core-domain';
import { GoalReportService, ReadingService, RevenueRecorderService } from '../src/core-services';
import { FIXED_NOW, createStore } from './helpers';

describe('GoalReportService', () => {
  const now = () => FIXED_NOW;

  it('should report reading goals per book', async () => {
    const store = createStore();
    const goal = await store.createGoal({
      title: 'Read 4',
      goalType: GoalType.READING,
      targetValue: 4,
      endDate: addDays(FIXED_NOW, 30).toISOString(),
    });
    const reading = new ReadingService(store, { now });
    const finished = await reading.addBook(goal.id, { title: 'Short', totalPages: 100 });
    await reading.markBookCompleted(finished.id);
    const open = await reading.addBook(goal.id, { title: 'Long', totalPages: 400 });
    await reading.logReadingSession(open.id, { pagesRead: 40, durationMinutes: 60 });

    const report = await new GoalReportService(store, { now }).buildReport(goal.id);

    expect(report.progress).toBe(0.25);
    expect(report.progressPercentage).toBe(25);
    expect(report.daysRemaining).toBe(30);
    if (report.details.goalType !== GoalType.READING) throw new Error('expected a reading report');
    expect(report.details.books.map((b) => [b.title, b.isCompleted, b.pagesRemaining])).toEqual([
      ['Short', true, 0],
      ['Long', false, 360],
    ]);
    expect(report.details.books[1]?.totalPagesRead).toBe(40);
    expect(report.details.books[1]?.streak).toBe(1);
  });

  it('should report programming goals with repositories and apps', async () => {
    const store = createStore();
    const goal = await store.createGoal({ title: 'Ship', goalType: GoalType.PROGRAMMING, targetValue: 100 });
    const repository = await store.trackRepository(goal.id, { fullName: 'octo/widgets' });
    await store.replaceCommitActivity(repository.id, [
      { weekStartDate: addDays(FIXED_NOW, -7).toISOString(), commitCount: 4, additions: 40, deletions: 4 },
      { weekStartDate: addDays(FIXED_NOW, -70).toISOString(), commitCount: 6 },
    ]);
    await store.appendStarHistory(repository.id, {
      date: addDays(FIXED_NOW, -10).toISOString(),
      starCount: 100,
      forkCount: 0,
      watcherCount: 0,
      openIssuesCount: 0,
    });
    await store.appendStarHistory(repository.id, {
      date: FIXED_NOW.toISOString(),
      starCount: 120,
      forkCount: 0,
      watcherCount: 0,
      openIssuesCount: 0,
    });
    const project = await store.addAppProject(goal.id, { name: 'Pocket Tally' });
    await new RevenueRecorderService(store, { now }).recordRevenue(project.id, { grossRevenue: 100 });

    const report = await new GoalReportService(store, { now }).buildReport(goal.id);

    if (report.details.goalType !== GoalType.PROGRAMMING) throw new Error('expected a programming report');
    expect(report.details.repositories).toEqual([
      {
        repositoryId: repository.id,
        fullName: 'octo/widgets',
        starCount: 0,
        totalCommits: 10,
        totalAdditions: 40,
        totalDeletions: 4,
        recentCommits: 4,
        starGrowthThisWeek: 0,
        starGrowthThisMonth: 20,
        averageDailyStarGrowth: 2,
        projectedStarsIn30Days: 180,
        needsSync: true,
      },
    ]);
    expect(report.details.projects.map((p) => [p.name, p.totalRevenue])).toEqual([['Pocket Tally', 85]]);
  });

  it('should reject unknown goals', async () => {
    await expect(new GoalReportService(createStore(), { now }).buildReport('missing')).rejects.toMatchObject({
      code: GoalTrackerErrorCode.NOT_FOUND,
    });
  });
});
