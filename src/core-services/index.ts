/**
 * Services Export
 *
 * Business logic services for goal tracking
 */

export * from './goal-progress.service';
export * from './reading.service';
export * from './fitness.service';
export * from './revenue-recorder.service';
export * from './github-sync.service';
export * from './goal-assistant.service';
export * from './goal-report.service';
