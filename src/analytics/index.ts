/**
 * Analytics Export
 *
 * Pure calculators. None of them perform I/O; dates default to "now" and
 * can be pinned by passing one in.
 */

export * from './goal-progress';
export * from './reading';
export * from './fitness';
export * from './programming';
export * from './revenue';
