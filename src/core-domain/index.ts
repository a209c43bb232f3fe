/**
 * Domain Models Export
 *
 * All domain models, schemas, and types for goal tracking.
 */

// Goal
export * from './goal';

// Reading
export * from './book';

// Fitness
export * from './training-session';
export * from './fitness-config';
export * from './personal-record';

// Programming
export * from './repository';
export * from './app-project';

// Errors
export * from './errors';
