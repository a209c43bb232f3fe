/**
 * Error taxonomy shared by the store, the provider adapters and the
 * GitHub reconciler.
 */

import { ZodError } from 'zod';

export enum GoalTrackerErrorCode {
  UNAUTHENTICATED = 'UNAUTHENTICATED',
  RATE_LIMITED = 'RATE_LIMITED',
  NOT_FOUND = 'NOT_FOUND',
  NETWORK_ERROR = 'NETWORK_ERROR',
  PARSING_FAILED = 'PARSING_FAILED',
  STATISTICS_NOT_READY = 'STATISTICS_NOT_READY',
  INVALID_INPUT = 'INVALID_INPUT',
}

const DEFAULT_MESSAGES: Record<GoalTrackerErrorCode, string> = {
  [GoalTrackerErrorCode.UNAUTHENTICATED]: 'Not authenticated with GitHub',
  [GoalTrackerErrorCode.RATE_LIMITED]: 'GitHub API rate limit exceeded',
  [GoalTrackerErrorCode.NOT_FOUND]: 'Repository not found',
  [GoalTrackerErrorCode.NETWORK_ERROR]: 'Network error',
  [GoalTrackerErrorCode.PARSING_FAILED]: 'Failed to parse provider response',
  [GoalTrackerErrorCode.STATISTICS_NOT_READY]: 'Statistics are still being computed',
  [GoalTrackerErrorCode.INVALID_INPUT]: 'Invalid input',
};

const RECOVERABLE_CODES: ReadonlySet<GoalTrackerErrorCode> = new Set([
  GoalTrackerErrorCode.RATE_LIMITED,
  GoalTrackerErrorCode.NETWORK_ERROR,
  GoalTrackerErrorCode.STATISTICS_NOT_READY,
]);

export class GoalTrackerError extends Error {
  constructor(
    public readonly code: GoalTrackerErrorCode,
    message: string = DEFAULT_MESSAGES[code],
    public readonly recoverable: boolean = RECOVERABLE_CODES.has(code),
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GoalTrackerError';
  }

  static invalidInput(error: ZodError, subject: string): GoalTrackerError {
    const details = error.issues
      .map((issue) => `${issue.path.join('.') || subject}: ${issue.message}`)
      .join('; ');
    return new GoalTrackerError(
      GoalTrackerErrorCode.INVALID_INPUT,
      `Invalid ${subject}: ${details}`,
      false,
      { cause: error }
    );
  }

  /**
   * Wrap anything thrown by a provider. Unknown failures count as network
   * errors.
   */
  static from(error: unknown): GoalTrackerError {
    if (error instanceof GoalTrackerError) return error;
    return new GoalTrackerError(
      GoalTrackerErrorCode.NETWORK_ERROR,
      describeError(error),
      true,
      { cause: error }
    );
  }
}

export function isGoalTrackerError(
  error: unknown,
  code?: GoalTrackerErrorCode
): error is GoalTrackerError {
  return error instanceof GoalTrackerError && (code === undefined || error.code === code);
}

/**
 * Human-readable message for anything thrown by a provider
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
