/**
 * Configuration
 *
 * Reads environment variables once and validates them with zod.
 *
 * - GOALS_DATA_FILE: JSON snapshot used by the CLI (default ./data/goals.json)
 * - GITHUB_TOKEN: token sent to the GitHub REST API
 * - AI_MODEL: model id handed to the `ai` SDK
 * - LOG_LEVEL: pino level
 * - SYNC_CONCURRENCY: repositories synced in parallel by `syncGoal`
 */

import { z } from 'zod';

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  storage: z.object({
    dataFile: z.string().min(1).default('./data/goals.json'),
  }),

  github: z.object({
    token: z.string().optional(),
    baseUrl: z.string().url().default('https://api.github.com'),
    syncConcurrency: z.coerce.number().int().positive().max(8).default(2),
  }),

  books: z.object({
    baseUrl: z.string().url().default('https://www.googleapis.com/books/v1/volumes'),
  }),

  ai: z.object({
    model: z.string().min(1).default('anthropic/claude-sonnet-4'),
    maxTokens: z.coerce.number().int().positive().default(2048),
  }),
});

export type Config = z.infer<typeof configSchema>;

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Build a config from an environment map. Exposed for tests and for the CLI,
 * which overrides a few values from flags.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({
    nodeEnv: emptyToUndefined(env.NODE_ENV),
    logLevel: emptyToUndefined(env.LOG_LEVEL),
    storage: {
      dataFile: emptyToUndefined(env.GOALS_DATA_FILE),
    },
    github: {
      token: emptyToUndefined(env.GITHUB_TOKEN),
      baseUrl: emptyToUndefined(env.GITHUB_API_URL),
      syncConcurrency: emptyToUndefined(env.SYNC_CONCURRENCY),
    },
    books: {
      baseUrl: emptyToUndefined(env.BOOKS_API_URL),
    },
    ai: {
      model: emptyToUndefined(env.AI_MODEL),
      maxTokens: emptyToUndefined(env.AI_MAX_TOKENS),
    },
  });

  if (!result.success) {
    const invalidVars = result.error.issues.map((issue) => ({
      name: issue.path.join('.'),
      reason: issue.message,
    }));
    throw new ConfigValidationError(
      `Invalid configuration: ${invalidVars.map((v) => `${v.name} (${v.reason})`).join(', ')}`,
      invalidVars
    );
  }

  return result.data;
}

export const config: Config = loadConfig();
