/**
 * Goal Assistant Service
 *
 * Optional AI help when setting up a goal: a suggested structure per goal
 * type, and a summary of a book's notes. Generation failures never reach
 * the caller as exceptions; they come back as an `unavailable` answer the
 * UI can dismiss.
 */

import { z } from 'zod';
import type { EventStore } from '../core-db';
import {
  GoalTrackerError,
  GoalTrackerErrorCode,
  GoalType,
  describeError,
  type Goal,
} from '../core-domain';
import type { TextGenerationProvider } from '../connectors/interfaces';
import { logger as defaultLogger, type Logger } from '../logger';

// ============================================================================
// Suggestion schemas
// ============================================================================

export const BookGoalSuggestionSchema = z.object({
  suggestedTarget: z.number().int().positive().optional(),
  milestones: z.array(z.object({ title: z.string(), targetBooks: z.number().int() })).optional(),
  readingTips: z.array(z.string()).optional(),
  suggestedCategories: z.array(z.string()).optional(),
  summary: z.string().optional(),
});

export const FitnessGoalSuggestionSchema = z.object({
  suggestedWeeklyHours: z.number().nonnegative().optional(),
  weeklyBreakdown: z
    .object({
      swim: z.number().optional(),
      bike: z.number().optional(),
      run: z.number().optional(),
      strength: z.number().optional(),
      recovery: z.number().optional(),
    })
    .optional(),
  phaseStructure: z
    .array(z.object({ name: z.string(), weeks: z.number().int(), focus: z.string() }))
    .optional(),
  keyWorkouts: z.array(z.string()).optional(),
  summary: z.string().optional(),
});

export const ProgrammingGoalSuggestionSchema = z.object({
  suggestedMetrics: z.array(z.string()).optional(),
  milestones: z.array(z.object({ title: z.string(), description: z.string() })).optional(),
  focusAreas: z.array(z.string()).optional(),
  learningResources: z.array(z.string()).optional(),
  summary: z.string().optional(),
});

export type BookGoalSuggestion = z.infer<typeof BookGoalSuggestionSchema>;
export type FitnessGoalSuggestion = z.infer<typeof FitnessGoalSuggestionSchema>;
export type ProgrammingGoalSuggestion = z.infer<typeof ProgrammingGoalSuggestionSchema>;

export type GoalStructureSuggestion =
  | { goalType: GoalType.READING; suggestion: BookGoalSuggestion }
  | { goalType: GoalType.FITNESS; suggestion: FitnessGoalSuggestion }
  | { goalType: GoalType.PROGRAMMING; suggestion: ProgrammingGoalSuggestion };

export type AssistantAnswer<T> = { status: 'ok'; value: T } | { status: 'unavailable'; reason: string };

// ============================================================================
// Prompts
// ============================================================================

const JSON_ONLY = 'Return ONLY valid JSON, no markdown code blocks or explanation.';

const STRUCTURE_FIELDS: Record<GoalType, { intro: string; fields: string[] }> = {
  [GoalType.READING]: {
    intro: 'Please suggest a structure for tracking this goal.',
    fields: [
      'suggestedTarget: number of books (if not specified, suggest based on title)',
      'milestones: array of milestone objects with {title, targetBooks}',
      'readingTips: array of 3 practical tips',
      'suggestedCategories: array of book categories/genres to consider',
      'summary: a brief encouraging message about this goal',
    ],
  },
  [GoalType.FITNESS]: {
    intro: 'Please suggest a training structure.',
    fields: [
      'suggestedWeeklyHours: total weekly training hours',
      'weeklyBreakdown: object with {swim, bike, run, strength, recovery} as hours per week',
      'phaseStructure: array of training phases with {name, weeks, focus}',
      'keyWorkouts: array of workout descriptions to include',
      'summary: a brief encouraging message about this goal',
    ],
  },
  [GoalType.PROGRAMMING]: {
    intro: 'Please suggest a structure for tracking this goal.',
    fields: [
      'suggestedMetrics: array of metrics to track (e.g., commits, PRs, issues)',
      'milestones: array of milestone objects with {title, description}',
      'focusAreas: array of technical areas to focus on',
      'learningResources: array of suggested resources',
      'summary: a brief encouraging message about this goal',
    ],
  },
};

const GOAL_NOUN: Record<GoalType, string> = {
  [GoalType.READING]: 'book reading',
  [GoalType.FITNESS]: 'fitness',
  [GoalType.PROGRAMMING]: 'programming',
};

export function buildStructurePrompt(goalType: GoalType, title: string, description?: string): string {
  const { intro, fields } = STRUCTURE_FIELDS[goalType];
  const descriptionLine = description ? `\nDescription: ${description}` : '';
  return [
    `I'm creating a ${GOAL_NOUN[goalType]} goal titled "${title}".${descriptionLine}`,
    '',
    `${intro} Return a JSON object with:`,
    ...fields.map((field) => `- ${field}`),
    '',
    JSON_ONLY,
  ].join('\n');
}

export function buildBookSummaryPrompt(title: string, author: string | undefined, notes: string[]): string {
  const byline = author ? ` by ${author}` : '';
  return [
    `I've been reading "${title}"${byline}.`,
    '',
    'Here are my chapter notes:',
    ...notes.map((note) => `- ${note}`),
    '',
    'Please provide a brief summary (2-3 paragraphs) of the key insights and themes from my notes.',
    'Focus on synthesizing the main ideas rather than just listing them.',
  ].join('\n');
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Pull the JSON object out of a model answer: drops a surrounding code fence
 * and anything outside the outermost braces
 */
export function extractJsonObject(text: string): string {
  let clean = text.trim();
  clean = clean.replace(/^```(?:json)?/, '').replace(/```$/, '').trim();

  const start = clean.indexOf('{');
  const end = clean.lastIndexOf('}');
  return start !== -1 && end > start ? clean.slice(start, end + 1) : clean;
}

export function parseStructureSuggestion(goalType: GoalType, text: string): GoalStructureSuggestion {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJsonObject(text));
  } catch (error) {
    throw new GoalTrackerError(
      GoalTrackerErrorCode.PARSING_FAILED,
      'Suggestion is not valid JSON',
      false,
      { cause: error }
    );
  }

  const fail = (error: z.ZodError): GoalTrackerError =>
    new GoalTrackerError(GoalTrackerErrorCode.PARSING_FAILED, 'Suggestion has an unexpected shape', false, {
      cause: error,
    });

  switch (goalType) {
    case GoalType.READING: {
      const result = BookGoalSuggestionSchema.safeParse(raw);
      if (!result.success) throw fail(result.error);
      return { goalType, suggestion: result.data };
    }
    case GoalType.FITNESS: {
      const result = FitnessGoalSuggestionSchema.safeParse(raw);
      if (!result.success) throw fail(result.error);
      return { goalType, suggestion: result.data };
    }
    case GoalType.PROGRAMMING: {
      const result = ProgrammingGoalSuggestionSchema.safeParse(raw);
      if (!result.success) throw fail(result.error);
      return { goalType, suggestion: result.data };
    }
  }
}

// ============================================================================
// Service
// ============================================================================

export interface GoalAssistantServiceOptions {
  logger?: Logger;
  maxTokens?: number;
  summaryMaxTokens?: number;
}

export class GoalAssistantService {
  private readonly logger: Logger;
  private readonly maxTokens: number;
  private readonly summaryMaxTokens: number;

  constructor(
    private readonly generator: TextGenerationProvider,
    private readonly store: EventStore,
    options: GoalAssistantServiceOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.maxTokens = options.maxTokens ?? 2048;
    this.summaryMaxTokens = options.summaryMaxTokens ?? 1024;
  }

  async suggestStructure(input: {
    goalType: GoalType;
    title: string;
    description?: string;
  }): Promise<AssistantAnswer<GoalStructureSuggestion>> {
    try {
      const text = await this.generator.generate(
        buildStructurePrompt(input.goalType, input.title, input.description),
        { maxTokens: this.maxTokens }
      );
      return { status: 'ok', value: parseStructureSuggestion(input.goalType, text) };
    } catch (error) {
      this.logger.warn(
        { goalType: input.goalType, provider: this.generator.id, error: describeError(error) },
        'Goal structure suggestion unavailable'
      );
      return { status: 'unavailable', reason: describeError(error) };
    }
  }

  async summarizeBookNotes(input: {
    title: string;
    author?: string;
    notes: string[];
  }): Promise<AssistantAnswer<string>> {
    if (input.notes.length === 0) {
      return { status: 'unavailable', reason: 'No notes to summarize' };
    }
    try {
      const text = await this.generator.generate(
        buildBookSummaryPrompt(input.title, input.author, input.notes),
        { maxTokens: this.summaryMaxTokens }
      );
      return { status: 'ok', value: text.trim() };
    } catch (error) {
      this.logger.warn(
        { title: input.title, provider: this.generator.id, error: describeError(error) },
        'Book summary unavailable'
      );
      return { status: 'unavailable', reason: describeError(error) };
    }
  }

  /**
   * Keep an accepted suggestion on the goal
   */
  async acceptSuggestion(goalId: string, suggestion: GoalStructureSuggestion): Promise<Goal> {
    const goal = await this.store.getGoal(goalId);
    if (!goal) {
      throw new GoalTrackerError(GoalTrackerErrorCode.NOT_FOUND, `Goal ${goalId} not found`, false);
    }
    if (goal.goalType !== suggestion.goalType) {
      throw new GoalTrackerError(
        GoalTrackerErrorCode.INVALID_INPUT,
        `Suggestion for a ${suggestion.goalType} goal cannot be applied to a ${goal.goalType} goal`
      );
    }
    return this.store.updateGoal(goalId, {
      aiGeneratedStructure: JSON.stringify(suggestion.suggestion),
    });
  }
}
