import { describe, it, expect } from 'vitest';
import { GoalTrackerErrorCode, GoalType } from '../src/core-domain';
import type { TextGenerationOptions, TextGenerationProvider } from '../src/connectors';
import {
  GoalAssistantService,
  buildStructurePrompt,
  extractJsonObject,
  parseStructureSuggestion,
} from '../src/core-services';
import { createStore } from './helpers';

class ScriptedGenerator implements TextGenerationProvider {
  readonly id = 'scripted';
  readonly prompts: string[] = [];
  readonly options: TextGenerationOptions[] = [];

  constructor(private readonly answer: string | Error) {}

  async generate(prompt: string, options: TextGenerationOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    if (this.answer instanceof Error) throw this.answer;
    return this.answer;
  }
}

describe('Goal assistant parsing', () => {
  it('should strip a json code fence', () => {
    expect(extractJsonObject('```json\n{"summary":"Go"}\n```')).toBe('{"summary":"Go"}');
  });

  it('should drop chatter around the object', () => {
    expect(extractJsonObject('Sure! {"a":{"b":1}} Enjoy.')).toBe('{"a":{"b":1}}');
  });

  it('should validate the suggestion against its goal type', () => {
    const parsed = parseStructureSuggestion(
      GoalType.READING,
      '{"suggestedTarget":24,"readingTips":["Read daily"],"summary":"Two a month"}'
    );

    expect(parsed).toEqual({
      goalType: GoalType.READING,
      suggestion: { suggestedTarget: 24, readingTips: ['Read daily'], summary: 'Two a month' },
    });
  });

  it('should reject a suggestion of the wrong shape', () => {
    expect(() => parseStructureSuggestion(GoalType.FITNESS, '{"suggestedWeeklyHours":"lots"}')).toThrow(
      'Suggestion has an unexpected shape'
    );
  });

  it('should put the title and description in the prompt', () => {
    const prompt = buildStructurePrompt(GoalType.PROGRAMMING, 'Ship v2', 'Rewrite the parser');

    expect(prompt.split('\n')[0]).toBe('I\'m creating a programming goal titled "Ship v2".');
    expect(prompt.split('\n')[1]).toBe('Description: Rewrite the parser');
  });
});

describe('GoalAssistantService', () => {
  it('should return a parsed suggestion', async () => {
    const generator = new ScriptedGenerator('```json\n{"suggestedWeeklyHours":6,"keyWorkouts":["Long run"]}\n```');
    const assistant = new GoalAssistantService(generator, createStore(), { maxTokens: 512 });

    const answer = await assistant.suggestStructure({ goalType: GoalType.FITNESS, title: 'Half marathon' });

    expect(answer).toEqual({
      status: 'ok',
      value: {
        goalType: GoalType.FITNESS,
        suggestion: { suggestedWeeklyHours: 6, keyWorkouts: ['Long run'] },
      },
    });
    expect(generator.options[0]?.maxTokens).toBe(512);
  });

  it('should answer unavailable when generation fails', async () => {
    const assistant = new GoalAssistantService(new ScriptedGenerator(new Error('model offline')), createStore());

    const answer = await assistant.suggestStructure({ goalType: GoalType.READING, title: 'Read more' });

    expect(answer).toEqual({ status: 'unavailable', reason: 'model offline' });
  });

  it('should answer unavailable for an unparseable suggestion', async () => {
    const assistant = new GoalAssistantService(new ScriptedGenerator('I cannot help with that.'), createStore());

    const answer = await assistant.suggestStructure({ goalType: GoalType.READING, title: 'Read more' });

    expect(answer).toEqual({ status: 'unavailable', reason: 'Suggestion is not valid JSON' });
  });

  it('should summarize book notes', async () => {
    const generator = new ScriptedGenerator('  Habits compound.  ');
    const assistant = new GoalAssistantService(generator, createStore());

    const answer = await assistant.summarizeBookNotes({
      title: 'Small Steps',
      author: 'J. Doe',
      notes: ['Start tiny', 'Stack habits'],
    });

    expect(answer).toEqual({ status: 'ok', value: 'Habits compound.' });
    expect(generator.prompts[0]).toContain('- Stack habits');
    expect(generator.options[0]?.maxTokens).toBe(1024);
  });

  it('should not call the model without notes', async () => {
    const generator = new ScriptedGenerator('unused');
    const assistant = new GoalAssistantService(generator, createStore());

    const answer = await assistant.summarizeBookNotes({ title: 'Small Steps', notes: [] });

    expect(answer).toEqual({ status: 'unavailable', reason: 'No notes to summarize' });
    expect(generator.prompts).toEqual([]);
  });

  it('should store an accepted suggestion on a matching goal', async () => {
    const store = createStore();
    const goal = await store.createGoal({ title: 'Read more', goalType: GoalType.READING, targetValue: 12 });
    const assistant = new GoalAssistantService(new ScriptedGenerator('{}'), store);

    const updated = await assistant.acceptSuggestion(goal.id, {
      goalType: GoalType.READING,
      suggestion: { suggestedTarget: 24 },
    });

    expect(updated.aiGeneratedStructure).toBe('{"suggestedTarget":24}');
  });

  it('should refuse a suggestion for another goal type', async () => {
    const store = createStore();
    const goal = await store.createGoal({ title: 'Read more', goalType: GoalType.READING, targetValue: 12 });
    const assistant = new GoalAssistantService(new ScriptedGenerator('{}'), store);

    await expect(
      assistant.acceptSuggestion(goal.id, { goalType: GoalType.FITNESS, suggestion: { suggestedWeeklyHours: 5 } })
    ).rejects.toMatchObject({ code: GoalTrackerErrorCode.INVALID_INPUT });
  });
});
