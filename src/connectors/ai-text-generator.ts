/**
 * AI SDK Text Generator
 *
 * `TextGenerationProvider` backed by `generateText`. A plain model id string
 * is resolved by the AI SDK's default provider; pass a provider model to use
 * something else.
 */

import { generateText, type LanguageModel } from 'ai';
import { config } from '../config';
import type { TextGenerationOptions, TextGenerationProvider } from './interfaces';

export interface AiSdkTextGeneratorOptions {
  model?: LanguageModel;
  maxTokens?: number;
}

export class AiSdkTextGenerator implements TextGenerationProvider {
  readonly id = 'ai-sdk';

  private readonly model: LanguageModel;
  private readonly maxTokens: number;

  constructor(options: AiSdkTextGeneratorOptions = {}) {
    this.model = options.model ?? config.ai.model;
    this.maxTokens = options.maxTokens ?? config.ai.maxTokens;
  }

  async generate(prompt: string, options: TextGenerationOptions = {}): Promise<string> {
    const { text } = await generateText({
      model: this.model,
      system: options.system,
      prompt,
      maxOutputTokens: options.maxTokens ?? this.maxTokens,
      abortSignal: options.signal,
    });
    return text;
  }
}
