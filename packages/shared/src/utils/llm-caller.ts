import type { z } from 'zod';

import { type LanguageModel, generateObject } from 'ai';

/**
 * Configuration for a structured LLM call
 */
export interface LLMCallConfig<TOutput> {
  /**
   * Zod schema the response must satisfy
   */
  schema: z.ZodType<TOutput>;

  systemPrompt: string;

  userPrompt: string;

  model: LanguageModel;

  /**
   * Retry count handed to the AI SDK for transport errors (default: 0)
   */
  maxRetries?: number;

  /**
   * Temperature for generation (optional, 0-1)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation and deadlines
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'LLMTranslationProvider')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'translation')
   */
  phase: string;
}

/**
 * Token usage of a single call, tagged with its origin
 */
export interface ExtendedTokenUsage {
  component: string;
  phase: string;
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface LLMCallResult<T> {
  output: T;
  usage: ExtendedTokenUsage;
}

/**
 * LLMCaller - structured LLM calls through the AI SDK
 *
 * Wraps `generateObject`, re-validates the object against the caller's schema
 * and reports token usage tagged with component and phase. A failed call is
 * rethrown as-is; callers decide how to surface it.
 *
 * @example
 * ```typescript
 * const result = await LLMCaller.call({
 *   schema: z.object({ translation: z.string() }),
 *   systemPrompt: 'Translate academic text',
 *   userPrompt: 'Attention is all you need.',
 *   model: openai('gpt-4o-mini'),
 *   component: 'LLMTranslationProvider',
 *   phase: 'translation',
 * });
 *
 * result.output.translation;
 * result.usage.totalTokens;
 * ```
 */
export class LLMCaller {
  /**
   * Model identifier for usage reports
   */
  static getModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  static async call<TOutput>(
    config: LLMCallConfig<TOutput>,
  ): Promise<LLMCallResult<TOutput>> {
    const response = await generateObject<z.ZodTypeAny, 'object'>({
      model: config.model,
      schema: config.schema,
      system: config.systemPrompt,
      prompt: config.userPrompt,
      temperature: config.temperature,
      maxRetries: config.maxRetries ?? 0,
      abortSignal: config.abortSignal,
    });

    return {
      output: config.schema.parse(response.object),
      usage: {
        component: config.component,
        phase: config.phase,
        modelName: this.getModelName(config.model),
        inputTokens: response.usage?.inputTokens ?? 0,
        outputTokens: response.usage?.outputTokens ?? 0,
        totalTokens: response.usage?.totalTokens ?? 0,
      },
    };
  }
}
