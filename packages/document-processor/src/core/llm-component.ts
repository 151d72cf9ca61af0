import type { LogLevel, LoggerMethods } from '@papertrans/logger';
import type { LLMTokenUsageAggregator } from '@papertrans/shared';
import type { LanguageModel } from 'ai';
import type { z } from 'zod';

import { LLMCaller } from '@papertrans/shared';

export interface LLMComponentOptions {
  /**
   * Retry count handed to the AI SDK (default: 0)
   */
  maxRetries?: number;

  /**
   * Sampling temperature (default: 0)
   */
  temperature?: number;

  /**
   * Used for every request that does not bring its own signal
   */
  abortSignal?: AbortSignal;
}

export interface StructuredRequest<TOutput> {
  schema: z.ZodType<TOutput>;
  systemPrompt: string;
  userPrompt: string;

  /**
   * Usage is reported under this phase (e.g., 'translation')
   */
  phase: string;

  abortSignal?: AbortSignal;
}

/**
 * LLMComponent - base for pipeline steps backed by a language model
 *
 * Holds the model settings, prefixes log lines with the component name and
 * reports the token usage of every request to the run's aggregator.
 *
 * Subclasses: LLMTranslationProvider
 */
export abstract class LLMComponent {
  protected readonly maxRetries: number;
  protected readonly temperature: number;
  protected readonly abortSignal?: AbortSignal;

  constructor(
    protected readonly logger: LoggerMethods,
    protected readonly model: LanguageModel,
    protected readonly componentName: string,
    options: LLMComponentOptions = {},
    private readonly aggregator?: LLMTokenUsageAggregator,
  ) {
    this.maxRetries = options.maxRetries ?? 0;
    this.temperature = options.temperature ?? 0;
    this.abortSignal = options.abortSignal;
  }

  protected log(level: LogLevel, message: string, ...args: unknown[]): void {
    this.logger[level](`[${this.componentName}] ${message}`, ...args);
  }

  /**
   * Run one structured request and record its usage
   *
   * @returns The validated output
   */
  protected async request<TOutput>(
    request: StructuredRequest<TOutput>,
  ): Promise<TOutput> {
    const { output, usage } = await LLMCaller.call({
      schema: request.schema,
      systemPrompt: request.systemPrompt,
      userPrompt: request.userPrompt,
      model: this.model,
      maxRetries: this.maxRetries,
      temperature: this.temperature,
      abortSignal: request.abortSignal ?? this.abortSignal,
      component: this.componentName,
      phase: request.phase,
    });
    this.aggregator?.track(usage);
    return output;
  }

  protected abstract buildSystemPrompt(...args: string[]): string;

  protected abstract buildUserPrompt(...args: string[]): string;
}
