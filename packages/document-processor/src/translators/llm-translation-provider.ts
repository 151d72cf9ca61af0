import type { LoggerMethods } from '@papertrans/logger';
import type { LLMTokenUsageAggregator } from '@papertrans/shared';
import type { LanguageModel } from 'ai';

import type {
  TranslateOptions,
  TranslationProvider,
} from './translation-provider';

import { z } from 'zod';

import { LLMComponent, type LLMComponentOptions } from '../core/llm-component';

export const TranslationResponseSchema = z.object({
  translation: z.string().describe('The translated text only'),
});

export type LLMTranslationProviderOptions = LLMComponentOptions;

/**
 * LLMTranslationProvider - translates academic text with any AI SDK model
 *
 * Uses structured output so the response carries only the translation. Token
 * usage is reported to the aggregator under the 'translation' phase.
 */
export class LLMTranslationProvider
  extends LLMComponent
  implements TranslationProvider
{
  readonly name = 'llm';

  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: LLMTranslationProviderOptions,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, model, 'LLMTranslationProvider', options, aggregator);
  }

  async translate(
    text: string,
    targetLanguage: string,
    options: TranslateOptions = {},
  ): Promise<string> {
    const { translation } = await this.request({
      schema: TranslationResponseSchema,
      systemPrompt: this.buildSystemPrompt(
        targetLanguage,
        options.sourceLanguage ?? '',
      ),
      userPrompt: this.buildUserPrompt(text),
      phase: 'translation',
      abortSignal: options.signal,
    });
    this.log('debug', `Translated ${text.length} characters to ${targetLanguage}`);
    return translation;
  }

  protected buildSystemPrompt(
    targetLanguage: string,
    sourceLanguage: string,
  ): string {
    const from = sourceLanguage ? ` from "${sourceLanguage}"` : '';
    return `You translate passages of machine learning research papers${from} into the language with ISO 639-1 code "${targetLanguage}".

Rules:
- Translate the whole passage faithfully; do not summarize or add notes
- Keep mathematical notation, variable names, citations such as [12], URLs and code unchanged
- Keep established technical terms in English when the target language commonly does
- Return only the translation`;
  }

  protected buildUserPrompt(text: string): string {
    return text;
  }
}
