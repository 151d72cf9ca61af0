import type { LoggerMethods } from '@papertrans/logger';
import type { TextBlock, TextBlockRole } from '@papertrans/model';

import type { TranslationProvider } from './translation-provider';

import { withDeadline } from '@papertrans/shared';

import { TRANSLATOR } from '../config/constants';
import { TranslationError } from './translation-error';

export interface TranslatorOptions {
  /**
   * Source language code (default: 'en')
   */
  sourceLanguage?: string;

  /**
   * Target language code (default: 'es')
   */
  targetLanguage?: string;

  /**
   * Deadline for each provider call in milliseconds (default: 30000)
   */
  timeoutMs?: number;

  /**
   * Roles whose text is copied without translation
   * (default: authors, reference)
   */
  untranslatedRoles?: readonly TextBlockRole[];
}

/**
 * Translator - fills `translatedText` of every block through a provider
 *
 * Calls are sequential and bounded by a deadline. Identical texts are sent
 * once per run. The first failure aborts the whole run with a
 * TranslationError naming the block and provider; no partial result is
 * returned.
 */
export class Translator {
  readonly sourceLanguage: string;
  readonly targetLanguage: string;

  private readonly timeoutMs: number;
  private readonly untranslatedRoles: ReadonlySet<TextBlockRole>;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly provider: TranslationProvider,
    options: TranslatorOptions = {},
  ) {
    this.sourceLanguage = options.sourceLanguage ?? TRANSLATOR.SOURCE_LANGUAGE;
    this.targetLanguage = options.targetLanguage ?? TRANSLATOR.TARGET_LANGUAGE;
    this.timeoutMs = options.timeoutMs ?? TRANSLATOR.TIMEOUT_MS;
    this.untranslatedRoles = new Set<TextBlockRole>(
      options.untranslatedRoles ?? TRANSLATOR.UNTRANSLATED_ROLES,
    );
  }

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * Translate blocks in ordinal order.
   *
   * @param signal - Caller cancellation; also ends the pending provider call
   * @returns New blocks, same count and attributes, `translatedText` set
   * @throws {TranslationError} on the first failed provider call
   */
  async translate(
    blocks: TextBlock[],
    signal?: AbortSignal,
  ): Promise<TextBlock[]> {
    this.logger.info(
      `[Translator] Translating ${blocks.length} blocks from ${this.sourceLanguage} to ${this.targetLanguage} with ${this.provider.name}`,
    );

    const cache = new Map<string, string>();
    const translated: TextBlock[] = [];

    for (const block of blocks) {
      if (this.untranslatedRoles.has(block.role) || block.text.trim() === '') {
        translated.push({ ...block, translatedText: block.text });
        continue;
      }

      let translatedText = cache.get(block.text);
      if (translatedText === undefined) {
        translatedText = await this.translateBlock(block, signal);
        cache.set(block.text, translatedText);
      }
      translated.push({ ...block, translatedText });
    }

    this.logger.info(
      `[Translator] Translated ${blocks.length} blocks with ${cache.size} provider calls`,
    );
    return translated;
  }

  private async translateBlock(
    block: TextBlock,
    signal?: AbortSignal,
  ): Promise<string> {
    const details = { provider: this.provider.name, ordinal: block.ordinal };
    let result: string;

    try {
      result = await withDeadline(
        (deadlineSignal) =>
          this.provider.translate(block.text, this.targetLanguage, {
            sourceLanguage: this.sourceLanguage,
            signal: deadlineSignal,
          }),
        this.timeoutMs,
        signal,
      );
    } catch (error) {
      throw TranslationError.fromError(
        `Failed to translate block ${block.ordinal} with ${this.provider.name}`,
        error,
        details,
      );
    }

    if (result.trim() === '') {
      throw new TranslationError(
        'INVALID_RESPONSE',
        `Provider ${this.provider.name} returned an empty translation for block ${block.ordinal}`,
        details,
      );
    }
    return result;
  }
}
