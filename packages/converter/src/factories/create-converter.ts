import type { LoggerMethods } from '@papertrans/logger';
import type { PdfExtractor } from '@papertrans/pdf-parser';

import type { ConverterConfig } from '../config/converter-config';
import type { ConversionState } from '../core/converter';

import {
  EchoTranslationProvider,
  GoogleTranslationProvider,
  LLMTranslationProvider,
  type TranslationProvider,
  Translator,
} from '@papertrans/document-processor';
import { createConsoleLogger } from '@papertrans/logger';
import { PDFParser } from '@papertrans/pdf-parser';
import { LLMTokenUsageAggregator } from '@papertrans/shared';

import { Converter } from '../core/converter';
import { ConfigurationError } from '../errors/configuration-error';
import { createModel } from './model-factory';

/**
 * Build the translation provider named by the configuration
 *
 * @throws {ConfigurationError} when the provider's settings are missing
 */
export function createTranslationProvider(
  config: ConverterConfig,
  logger: LoggerMethods,
  aggregator?: LLMTokenUsageAggregator,
): TranslationProvider {
  switch (config.provider) {
    case 'google':
      if (!config.google) {
        throw new ConfigurationError([
          'GOOGLE_TRANSLATE_API_KEY: Required when PAPERTRANS_PROVIDER is google',
        ]);
      }
      return new GoogleTranslationProvider(logger, config.google);
    case 'llm':
      if (!config.llm) {
        throw new ConfigurationError([
          'PAPERTRANS_LLM_MODEL: Required when PAPERTRANS_PROVIDER is llm',
        ]);
      }
      return new LLMTranslationProvider(
        logger,
        createModel(config.llm.modelId, config.llm.apiKey),
        {},
        aggregator,
      );
    case 'echo':
      return new EchoTranslationProvider();
  }
}

export interface CreateConverterOptions {
  /**
   * Default: console logger at `config.logLevel`
   */
  logger?: LoggerMethods;

  /**
   * Default: pdfjs-dist extractor
   */
  extractor?: PdfExtractor;

  /**
   * Replaces the provider named by the configuration
   */
  provider?: TranslationProvider;

  abortSignal?: AbortSignal;

  onStageChange?: (state: ConversionState) => void;
}

/**
 * Wire a Converter from configuration
 *
 * @example
 * ```typescript
 * const converter = createConverter(loadConverterConfig());
 * await converter.convert('paper.pdf', 'out');
 * ```
 */
export function createConverter(
  config: ConverterConfig,
  options: CreateConverterOptions = {},
): Converter {
  const logger =
    options.logger ?? createConsoleLogger({ level: config.logLevel });
  const usageAggregator = new LLMTokenUsageAggregator();
  const provider =
    options.provider ??
    createTranslationProvider(config, logger, usageAggregator);

  return new Converter({
    logger,
    parser: new PDFParser({
      logger,
      template: config.template,
      extractor: options.extractor,
    }),
    translator: new Translator(logger, provider, {
      sourceLanguage: config.sourceLanguage,
      targetLanguage: config.targetLanguage,
      timeoutMs: config.timeoutMs,
    }),
    imageWidth: config.imageWidth,
    includeSourceMarkdown: config.includeSourceMarkdown,
    abortSignal: options.abortSignal,
    onStageChange: options.onStageChange,
    usageAggregator,
  });
}
