/**
 * @papertrans/converter
 *
 * Converts a conference paper PDF into translated Markdown with its figures.
 *
 * @packageDocumentation
 */

export { Converter } from './core/converter';
export type {
  ConversionResult,
  ConversionState,
  ConverterOptions,
  DocumentParser,
} from './core/converter';
export { CONVERTER } from './config/constants';
export {
  ConverterEnvSchema,
  loadConverterConfig,
} from './config/converter-config';
export type {
  ConverterConfig,
  LlmVendor,
  TranslationProviderName,
} from './config/converter-config';
export { ConfigurationError } from './errors/configuration-error';
export { ConversionError } from './errors/conversion-error';
export type { ConversionStage } from './errors/conversion-error';
export {
  createConverter,
  createTranslationProvider,
} from './factories/create-converter';
export type { CreateConverterOptions } from './factories/create-converter';
export { createModel } from './factories/model-factory';
