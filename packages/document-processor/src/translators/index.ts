export {
  EchoTranslationProvider,
  type EchoTranslationProviderOptions,
} from './echo-translation-provider';
export {
  GoogleTranslationProvider,
  type GoogleTranslationProviderOptions,
} from './google-translation-provider';
export {
  LLMTranslationProvider,
  TranslationResponseSchema,
  type LLMTranslationProviderOptions,
} from './llm-translation-provider';
export {
  TranslationError,
  type TranslationErrorCode,
  type TranslationErrorOptions,
} from './translation-error';
export type {
  TranslateOptions,
  TranslationProvider,
} from './translation-provider';
export { Translator, type TranslatorOptions } from './translator';
