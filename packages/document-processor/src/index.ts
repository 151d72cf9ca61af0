/**
 * @papertrans/document-processor
 *
 * Stages between parsing and output: pairs images with captions, translates
 * text blocks through a pluggable provider and renders Markdown.
 *
 * @packageDocumentation
 */

export { LLMComponent } from './core';
export type { LLMComponentOptions, StructuredRequest } from './core';
export { GOOGLE_TRANSLATE, IMAGE_MAPPER, TRANSLATOR } from './config/constants';
export { ImageMap, ImageMapper } from './mappers';
export type { ImageMapperOptions } from './mappers';
export {
  EchoTranslationProvider,
  GoogleTranslationProvider,
  LLMTranslationProvider,
  TranslationError,
  TranslationResponseSchema,
  Translator,
} from './translators';
export type {
  EchoTranslationProviderOptions,
  GoogleTranslationProviderOptions,
  LLMTranslationProviderOptions,
  TranslateOptions,
  TranslationErrorCode,
  TranslationErrorOptions,
  TranslationProvider,
  TranslatorOptions,
} from './translators';
export {
  MarkdownDocumentJsonSchema,
  MarkdownGenerator,
  MarkdownJson,
  MarkdownReader,
  MarkdownSerializer,
  MarkdownWriter,
  RenderError,
} from './markdown';
export type {
  MarkdownDocumentJson,
  MarkdownGeneratorOptions,
  MarkdownSerializeOptions,
  RenderErrorCode,
  TextSource,
  WrittenMarkdown,
} from './markdown';
