export {
  MarkdownGenerator,
  type MarkdownGeneratorOptions,
  type TextSource,
} from './markdown-generator';
export {
  MarkdownSerializer,
  type MarkdownSerializeOptions,
} from './markdown-serializer';
export {
  MarkdownJson,
  type MarkdownDocumentJson,
  MarkdownDocumentJsonSchema,
} from './markdown-json';
export { MarkdownReader } from './markdown-reader';
export { MarkdownWriter, type WrittenMarkdown } from './markdown-writer';
export { RenderError, type RenderErrorCode } from './render-error';
