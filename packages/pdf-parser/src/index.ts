export { PDFParser } from './core/pdf-parser';
export { PDF_PARSER } from './config/constants';
export {
  NEURIPS_TEMPLATE,
  TWO_COLUMN_TEMPLATE,
  resolveTemplate,
} from './config/templates';
export type { TemplateName, TemplateRules } from './config/templates';
export { ParseError } from './errors/parse-error';
export type { ParseErrorCode } from './errors/parse-error';
export { PdfjsExtractor } from './extractors/pdfjs-extractor';
export { BlockClassifier } from './processors/block-classifier';
export type {
  BlockClassification,
  ClassificationResult,
} from './processors/block-classifier';
export { isLikelyTableOrFigure } from './processors/figure-text-filter';
export { LayoutAnalyzer, SPANNING } from './processors/layout-analyzer';
export type {
  LayoutAnalyzerOptions,
  LayoutBlock,
  LayoutElement,
  LayoutImage,
  LayoutLine,
  PageLayout,
} from './processors/layout-analyzer';
export { TextNormalizer } from './processors/text-normalizer';
export type {
  PdfExtractor,
  RawImage,
  RawPage,
  RawPdf,
  RawTextItem,
} from './types/raw-pdf';
