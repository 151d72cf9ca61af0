export type {
  BoundingBox,
  DocumentStructure,
  ImageAsset,
  ImageFormat,
  ParsedDocument,
  PdfDocumentInfo,
  SectionInfo,
  TextBlock,
  TextBlockRole,
} from './parsed-document';
export type {
  CaptionedImageMapping,
  ImageMapping,
  UncaptionedImageMapping,
} from './image-mapping';
export type {
  EquationNode,
  HeadingNode,
  ImageNode,
  MarkdownDocument,
  MarkdownNode,
  ParagraphNode,
} from './markdown-document';
export type {
  ComponentUsageReport,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from './token-usage-report';
