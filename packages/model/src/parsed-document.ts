/**
 * Axis-aligned box in PDF points with a top-left origin.
 *
 * @interface BoundingBox
 */
export interface BoundingBox {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * Source PDF information
 *
 * Read-only description of the input file. Never mutated by the pipeline.
 *
 * @interface PdfDocumentInfo
 */
export interface PdfDocumentInfo {
  /**
   * Absolute or caller-relative path of the PDF file
   */
  sourcePath: string;

  /**
   * Number of pages in the PDF
   */
  pageCount: number;

  /**
   * Title from the PDF metadata dictionary, when present
   */
  title?: string;
}

/**
 * Role a text block plays in the template layout
 *
 * - title: paper title on the first page
 * - authors: author/affiliation block between title and first heading
 * - heading: numbered or well-known unnumbered section heading
 * - caption: "Figure N" / "Table N" label text
 * - reference: entry inside the references section
 * - paragraph: body text (and everything unclassified)
 */
export type TextBlockRole =
  | 'title'
  | 'authors'
  | 'heading'
  | 'paragraph'
  | 'caption'
  | 'reference';

/**
 * Contiguous span of extracted text
 *
 * Ordinals start at 0 and increase by one in reading order across pages.
 *
 * @interface TextBlock
 */
export interface TextBlock {
  /**
   * Reading-order position (0-based, no gaps)
   */
  ordinal: number;

  /**
   * Page index in the PDF (0-based)
   */
  pageIndex: number;

  bbox: BoundingBox;

  role: TextBlockRole;

  /**
   * Markdown heading level for title/heading blocks (title = 1)
   */
  headingLevel?: number;

  /**
   * Section number for numbered headings (e.g., "3.1")
   */
  sectionNumber?: string;

  /**
   * Dominant font size of the block in points
   */
  fontSize: number;

  /**
   * Original text, normalized
   */
  text: string;

  /**
   * Translated text; null until the translation stage has run
   */
  translatedText: string | null;
}

export type ImageFormat = 'png' | 'jpeg';

/**
 * Figure extracted from a page
 *
 * @interface ImageAsset
 */
export interface ImageAsset {
  /**
   * Deterministic identifier (e.g., "image_2_0")
   */
  id: string;

  /**
   * Position among images in reading order (0-based)
   */
  ordinal: number;

  pageIndex: number;

  bbox: BoundingBox;

  format: ImageFormat;

  pixelWidth: number;

  pixelHeight: number;

  /**
   * Encoded image bytes (PNG or JPEG)
   */
  data: Uint8Array;

  /**
   * File name used when the image is written beside the Markdown
   */
  fileName: string;

  /**
   * Ordinal of the text block immediately preceding the image in reading
   * order, or null when the image comes before every text block
   */
  followsOrdinal: number | null;
}

/**
 * Section heading detected while parsing
 *
 * @interface SectionInfo
 */
export interface SectionInfo {
  ordinal: number;
  number: string | null;
  title: string;
  level: number;
}

/**
 * Structural metadata for the parsed document
 *
 * @interface DocumentStructure
 */
export interface DocumentStructure {
  title: string | null;

  sections: SectionInfo[];

  /**
   * Name of the template rules used for layout analysis
   */
  templateName: string;

  /**
   * False when neither a title nor a heading could be found; blocks are then
   * plain paragraphs
   */
  templateMatched: boolean;
}

/**
 * Parser output
 *
 * @interface ParsedDocument
 */
export interface ParsedDocument {
  info: PdfDocumentInfo;
  blocks: TextBlock[];
  images: ImageAsset[];
  structure: DocumentStructure;
}
