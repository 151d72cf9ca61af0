import type { BoundingBox, ImageFormat } from '@papertrans/model';

/**
 * A run of text as reported by the PDF library, in page coordinates with a
 * top-left origin
 */
export interface RawTextItem {
  text: string;
  left: number;
  /** Distance from the top of the page to the baseline */
  baseline: number;
  width: number;
  /** Glyph height, approximately the font size */
  height: number;
  fontSize: number;
  /** Font identifier; only compared for equality */
  fontName: string;
}

/**
 * An image painted on a page, with its encoded bytes
 */
export interface RawImage {
  bbox: BoundingBox;
  format: ImageFormat;
  pixelWidth: number;
  pixelHeight: number;
  data: Uint8Array;
}

export interface RawPage {
  pageIndex: number;
  width: number;
  height: number;
  textItems: RawTextItem[];
  /** Images in paint order */
  images: RawImage[];
}

export interface RawPdf {
  pageCount: number;
  /** Title from the document information dictionary, when present */
  title?: string;
  pages: RawPage[];
}

/**
 * Capability that turns a PDF file into positioned text and images.
 *
 * Implementations throw ParseError for unreadable or invalid files.
 */
export interface PdfExtractor {
  extract(pdfPath: string): Promise<RawPdf>;
}
