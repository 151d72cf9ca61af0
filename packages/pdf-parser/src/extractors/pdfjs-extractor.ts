import type { LoggerMethods } from '@papertrans/logger';
import type { BoundingBox } from '@papertrans/model';
import type {
  PDFDocumentProxy,
  PDFPageProxy,
} from 'pdfjs-dist/legacy/build/pdf.mjs';

import type {
  PdfExtractor,
  RawImage,
  RawPage,
  RawPdf,
  RawTextItem,
} from '../types/raw-pdf';
import type { Matrix } from '../utils/matrix';
import type { DecodedImage } from './image-encoder';

import { readFile } from 'node:fs/promises';
import { OPS, getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import { ParseError } from '../errors/parse-error';
import {
  IDENTITY_MATRIX,
  applyToPoint,
  multiply,
  toMatrix,
} from '../utils/matrix';
import { encodePng, isDecodedImage } from './image-encoder';

/**
 * Extracts positioned text runs and painted images with pdfjs-dist.
 *
 * Text comes from `getTextContent`; images are located by replaying the
 * operator list with a graphics-state stack and taking the decoded pixels
 * pdfjs keeps in its object stores. Rotated text (such as arXiv side stamps)
 * is skipped.
 */
export class PdfjsExtractor implements PdfExtractor {
  constructor(private readonly logger: LoggerMethods) {}

  async extract(pdfPath: string): Promise<RawPdf> {
    const data = await this.readPdf(pdfPath);
    const document = await this.openDocument(pdfPath, data);

    try {
      const title = await this.readTitle(document);
      const pages: RawPage[] = [];

      for (let pageIndex = 0; pageIndex < document.numPages; pageIndex++) {
        const page = await document.getPage(pageIndex + 1);
        try {
          pages.push(await this.extractPage(page, pageIndex));
        } finally {
          page.cleanup();
        }
      }

      this.logger.info(
        `[PdfjsExtractor] Extracted ${pages.length} pages from ${pdfPath}`,
      );

      return { pageCount: document.numPages, title, pages };
    } catch (error) {
      if (error instanceof ParseError) {
        throw error;
      }
      throw ParseError.fromError(
        'EXTRACTION_FAILED',
        `Failed to extract content from ${pdfPath}`,
        error,
      );
    } finally {
      await document.destroy();
    }
  }

  private async readPdf(pdfPath: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await readFile(pdfPath));
    } catch (error) {
      throw ParseError.fromError(
        'FILE_NOT_FOUND',
        `Cannot read ${pdfPath}`,
        error,
      );
    }
  }

  private async openDocument(
    pdfPath: string,
    data: Uint8Array,
  ): Promise<PDFDocumentProxy> {
    const loadingTask = getDocument({
      data,
      verbosity: 0,
      isEvalSupported: false,
      isOffscreenCanvasSupported: false,
      disableFontFace: true,
      useSystemFonts: false,
    });
    try {
      return await loadingTask.promise;
    } catch (error) {
      // Release the worker side of a document that never opened
      await loadingTask.destroy();
      const code =
        error instanceof Error && error.name === 'PasswordException'
          ? 'ENCRYPTED'
          : 'INVALID_PDF';
      throw ParseError.fromError(code, `Cannot open ${pdfPath}`, error);
    }
  }

  private async readTitle(
    document: PDFDocumentProxy,
  ): Promise<string | undefined> {
    const metadata = await document.getMetadata();
    const info: unknown = metadata.info;
    if (
      typeof info === 'object' &&
      info !== null &&
      'Title' in info &&
      typeof info.Title === 'string' &&
      info.Title.trim().length > 0
    ) {
      return info.Title.trim();
    }
    return undefined;
  }

  private async extractPage(
    page: PDFPageProxy,
    pageIndex: number,
  ): Promise<RawPage> {
    const viewport = page.getViewport({ scale: 1 });
    const toViewport = toMatrix(viewport.transform) ?? IDENTITY_MATRIX;

    const textItems = await this.extractText(page, toViewport);
    const images = await this.extractImages(page, pageIndex, toViewport);

    this.logger.debug(
      `[PdfjsExtractor] Page ${pageIndex}: ${textItems.length} text items, ${images.length} images`,
    );

    return {
      pageIndex,
      width: viewport.width,
      height: viewport.height,
      textItems,
      images,
    };
  }

  private async extractText(
    page: PDFPageProxy,
    toViewport: Matrix,
  ): Promise<RawTextItem[]> {
    const content = await page.getTextContent();
    const items: RawTextItem[] = [];
    let rotated = 0;

    for (const item of content.items) {
      if (!('str' in item) || item.str.trim().length === 0) {
        continue;
      }
      const transform = toMatrix(item.transform);
      if (!transform) {
        continue;
      }
      const [a, b, c, d, e, f] = transform;
      if (b !== 0 || c !== 0) {
        rotated++;
        continue;
      }

      const [left, baseline] = applyToPoint(toViewport, e, f);
      const fontSize = Math.abs(d) || Math.abs(a);
      items.push({
        text: item.str,
        left,
        baseline,
        width: item.width,
        height: item.height || fontSize,
        fontSize,
        fontName: item.fontName,
      });
    }

    if (rotated > 0) {
      this.logger.debug(`[PdfjsExtractor] Skipped ${rotated} rotated text items`);
    }

    return items;
  }

  private async extractImages(
    page: PDFPageProxy,
    pageIndex: number,
    toViewport: Matrix,
  ): Promise<RawImage[]> {
    const operatorList = await page.getOperatorList();
    const images: RawImage[] = [];
    const stack: Matrix[] = [];
    let ctm: Matrix = IDENTITY_MATRIX;

    for (let i = 0; i < operatorList.fnArray.length; i++) {
      const op = operatorList.fnArray[i];
      const args: unknown = operatorList.argsArray[i];

      switch (op) {
        case OPS.save:
          stack.push(ctm);
          break;
        case OPS.restore:
          ctm = stack.pop() ?? IDENTITY_MATRIX;
          break;
        case OPS.transform: {
          const matrix = toMatrix(args);
          if (matrix) {
            ctm = multiply(matrix, ctm);
          }
          break;
        }
        case OPS.paintImageXObject:
        case OPS.paintInlineImageXObject: {
          const decoded = Array.isArray(args)
            ? this.resolveImage(page, args[0])
            : null;
          if (!decoded) {
            this.logger.warn(
              `[PdfjsExtractor] Page ${pageIndex}: image ${images.length} could not be decoded, skipping`,
            );
            break;
          }
          images.push({
            bbox: unitSquareBox(multiply(ctm, toViewport)),
            format: 'png',
            pixelWidth: decoded.width,
            pixelHeight: decoded.height,
            data: encodePng(decoded),
          });
          break;
        }
      }
    }

    return images;
  }

  /**
   * Look up decoded pixels for a painted image.
   *
   * Inline images carry their pixels in the operator arguments; XObjects are
   * referenced by id, with ids starting with `g_` shared across pages.
   */
  private resolveImage(
    page: PDFPageProxy,
    ref: unknown,
  ): DecodedImage | null {
    if (isDecodedImage(ref)) {
      return ref;
    }
    if (typeof ref !== 'string') {
      return null;
    }
    const store = ref.startsWith('g_') ? page.commonObjs : page.objs;
    if (!store.has(ref)) {
      return null;
    }
    const value: unknown = store.get(ref);
    return isDecodedImage(value) ? value : null;
  }
}

/**
 * Bounding box of the unit square under a transform, in viewport space
 */
function unitSquareBox(m: Matrix): BoundingBox {
  const corners = [
    applyToPoint(m, 0, 0),
    applyToPoint(m, 1, 0),
    applyToPoint(m, 0, 1),
    applyToPoint(m, 1, 1),
  ];
  const xs = corners.map(([x]) => x);
  const ys = corners.map(([, y]) => y);
  return {
    left: Math.min(...xs),
    top: Math.min(...ys),
    right: Math.max(...xs),
    bottom: Math.max(...ys),
  };
}
