import type { LoggerMethods } from '@papertrans/logger';
import type {
  ImageAsset,
  ImageFormat,
  ParsedDocument,
  TextBlock,
} from '@papertrans/model';

import type { TemplateName, TemplateRules } from '../config/templates';
import type { LayoutBlock } from '../processors/layout-analyzer';
import type { PdfExtractor, RawPdf } from '../types/raw-pdf';

import { resolveTemplate } from '../config/templates';
import { ParseError } from '../errors/parse-error';
import { PdfjsExtractor } from '../extractors/pdfjs-extractor';
import { BlockClassifier } from '../processors/block-classifier';
import { LayoutAnalyzer } from '../processors/layout-analyzer';

const FILE_EXTENSIONS: Record<ImageFormat, string> = {
  png: 'png',
  jpeg: 'jpg',
};

type Options = {
  logger: LoggerMethods;
  /**
   * Source of positioned text and images (default: PdfjsExtractor)
   */
  extractor?: PdfExtractor;
  /**
   * Layout rules, by name or as a custom template (default: 'neurips')
   */
  template?: TemplateName | TemplateRules;
  /**
   * Individual rules replacing those of `template`
   */
  templateOverrides?: Partial<TemplateRules>;
  /**
   * Images smaller than this on either side (points) are dropped (default: 24)
   */
  minImageSize?: number;
};

/**
 * PDFParser - turns a conference paper PDF into ordered text blocks and images
 *
 * ## Pipeline
 * 1. **Extraction**: positioned text runs and images from the PdfExtractor
 * 2. **Layout analysis**: lines, blocks, columns and reading order per page
 * 3. **Classification**: title, authors, headings, captions and references
 *    from the template rules
 * 4. **Assembly**: block ordinals 0..n-1 in reading order; each image records
 *    the ordinal of the block before it
 *
 * A document that matches no template rule (no title, no heading) is not an
 * error: its blocks become plain paragraphs, `structure.templateMatched` is
 * false and a warning is logged.
 *
 * @example
 * ```typescript
 * const parser = new PDFParser({ logger, template: 'neurips' });
 * const document = await parser.parse('paper.pdf');
 * ```
 */
export class PDFParser {
  private readonly logger: LoggerMethods;
  private readonly extractor: PdfExtractor;
  private readonly template: TemplateRules;
  private readonly layoutAnalyzer: LayoutAnalyzer;
  private readonly classifier: BlockClassifier;

  constructor(options: Options) {
    const { logger, extractor, template, templateOverrides, minImageSize } =
      options;

    this.logger = logger;
    this.extractor = extractor ?? new PdfjsExtractor(logger);
    this.template = { ...resolveTemplate(template), ...templateOverrides };
    this.layoutAnalyzer = new LayoutAnalyzer(logger, this.template, {
      minImageSize,
    });
    this.classifier = new BlockClassifier(logger, this.template);
  }

  get templateRules(): TemplateRules {
    return this.template;
  }

  /**
   * Parse a PDF file.
   *
   * @throws {ParseError} FILE_NOT_FOUND, INVALID_PDF, ENCRYPTED or
   * EXTRACTION_FAILED when the file cannot be read; EMPTY_DOCUMENT when it
   * has no pages
   */
  async parse(pdfPath: string): Promise<ParsedDocument> {
    this.logger.info(
      `[PDFParser] Parsing ${pdfPath} with ${this.template.name} template`,
    );

    const raw = await this.extract(pdfPath);
    if (raw.pageCount === 0 || raw.pages.length === 0) {
      throw new ParseError('EMPTY_DOCUMENT', `PDF has no pages: ${pdfPath}`);
    }

    const elements = raw.pages.flatMap(
      (page) => this.layoutAnalyzer.analyze(page).elements,
    );
    const textElements = elements.filter(
      (element): element is LayoutBlock => element.kind === 'text',
    );
    const classification = this.classifier.classify(
      textElements,
      raw.pages[0].height,
    );

    const blocks: TextBlock[] = [];
    const images: ImageAsset[] = [];
    const imagesOnPage = new Map<number, number>();
    let lastOrdinal: number | null = null;

    for (const element of elements) {
      if (element.kind === 'text') {
        const ordinal = blocks.length;
        blocks.push({
          ordinal,
          pageIndex: element.pageIndex,
          bbox: element.bbox,
          ...classification.blocks[ordinal],
          fontSize: element.fontSize,
          text: element.text,
          translatedText: null,
        });
        lastOrdinal = ordinal;
        continue;
      }

      const indexOnPage = imagesOnPage.get(element.pageIndex) ?? 0;
      imagesOnPage.set(element.pageIndex, indexOnPage + 1);
      const id = `image_${element.pageIndex}_${indexOnPage}`;
      const { image } = element;
      images.push({
        id,
        ordinal: images.length,
        pageIndex: element.pageIndex,
        bbox: element.bbox,
        format: image.format,
        pixelWidth: image.pixelWidth,
        pixelHeight: image.pixelHeight,
        data: image.data,
        fileName: `${id}.${FILE_EXTENSIONS[image.format]}`,
        followsOrdinal: lastOrdinal,
      });
    }

    if (!classification.templateMatched) {
      this.logger.warn(
        `[PDFParser] ${pdfPath} does not match the ${this.template.name} template, using plain paragraphs`,
      );
    }

    this.logger.info(
      `[PDFParser] Parsed ${blocks.length} text blocks and ${images.length} images from ${raw.pageCount} pages`,
    );

    return {
      info: { sourcePath: pdfPath, pageCount: raw.pageCount, title: raw.title },
      blocks,
      images,
      structure: {
        title: classification.title ?? raw.title ?? null,
        sections: classification.sections,
        templateName: this.template.name,
        templateMatched: classification.templateMatched,
      },
    };
  }

  private async extract(pdfPath: string): Promise<RawPdf> {
    try {
      return await this.extractor.extract(pdfPath);
    } catch (error) {
      if (error instanceof ParseError) {
        throw error;
      }
      throw ParseError.fromError(
        'EXTRACTION_FAILED',
        `Failed to extract content from ${pdfPath}`,
        error,
      );
    }
  }
}
