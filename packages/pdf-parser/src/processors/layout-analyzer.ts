import type { LoggerMethods } from '@papertrans/logger';
import type { BoundingBox } from '@papertrans/model';

import type { TemplateRules } from '../config/templates';
import type { RawImage, RawPage, RawTextItem } from '../types/raw-pdf';

import { orderBy } from 'es-toolkit';

import { LAYOUT_ANALYZER, PDF_PARSER } from '../config/constants';
import { isLikelyTableOrFigure } from './figure-text-filter';
import { TextNormalizer } from './text-normalizer';

/** Column index of an element; SPANNING when it crosses the gutter */
export const SPANNING = -1;

/** Horizontal gap (ratio of font size) that separates two lines on one row */
const COLUMN_GAP_RATIO = 1.2;

/** Slack in points when deciding which side of the gutter an element is on */
const GUTTER_TOLERANCE = 2;

export interface LayoutLine {
  text: string;
  bbox: BoundingBox;
  baseline: number;
  fontSize: number;
  fontName: string;
  column: number;
}

export interface LayoutBlock {
  kind: 'text';
  pageIndex: number;
  bbox: BoundingBox;
  column: number;
  fontSize: number;
  fontName: string;
  lines: LayoutLine[];
  /** Lines joined and normalized */
  text: string;
}

export interface LayoutImage {
  kind: 'image';
  pageIndex: number;
  bbox: BoundingBox;
  column: number;
  image: RawImage;
}

export type LayoutElement = LayoutBlock | LayoutImage;

export interface PageLayout {
  pageIndex: number;
  width: number;
  height: number;
  /** Blocks and images in reading order */
  elements: LayoutElement[];
}

export interface LayoutAnalyzerOptions {
  /** Images smaller than this (points) on either side are dropped */
  minImageSize?: number;
}

/**
 * LayoutAnalyzer - groups positioned text runs into blocks and orders blocks
 * and images for reading.
 *
 * 1. Drops running headers and footers using the template margins
 * 2. Merges runs into lines by baseline, splitting rows at wide gaps
 * 3. Merges lines into blocks by vertical gap, font and column
 * 4. Drops text inside images and table/figure debris (captions are kept)
 * 5. Orders elements in bands separated by spanning elements, column by
 *    column inside each band
 */
export class LayoutAnalyzer {
  private readonly minImageSize: number;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly template: TemplateRules,
    options: LayoutAnalyzerOptions = {},
  ) {
    this.minImageSize = options.minImageSize ?? PDF_PARSER.MIN_IMAGE_SIZE;
  }

  analyze(page: RawPage): PageLayout {
    const items = this.filterMargins(page);
    const lines = this.buildLines(items, page.width);
    const blocks = this.buildBlocks(lines, page.pageIndex);
    const images = this.collectImages(page);
    const kept = this.dropFigureText(blocks, images, page.pageIndex);

    return {
      pageIndex: page.pageIndex,
      width: page.width,
      height: page.height,
      elements: this.orderElements([...kept, ...images]),
    };
  }

  private filterMargins(page: RawPage): RawTextItem[] {
    const footerTop = page.height - this.template.footerMargin;
    return page.textItems.filter(
      (item) =>
        item.text.trim().length > 0 &&
        item.baseline > this.template.headerMargin &&
        item.baseline - item.height < footerTop,
    );
  }

  private buildLines(items: RawTextItem[], pageWidth: number): LayoutLine[] {
    const sorted = orderBy(items, ['baseline', 'left'], ['asc', 'asc']);
    const lines: LayoutLine[] = [];

    let row: RawTextItem[] = [];
    for (const item of sorted) {
      const anchor = row[0];
      const tolerance =
        LAYOUT_ANALYZER.LINE_TOLERANCE_RATIO *
        Math.max(item.fontSize, anchor?.fontSize ?? 0);
      if (anchor && Math.abs(item.baseline - anchor.baseline) > tolerance) {
        lines.push(...this.splitRow(row, pageWidth));
        row = [];
      }
      row.push(item);
    }
    if (row.length > 0) {
      lines.push(...this.splitRow(row, pageWidth));
    }

    return lines;
  }

  /**
   * Split one baseline row into lines at gaps wider than a column gutter
   */
  private splitRow(row: RawTextItem[], pageWidth: number): LayoutLine[] {
    const sorted = orderBy(row, ['left'], ['asc']);
    const segments: RawTextItem[][] = [];

    let current: RawTextItem[] = [];
    for (const item of sorted) {
      const previous = current[current.length - 1];
      if (
        previous &&
        item.left - (previous.left + previous.width) >
          COLUMN_GAP_RATIO * Math.max(item.fontSize, previous.fontSize)
      ) {
        segments.push(current);
        current = [];
      }
      current.push(item);
    }
    segments.push(current);

    return segments.map((segment) => this.toLine(segment, pageWidth));
  }

  private toLine(items: RawTextItem[], pageWidth: number): LayoutLine {
    let text = '';
    let previous: RawTextItem | undefined;
    for (const item of items) {
      if (previous) {
        const gap = item.left - (previous.left + previous.width);
        const spaced = /\s$/.test(previous.text) || /^\s/.test(item.text);
        if (
          !spaced &&
          gap > LAYOUT_ANALYZER.WORD_GAP_RATIO * item.fontSize
        ) {
          text += ' ';
        }
      }
      text += item.text;
      previous = item;
    }

    // The run with the most characters decides the line's font
    const dominant = orderBy(items, [(item) => item.text.length], ['desc'])[0];
    const bbox: BoundingBox = {
      left: Math.min(...items.map((item) => item.left)),
      top: Math.min(...items.map((item) => item.baseline - item.height)),
      right: Math.max(...items.map((item) => item.left + item.width)),
      bottom: Math.max(...items.map((item) => item.baseline)),
    };

    return {
      text,
      bbox,
      baseline: dominant.baseline,
      fontSize: dominant.fontSize || PDF_PARSER.FALLBACK_FONT_SIZE,
      fontName: dominant.fontName,
      column: this.columnOf(bbox, pageWidth),
    };
  }

  private columnOf(bbox: BoundingBox, pageWidth: number): number {
    if (this.template.columnCount === 1) {
      return 0;
    }
    const gutter = pageWidth / 2;
    if (bbox.right <= gutter + GUTTER_TOLERANCE) {
      return 0;
    }
    if (bbox.left >= gutter - GUTTER_TOLERANCE) {
      return 1;
    }
    return SPANNING;
  }

  private buildBlocks(lines: LayoutLine[], pageIndex: number): LayoutBlock[] {
    const blocks: LayoutBlock[] = [];
    const open = new Map<number, LayoutBlock>();

    for (const line of orderBy(lines, ['baseline', (l) => l.bbox.left], ['asc', 'asc'])) {
      // A spanning line separates bands, so column blocks cannot continue
      // across it and vice versa
      if (line.column === SPANNING) {
        open.forEach((_, column) => {
          if (column !== SPANNING) open.delete(column);
        });
      } else {
        open.delete(SPANNING);
      }

      const block = open.get(line.column);
      if (block && this.continuesBlock(block, line)) {
        block.lines.push(line);
        block.bbox = {
          left: Math.min(block.bbox.left, line.bbox.left),
          top: Math.min(block.bbox.top, line.bbox.top),
          right: Math.max(block.bbox.right, line.bbox.right),
          bottom: Math.max(block.bbox.bottom, line.bbox.bottom),
        };
        continue;
      }

      const created: LayoutBlock = {
        kind: 'text',
        pageIndex,
        bbox: { ...line.bbox },
        column: line.column,
        fontSize: line.fontSize,
        fontName: line.fontName,
        lines: [line],
        text: '',
      };
      blocks.push(created);
      open.set(line.column, created);
    }

    for (const block of blocks) {
      block.text = TextNormalizer.joinLines(block.lines.map((l) => l.text));
    }
    return blocks;
  }

  private continuesBlock(block: LayoutBlock, line: LayoutLine): boolean {
    const gap = line.bbox.top - block.bbox.bottom;
    const overlapsHorizontally =
      line.bbox.left < block.bbox.right && line.bbox.right > block.bbox.left;

    return (
      gap <= LAYOUT_ANALYZER.BLOCK_GAP_RATIO * block.fontSize &&
      Math.abs(line.fontSize - block.fontSize) <=
        LAYOUT_ANALYZER.FONT_SIZE_TOLERANCE &&
      line.fontName === block.fontName &&
      overlapsHorizontally
    );
  }

  private collectImages(page: RawPage): LayoutImage[] {
    const images: LayoutImage[] = [];
    for (const image of page.images) {
      const width = image.bbox.right - image.bbox.left;
      const height = image.bbox.bottom - image.bbox.top;
      if (width < this.minImageSize || height < this.minImageSize) {
        this.logger.debug(
          `[LayoutAnalyzer] Page ${page.pageIndex}: dropped ${width.toFixed(1)}x${height.toFixed(1)}pt image`,
        );
        continue;
      }
      images.push({
        kind: 'image',
        pageIndex: page.pageIndex,
        bbox: image.bbox,
        column: this.columnOf(image.bbox, page.width),
        image,
      });
    }
    return images;
  }

  private dropFigureText(
    blocks: LayoutBlock[],
    images: LayoutImage[],
    pageIndex: number,
  ): LayoutBlock[] {
    const kept = blocks.filter((block) => {
      if (block.text.length === 0) {
        return false;
      }
      if (
        this.template.captionPatterns.some((pattern) =>
          pattern.test(block.text),
        )
      ) {
        return true;
      }
      if (images.some((image) => containsCenter(image.bbox, block.bbox))) {
        return false;
      }
      return !isLikelyTableOrFigure(block.lines.map((l) => l.text).join('\n'));
    });

    if (kept.length < blocks.length) {
      this.logger.debug(
        `[LayoutAnalyzer] Page ${pageIndex}: dropped ${blocks.length - kept.length} figure/table text blocks`,
      );
    }
    return kept;
  }

  private orderElements(elements: LayoutElement[]): LayoutElement[] {
    const byTop = orderBy(
      elements,
      [(e) => e.bbox.top, (e) => e.bbox.left],
      ['asc', 'asc'],
    );
    const ordered: LayoutElement[] = [];
    let band: LayoutElement[] = [];

    const flush = () => {
      ordered.push(
        ...orderBy(
          band,
          ['column', (e) => e.bbox.top, (e) => e.bbox.left],
          ['asc', 'asc', 'asc'],
        ),
      );
      band = [];
    };

    for (const element of byTop) {
      if (element.column === SPANNING) {
        flush();
        ordered.push(element);
      } else {
        band.push(element);
      }
    }
    flush();

    return ordered;
  }
}

function containsCenter(outer: BoundingBox, inner: BoundingBox): boolean {
  const x = (inner.left + inner.right) / 2;
  const y = (inner.top + inner.bottom) / 2;
  return (
    x >= outer.left && x <= outer.right && y >= outer.top && y <= outer.bottom
  );
}
