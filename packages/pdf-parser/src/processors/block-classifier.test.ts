import type { LayoutBlock } from './layout-analyzer';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { NEURIPS_TEMPLATE } from '../config/templates';
import { BlockClassifier } from './block-classifier';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const BODY =
  'The sorting method groups small records into buckets before merging them, which keeps memory use low on the test machines and lets the final merge pass finish well within the time limit that was set for every run described in this part of the report.';

interface BlockInit {
  pageIndex?: number;
  top?: number;
  fontSize?: number;
  fontName?: string;
  lineCount?: number;
}

function block(text: string, init: BlockInit = {}): LayoutBlock {
  const {
    pageIndex = 0,
    top = 100,
    fontSize = 10,
    fontName = 'body',
    lineCount = 1,
  } = init;
  const bbox = { left: 72, top, right: 540, bottom: top + fontSize };
  return {
    kind: 'text',
    pageIndex,
    bbox,
    column: 0,
    fontSize,
    fontName,
    lines: Array.from({ length: lineCount }, () => ({
      text,
      bbox,
      baseline: bbox.bottom,
      fontSize,
      fontName,
      column: 0,
    })),
    text,
  };
}

const heading = (text: string, init: BlockInit = {}) =>
  block(text, { fontSize: 12, fontName: 'bold', top: 400, ...init });

describe('BlockClassifier', () => {
  let classifier: BlockClassifier;

  beforeEach(() => {
    classifier = new BlockClassifier(mockLogger, NEURIPS_TEMPLATE);
  });

  test('classifies a typical paper layout', () => {
    const blocks = [
      block('Bucketed Merging for Small Records', {
        top: 80,
        fontSize: 17,
        fontName: 'title',
      }),
      block('Jane Doe Example University', { top: 150 }),
      heading('Abstract', { top: 250 }),
      block(BODY, { top: 270, lineCount: 3 }),
      heading('1 Introduction'),
      block(BODY, { pageIndex: 1, lineCount: 3 }),
      block('Figure 1: The bucketed merge layout.', { pageIndex: 1 }),
      heading('3 Model Architecture', { pageIndex: 1 }),
      heading('2 Background', { pageIndex: 1 }),
      heading('2.1 Bucket Sizes', { pageIndex: 1, fontSize: 10 }),
      heading('References', { pageIndex: 2 }),
      block('[1] A. Author. A paper title. 2017.', { pageIndex: 2 }),
      heading('3 Appendix Results', { pageIndex: 3 }),
      block('More text after the references.', { pageIndex: 3 }),
    ];

    const result = classifier.classify(blocks, 792);

    expect(result.blocks.map((b) => b.role)).toEqual([
      'title',
      'authors',
      'heading',
      'paragraph',
      'heading',
      'paragraph',
      'caption',
      'paragraph',
      'heading',
      'heading',
      'heading',
      'reference',
      'heading',
      'paragraph',
    ]);
    expect(result.title).toBe('Bucketed Merging for Small Records');
    expect(result.templateMatched).toBe(true);
    expect(result.sections).toEqual([
      { ordinal: 2, number: null, title: 'Abstract', level: 2 },
      { ordinal: 4, number: '1', title: 'Introduction', level: 2 },
      { ordinal: 8, number: '2', title: 'Background', level: 2 },
      { ordinal: 9, number: '2.1', title: 'Bucket Sizes', level: 3 },
      { ordinal: 10, number: null, title: 'References', level: 2 },
      { ordinal: 12, number: '3', title: 'Appendix Results', level: 2 },
    ]);
    expect(result.blocks[0]).toEqual({ role: 'title', headingLevel: 1 });
    expect(result.blocks[9]).toMatchObject({
      role: 'heading',
      headingLevel: 3,
      sectionNumber: '2.1',
    });
  });

  test('logs rejected section numbers', () => {
    classifier.classify(
      [block(BODY, { lineCount: 3 }), heading('1 Introduction'), heading('4 Results')],
      792,
    );

    expect(mockLogger.debug).toHaveBeenCalledWith(
      '[BlockClassifier] Rejected heading "4 Results" after section 1',
    );
  });

  test('treats numbered lines in body style as paragraphs', () => {
    const result = classifier.classify(
      [
        block(BODY, { lineCount: 3 }),
        heading('1 Introduction'),
        block('2 We propose a new network.'),
      ],
      792,
    );

    expect(result.blocks.map((b) => b.role)).toEqual([
      'paragraph',
      'heading',
      'paragraph',
    ]);
  });

  test('keeps numbered affiliation lines below the title as authors', () => {
    const result = classifier.classify(
      [
        block('Bucketed Merging for Small Records', {
          top: 80,
          fontSize: 17,
          fontName: 'title',
        }),
        block('Jane Doe', { top: 130 }),
        block('1 Example University', { top: 145, fontSize: 9, fontName: 'italic' }),
        block('2 Sample Institute', { top: 160, fontName: 'italic' }),
        block(BODY, { top: 250, lineCount: 3 }),
        heading('1 Introduction'),
      ],
      792,
    );

    expect(result.blocks.map((b) => b.role)).toEqual([
      'title',
      'authors',
      'authors',
      'authors',
      'authors',
      'heading',
    ]);
    expect(result.sections).toEqual([
      { ordinal: 5, number: '1', title: 'Introduction', level: 2 },
    ]);
  });

  test('does not open a document with a section other than 1', () => {
    const result = classifier.classify(
      [block(BODY, { lineCount: 3 }), heading('3 Results')],
      792,
    );

    expect(result.blocks.map((b) => b.role)).toEqual([
      'paragraph',
      'paragraph',
    ]);
    expect(result.sections).toEqual([]);
  });

  test('rejects numbered headings set smaller than body text', () => {
    const result = classifier.classify(
      [block(BODY, { lineCount: 3 }), heading('1 Introduction', { fontSize: 8 })],
      792,
    );

    expect(result.blocks.map((b) => b.role)).toEqual([
      'paragraph',
      'paragraph',
    ]);
  });

  test('rejects headings that are too long or span too many lines', () => {
    const result = classifier.classify(
      [
        block(BODY, { lineCount: 3 }),
        heading('Abstract', { lineCount: 3 }),
        heading(`1 ${'Very long heading '.repeat(8)}`),
      ],
      792,
    );

    expect(result.blocks.map((b) => b.role)).toEqual([
      'paragraph',
      'paragraph',
      'paragraph',
    ]);
  });

  test('accepts unnumbered headings with trailing punctuation', () => {
    const result = classifier.classify(
      [block(BODY, { lineCount: 3 }), heading('Acknowledgments.')],
      792,
    );

    expect(result.sections).toEqual([
      { ordinal: 1, number: null, title: 'Acknowledgments', level: 2 },
    ]);
  });

  test('does not take a large block below the title region as title', () => {
    const result = classifier.classify(
      [
        block(BODY, { lineCount: 3 }),
        block('Large text low on the page', { top: 500, fontSize: 17 }),
        heading('1 Introduction'),
      ],
      792,
    );

    expect(result.title).toBeNull();
    expect(result.blocks.map((b) => b.role)).toEqual([
      'paragraph',
      'paragraph',
      'heading',
    ]);
  });

  test('degrades to paragraphs when neither title nor heading is found', () => {
    const result = classifier.classify(
      [
        block(BODY, { lineCount: 3 }),
        block('Figure 1: A caption-like line.'),
        block('Another paragraph of text.'),
      ],
      792,
    );

    expect(result.templateMatched).toBe(false);
    expect(result.title).toBeNull();
    expect(result.sections).toEqual([]);
    expect(result.blocks).toEqual([
      { role: 'paragraph' },
      { role: 'paragraph' },
      { role: 'paragraph' },
    ]);
  });

  test('handles an empty document', () => {
    const result = classifier.classify([], 792);

    expect(result).toEqual({
      blocks: [],
      title: null,
      sections: [],
      templateMatched: false,
    });
  });
});
