import { describe, expect, test } from 'vitest';

import { MarkdownSerializer } from './markdown-serializer';

describe('MarkdownSerializer', () => {
  test('serializes headings, paragraphs, captions and images', () => {
    const markdown = MarkdownSerializer.serialize({
      nodes: [
        { kind: 'heading', level: 1, text: 'Título', sourceOrdinal: 0 },
        { kind: 'heading', level: 3, text: '2.1 Método', sourceOrdinal: 1 },
        {
          kind: 'paragraph',
          text: 'Un párrafo.',
          sourceOrdinal: 2,
          style: 'body',
        },
        {
          kind: 'image',
          imageId: 'image_0_0',
          path: 'paper_images/image_0_0.png',
          altText: 'Figura 1: Ejemplo',
        },
        {
          kind: 'paragraph',
          text: 'Figura 1: Ejemplo',
          sourceOrdinal: 3,
          style: 'caption',
        },
      ],
      images: [],
    });

    expect(markdown).toBe(
      [
        '# Título',
        '',
        '### 2.1 Método',
        '',
        'Un párrafo.',
        '',
        '![Figura 1: Ejemplo](paper_images/image_0_0.png)',
        '',
        '*Figura 1: Ejemplo*',
        '',
      ].join('\n'),
    );
  });

  test('returns an empty string for an empty document', () => {
    expect(MarkdownSerializer.serialize({ nodes: [], images: [] })).toBe('');
  });

  test('clamps heading levels to 1..6', () => {
    expect(
      MarkdownSerializer.serializeNode({
        kind: 'heading',
        level: 9,
        text: 'Deep',
        sourceOrdinal: 0,
      }),
    ).toBe('###### Deep');
  });

  test('escapes leading markers, caption asterisks and alt brackets', () => {
    expect(
      MarkdownSerializer.serializeNode({
        kind: 'paragraph',
        text: '# not a heading',
        sourceOrdinal: 0,
        style: 'body',
      }),
    ).toBe('\\# not a heading');
    expect(
      MarkdownSerializer.serializeNode({
        kind: 'paragraph',
        text: 'Table 1: a*b',
        sourceOrdinal: 0,
        style: 'caption',
      }),
    ).toBe('*Table 1: a\\*b*');
    expect(
      MarkdownSerializer.serializeNode({
        kind: 'image',
        imageId: 'x',
        path: 'my images/x.png',
        altText: 'Figure 2: [left] and [right]',
      }),
    ).toBe('![Figure 2: \\[left\\] and \\[right\\]](my%20images/x.png)');
  });

  test('escapes paragraphs that would open a list', () => {
    const body = (text: string) =>
      MarkdownSerializer.serializeNode({
        kind: 'paragraph',
        text,
        sourceOrdinal: 0,
        style: 'body',
      });

    expect(body('1. We first sort the records.')).toBe(
      '1\\. We first sort the records.',
    );
    expect(body('2) Then we merge them.')).toBe('2\\) Then we merge them.');
    expect(body('- a dash')).toBe('\\- a dash');
    expect(body('+ a plus')).toBe('\\+ a plus');
    expect(body('* a star')).toBe('\\* a star');
    expect(body('$$ not math')).toBe('\\$$ not math');
  });

  test('leaves numbers and signs that do not open a list', () => {
    const body = (text: string) =>
      MarkdownSerializer.serializeNode({
        kind: 'paragraph',
        text,
        sourceOrdinal: 0,
        style: 'body',
      });

    expect(body('2017 was a good year.')).toBe('2017 was a good year.');
    expect(body('3.5 times faster.')).toBe('3.5 times faster.');
    expect(body('-1 is the sentinel.')).toBe('-1 is the sentinel.');
  });

  test('renders equations as display blocks', () => {
    expect(
      MarkdownSerializer.serializeNode({
        kind: 'equation',
        latex: '  E = mc^2\n',
        sourceOrdinal: 0,
      }),
    ).toBe('$$\nE = mc^2\n$$');
  });

  test('renders sized images as HTML', () => {
    expect(
      MarkdownSerializer.serializeNode(
        {
          kind: 'image',
          imageId: 'x',
          path: 'img/x.png',
          altText: 'Figure "1" <a>',
        },
        { imageWidth: 480 },
      ),
    ).toBe(
      '<img src="img/x.png" alt="Figure &quot;1&quot; &lt;a&gt;" width="480px">',
    );
  });
});
