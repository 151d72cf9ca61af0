import type { TranslationProvider } from '@papertrans/document-processor';
import type { PdfExtractor, RawPdf, RawTextItem } from '@papertrans/pdf-parser';

import {
  EchoTranslationProvider,
  MarkdownWriter,
  RenderError,
  Translator,
} from '@papertrans/document-processor';
import { PDFParser } from '@papertrans/pdf-parser';
import { LLMTokenUsageAggregator } from '@papertrans/shared';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, readdir, rename, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { ConversionError } from '../errors/conversion-error';
import { type ConversionState, Converter } from './converter';

vi.mock('node:fs/promises', async (importOriginal) => {
  const original = await importOriginal<typeof import('node:fs/promises')>();
  return { ...original, rename: vi.fn(original.rename) };
});

const makeLogger = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

function item(
  text: string,
  baseline: number,
  fontSize = 10,
  fontName = 'body',
): RawTextItem {
  return {
    text,
    left: 72,
    baseline,
    width: text.length * 5,
    height: fontSize,
    fontSize,
    fontName,
  };
}

const PAPER: RawPdf = {
  pageCount: 2,
  pages: [
    {
      pageIndex: 0,
      width: 612,
      height: 792,
      textItems: [
        item('A Study of Things', 100, 17, 'title'),
        item('1 Introduction', 200, 12, 'bold'),
        item('We study things in detail here.', 220),
        item('Figure 1: Example', 515),
      ],
      images: [
        {
          bbox: { left: 72, top: 300, right: 372, bottom: 500 },
          format: 'png',
          pixelWidth: 600,
          pixelHeight: 400,
          data: new Uint8Array([1, 2, 3]),
        },
      ],
    },
    {
      pageIndex: 1,
      width: 612,
      height: 792,
      textItems: [item('More text on the second page.', 100)],
      images: [
        {
          bbox: { left: 72, top: 150, right: 272, bottom: 350 },
          format: 'jpeg',
          pixelWidth: 200,
          pixelHeight: 200,
          data: new Uint8Array([4, 5]),
        },
      ],
    },
  ],
};

const TRANSLATED_MARKDOWN = [
  '# ES A Study of Things',
  '## ES 1 Introduction',
  'ES We study things in detail here.',
  '![ES Figure 1: Example](paper_images/image_0_0.png)',
  '*ES Figure 1: Example*',
  'ES More text on the second page.',
  '![Image 2](paper_images/image_1_0.jpg)',
].join('\n\n');

function extractorOf(raw: RawPdf): PdfExtractor {
  return { extract: vi.fn(async () => raw) };
}

async function conversionErrorOf(
  conversion: Promise<unknown>,
): Promise<ConversionError> {
  const error = await conversion.catch((e: unknown) => e);
  if (!(error instanceof ConversionError)) {
    throw new Error('Expected the conversion to fail');
  }
  return error;
}

describe('Converter', () => {
  let workDir: string;
  let outputDir: string;
  let logger: ReturnType<typeof makeLogger>;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'converter-test-'));
    outputDir = join(workDir, 'out');
    logger = makeLogger();
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  function createConverter(
    options: {
      provider?: TranslationProvider;
      abortSignal?: AbortSignal;
      onStageChange?: (state: ConversionState) => void;
      includeSourceMarkdown?: boolean;
      usageAggregator?: LLMTokenUsageAggregator;
      writer?: MarkdownWriter;
      raw?: RawPdf;
    } = {},
  ) {
    const provider =
      options.provider ??
      new EchoTranslationProvider({ transform: (text) => `ES ${text}` });
    return new Converter({
      logger,
      parser: new PDFParser({
        logger,
        extractor: extractorOf(options.raw ?? PAPER),
      }),
      translator: new Translator(logger, provider),
      abortSignal: options.abortSignal,
      onStageChange: options.onStageChange,
      includeSourceMarkdown: options.includeSourceMarkdown,
      usageAggregator: options.usageAggregator,
      writer: options.writer,
    });
  }

  describe('convert', () => {
    test('writes translated markdown with captioned figures placed before their caption', async () => {
      const result = await createConverter().convert(
        '/papers/paper.pdf',
        outputDir,
      );

      expect(result.markdownPath).toBe(join(outputDir, 'paper_es.md'));
      expect(await readFile(result.markdownPath, 'utf-8')).toBe(
        `${TRANSLATED_MARKDOWN}\n`,
      );
    });

    test('writes every placed image under the image directory', async () => {
      const result = await createConverter().convert(
        '/papers/paper.pdf',
        outputDir,
      );

      expect(result.imagePaths).toEqual([
        join(outputDir, 'paper_images', 'image_0_0.png'),
        join(outputDir, 'paper_images', 'image_1_0.jpg'),
      ]);
      expect(
        new Uint8Array(await readFile(result.imagePaths[0])),
      ).toEqual(new Uint8Array([1, 2, 3]));
      expect(
        new Uint8Array(await readFile(result.imagePaths[1])),
      ).toEqual(new Uint8Array([4, 5]));
      expect((await readdir(outputDir)).sort()).toEqual([
        'paper_es.md',
        'paper_images',
      ]);
    });

    test('keeps an uncaptioned image after the block that precedes it', async () => {
      const raw: RawPdf = {
        pageCount: 1,
        pages: [
          {
            pageIndex: 0,
            width: 612,
            height: 792,
            textItems: [
              item('Text before the image.', 100),
              item('Text after the image.', 330),
            ],
            images: [
              {
                bbox: { left: 72, top: 150, right: 372, bottom: 300 },
                format: 'png',
                pixelWidth: 300,
                pixelHeight: 150,
                data: new Uint8Array([9]),
              },
            ],
          },
        ],
      };

      const result = await createConverter({ raw }).convert(
        '/papers/notes.pdf',
        outputDir,
      );

      expect(await readFile(result.markdownPath, 'utf-8')).toBe(
        [
          'ES Text before the image.',
          '![Image 1](notes_images/image_0_0.png)',
          'ES Text after the image.',
        ].join('\n\n') + '\n',
      );
    });

    test('reports every stage in order', async () => {
      const onStageChange = vi.fn();

      const result = await createConverter({ onStageChange }).convert(
        '/papers/paper.pdf',
        outputDir,
      );

      const expected: ConversionState[] = [
        'initialized',
        'parsed',
        'images-mapped',
        'translated',
        'rendered',
      ];
      expect(result.stages).toEqual(expected);
      expect(onStageChange.mock.calls.map(([state]) => state)).toEqual(
        expected,
      );
    });

    test('also writes the original-text markdown when requested', async () => {
      const result = await createConverter({
        includeSourceMarkdown: true,
      }).convert('/papers/paper.pdf', outputDir);

      expect(result.sourceMarkdownPath).toBe(join(outputDir, 'paper_en.md'));
      expect(await readFile(join(outputDir, 'paper_en.md'), 'utf-8')).toBe(
        TRANSLATED_MARKDOWN.replaceAll('ES ', '') + '\n',
      );
      expect((await readdir(outputDir)).sort()).toEqual([
        'paper_en.md',
        'paper_es.md',
        'paper_images',
      ]);
    });

    test('replaces the output of an earlier run', async () => {
      await createConverter().convert('/papers/paper.pdf', outputDir);

      const result = await createConverter({
        provider: new EchoTranslationProvider(),
      }).convert('/papers/paper.pdf', outputDir);

      expect(await readFile(result.markdownPath, 'utf-8')).toBe(
        TRANSLATED_MARKDOWN.replaceAll('ES ', '') + '\n',
      );
      expect((await readdir(outputDir)).sort()).toEqual([
        'paper_es.md',
        'paper_images',
      ]);
    });

    test('returns token usage reported during the run', async () => {
      const usageAggregator = new LLMTokenUsageAggregator();
      const provider: TranslationProvider = {
        name: 'metered',
        translate: vi.fn(async (text: string) => {
          usageAggregator.track({
            component: 'LLMTranslationProvider',
            phase: 'translation',
            modelName: 'test-model',
            inputTokens: 10,
            outputTokens: 5,
            totalTokens: 15,
          });
          return text;
        }),
      };

      const result = await createConverter({
        provider,
        usageAggregator,
      }).convert('/papers/paper.pdf', outputDir);

      // One call per distinct block text; the caption doubles as alt text
      expect(provider.translate).toHaveBeenCalledTimes(5);
      expect(result.tokenUsage?.total).toEqual({
        inputTokens: 50,
        outputTokens: 25,
        totalTokens: 75,
      });
      expect(logger.info).toHaveBeenCalledWith(
        '[TokenUsage] Grand total: 50 input, 25 output, 75 total',
      );
    });

    test('omits token usage when nothing was tracked', async () => {
      const usageAggregator = new LLMTokenUsageAggregator();

      const result = await createConverter({ usageAggregator }).convert(
        '/papers/paper.pdf',
        outputDir,
      );

      expect(result.tokenUsage).toBeUndefined();
    });
  });

  describe('failures', () => {
    test('leaves no files behind when the provider fails', async () => {
      const onStageChange = vi.fn();
      const provider: TranslationProvider = {
        name: 'broken',
        translate: vi.fn(async () => {
          throw new Error('quota exceeded');
        }),
      };

      const error = await conversionErrorOf(
        createConverter({ provider, onStageChange }).convert(
          '/papers/paper.pdf',
          outputDir,
        ),
      );

      expect(error.stage).toBe('translate');
      expect(error.kind).toBe('TranslationError');
      expect(error.message).toBe(
        'Conversion failed during translate: Failed to translate block 0 with broken: quota exceeded',
      );
      expect(existsSync(outputDir)).toBe(false);
      expect(onStageChange.mock.calls.map(([state]) => state)).toEqual([
        'initialized',
        'parsed',
        'images-mapped',
      ]);
      expect(logger.error).toHaveBeenCalledWith(
        '[Converter] Conversion failed during translate: Failed to translate block 0 with broken: quota exceeded',
      );
    });

    test('reports parse failures with the parse stage', async () => {
      const converter = new Converter({
        logger,
        parser: new PDFParser({
          logger,
          extractor: extractorOf({ pageCount: 0, pages: [] }),
        }),
        translator: new Translator(logger, new EchoTranslationProvider()),
      });

      const error = await conversionErrorOf(
        converter.convert('/papers/empty.pdf', outputDir),
      );

      expect(error.name).toBe('ConversionError');
      expect(error.stage).toBe('parse');
      expect(error.kind).toBe('ParseError');
      expect(error.message).toBe(
        'Conversion failed during parse: PDF has no pages: /papers/empty.pdf',
      );
      expect(existsSync(outputDir)).toBe(false);
    });

    test('removes the staging directory when writing fails', async () => {
      const writer = new MarkdownWriter(logger);
      vi.spyOn(writer, 'write').mockRejectedValue(
        new RenderError('WRITE_FAILED', 'disk full'),
      );

      const error = await conversionErrorOf(
        createConverter({ writer }).convert('/papers/paper.pdf', outputDir),
      );

      expect(error.stage).toBe('render');
      expect(error.kind).toBe('RenderError');
      expect(error.message).toBe('Conversion failed during render: disk full');
      expect(await readdir(outputDir)).toEqual([]);
    });

    test('keeps the earlier output when moving the new output fails', async () => {
      await createConverter().convert('/papers/paper.pdf', outputDir);
      const actual =
        await vi.importActual<typeof import('node:fs/promises')>(
          'node:fs/promises',
        );
      vi.mocked(rename).mockImplementation(async (from, to) => {
        if (
          String(to) === join(outputDir, 'paper_es.md') &&
          !String(from).includes('.previous')
        ) {
          throw new Error('device busy');
        }
        return actual.rename(from, to);
      });

      const error = await conversionErrorOf(
        createConverter({
          provider: new EchoTranslationProvider(),
        }).convert('/papers/paper.pdf', outputDir),
      );

      expect(error.stage).toBe('render');
      expect(error.kind).toBe('RenderError');
      expect(await readFile(join(outputDir, 'paper_es.md'), 'utf-8')).toBe(
        TRANSLATED_MARKDOWN + '\n',
      );
      expect((await readdir(outputDir)).sort()).toEqual([
        'paper_es.md',
        'paper_images',
      ]);
      expect((await readdir(join(outputDir, 'paper_images'))).sort()).toEqual([
        'image_0_0.png',
        'image_1_0.jpg',
      ]);
    });

    test('does not start when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const extractor = extractorOf(PAPER);
      const converter = new Converter({
        logger,
        parser: new PDFParser({ logger, extractor }),
        translator: new Translator(logger, new EchoTranslationProvider()),
        abortSignal: controller.signal,
      });

      const error = await conversionErrorOf(
        converter.convert('/papers/paper.pdf', outputDir),
      );

      expect(error.stage).toBe('parse');
      expect(error.kind).toBe('AbortError');
      expect(error.message).toBe(
        'Conversion failed during parse: Conversion was aborted',
      );
      expect(extractor.extract).not.toHaveBeenCalled();
    });

    test('stops before the next stage when aborted in between', async () => {
      const controller = new AbortController();
      const onStageChange = vi.fn((state: ConversionState) => {
        if (state === 'parsed') {
          controller.abort();
        }
      });

      const error = await conversionErrorOf(
        createConverter({
          abortSignal: controller.signal,
          onStageChange,
        }).convert('/papers/paper.pdf', outputDir),
      );

      expect(error.stage).toBe('map-images');
      expect(error.kind).toBe('AbortError');
      expect(existsSync(outputDir)).toBe(false);
    });
  });
});
