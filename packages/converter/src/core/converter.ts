import type { LoggerMethods } from '@papertrans/logger';
import type { ParsedDocument, TokenUsageReport } from '@papertrans/model';
import type { LLMTokenUsageAggregator } from '@papertrans/shared';

import type { ConversionStage } from '../errors/conversion-error';

import {
  type ImageMap,
  ImageMapper,
  MarkdownGenerator,
  MarkdownSerializer,
  MarkdownWriter,
  RenderError,
  type Translator,
} from '@papertrans/document-processor';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rename, rm } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';

import { CONVERTER } from '../config/constants';
import { ConversionError } from '../errors/conversion-error';

/**
 * Progress of one conversion; only ever moves forward
 */
export type ConversionState =
  | 'initialized'
  | 'parsed'
  | 'images-mapped'
  | 'translated'
  | 'rendered';

/**
 * Anything that turns a PDF path into a ParsedDocument (PDFParser)
 */
export interface DocumentParser {
  parse(pdfPath: string): Promise<ParsedDocument>;
}

export interface ConverterOptions {
  logger: LoggerMethods;

  parser: DocumentParser;

  translator: Translator;

  /**
   * Default: ImageMapper with default caption rules
   */
  imageMapper?: ImageMapper;

  generator?: MarkdownGenerator;

  writer?: MarkdownWriter;

  /**
   * Render images as `<img>` tags with this width in pixels
   */
  imageWidth?: number;

  /**
   * Also write `<base>_<source>.md` with the original text (default: false)
   */
  includeSourceMarkdown?: boolean;

  /**
   * Checked before every stage; the translation stage also stops its
   * pending provider call
   */
  abortSignal?: AbortSignal;

  /**
   * Called after every state transition
   */
  onStageChange?: (state: ConversionState) => void;

  /**
   * Token usage of LLM-backed providers; reset at the start of each run
   */
  usageAggregator?: LLMTokenUsageAggregator;
}

export interface ConversionResult {
  markdownPath: string;

  /**
   * Present when `includeSourceMarkdown` is set
   */
  sourceMarkdownPath?: string;

  imagePaths: string[];

  /**
   * States visited, in order
   */
  stages: ConversionState[];

  /**
   * Present when an LLM-backed provider reported usage
   */
  tokenUsage?: TokenUsageReport;
}

interface OutputNames {
  base: string;
  imageDir: string;
  markdown: string;
  sourceMarkdown: string;
}

/**
 * Converter - PDF paper to translated Markdown
 *
 * Runs Parser → ImageMapper → Translator → MarkdownGenerator/Writer once per
 * document. Each run keeps its own state, so one instance converts any number
 * of documents one after another.
 *
 * Output is written to a staging directory inside `outputDir` and moved into
 * place only when every file exists. A failed run leaves no files behind and
 * throws a ConversionError naming the stage.
 *
 * @example
 * ```typescript
 * const converter = new Converter({ logger, parser, translator });
 * const result = await converter.convert('paper.pdf', 'out');
 * // out/paper_es.md, out/paper_images/image_0_0.png
 * ```
 */
export class Converter {
  private readonly logger: LoggerMethods;
  private readonly parser: DocumentParser;
  private readonly translator: Translator;
  private readonly imageMapper: ImageMapper;
  private readonly generator: MarkdownGenerator;
  private readonly writer: MarkdownWriter;
  private readonly imageWidth?: number;
  private readonly includeSourceMarkdown: boolean;
  private readonly abortSignal?: AbortSignal;
  private readonly onStageChange?: (state: ConversionState) => void;
  private readonly usageAggregator?: LLMTokenUsageAggregator;

  constructor(options: ConverterOptions) {
    this.logger = options.logger;
    this.parser = options.parser;
    this.translator = options.translator;
    this.imageMapper = options.imageMapper ?? new ImageMapper(options.logger);
    this.generator =
      options.generator ?? new MarkdownGenerator(options.logger);
    this.writer = options.writer ?? new MarkdownWriter(options.logger);
    this.imageWidth = options.imageWidth;
    this.includeSourceMarkdown = options.includeSourceMarkdown ?? false;
    this.abortSignal = options.abortSignal;
    this.onStageChange = options.onStageChange;
    this.usageAggregator = options.usageAggregator;
  }

  /**
   * Convert one PDF.
   *
   * @throws {ConversionError} with the failed stage and the stage error as
   * cause
   */
  async convert(pdfPath: string, outputDir: string): Promise<ConversionResult> {
    const startTime = Date.now();
    const stages: ConversionState[] = ['initialized'];
    const advance = (state: ConversionState) => {
      stages.push(state);
      this.logger.info(`[Converter] Stage: ${state}`);
      this.onStageChange?.(state);
    };

    this.logger.info(`[Converter] Converting ${pdfPath} into ${outputDir}`);
    this.usageAggregator?.reset();
    this.onStageChange?.('initialized');

    const parsed = await this.runStage('parse', () =>
      this.parser.parse(pdfPath),
    );
    advance('parsed');

    const imageMap = await this.runStage('map-images', async () =>
      this.imageMapper.map(parsed.images, parsed.blocks),
    );
    advance('images-mapped');

    const blocks = await this.runStage('translate', () =>
      this.translator.translate(parsed.blocks, this.abortSignal),
    );
    advance('translated');

    const output = await this.runStage('render', () =>
      this.render({ ...parsed, blocks }, imageMap, pdfPath, outputDir),
    );
    advance('rendered');

    let tokenUsage: TokenUsageReport | undefined;
    if (this.usageAggregator?.hasUsage()) {
      this.usageAggregator.logSummary(this.logger);
      tokenUsage = this.usageAggregator.getReport();
    }

    this.logger.info(
      `[Converter] Wrote ${output.markdownPath} in ${Date.now() - startTime}ms`,
    );

    return { ...output, stages, tokenUsage };
  }

  private async runStage<T>(
    stage: ConversionStage,
    task: () => Promise<T>,
  ): Promise<T> {
    try {
      this.checkAborted();
      return await task();
    } catch (error) {
      const conversionError = new ConversionError(stage, error);
      this.logger.error(`[Converter] ${conversionError.message}`);
      throw conversionError;
    }
  }

  /**
   * @throws {Error} with name 'AbortError' if aborted
   */
  private checkAborted(): void {
    if (this.abortSignal?.aborted) {
      const error = new Error('Conversion was aborted');
      error.name = 'AbortError';
      throw error;
    }
  }

  private async render(
    document: ParsedDocument,
    imageMap: ImageMap,
    pdfPath: string,
    outputDir: string,
  ): Promise<Omit<ConversionResult, 'stages' | 'tokenUsage'>> {
    const names = this.outputNames(pdfPath);
    const translatedMarkdown = this.toMarkdown(
      document,
      imageMap,
      names,
      'translated',
    );
    const sourceMarkdown = this.includeSourceMarkdown
      ? this.toMarkdown(document, imageMap, names, 'original')
      : null;

    const staging = await this.createStaging(outputDir);
    try {
      await this.writer.write(
        staging,
        names.markdown,
        translatedMarkdown.text,
        translatedMarkdown.images,
        names.imageDir,
      );
      if (sourceMarkdown !== null) {
        await this.writer.write(
          staging,
          names.sourceMarkdown,
          sourceMarkdown.text,
          [],
          names.imageDir,
        );
      }
      const entries = [
        ...(translatedMarkdown.images.length > 0 ? [names.imageDir] : []),
        ...(sourceMarkdown !== null ? [names.sourceMarkdown] : []),
        names.markdown,
      ];
      await this.publish(staging, outputDir, entries);
    } finally {
      await rm(staging, { recursive: true, force: true });
    }

    return {
      markdownPath: join(outputDir, names.markdown),
      sourceMarkdownPath:
        sourceMarkdown !== null
          ? join(outputDir, names.sourceMarkdown)
          : undefined,
      imagePaths: translatedMarkdown.images.map((image) =>
        join(outputDir, names.imageDir, image.fileName),
      ),
    };
  }

  private toMarkdown(
    document: ParsedDocument,
    imageMap: ImageMap,
    names: OutputNames,
    textSource: 'translated' | 'original',
  ) {
    const markdownDocument = this.generator.generate(
      document.blocks,
      imageMap,
      document.images,
      document.structure,
      { textSource, imageDir: names.imageDir },
    );
    return {
      text: MarkdownSerializer.serialize(markdownDocument, {
        imageWidth: this.imageWidth,
      }),
      images: markdownDocument.images,
    };
  }

  private outputNames(pdfPath: string): OutputNames {
    const base = basename(pdfPath, extname(pdfPath));
    return {
      base,
      imageDir: `${base}${CONVERTER.IMAGE_DIR_SUFFIX}`,
      markdown: `${base}_${this.translator.targetLanguage}.md`,
      sourceMarkdown: `${base}_${this.translator.sourceLanguage}.md`,
    };
  }

  private async createStaging(outputDir: string): Promise<string> {
    try {
      await mkdir(outputDir, { recursive: true });
      return await mkdtemp(join(outputDir, CONVERTER.STAGING_PREFIX));
    } catch (error) {
      throw RenderError.fromError(
        'WRITE_FAILED',
        `Failed to prepare ${outputDir}`,
        error,
      );
    }
  }

  /**
   * Move staged entries into the output directory. Earlier output of the same
   * name is parked inside the staging directory first and moved back if any
   * entry fails to land, so a failed run leaves the previous output in place.
   */
  private async publish(
    staging: string,
    outputDir: string,
    entries: string[],
  ): Promise<void> {
    const backupDir = join(staging, CONVERTER.BACKUP_DIR);
    const backedUp: string[] = [];
    const moved: string[] = [];
    try {
      await mkdir(backupDir);
      for (const entry of entries) {
        const target = join(outputDir, entry);
        if (existsSync(target)) {
          await rename(target, join(backupDir, entry));
          backedUp.push(entry);
        }
        await rename(join(staging, entry), target);
        moved.push(target);
      }
    } catch (error) {
      for (const target of moved) {
        await rm(target, { recursive: true, force: true });
      }
      for (const entry of backedUp) {
        await rename(join(backupDir, entry), join(outputDir, entry));
      }
      throw RenderError.fromError(
        'WRITE_FAILED',
        `Failed to move output into ${outputDir}`,
        error,
      );
    }
  }
}
