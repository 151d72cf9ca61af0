import type { LoggerMethods } from '@papertrans/logger';
import type { ImageAsset } from '@papertrans/model';

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { RenderError } from './render-error';

export interface WrittenMarkdown {
  markdownPath: string;
  imagePaths: string[];
}

/**
 * MarkdownWriter - writes the Markdown file and its images
 */
export class MarkdownWriter {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * @param dir - Directory receiving the Markdown file
   * @param fileName - Markdown file name
   * @param imageDir - Image directory relative to `dir` ('' for `dir` itself)
   * @throws {RenderError} WRITE_FAILED on any I/O failure
   */
  async write(
    dir: string,
    fileName: string,
    markdown: string,
    images: ImageAsset[],
    imageDir = '',
  ): Promise<WrittenMarkdown> {
    const imagesPath = join(dir, imageDir);
    const imagePaths: string[] = [];

    try {
      await mkdir(imagesPath, { recursive: true });
      for (const image of images) {
        const imagePath = join(imagesPath, image.fileName);
        await writeFile(imagePath, image.data);
        imagePaths.push(imagePath);
      }
    } catch (error) {
      throw RenderError.fromError(
        'WRITE_FAILED',
        `Failed to write images to ${imagesPath}`,
        error,
      );
    }

    const markdownPath = join(dir, fileName);
    try {
      await writeFile(markdownPath, markdown, 'utf-8');
    } catch (error) {
      throw RenderError.fromError(
        'WRITE_FAILED',
        `Failed to write ${markdownPath}`,
        error,
      );
    }

    this.logger.info(
      `[MarkdownWriter] Wrote ${markdownPath} with ${imagePaths.length} images`,
    );
    return { markdownPath, imagePaths };
  }
}
