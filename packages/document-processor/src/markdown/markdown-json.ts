import type { MarkdownDocument } from '@papertrans/model';

import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';

import { RenderError } from './render-error';

const BoundingBoxSchema = z.object({
  left: z.number(),
  top: z.number(),
  right: z.number(),
  bottom: z.number(),
});

const MarkdownNodeSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('heading'),
    level: z.number().int().min(1),
    text: z.string(),
    sourceOrdinal: z.number().int(),
  }),
  z.object({
    kind: z.literal('paragraph'),
    text: z.string(),
    sourceOrdinal: z.number().int(),
    style: z.enum(['body', 'caption']),
  }),
  z.object({
    kind: z.literal('image'),
    imageId: z.string(),
    path: z.string(),
    altText: z.string(),
  }),
  z.object({
    kind: z.literal('equation'),
    latex: z.string(),
    sourceOrdinal: z.number().int(),
  }),
]);

const ImageAssetSchema = z.object({
  id: z.string(),
  ordinal: z.number().int(),
  pageIndex: z.number().int(),
  bbox: BoundingBoxSchema,
  format: z.enum(['png', 'jpeg']),
  pixelWidth: z.number().int(),
  pixelHeight: z.number().int(),
  /** Image bytes, base64 encoded */
  data: z.string().base64(),
  fileName: z.string(),
  followsOrdinal: z.number().int().nullable(),
});

export const MarkdownDocumentJsonSchema = z.object({
  version: z.literal(1),
  nodes: z.array(MarkdownNodeSchema),
  images: z.array(ImageAssetSchema),
});

export type MarkdownDocumentJson = z.infer<typeof MarkdownDocumentJsonSchema>;

/**
 * MarkdownJson
 *
 * JSON form of a MarkdownDocument, so a rendered document can be stored and
 * re-serialized later without parsing or translating the PDF again.
 */
export class MarkdownJson {
  static toJson(document: MarkdownDocument): MarkdownDocumentJson {
    return {
      version: 1,
      nodes: document.nodes.map((node) => ({ ...node })),
      images: document.images.map((image) => ({
        ...image,
        bbox: { ...image.bbox },
        data: Buffer.from(image.data).toString('base64'),
      })),
    };
  }

  /**
   * @throws {RenderError} INVALID_INPUT when the value is not a saved document
   */
  static fromJson(value: unknown): MarkdownDocument {
    const result = MarkdownDocumentJsonSchema.safeParse(value);
    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      );
      throw new RenderError(
        'INVALID_INPUT',
        `Invalid Markdown document JSON: ${issues.join('; ')}`,
      );
    }
    return {
      nodes: result.data.nodes,
      images: result.data.images.map((image) => ({
        ...image,
        data: new Uint8Array(Buffer.from(image.data, 'base64')),
      })),
    };
  }

  /**
   * @throws {RenderError} WRITE_FAILED when the file cannot be written
   */
  static async save(document: MarkdownDocument, path: string): Promise<void> {
    const json = JSON.stringify(MarkdownJson.toJson(document), null, 2);
    try {
      await writeFile(path, `${json}\n`, 'utf-8');
    } catch (error) {
      throw RenderError.fromError('WRITE_FAILED', `Failed to write ${path}`, error);
    }
  }

  /**
   * @throws {RenderError} READ_FAILED when the file cannot be read or is not
   * JSON, INVALID_INPUT when it does not hold a saved document
   */
  static async load(path: string): Promise<MarkdownDocument> {
    let value: unknown;
    try {
      value = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw RenderError.fromError('READ_FAILED', `Failed to read ${path}`, error);
    }
    return MarkdownJson.fromJson(value);
  }
}
