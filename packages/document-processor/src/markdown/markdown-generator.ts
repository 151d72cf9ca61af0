import type { LoggerMethods } from '@papertrans/logger';
import type {
  DocumentStructure,
  ImageAsset,
  MarkdownDocument,
  MarkdownNode,
  TextBlock,
} from '@papertrans/model';

import type { ImageMap } from '../mappers/image-map';

import { orderBy } from 'es-toolkit';

import { MARKDOWN } from '../config/constants';
import { RenderError } from './render-error';

export type TextSource = 'translated' | 'original';

export interface MarkdownGeneratorOptions {
  /**
   * Which text of each block to render (default: 'translated')
   */
  textSource?: TextSource;

  /**
   * Directory of the image files relative to the Markdown file
   * (default: images sit beside the Markdown file)
   */
  imageDir?: string;
}

/**
 * MarkdownGenerator - lays out blocks and images in reading order
 *
 * Order of nodes:
 * 1. uncaptioned images that precede every block
 * 2. per block, by ordinal: the images captioned by it, the block itself,
 *    then the uncaptioned images that follow it
 *
 * A captioned figure therefore sits right after the paragraph before its
 * caption, and uncaptioned images keep their position.
 */
export class MarkdownGenerator {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * @throws {RenderError} MISSING_TRANSLATION when translated text is
   * requested and a block has none; INVALID_INPUT when an image is missing
   * from the map or points at an unknown block
   */
  generate(
    blocks: TextBlock[],
    imageMap: ImageMap,
    images: ImageAsset[],
    structure: DocumentStructure,
    options: MarkdownGeneratorOptions = {},
  ): MarkdownDocument {
    const { textSource = 'translated', imageDir = '' } = options;
    const ordered = orderBy(blocks, ['ordinal'], ['asc']);
    const byOrdinal = new Map(ordered.map((block) => [block.ordinal, block]));
    const byId = new Map(images.map((image) => [image.id, image]));

    this.validate(images, imageMap, byOrdinal);

    const textOf = (block: TextBlock): string => {
      if (textSource === 'original') {
        return block.text;
      }
      if (block.translatedText === null) {
        throw new RenderError(
          'MISSING_TRANSLATION',
          `Block ${block.ordinal} has no translated text`,
        );
      }
      return block.translatedText;
    };

    const sectionLevels = new Map(
      structure.sections.map((section) => [section.ordinal, section.level]),
    );
    const nodes: MarkdownNode[] = [];
    const placed: ImageAsset[] = [];

    const pushImages = (ids: string[], altText?: string) => {
      for (const id of ids) {
        const image = byId.get(id);
        if (!image) {
          continue;
        }
        nodes.push({
          kind: 'image',
          imageId: image.id,
          path: imageDir ? `${imageDir}/${image.fileName}` : image.fileName,
          altText: altText ?? `${MARKDOWN.IMAGE_ALT_PREFIX} ${image.ordinal + 1}`,
        });
        placed.push(image);
      }
    };

    pushImages(imageMap.uncaptionedAfter(null));

    for (const block of ordered) {
      const text = textOf(block);
      pushImages(imageMap.imagesForCaption(block.ordinal), text);

      switch (block.role) {
        case 'title':
          nodes.push({
            kind: 'heading',
            level: 1,
            text,
            sourceOrdinal: block.ordinal,
          });
          break;
        case 'heading':
          nodes.push({
            kind: 'heading',
            level:
              block.headingLevel ?? sectionLevels.get(block.ordinal) ?? 2,
            text,
            sourceOrdinal: block.ordinal,
          });
          break;
        default:
          nodes.push({
            kind: 'paragraph',
            text,
            sourceOrdinal: block.ordinal,
            style: block.role === 'caption' ? 'caption' : 'body',
          });
      }

      pushImages(imageMap.uncaptionedAfter(block.ordinal));
    }

    this.logger.debug(
      `[MarkdownGenerator] Generated ${nodes.length} nodes (${placed.length} images) from ${textSource} text`,
    );

    return { nodes, images: placed };
  }

  private validate(
    images: ImageAsset[],
    imageMap: ImageMap,
    byOrdinal: Map<number, TextBlock>,
  ): void {
    for (const image of images) {
      const mapping = imageMap.get(image.id);
      if (!mapping) {
        throw new RenderError(
          'INVALID_INPUT',
          `Image ${image.id} is missing from the image map`,
        );
      }
      const anchor =
        mapping.kind === 'captioned'
          ? mapping.captionOrdinal
          : image.followsOrdinal;
      if (anchor !== null && !byOrdinal.has(anchor)) {
        throw new RenderError(
          'INVALID_INPUT',
          `Image ${image.id} refers to unknown block ${anchor}`,
        );
      }
    }
  }
}
