import type { LoggerMethods } from '@papertrans/logger';
import type {
  BoundingBox,
  ImageAsset,
  ImageMapping,
  TextBlock,
} from '@papertrans/model';

import { orderBy } from 'es-toolkit';

import { IMAGE_MAPPER } from '../config/constants';
import { ImageMap } from './image-map';

export interface ImageMapperOptions {
  /**
   * Patterns marking a block as a caption (default: Figure/Fig./Table + number)
   */
  captionPatterns?: readonly RegExp[];

  /**
   * Largest vertical gap in points between image and caption (default: 72)
   */
  maxCaptionDistance?: number;

  /**
   * How far a caption may start above the image bottom, in points (default: 4)
   */
  overlapTolerance?: number;

  /**
   * Require the caption to overlap the image horizontally (default: true)
   */
  requireHorizontalOverlap?: boolean;
}

interface Candidate {
  ordinal: number;
  distance: number;
}

/**
 * ImageMapper - pairs each image with the caption below it
 *
 * A caption candidate is a block on the same page whose text matches a caption
 * pattern, starting below the image bottom (within the overlap tolerance) and
 * no further than `maxCaptionDistance` from it. The closest candidate wins,
 * then the earliest ordinal. Images without a candidate are kept as
 * uncaptioned.
 *
 * Mapping is pure: the same input always yields an equal ImageMap.
 */
export class ImageMapper {
  private readonly captionPatterns: readonly RegExp[];
  private readonly maxCaptionDistance: number;
  private readonly overlapTolerance: number;
  private readonly requireHorizontalOverlap: boolean;

  constructor(
    private readonly logger: LoggerMethods,
    options: ImageMapperOptions = {},
  ) {
    this.captionPatterns =
      options.captionPatterns ?? IMAGE_MAPPER.CAPTION_PATTERNS;
    this.maxCaptionDistance =
      options.maxCaptionDistance ?? IMAGE_MAPPER.MAX_CAPTION_DISTANCE;
    this.overlapTolerance =
      options.overlapTolerance ?? IMAGE_MAPPER.OVERLAP_TOLERANCE;
    this.requireHorizontalOverlap = options.requireHorizontalOverlap ?? true;
  }

  /**
   * @throws {TypeError} on duplicate image ids, duplicate block ordinals or
   * bounding boxes with non-finite or inverted coordinates
   */
  map(images: ImageAsset[], blocks: TextBlock[]): ImageMap {
    this.validate(images, blocks);

    const captions = blocks.filter((block) => this.isCaption(block.text));
    const mappings = images.map((image) =>
      this.mapImage(image, captions),
    );

    const captioned = mappings.filter((m) => m.kind === 'captioned').length;
    this.logger.debug(
      `[ImageMapper] Mapped ${images.length} images: ${captioned} captioned, ${images.length - captioned} uncaptioned`,
    );

    return new ImageMap(mappings, images);
  }

  private mapImage(image: ImageAsset, captions: TextBlock[]): ImageMapping {
    const candidates: Candidate[] = [];

    for (const caption of captions) {
      if (caption.pageIndex !== image.pageIndex) {
        continue;
      }
      const distance = caption.bbox.top - image.bbox.bottom;
      if (
        distance < -this.overlapTolerance ||
        distance > this.maxCaptionDistance
      ) {
        continue;
      }
      if (
        this.requireHorizontalOverlap &&
        !overlapsHorizontally(image.bbox, caption.bbox)
      ) {
        continue;
      }
      candidates.push({ ordinal: caption.ordinal, distance });
    }

    const [best] = orderBy(
      candidates,
      [(candidate) => Math.abs(candidate.distance), 'ordinal'],
      ['asc', 'asc'],
    );

    if (!best) {
      return { kind: 'uncaptioned', imageId: image.id };
    }
    return {
      kind: 'captioned',
      imageId: image.id,
      captionOrdinal: best.ordinal,
      distance: best.distance,
    };
  }

  private isCaption(text: string): boolean {
    return this.captionPatterns.some((pattern) => pattern.test(text));
  }

  private validate(images: ImageAsset[], blocks: TextBlock[]): void {
    const ids = new Set<string>();
    for (const image of images) {
      if (ids.has(image.id)) {
        throw new TypeError(`Duplicate image id: ${image.id}`);
      }
      ids.add(image.id);
      assertValidBox(image.bbox, `image ${image.id}`);
    }

    const ordinals = new Set<number>();
    for (const block of blocks) {
      if (ordinals.has(block.ordinal)) {
        throw new TypeError(`Duplicate block ordinal: ${block.ordinal}`);
      }
      ordinals.add(block.ordinal);
      assertValidBox(block.bbox, `block ${block.ordinal}`);
    }
  }
}

function overlapsHorizontally(a: BoundingBox, b: BoundingBox): boolean {
  return a.left < b.right && b.left < a.right;
}

function assertValidBox(box: BoundingBox, label: string): void {
  const { left, top, right, bottom } = box;
  if (![left, top, right, bottom].every(Number.isFinite)) {
    throw new TypeError(`Invalid bounding box for ${label}`);
  }
  if (right < left || bottom < top) {
    throw new TypeError(`Inverted bounding box for ${label}`);
  }
}
