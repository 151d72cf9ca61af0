import type { ImageAsset, ImageMapping } from '@papertrans/model';

/**
 * ImageMap - read-only index from image id to its caption mapping
 *
 * Keeps the images' reading order so lookups return ids in the order the
 * images appear in the document.
 */
export class ImageMap {
  private readonly mappings: ReadonlyMap<string, ImageMapping>;
  private readonly order: readonly Pick<ImageAsset, 'id' | 'followsOrdinal'>[];

  constructor(
    mappings: ImageMapping[],
    images: Pick<ImageAsset, 'id' | 'followsOrdinal'>[],
  ) {
    this.mappings = new Map(
      mappings.map((mapping) => [mapping.imageId, mapping]),
    );
    this.order = images.map(({ id, followsOrdinal }) => ({
      id,
      followsOrdinal,
    }));
  }

  get size(): number {
    return this.mappings.size;
  }

  get(imageId: string): ImageMapping | undefined {
    return this.mappings.get(imageId);
  }

  has(imageId: string): boolean {
    return this.mappings.has(imageId);
  }

  /**
   * Mappings in image reading order
   */
  values(): ImageMapping[] {
    return this.order.flatMap(({ id }) => this.mappings.get(id) ?? []);
  }

  /**
   * Ids of the images whose caption is the block with this ordinal
   */
  imagesForCaption(captionOrdinal: number): string[] {
    return this.values()
      .filter(
        (mapping) =>
          mapping.kind === 'captioned' &&
          mapping.captionOrdinal === captionOrdinal,
      )
      .map((mapping) => mapping.imageId);
  }

  /**
   * Ids of the uncaptioned images placed right after the block with this
   * ordinal; `null` selects the images that precede every block
   */
  uncaptionedAfter(ordinal: number | null): string[] {
    return this.order
      .filter(
        ({ id, followsOrdinal }) =>
          followsOrdinal === ordinal &&
          this.mappings.get(id)?.kind === 'uncaptioned',
      )
      .map(({ id }) => id);
  }
}
