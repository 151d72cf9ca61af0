/**
 * Image associated with a caption-like text block
 *
 * @interface CaptionedImageMapping
 */
export interface CaptionedImageMapping {
  kind: 'captioned';
  imageId: string;

  /**
   * Ordinal of the caption TextBlock
   */
  captionOrdinal: number;

  /**
   * Vertical distance from image bottom to caption top, in points
   */
  distance: number;
}

/**
 * Image without a caption in range; kept and rendered at its own position
 *
 * @interface UncaptionedImageMapping
 */
export interface UncaptionedImageMapping {
  kind: 'uncaptioned';
  imageId: string;
}

export type ImageMapping = CaptionedImageMapping | UncaptionedImageMapping;
