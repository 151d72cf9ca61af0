import type { ImageAsset } from './parsed-document';

export interface HeadingNode {
  kind: 'heading';
  level: number;
  text: string;
  sourceOrdinal: number;
}

export interface ParagraphNode {
  kind: 'paragraph';
  text: string;
  sourceOrdinal: number;

  /**
   * Caption paragraphs are rendered emphasized
   */
  style: 'body' | 'caption';
}

export interface ImageNode {
  kind: 'image';
  imageId: string;

  /**
   * Relative link from the Markdown file to the image file
   */
  path: string;

  altText: string;
}

/**
 * Display equation, rendered as a `$$` block
 */
export interface EquationNode {
  kind: 'equation';

  /**
   * LaTeX source without the surrounding `$$`
   */
  latex: string;

  sourceOrdinal: number;
}

export type MarkdownNode =
  | HeadingNode
  | ParagraphNode
  | ImageNode
  | EquationNode;

/**
 * Rendered document in reading order
 *
 * Built by the generator or read back from Markdown or JSON. `images` holds
 * the assets whose bytes are written next to the Markdown file.
 *
 * @interface MarkdownDocument
 */
export interface MarkdownDocument {
  nodes: MarkdownNode[];
  images: ImageAsset[];
}
