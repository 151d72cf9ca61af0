import type { MarkdownDocument, MarkdownNode } from '@papertrans/model';

export interface MarkdownSerializeOptions {
  /**
   * Render images as HTML `<img>` tags with this width in pixels
   */
  imageWidth?: number;
}

/**
 * MarkdownSerializer
 *
 * Turns a MarkdownDocument into CommonMark text: one node per paragraph,
 * separated by blank lines.
 */
export class MarkdownSerializer {
  static serialize(
    document: MarkdownDocument,
    options: MarkdownSerializeOptions = {},
  ): string {
    if (document.nodes.length === 0) {
      return '';
    }
    const parts = document.nodes.map((node) =>
      MarkdownSerializer.serializeNode(node, options),
    );
    return `${parts.join('\n\n')}\n`;
  }

  static serializeNode(
    node: MarkdownNode,
    options: MarkdownSerializeOptions = {},
  ): string {
    switch (node.kind) {
      case 'heading': {
        const level = Math.min(Math.max(node.level, 1), 6);
        return `${'#'.repeat(level)} ${node.text}`;
      }
      case 'paragraph':
        return node.style === 'caption'
          ? `*${node.text.replace(/\*/g, '\\*')}*`
          : escapeLeadingMarker(node.text);
      case 'image':
        return options.imageWidth !== undefined
          ? `<img src="${escapeAttribute(node.path)}" alt="${escapeAttribute(node.altText)}" width="${options.imageWidth}px">`
          : `![${escapeAltText(node.altText)}](${encodePath(node.path)})`;
      case 'equation':
        return `$$\n${node.latex.trim()}\n$$`;
    }
  }
}

/**
 * Keep body paragraphs from opening as a heading, quote, list or equation
 */
function escapeLeadingMarker(text: string): string {
  return text
    .replace(/^([#>]|[-+*](?=\s|$)|\$\$)/, '\\$1')
    .replace(/^(\d{1,9})([.)])(?=\s|$)/, '$1\\$2');
}

function escapeAltText(text: string): string {
  return text.replace(/[\\[\]]/g, '\\$&');
}

function escapeAttribute(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}
