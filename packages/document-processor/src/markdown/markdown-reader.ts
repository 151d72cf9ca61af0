import type {
  ImageNode,
  MarkdownDocument,
  MarkdownNode,
} from '@papertrans/model';
import type { Token } from 'marked';

import { Lexer } from 'marked';
import { basename, extname } from 'node:path';

import { RenderError } from './render-error';

const IMAGE_TAG_PATTERN = /^<img src="([^"]*)" alt="([^"]*)"(?: width="\d+px")?>$/;

/**
 * MarkdownReader
 *
 * Reads Markdown written by MarkdownSerializer back into a MarkdownDocument.
 * `$$` lines fence an equation, which may contain blank lines; everything
 * between equations goes through the marked lexer. Nodes are numbered in
 * reading order and `images` is left empty since the Markdown carries only
 * links.
 */
export class MarkdownReader {
  /**
   * @throws {RenderError} INVALID_INPUT when an equation block is not closed
   */
  static read(markdown: string): MarkdownDocument {
    const lines = markdown.split(/\r?\n/);
    const nodes: MarkdownNode[] = [];
    let chunk: string[] = [];

    const flush = () => {
      for (const token of Lexer.lex(chunk.join('\n'))) {
        const node = readToken(token, nodes.length);
        if (node) {
          nodes.push(node);
        }
      }
      chunk = [];
    };

    for (let index = 0; index < lines.length; index++) {
      const line = lines[index];
      const startsBlock =
        chunk.length === 0 || chunk[chunk.length - 1].trim() === '';
      if (!startsBlock || line.trim() !== '$$') {
        chunk.push(line);
        continue;
      }

      const close = lines.findIndex(
        (candidate, at) => at > index && candidate.trim() === '$$',
      );
      if (close === -1) {
        throw new RenderError(
          'INVALID_INPUT',
          `Equation opened on line ${index + 1} is never closed`,
        );
      }
      flush();
      nodes.push({
        kind: 'equation',
        latex: lines.slice(index + 1, close).join('\n').trim(),
        sourceOrdinal: nodes.length,
      });
      index = close;
    }
    flush();

    return { nodes, images: [] };
  }
}

function readToken(token: Token, ordinal: number): MarkdownNode | null {
  switch (token.type) {
    case 'space':
      return null;
    case 'heading':
      return {
        kind: 'heading',
        level: token.depth,
        text: token.text,
        sourceOrdinal: ordinal,
      };
    case 'html':
      return readParagraph(token.text.trim(), [], ordinal);
    case 'paragraph':
      return readParagraph(token.text, token.tokens ?? [], ordinal);
    default:
      return body(token.raw.trim(), ordinal);
  }
}

function readParagraph(
  text: string,
  inline: Token[],
  ordinal: number,
): MarkdownNode {
  const tag = IMAGE_TAG_PATTERN.exec(text);
  if (tag) {
    return imageNode(unescapeAttribute(tag[1]), unescapeAttribute(tag[2]));
  }

  if (text.length > 4 && text.startsWith('$$') && text.endsWith('$$')) {
    return {
      kind: 'equation',
      latex: text.slice(2, -2).trim(),
      sourceOrdinal: ordinal,
    };
  }

  if (inline.length === 1) {
    const [only] = inline;
    if (only.type === 'image') {
      return imageNode(decodePath(only.href), only.text);
    }
    if (only.type === 'em' && text.startsWith('*')) {
      return {
        kind: 'paragraph',
        text: only.text.replace(/\\\*/g, '*'),
        sourceOrdinal: ordinal,
        style: 'caption',
      };
    }
  }

  return body(text, ordinal);
}

/**
 * Body paragraph with the serializer's leading escape undone
 */
function body(text: string, ordinal: number): MarkdownNode {
  return {
    kind: 'paragraph',
    text: text
      .replace(/^\\([#>\-+*]|\$\$)/, '$1')
      .replace(/^(\d{1,9})\\([.)])/, '$1$2'),
    sourceOrdinal: ordinal,
    style: 'body',
  };
}

function imageNode(path: string, altText: string): ImageNode {
  return {
    kind: 'image',
    imageId: basename(path, extname(path)),
    path,
    altText,
  };
}

function decodePath(path: string): string {
  return path
    .split('/')
    .map((part) => {
      try {
        return decodeURIComponent(part);
      } catch (error) {
        if (error instanceof URIError) {
          return part;
        }
        throw error;
      }
    })
    .join('/');
}

function unescapeAttribute(text: string): string {
  return text
    .replace(/&quot;/g, '"')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&amp;/g, '&');
}
