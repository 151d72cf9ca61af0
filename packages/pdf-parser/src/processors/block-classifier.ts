import type { LoggerMethods } from '@papertrans/logger';
import type { SectionInfo, TextBlockRole } from '@papertrans/model';

import type { TemplateRules } from '../config/templates';
import type { LayoutBlock } from './layout-analyzer';

import { groupBy } from 'es-toolkit';

import { LAYOUT_ANALYZER } from '../config/constants';
import {
  isValidSectionTransition,
  parseSectionNumber,
} from '../utils/section-number';

export interface BlockClassification {
  role: TextBlockRole;
  headingLevel?: number;
  sectionNumber?: string;
}

export interface ClassificationResult {
  /** One entry per input block, same order */
  blocks: BlockClassification[];
  title: string | null;
  /** Sections with `ordinal` set to the index of the heading block */
  sections: SectionInfo[];
  templateMatched: boolean;
}

interface BodyStyle {
  fontSize: number;
  fontName: string;
}

/**
 * BlockClassifier - assigns template roles to blocks in reading order
 *
 * Rules:
 * - title: largest font in the top region of the first page, clearly larger
 *   than body text
 * - authors: first-page blocks between the title and the first heading
 * - caption: matches one of the template caption patterns
 * - heading: short block set apart from body text by size or font, either a
 *   numbered heading whose number follows the previous one, or a known
 *   unnumbered heading
 * - reference: blocks after a references heading, until the next heading
 * - paragraph: everything else
 *
 * When neither a title nor a heading is found the template did not match and
 * every block becomes a paragraph.
 */
export class BlockClassifier {
  private readonly unnumbered: Set<string>;
  private readonly references: Set<string>;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly template: TemplateRules,
  ) {
    this.unnumbered = new Set(
      template.unnumberedHeadings.map((heading) => heading.toLowerCase()),
    );
    this.references = new Set(
      template.referenceHeadings.map((heading) => heading.toLowerCase()),
    );
  }

  /**
   * @param blocks - Text blocks of the whole document in reading order
   * @param firstPageHeight - Height of page 0 in points
   */
  classify(blocks: LayoutBlock[], firstPageHeight: number): ClassificationResult {
    const body = this.detectBodyStyle(blocks);
    const titleIndex = this.findTitle(blocks, body, firstPageHeight);

    const result: BlockClassification[] = [];
    const sections: SectionInfo[] = [];
    let lastNumber: string | null = null;
    let seenHeading = false;
    let inReferences = false;

    for (const [index, block] of blocks.entries()) {
      if (index === titleIndex) {
        result.push({ role: 'title', headingLevel: 1 });
        continue;
      }

      if (this.isCaption(block.text)) {
        result.push({ role: 'caption' });
        continue;
      }

      const inAuthors =
        titleIndex !== null &&
        index > titleIndex &&
        !seenHeading &&
        block.pageIndex === 0;

      const heading = this.matchHeading(block, body, lastNumber, inAuthors);
      if (heading) {
        result.push({
          role: 'heading',
          headingLevel: heading.level,
          sectionNumber: heading.number ?? undefined,
        });
        sections.push({ ordinal: index, ...heading });
        if (heading.number !== null) {
          lastNumber = heading.number;
        }
        seenHeading = true;
        inReferences = this.references.has(heading.title.toLowerCase());
        continue;
      }

      if (inAuthors) {
        result.push({ role: 'authors' });
        continue;
      }

      result.push({ role: inReferences ? 'reference' : 'paragraph' });
    }

    const title = titleIndex !== null ? blocks[titleIndex].text : null;
    const templateMatched = title !== null || sections.length > 0;

    this.logger.info(
      `[BlockClassifier] Title ${title !== null ? 'found' : 'not found'}, ${sections.length} headings in ${blocks.length} blocks`,
    );

    if (!templateMatched) {
      return {
        blocks: blocks.map(
          (): BlockClassification => ({ role: 'paragraph' }),
        ),
        title: null,
        sections: [],
        templateMatched,
      };
    }

    return { blocks: result, title, sections, templateMatched };
  }

  /**
   * Body text style: the font size and font carrying the most characters
   */
  private detectBodyStyle(blocks: LayoutBlock[]): BodyStyle {
    const lines = blocks.flatMap((block) => block.lines);
    if (lines.length === 0) {
      return { fontSize: 0, fontName: '' };
    }

    const bySize = groupBy(lines, (line) => String(roundToHalf(line.fontSize)));
    const fontSize = Number(heaviest(bySize));
    const byFont = groupBy(
      lines.filter((line) => roundToHalf(line.fontSize) === fontSize),
      (line) => line.fontName,
    );

    return { fontSize, fontName: heaviest(byFont) };
  }

  private findTitle(
    blocks: LayoutBlock[],
    body: BodyStyle,
    firstPageHeight: number,
  ): number | null {
    const limit = firstPageHeight * this.template.titleRegion;
    let best: number | null = null;

    for (const [index, block] of blocks.entries()) {
      if (
        block.pageIndex !== 0 ||
        block.bbox.top > limit ||
        block.fontSize < body.fontSize * this.template.titleMinFontRatio
      ) {
        continue;
      }
      if (best === null || block.fontSize > blocks[best].fontSize) {
        best = index;
      }
    }

    return best;
  }

  private isCaption(text: string): boolean {
    return this.template.captionPatterns.some((pattern) => pattern.test(text));
  }

  private matchHeading(
    block: LayoutBlock,
    body: BodyStyle,
    lastNumber: string | null,
    inAuthors: boolean,
  ): Omit<SectionInfo, 'ordinal'> | null {
    const text = block.text;
    if (
      text.length > this.template.headingMaxLength ||
      block.lines.length > this.template.headingMaxLines
    ) {
      return null;
    }

    const tolerance = LAYOUT_ANALYZER.FONT_SIZE_TOLERANCE;
    const larger = block.fontSize > body.fontSize + tolerance;
    const setApart = larger || block.fontName !== body.fontName;
    if (!setApart) {
      return null;
    }

    const numbered = this.template.numberedHeadingPattern.exec(text);
    if (numbered) {
      const [, number, title] = numbered;
      // Affiliation markers ("1 Some University") share the numbered shape.
      // Below the title a numbered heading must be set in a larger font,
      // and nowhere may it be smaller than body text.
      if (
        block.fontSize < body.fontSize - tolerance ||
        (inAuthors && !larger)
      ) {
        return null;
      }
      if (!isValidSectionTransition(lastNumber, number)) {
        this.logger.debug(
          `[BlockClassifier] Rejected heading "${text}" after section ${lastNumber ?? 'none'}`,
        );
        return null;
      }
      return {
        number,
        title,
        level: parseSectionNumber(number).length + 1,
      };
    }

    const bare = text.replace(/[.:]+$/, '').trim();
    if (this.unnumbered.has(bare.toLowerCase())) {
      return { number: null, title: bare, level: 2 };
    }

    return null;
  }
}

/**
 * Key of the group with the most characters of text
 */
function heaviest(groups: Record<string, { text: string }[]>): string {
  let bestKey = '';
  let bestWeight = -1;
  for (const [key, members] of Object.entries(groups)) {
    const weight = members.reduce((sum, member) => sum + member.text.length, 0);
    if (weight > bestWeight) {
      bestKey = key;
      bestWeight = weight;
    }
  }
  return bestKey;
}

function roundToHalf(value: number): number {
  return Math.round(value * 2) / 2;
}
