/**
 * Layout and classification rules for one family of paper layouts.
 *
 * Margins and distances are in PDF points, measured from the top-left corner
 * of the page.
 */
export interface TemplateRules {
  /** Template identifier, reported in DocumentStructure.templateName */
  name: string;

  /** Number of text columns in the body */
  columnCount: 1 | 2;

  /** Text entirely inside this band at the top of a page is a running header */
  headerMargin: number;

  /** Text starting inside this band at the bottom of a page is a footer */
  footerMargin: number;

  /** Fraction of the first page's height in which the title may appear */
  titleRegion: number;

  /** Minimum ratio of the title font size to the body font size */
  titleMinFontRatio: number;

  /** Headings longer than this are treated as body text */
  headingMaxLength: number;

  /** Headings spanning more lines than this are treated as body text */
  headingMaxLines: number;

  /** Matches a numbered heading; group 1 is the number, group 2 the title */
  numberedHeadingPattern: RegExp;

  /** Section titles recognised without a number (case-insensitive) */
  unnumberedHeadings: readonly string[];

  /** Unnumbered headings after which blocks are bibliography entries */
  referenceHeadings: readonly string[];

  /** A block whose text matches one of these is a figure or table caption */
  captionPatterns: readonly RegExp[];
}

export type TemplateName = 'neurips' | 'two-column';

const CAPTION_PATTERNS: readonly RegExp[] = [
  /^(?:Figure|Fig\.)\s*\d+/i,
  /^Table\s*\d+/i,
];

const UNNUMBERED_HEADINGS: readonly string[] = [
  'Abstract',
  'References',
  'Bibliography',
  'Acknowledgments',
  'Acknowledgements',
  'Acknowledgments and Disclosure of Funding',
  'Broader Impact',
  'Broader Impacts',
  'Appendix',
  'Supplementary Material',
  'NeurIPS Paper Checklist',
];

/**
 * Single-column NeurIPS conference layout (US Letter, 5.5in text width)
 */
export const NEURIPS_TEMPLATE: TemplateRules = {
  name: 'neurips',
  columnCount: 1,
  headerMargin: 50,
  footerMargin: 60,
  titleRegion: 0.35,
  titleMinFontRatio: 1.3,
  headingMaxLength: 120,
  headingMaxLines: 2,
  numberedHeadingPattern: /^(\d+(?:\.\d+)*)\.?\s+(\p{Lu}.*)$/u,
  unnumberedHeadings: UNNUMBERED_HEADINGS,
  referenceHeadings: ['References', 'Bibliography'],
  captionPatterns: CAPTION_PATTERNS,
};

/**
 * Two-column conference layout (ICML, CVPR and similar)
 */
export const TWO_COLUMN_TEMPLATE: TemplateRules = {
  ...NEURIPS_TEMPLATE,
  name: 'two-column',
  columnCount: 2,
  headerMargin: 40,
  footerMargin: 50,
  titleRegion: 0.3,
};

const TEMPLATES: Record<TemplateName, TemplateRules> = {
  neurips: NEURIPS_TEMPLATE,
  'two-column': TWO_COLUMN_TEMPLATE,
};

/**
 * Resolve a template by name, or pass a custom template through
 */
export function resolveTemplate(
  template: TemplateName | TemplateRules = 'neurips',
): TemplateRules {
  return typeof template === 'string' ? TEMPLATES[template] : template;
}
