/**
 * Configuration constants for PDFParser
 */
export const PDF_PARSER = {
  /**
   * Images smaller than this on either side (in points) are treated as
   * decorations and dropped
   */
  MIN_IMAGE_SIZE: 24,

  /**
   * Standard font size assumed when an extractor reports none
   */
  FALLBACK_FONT_SIZE: 10,
} as const;

/**
 * Configuration constants for LayoutAnalyzer
 */
export const LAYOUT_ANALYZER = {
  /**
   * Items whose baselines differ by less than this ratio of the font size
   * are placed on the same line
   */
  LINE_TOLERANCE_RATIO: 0.5,

  /**
   * Horizontal gap (ratio of font size) above which adjacent items on a line
   * are joined with a space
   */
  WORD_GAP_RATIO: 0.15,

  /**
   * Vertical gap (ratio of font size) above which consecutive lines start a
   * new block
   */
  BLOCK_GAP_RATIO: 0.45,

  /**
   * Maximum font size difference in points for lines of the same block
   */
  FONT_SIZE_TOLERANCE: 0.6,
} as const;

/**
 * Thresholds for detecting text extracted from inside tables and figures
 */
export const FIGURE_TEXT = {
  /**
   * Share of digits among non-whitespace characters above which a block is
   * treated as table content
   */
  MAX_NUMERIC_DENSITY: 0.3,

  /**
   * Blocks with more line breaks than this are treated as table content when
   * their lines are also short
   */
  MAX_LINE_BREAKS: 10,

  /**
   * Average line length below which the line-break rule applies
   */
  SHORT_LINE_LENGTH: 20,

  /**
   * Blocks whose average line length is below this are treated as figure
   * labels
   */
  MIN_AVERAGE_LINE_LENGTH: 5,

  /**
   * Blocks with more consecutive single-word lines than this are treated as
   * figure labels
   */
  MAX_SINGLE_WORD_LINES: 5,

  /**
   * Blocks shorter than this are never treated as figure text by density
   * rules
   */
  MIN_CHECKED_LENGTH: 10,
} as const;
