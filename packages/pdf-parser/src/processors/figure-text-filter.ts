import { FIGURE_TEXT } from '../config/constants';

/**
 * Decide whether a block of extracted text is debris from inside a table or
 * figure (axis labels, tick values, cell contents) rather than prose.
 *
 * Lines of the block are separated by `\n`.
 */
export function isLikelyTableOrFigure(text: string): boolean {
  const totalChars = text.length;
  if (totalChars === 0) {
    return false;
  }

  const digits = text.replace(/\D/g, '').length;
  if (
    totalChars >= FIGURE_TEXT.MIN_CHECKED_LENGTH &&
    digits / totalChars > FIGURE_TEXT.MAX_NUMERIC_DENSITY
  ) {
    return true;
  }

  const lines = text.split('\n');
  const averageLineLength = totalChars / lines.length;

  if (
    lines.length - 1 > FIGURE_TEXT.MAX_LINE_BREAKS &&
    averageLineLength < FIGURE_TEXT.SHORT_LINE_LENGTH
  ) {
    return true;
  }

  if (
    totalChars > FIGURE_TEXT.MIN_CHECKED_LENGTH &&
    averageLineLength < FIGURE_TEXT.MIN_AVERAGE_LINE_LENGTH
  ) {
    return true;
  }

  let singleWordLines = 0;
  for (const line of lines) {
    const words = line.split(/\s+/).filter((word) => word.length > 0);
    singleWordLines = words.length <= 1 ? singleWordLines + 1 : 0;
    if (singleWordLines > FIGURE_TEXT.MAX_SINGLE_WORD_LINES) {
      return true;
    }
  }

  return false;
}
