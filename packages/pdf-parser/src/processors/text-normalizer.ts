/**
 * Typographic ligatures that PDF fonts emit as single code points
 */
const LIGATURES: Record<string, string> = {
  '\uFB00': 'ff',
  '\uFB01': 'fi',
  '\uFB02': 'fl',
  '\uFB03': 'ffi',
  '\uFB04': 'ffl',
  '\uFB05': 'st',
  '\uFB06': 'st',
};

/**
 * TextNormalizer - cleanup of text extracted from PDF lines
 *
 * - Line joining with removal of end-of-line hyphenation
 * - Ligature expansion
 * - Whitespace normalization
 * - Unicode normalization (NFC)
 */
export class TextNormalizer {
  /**
   * Normalizes text
   * - Expands ligatures (ﬁ → fi)
   * - Converts special whitespace and line breaks to a single space
   * - Trims leading and trailing spaces
   */
  static normalize(text: string): string {
    if (!text) return '';

    let normalized = text.normalize('NFC');

    normalized = normalized.replace(
      /[\uFB00-\uFB06]/g,
      (ligature) => LIGATURES[ligature] ?? ligature,
    );

    // Soft hyphens and zero-width characters carry no text
    normalized = normalized.replace(/[\u00AD\u200B-\u200D\uFEFF]/g, '');

    normalized = normalized.replace(/[\t\u00A0\u2000-\u200A\u202F]/g, ' ');
    normalized = normalized.replace(/\s+/g, ' ');

    return normalized.trim();
  }

  /**
   * Joins the lines of a block into one string.
   *
   * A line ending in a hyphen directly after a letter is joined to the next
   * line without the hyphen when the next line starts with a lowercase
   * letter ("trans-" + "former" → "transformer"); compounds such as
   * "self-" + "Attention" keep their hyphen.
   */
  static joinLines(lines: string[]): string {
    let joined = '';

    for (const raw of lines) {
      const line = raw.trim();
      if (line.length === 0) {
        continue;
      }
      if (joined.length === 0) {
        joined = line;
      } else if (/\p{L}-$/u.test(joined) && /^\p{Ll}/u.test(line)) {
        joined = joined.slice(0, -1) + line;
      } else if (/\p{L}-$/u.test(joined)) {
        joined += line;
      } else {
        joined += ` ${line}`;
      }
    }

    return TextNormalizer.normalize(joined);
  }
}
