/**
 * Image mapper defaults
 */
export const IMAGE_MAPPER = {
  /**
   * Largest gap between an image's bottom edge and its caption's top edge
   */
  MAX_CAPTION_DISTANCE: 72,

  /**
   * Captions may start this far above the image bottom and still count as
   * below it
   */
  OVERLAP_TOLERANCE: 4,

  /**
   * Default caption patterns; matched against the start of the block text
   */
  CAPTION_PATTERNS: [/^(?:Figure|Fig\.)\s*\d+/i, /^Table\s*\d+/i],
} as const;

/**
 * Translator defaults
 */
export const TRANSLATOR = {
  SOURCE_LANGUAGE: 'en',
  TARGET_LANGUAGE: 'es',

  /**
   * Deadline for a single provider call in milliseconds
   */
  TIMEOUT_MS: 30_000,

  /**
   * Roles copied as-is: names and bibliography entries
   */
  UNTRANSLATED_ROLES: ['authors', 'reference'],
} as const;

/**
 * Google Cloud Translation v2 defaults
 */
export const GOOGLE_TRANSLATE = {
  ENDPOINT: 'https://translation.googleapis.com/language/translate/v2',
  FORMAT: 'text',
} as const;

/**
 * Markdown defaults
 */
export const MARKDOWN = {
  /**
   * Alt text prefix for images without a caption ("Image 3")
   */
  IMAGE_ALT_PREFIX: 'Image',
} as const;
