/**
 * Pipeline stage in which a conversion failed
 */
export type ConversionStage = 'parse' | 'map-images' | 'translate' | 'render';

/**
 * ConversionError
 *
 * Raised by the Converter when a stage fails. The stage error (ParseError,
 * TranslationError, RenderError, ...) is kept as `cause`.
 */
export class ConversionError extends Error {
  constructor(
    public readonly stage: ConversionStage,
    cause: unknown,
  ) {
    super(
      `Conversion failed during ${stage}: ${ConversionError.getErrorMessage(cause)}`,
      { cause },
    );
    this.name = 'ConversionError';
  }

  /**
   * Name of the underlying error (e.g., 'TranslationError')
   */
  get kind(): string {
    return this.cause instanceof Error ? this.cause.name : typeof this.cause;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
