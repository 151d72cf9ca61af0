/**
 * Reason rendering failed
 *
 * - MISSING_TRANSLATION: translated text was requested but a block has none
 * - INVALID_INPUT: images and the image map do not agree with the blocks
 * - WRITE_FAILED: the Markdown file or an image could not be written
 * - READ_FAILED: a saved document could not be read
 */
export type RenderErrorCode =
  | 'MISSING_TRANSLATION'
  | 'INVALID_INPUT'
  | 'WRITE_FAILED'
  | 'READ_FAILED';

/**
 * RenderError
 *
 * Error thrown when a MarkdownDocument cannot be built or written.
 */
export class RenderError extends Error {
  constructor(
    public readonly code: RenderErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'RenderError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create RenderError from unknown error with context
   */
  static fromError(
    code: RenderErrorCode,
    context: string,
    error: unknown,
  ): RenderError {
    return new RenderError(
      code,
      `${context}: ${RenderError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
