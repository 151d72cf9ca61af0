/**
 * Reason a PDF could not be parsed
 *
 * - FILE_NOT_FOUND: the path does not exist or cannot be read
 * - INVALID_PDF: the file is not a PDF or is corrupted
 * - ENCRYPTED: the PDF requires a password
 * - EMPTY_DOCUMENT: the PDF has no pages
 * - EXTRACTION_FAILED: the extractor failed for any other reason
 */
export type ParseErrorCode =
  | 'FILE_NOT_FOUND'
  | 'INVALID_PDF'
  | 'ENCRYPTED'
  | 'EMPTY_DOCUMENT'
  | 'EXTRACTION_FAILED';

/**
 * ParseError
 *
 * Error thrown when a PDF cannot be turned into a ParsedDocument.
 */
export class ParseError extends Error {
  constructor(
    public readonly code: ParseErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ParseError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create ParseError from unknown error with context
   */
  static fromError(
    code: ParseErrorCode,
    context: string,
    error: unknown,
  ): ParseError {
    return new ParseError(
      code,
      `${context}: ${ParseError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
