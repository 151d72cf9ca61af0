import { DeadlineExceededError } from '@papertrans/shared';

/**
 * Reason a translation failed
 *
 * - PROVIDER_UNREACHABLE: network failure or provider unavailable
 * - PROVIDER_REJECTED: the provider refused the request (auth, quota, input)
 * - TIMEOUT: the call did not finish before its deadline
 * - INVALID_RESPONSE: malformed or empty response
 * - ABORTED: the caller cancelled the run
 */
export type TranslationErrorCode =
  | 'PROVIDER_UNREACHABLE'
  | 'PROVIDER_REJECTED'
  | 'TIMEOUT'
  | 'INVALID_RESPONSE'
  | 'ABORTED';

export interface TranslationErrorOptions extends ErrorOptions {
  /**
   * Name of the provider that failed
   */
  provider?: string;

  /**
   * Ordinal of the block being translated
   */
  ordinal?: number;
}

/**
 * TranslationError
 *
 * Error thrown when a text block cannot be translated. Translation is all or
 * nothing: no partial result accompanies this error.
 */
export class TranslationError extends Error {
  readonly code: TranslationErrorCode;
  readonly provider?: string;
  readonly ordinal?: number;

  constructor(
    code: TranslationErrorCode,
    message: string,
    options: TranslationErrorOptions = {},
  ) {
    const { provider, ordinal, ...errorOptions } = options;
    super(message, errorOptions);
    this.name = 'TranslationError';
    this.code = code;
    this.provider = provider;
    this.ordinal = ordinal;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Error code for an error a provider did not classify itself
   */
  static classify(error: unknown): TranslationErrorCode {
    if (error instanceof TranslationError) {
      return error.code;
    }
    if (error instanceof DeadlineExceededError) {
      return 'TIMEOUT';
    }
    if (error instanceof Error && error.name === 'AbortError') {
      return 'ABORTED';
    }
    if (error instanceof TypeError) {
      return 'PROVIDER_UNREACHABLE';
    }
    return 'PROVIDER_REJECTED';
  }

  /**
   * Create TranslationError from unknown error with context
   */
  static fromError(
    context: string,
    error: unknown,
    options: Omit<TranslationErrorOptions, 'cause'> = {},
  ): TranslationError {
    return new TranslationError(
      TranslationError.classify(error),
      `${context}: ${TranslationError.getErrorMessage(error)}`,
      { ...options, cause: error },
    );
  }
}
