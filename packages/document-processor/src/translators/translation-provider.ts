export interface TranslateOptions {
  /**
   * Language of the input text; providers may detect it when absent
   */
  sourceLanguage?: string;

  /**
   * Aborts the request when the deadline passes or the caller cancels
   */
  signal?: AbortSignal;
}

/**
 * Translation backend used by the Translator
 *
 * Implementations throw TranslationError for failures they can classify;
 * any other error is classified by the Translator.
 */
export interface TranslationProvider {
  /**
   * Provider name reported in errors and logs
   */
  readonly name: string;

  /**
   * @param targetLanguage - ISO 639-1 code (e.g., 'es')
   */
  translate(
    text: string,
    targetLanguage: string,
    options?: TranslateOptions,
  ): Promise<string>;
}
