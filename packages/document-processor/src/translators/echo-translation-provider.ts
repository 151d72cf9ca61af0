import type {
  TranslateOptions,
  TranslationProvider,
} from './translation-provider';

export interface EchoTranslationProviderOptions {
  /**
   * Maps the input to the "translation" (default: identity)
   */
  transform?: (text: string, targetLanguage: string) => string;
}

/**
 * Deterministic provider that returns its input, optionally transformed.
 * Makes no network calls.
 */
export class EchoTranslationProvider implements TranslationProvider {
  readonly name = 'echo';

  private readonly transform: (text: string, targetLanguage: string) => string;

  constructor(options: EchoTranslationProviderOptions = {}) {
    this.transform = options.transform ?? ((text) => text);
  }

  async translate(
    text: string,
    targetLanguage: string,
    options: TranslateOptions = {},
  ): Promise<string> {
    options.signal?.throwIfAborted();
    return this.transform(text, targetLanguage);
  }
}
