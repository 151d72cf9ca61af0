import type { LoggerMethods } from '@papertrans/logger';

import type {
  TranslateOptions,
  TranslationProvider,
} from './translation-provider';

import { z } from 'zod';

import { GOOGLE_TRANSLATE } from '../config/constants';
import { TranslationError } from './translation-error';

export interface GoogleTranslationProviderOptions {
  apiKey: string;

  /**
   * Cloud Translation v2 endpoint (default: translation.googleapis.com)
   */
  endpoint?: string;

  /**
   * Fetch implementation (default: global fetch)
   */
  fetch?: typeof fetch;
}

const TranslateResponseSchema = z.object({
  data: z.object({
    translations: z
      .array(
        z.object({
          translatedText: z.string(),
          detectedSourceLanguage: z.string().optional(),
        }),
      )
      .min(1),
  }),
});

const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string(),
  }),
});

/**
 * Google Cloud Translation (v2 REST) provider
 *
 * Sends one text per request. HTTP 4xx responses are rejections, 5xx and
 * network failures mean the provider is unreachable.
 */
export class GoogleTranslationProvider implements TranslationProvider {
  readonly name = 'google';

  private readonly apiKey: string;
  private readonly endpoint: string;
  private readonly fetch: typeof fetch;

  constructor(
    private readonly logger: LoggerMethods,
    options: GoogleTranslationProviderOptions,
  ) {
    this.apiKey = options.apiKey;
    this.endpoint = options.endpoint ?? GOOGLE_TRANSLATE.ENDPOINT;
    this.fetch = options.fetch ?? globalThis.fetch;
  }

  async translate(
    text: string,
    targetLanguage: string,
    options: TranslateOptions = {},
  ): Promise<string> {
    const url = new URL(this.endpoint);
    url.searchParams.set('key', this.apiKey);

    const response = await this.send(
      url,
      {
        q: [text],
        target: targetLanguage,
        source: options.sourceLanguage,
        format: GOOGLE_TRANSLATE.FORMAT,
      },
      options.signal,
    );

    if (!response.ok) {
      throw new TranslationError(
        response.status >= 500 ? 'PROVIDER_UNREACHABLE' : 'PROVIDER_REJECTED',
        `Google Translate returned ${response.status}: ${await this.readErrorMessage(response)}`,
        { provider: this.name },
      );
    }

    const parsed = TranslateResponseSchema.safeParse(
      await this.readJson(response),
    );
    if (!parsed.success) {
      throw new TranslationError(
        'INVALID_RESPONSE',
        `Unexpected Google Translate response: ${parsed.error.message}`,
        { provider: this.name, cause: parsed.error },
      );
    }

    const [translation] = parsed.data.data.translations;
    this.logger.debug(
      `[GoogleTranslationProvider] Translated ${text.length} characters to ${targetLanguage}`,
    );
    return translation.translatedText;
  }

  private async send(
    url: URL,
    body: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<Response> {
    try {
      return await this.fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      throw new TranslationError(
        'PROVIDER_UNREACHABLE',
        `Google Translate is unreachable: ${TranslationError.getErrorMessage(error)}`,
        { provider: this.name, cause: error },
      );
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new TranslationError(
        'INVALID_RESPONSE',
        'Google Translate response is not JSON',
        { provider: this.name, cause: error },
      );
    }
  }

  private async readErrorMessage(response: Response): Promise<string> {
    const body = await response.text();
    try {
      const parsed = ErrorResponseSchema.safeParse(JSON.parse(body));
      return parsed.success ? parsed.data.error.message : body;
    } catch {
      return body;
    }
  }
}
