import type { LogLevel } from '@papertrans/logger';
import type { TemplateName } from '@papertrans/pdf-parser';

import { TRANSLATOR } from '@papertrans/document-processor';
import { z } from 'zod';

import { ConfigurationError } from '../errors/configuration-error';

export type TranslationProviderName = 'google' | 'llm' | 'echo';

export type LlmVendor = 'openai' | 'anthropic' | 'google';

/**
 * Settings needed to build a Converter
 */
export interface ConverterConfig {
  provider: TranslationProviderName;
  sourceLanguage: string;
  targetLanguage: string;
  timeoutMs: number;
  template: TemplateName;
  logLevel: LogLevel | 'silent';
  imageWidth?: number;
  includeSourceMarkdown: boolean;

  /**
   * Set when `provider` is 'google'
   */
  google?: {
    apiKey: string;
    endpoint?: string;
  };

  /**
   * Set when `provider` is 'llm'
   */
  llm?: {
    /**
     * "vendor/model-name", e.g. "openai/gpt-4o-mini"
     */
    modelId: string;
    vendor: LlmVendor;
    apiKey: string;
  };
}

const LLM_KEY_VARIABLES = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GOOGLE_GENERATIVE_AI_API_KEY',
} as const;

const LanguageCodeSchema = z
  .string()
  .regex(/^[a-z]{2,3}(?:-[A-Za-z]{2,4})?$/, 'Expected a language code such as "es"');

export const ConverterEnvSchema = z
  .object({
    PAPERTRANS_PROVIDER: z.enum(['google', 'llm', 'echo']).default('google'),
    PAPERTRANS_SOURCE_LANG: LanguageCodeSchema.default(
      TRANSLATOR.SOURCE_LANGUAGE,
    ),
    PAPERTRANS_TARGET_LANG: LanguageCodeSchema.default(
      TRANSLATOR.TARGET_LANGUAGE,
    ),
    PAPERTRANS_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .positive()
      .default(TRANSLATOR.TIMEOUT_MS),
    PAPERTRANS_TEMPLATE: z.enum(['neurips', 'two-column']).default('neurips'),
    PAPERTRANS_LOG_LEVEL: z
      .enum(['debug', 'info', 'warn', 'error', 'silent'])
      .default('info'),
    PAPERTRANS_IMAGE_WIDTH: z.coerce.number().int().positive().optional(),
    PAPERTRANS_INCLUDE_SOURCE: z
      .enum(['true', 'false'])
      .default('false')
      .transform((value) => value === 'true'),
    GOOGLE_TRANSLATE_API_KEY: z.string().optional(),
    GOOGLE_TRANSLATE_ENDPOINT: z.string().url().optional(),
    PAPERTRANS_LLM_MODEL: z
      .string()
      .regex(
        /^(openai|anthropic|google)\/.+$/,
        'Expected "openai/<model>", "anthropic/<model>" or "google/<model>"',
      )
      .optional(),
    OPENAI_API_KEY: z.string().optional(),
    ANTHROPIC_API_KEY: z.string().optional(),
    GOOGLE_GENERATIVE_AI_API_KEY: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.PAPERTRANS_PROVIDER === 'google' && !env.GOOGLE_TRANSLATE_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GOOGLE_TRANSLATE_API_KEY'],
        message: 'Required when PAPERTRANS_PROVIDER is google',
      });
    }
    if (env.PAPERTRANS_PROVIDER !== 'llm') {
      return;
    }
    if (!env.PAPERTRANS_LLM_MODEL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PAPERTRANS_LLM_MODEL'],
        message: 'Required when PAPERTRANS_PROVIDER is llm',
      });
      return;
    }
    const keyVariable = LLM_KEY_VARIABLES[vendorOf(env.PAPERTRANS_LLM_MODEL)];
    if (!env[keyVariable]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [keyVariable],
        message: `Required for ${env.PAPERTRANS_LLM_MODEL}`,
      });
    }
  });

function vendorOf(modelId: string): LlmVendor {
  const [vendor] = modelId.split('/');
  switch (vendor) {
    case 'anthropic':
      return 'anthropic';
    case 'google':
      return 'google';
    default:
      return 'openai';
  }
}

/**
 * Read the converter configuration from environment variables.
 *
 * Empty variables count as unset.
 *
 * @throws {ConfigurationError} listing every invalid or missing variable
 */
export function loadConverterConfig(
  env: Record<string, string | undefined> = process.env,
): ConverterConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const result = ConverterEnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    );
  }

  const parsed = result.data;
  const config: ConverterConfig = {
    provider: parsed.PAPERTRANS_PROVIDER,
    sourceLanguage: parsed.PAPERTRANS_SOURCE_LANG,
    targetLanguage: parsed.PAPERTRANS_TARGET_LANG,
    timeoutMs: parsed.PAPERTRANS_TIMEOUT_MS,
    template: parsed.PAPERTRANS_TEMPLATE,
    logLevel: parsed.PAPERTRANS_LOG_LEVEL,
    imageWidth: parsed.PAPERTRANS_IMAGE_WIDTH,
    includeSourceMarkdown: parsed.PAPERTRANS_INCLUDE_SOURCE,
  };

  if (parsed.PAPERTRANS_PROVIDER === 'google' && parsed.GOOGLE_TRANSLATE_API_KEY) {
    config.google = {
      apiKey: parsed.GOOGLE_TRANSLATE_API_KEY,
      endpoint: parsed.GOOGLE_TRANSLATE_ENDPOINT,
    };
  }

  if (parsed.PAPERTRANS_PROVIDER === 'llm' && parsed.PAPERTRANS_LLM_MODEL) {
    const vendor = vendorOf(parsed.PAPERTRANS_LLM_MODEL);
    config.llm = {
      modelId: parsed.PAPERTRANS_LLM_MODEL,
      vendor,
      apiKey: parsed[LLM_KEY_VARIABLES[vendor]] ?? '',
    };
  }

  return config;
}
