import type { LanguageModel } from 'ai';

import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';

import { ConfigurationError } from '../errors/configuration-error';

/**
 * Converts a model ID string to a LanguageModel instance
 *
 * Model ID format: "vendor/model-name"
 * Examples:
 *   - "openai/gpt-4o-mini"
 *   - "anthropic/claude-3-5-haiku-latest"
 *   - "google/gemini-2.0-flash"
 *
 * @throws {ConfigurationError} for an unknown vendor or a missing model name
 */
export function createModel(modelId: string, apiKey: string): LanguageModel {
  const [vendor, ...rest] = modelId.split('/');
  const modelName = rest.join('/');
  if (!modelName) {
    throw new ConfigurationError([`Model id "${modelId}" has no model name`]);
  }

  switch (vendor) {
    case 'openai':
      return createOpenAI({ apiKey })(modelName);
    case 'anthropic':
      return createAnthropic({ apiKey })(modelName);
    case 'google':
      return createGoogleGenerativeAI({ apiKey })(modelName);
    default:
      throw new ConfigurationError([`Unknown model vendor: ${vendor}`]);
  }
}

