import { DeadlineExceededError } from '@papertrans/shared';
import { describe, expect, test } from 'vitest';

import { TranslationError } from './translation-error';

describe('TranslationError', () => {
  test('keeps code, provider and ordinal', () => {
    const cause = new Error('boom');
    const error = new TranslationError('PROVIDER_REJECTED', 'Rejected', {
      provider: 'google',
      ordinal: 4,
      cause,
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('TranslationError');
    expect(error.code).toBe('PROVIDER_REJECTED');
    expect(error.provider).toBe('google');
    expect(error.ordinal).toBe(4);
    expect(error.cause).toBe(cause);
  });

  describe('classify', () => {
    test('maps known error types to codes', () => {
      const aborted = new Error('The operation was aborted');
      aborted.name = 'AbortError';

      expect(
        TranslationError.classify(new TranslationError('TIMEOUT', 'late')),
      ).toBe('TIMEOUT');
      expect(TranslationError.classify(new DeadlineExceededError(10))).toBe(
        'TIMEOUT',
      );
      expect(TranslationError.classify(aborted)).toBe('ABORTED');
      expect(TranslationError.classify(new TypeError('fetch failed'))).toBe(
        'PROVIDER_UNREACHABLE',
      );
      expect(TranslationError.classify('bad request')).toBe(
        'PROVIDER_REJECTED',
      );
    });
  });

  describe('fromError', () => {
    test('prefixes the context and keeps the cause', () => {
      const cause = new DeadlineExceededError(500);

      const error = TranslationError.fromError('Block 2', cause, {
        provider: 'llm',
        ordinal: 2,
      });

      expect(error.message).toBe('Block 2: Operation timed out after 500ms');
      expect(error.code).toBe('TIMEOUT');
      expect(error.provider).toBe('llm');
      expect(error.ordinal).toBe(2);
      expect(error.cause).toBe(cause);
    });

    test('stringifies non-Error values', () => {
      expect(TranslationError.fromError('Context', 42).message).toBe(
        'Context: 42',
      );
    });
  });
});
