/**
 * __tests__/errors.test.ts
 *
 * Unit tests for the error taxonomy (app/lib/engine/errors.ts).
 */

import { describe, it, expect } from 'vitest';
import {
  ModelInvocationError,
  RecommendationError,
  describeFailure,
  isRecommendationError,
  type FailureKind,
} from '../app/lib/engine/errors';

describe('RecommendationError', () => {
  it('carries kind, cause and parse failure', () => {
    const cause = new Error('root');
    const err = new RecommendationError('UnparsableResponse', 'bad reply', {
      cause,
      parseFailure: 'MalformedOutput',
    });

    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('RecommendationError');
    expect(err.kind).toBe('UnparsableResponse');
    expect(err.parseFailure).toBe('MalformedOutput');
    expect(err.cause).toBe(cause);
    expect(isRecommendationError(err)).toBe(true);
    expect(isRecommendationError(cause)).toBe(false);
  });
});

describe('ModelInvocationError', () => {
  it('is transient unless told otherwise', () => {
    expect(new ModelInvocationError('Timeout', 'slow').transient).toBe(true);
    expect(new ModelInvocationError('ProviderError', 'bad request', { transient: false }).transient).toBe(false);
  });

  it('never marks an auth failure transient', () => {
    expect(new ModelInvocationError('AuthError', 'denied', { transient: true }).transient).toBe(false);
  });
});

describe('describeFailure()', () => {
  it.each<[FailureKind, boolean]>([
    ['InvalidInput', false],
    ['PromptTooLarge', false],
    ['Unauthorized', false],
    ['ModelUnavailable', true],
    ['UnparsableResponse', true],
    ['Cancelled', true],
  ])('marks %s retryable=%s', (kind, retryable) => {
    const description = describeFailure(kind);
    expect(description.retryable).toBe(retryable);
    expect(description.message.length).toBeGreaterThan(0);
  });

  it('uses a busy message for ModelUnavailable', () => {
    expect(describeFailure('ModelUnavailable').message).toBe(
      'The recommendation service is busy right now. Please try again in a moment.',
    );
  });
});
