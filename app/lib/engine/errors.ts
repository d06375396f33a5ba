/**
 * Error taxonomy for the recommendation engine.
 *
 * Each stage throws its own Error subclass with a `kind` discriminant. Only
 * RecommendationError ever reaches a caller of Recommender.recommend(); the
 * orchestrator maps the stage errors onto it and keeps the original as `cause`.
 */

// ── Public failures ──────────────────────────────────────────────────────────

export type FailureKind =
  | 'InvalidInput'
  | 'PromptTooLarge'
  | 'ModelUnavailable'
  | 'Unauthorized'
  | 'UnparsableResponse'
  | 'Cancelled';

export class RecommendationError extends Error {
  readonly kind: FailureKind;
  /** Set for UnparsableResponse: why the last model response was rejected. */
  readonly parseFailure?: ParseFailureKind;

  constructor(
    kind: FailureKind,
    message: string,
    options: { cause?: unknown; parseFailure?: ParseFailureKind } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'RecommendationError';
    this.kind = kind;
    if (options.parseFailure) this.parseFailure = options.parseFailure;
  }
}

export function isRecommendationError(err: unknown): err is RecommendationError {
  return err instanceof RecommendationError;
}

// ── Model client failures ────────────────────────────────────────────────────

export type ModelFailureKind = 'Timeout' | 'RateLimited' | 'ProviderError' | 'AuthError';

export class ModelInvocationError extends Error {
  readonly kind: ModelFailureKind;
  /** Whether another attempt could succeed. AuthError is never transient. */
  readonly transient: boolean;

  constructor(
    kind: ModelFailureKind,
    message: string,
    options: { cause?: unknown; transient?: boolean } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'ModelInvocationError';
    this.kind = kind;
    this.transient = kind === 'AuthError' ? false : (options.transient ?? true);
  }
}

// ── Parser failures ──────────────────────────────────────────────────────────

export type ParseFailureKind = 'MalformedOutput' | 'UnknownItemReference' | 'DuplicateItemReference';

export class ResponseParseError extends Error {
  readonly kind: ParseFailureKind;

  constructor(kind: ParseFailureKind, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ResponseParseError';
    this.kind = kind;
  }
}

// ── Prompt builder failures ──────────────────────────────────────────────────

export class PromptTooLargeError extends Error {
  readonly candidateCount: number;
  readonly maxCandidates: number;

  constructor(candidateCount: number, maxCandidates: number) {
    super(`Candidate set of ${candidateCount} items exceeds the ceiling of ${maxCandidates}.`);
    this.name = 'PromptTooLargeError';
    this.candidateCount = candidateCount;
    this.maxCandidates = maxCandidates;
  }
}

// ── Presentation mapping ─────────────────────────────────────────────────────

export interface FailureDescription {
  /** True when the same request may succeed if simply tried again. */
  retryable: boolean;
  message: string;
}

const FAILURE_DESCRIPTIONS: Record<FailureKind, FailureDescription> = {
  InvalidInput: {
    retryable: false,
    message: 'The request was incomplete or invalid. Check the entered details and try again.',
  },
  PromptTooLarge: {
    retryable: false,
    message: 'Too many items to compare at once. Narrow the selection and try again.',
  },
  ModelUnavailable: {
    retryable: true,
    message: 'The recommendation service is busy right now. Please try again in a moment.',
  },
  Unauthorized: {
    retryable: false,
    message: 'The recommendation service rejected the configured credentials.',
  },
  UnparsableResponse: {
    retryable: true,
    message: 'The recommendation service returned an unusable answer. Please try again.',
  },
  Cancelled: {
    retryable: true,
    message: 'The request was cancelled. Please try again.',
  },
};

/** Map a failure kind to the messaging a presentation layer should show. */
export function describeFailure(kind: FailureKind): FailureDescription {
  return FAILURE_DESCRIPTIONS[kind];
}
