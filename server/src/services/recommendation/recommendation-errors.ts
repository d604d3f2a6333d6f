/**
 * Recommendation Error Taxonomy
 * Standardized error classification for the recommendation pipeline
 *
 * Used for:
 * - Turn outcomes (unavailable / cancelled)
 * - HTTP error responses
 * - Observability
 *
 * EmptyResult is NOT an error: zero matches is a valid terminal outcome.
 */

import { isAbortError, isTimeoutError } from '../../lib/reliability/timeout-guard.js';

export enum RecommendationErrorKind {
  RETRIEVAL_UNAVAILABLE = 'RETRIEVAL_UNAVAILABLE',
  RETRIEVAL_TIMEOUT = 'RETRIEVAL_TIMEOUT',
  SCORING_TIMEOUT = 'SCORING_TIMEOUT',
  PROFILE_UNAVAILABLE = 'PROFILE_UNAVAILABLE',
  TURN_CANCELLED = 'TURN_CANCELLED',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

export type PipelineStage = 'retrieval' | 'profile' | 'scoring' | 'selection' | 'interaction';

export class RecommendationError extends Error {
  constructor(
    public readonly kind: RecommendationErrorKind,
    message: string,
    public readonly stage?: PipelineStage,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RecommendationError';
  }
}

/**
 * Candidate store unreachable (after one immediate retry)
 */
export class RetrievalUnavailableError extends RecommendationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(RecommendationErrorKind.RETRIEVAL_UNAVAILABLE, message, 'retrieval', options);
    this.name = 'RetrievalUnavailableError';
  }
}

export class RetrievalTimeoutError extends RecommendationError {
  constructor(public readonly timeoutMs: number, options?: { cause?: unknown }) {
    super(RecommendationErrorKind.RETRIEVAL_TIMEOUT, `Retrieval exceeded ${timeoutMs}ms`, 'retrieval', options);
    this.name = 'RetrievalTimeoutError';
  }
}

export class ScoringTimeoutError extends RecommendationError {
  constructor(
    public readonly timeoutMs: number,
    /** Candidates scored before the deadline hit */
    public readonly scoredCount: number
  ) {
    super(RecommendationErrorKind.SCORING_TIMEOUT, `Scoring exceeded ${timeoutMs}ms`, 'scoring');
    this.name = 'ScoringTimeoutError';
  }
}

/**
 * Never fatal: the turn degrades to unpersonalized scoring
 */
export class ProfileUnavailableError extends RecommendationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(RecommendationErrorKind.PROFILE_UNAVAILABLE, message, 'profile', options);
    this.name = 'ProfileUnavailableError';
  }
}

export class TurnCancelledError extends RecommendationError {
  constructor(stage?: PipelineStage, reason?: string) {
    super(RecommendationErrorKind.TURN_CANCELLED, `Turn cancelled${reason ? `: ${reason}` : ''}`, stage);
    this.name = 'TurnCancelledError';
  }
}

/**
 * Map any thrown value to a RecommendationError
 * Store errors (connection refused, driver errors) become RETRIEVAL_UNAVAILABLE
 * during retrieval and PROFILE_UNAVAILABLE during profile load.
 */
export function classifyRecommendationError(error: unknown, stage?: PipelineStage): RecommendationError {
  if (error instanceof RecommendationError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  if (isAbortError(error)) {
    return new TurnCancelledError(stage, message);
  }

  if (isTimeoutError(error)) {
    if (stage === 'retrieval') return new RetrievalTimeoutError(error.timeoutMs, { cause: error });
    if (stage === 'scoring') return new ScoringTimeoutError(error.timeoutMs, 0);
    if (stage === 'profile') return new ProfileUnavailableError(message, { cause: error });
  }

  if (stage === 'retrieval') {
    return new RetrievalUnavailableError(message, { cause: error });
  }
  if (stage === 'profile') {
    return new ProfileUnavailableError(message, { cause: error });
  }

  return new RecommendationError(RecommendationErrorKind.INTERNAL_ERROR, message, stage, { cause: error });
}

/**
 * Sanitize error for the user: raw store messages are logged, never returned
 */
export function toUserMessage(kind: RecommendationErrorKind): string {
  const messages: Record<RecommendationErrorKind, string> = {
    [RecommendationErrorKind.RETRIEVAL_UNAVAILABLE]: 'Поиск сейчас недоступен. Попробуйте ещё раз через несколько секунд.',
    [RecommendationErrorKind.RETRIEVAL_TIMEOUT]: 'Поиск занял слишком много времени. Попробуйте ещё раз.',
    [RecommendationErrorKind.SCORING_TIMEOUT]: 'Поиск занял слишком много времени. Попробуйте ещё раз.',
    [RecommendationErrorKind.PROFILE_UNAVAILABLE]: 'Произошла внутренняя ошибка.',
    [RecommendationErrorKind.TURN_CANCELLED]: 'Запрос отменён.',
    [RecommendationErrorKind.VALIDATION_ERROR]: 'Некорректный запрос.',
    [RecommendationErrorKind.INTERNAL_ERROR]: 'Произошла внутренняя ошибка.'
  };

  return messages[kind];
}
