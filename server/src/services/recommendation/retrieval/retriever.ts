/**
 * Retriever
 *
 * Bounded candidate retrieval for an already-classified query.
 * Dispatches once on `query.mode`:
 * - geo      -> radius search (rating desc, distance asc)
 * - semantic -> embed text, vector search (similarity desc)
 * - hybrid   -> both concurrently, merged by venue id
 * - clarify  -> nothing (store never called)
 *
 * Never returns more than RETRIEVAL_HARD_CAP candidates.
 */

import {
  DEFAULT_MIN_RATING,
  DEFAULT_RADIUS_METERS,
  RETRIEVAL_HARD_CAP,
  STORE_RETRY_ATTEMPTS
} from '../../../config/recommendation.config.js';
import { logger } from '../../../lib/logger/structured-logger.js';
import { startTimer } from '../../../lib/telemetry/stage-timer.js';
import {
  isAbortError,
  isTimeoutError,
  raceAbort,
  remainingMs,
  withTimeout
} from '../../../lib/reliability/timeout-guard.js';
import {
  RecommendationError,
  RetrievalTimeoutError,
  RetrievalUnavailableError,
  TurnCancelledError
} from '../recommendation-errors.js';
import type { ClarifyQuery, GeoQuery, HybridQuery, SemanticQuery } from '../query/recommendation-query.schema.js';
import type { IEmbeddingProvider } from '../embedding/embedding-provider.interface.js';
import type { ICandidateStore, NearbyHit, SimilarHit } from '../stores/candidate-store.interface.js';
import type { Candidate, GeoPoint, RetrievalSource } from '../types.js';

/**
 * Query with its location already resolved; geo and hybrid always carry a point here
 */
export type RetrievalQuery =
  | SemanticQuery
  | (GeoQuery & { point: GeoPoint })
  | (HybridQuery & { point: GeoPoint })
  | ClarifyQuery;

export interface RetrieverDeps {
  candidateStore: ICandidateStore;
  embedder: IEmbeddingProvider;
}

export interface RetrieveOptions {
  signal?: AbortSignal;
  /** Budget for the whole retrieval stage, including the one retry */
  deadlineMs?: number;
  requestId?: string;
}

export interface RetrievalResult {
  candidates: Candidate[];
  /** A hybrid sub-query failed; candidates come from the other one */
  partial: boolean;
  failedSources: RetrievalSource[];
}

interface CallContext {
  signal?: AbortSignal;
  deadlineAt: number;
  deadlineMs: number;
  requestId?: string;
}

const NO_DEADLINE_MS = 60_000;

/**
 * Clamp a requested limit into [1, RETRIEVAL_HARD_CAP]
 */
export function clampLimit(limit: number): number {
  if (!Number.isFinite(limit)) return RETRIEVAL_HARD_CAP;
  return Math.min(RETRIEVAL_HARD_CAP, Math.max(1, Math.floor(limit)));
}

/**
 * Union by venue id: semantic order first, geo-only venues appended in geo order.
 * A venue found by both keeps its semantic position and both signals.
 */
export function mergeCandidates(semantic: readonly SimilarHit[], geo: readonly NearbyHit[]): Candidate[] {
  const merged = new Map<number, Candidate>();

  for (const hit of semantic) {
    if (merged.has(hit.venue.id)) continue;
    merged.set(hit.venue.id, {
      venue: hit.venue,
      signals: { similarity: hit.similarity, sources: ['semantic'] }
    });
  }

  for (const hit of geo) {
    const existing = merged.get(hit.venue.id);
    if (!existing) {
      merged.set(hit.venue.id, {
        venue: hit.venue,
        signals: { distanceMeters: hit.distanceMeters, sources: ['geo'] }
      });
    } else if (!existing.signals.sources.includes('geo')) {
      merged.set(hit.venue.id, {
        venue: existing.venue,
        signals: {
          ...existing.signals,
          distanceMeters: hit.distanceMeters,
          sources: [...existing.signals.sources, 'geo']
        }
      });
    }
  }

  return [...merged.values()];
}

/**
 * One store call under the stage deadline, raced against cancellation,
 * with one immediate retry when the store is unreachable
 */
async function callStore<T>(
  operation: string,
  call: (signal: AbortSignal) => Promise<T>,
  ctx: CallContext
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= STORE_RETRY_ATTEMPTS; attempt++) {
    const budget = remainingMs(ctx.deadlineAt);
    if (budget <= 0) {
      throw new RetrievalTimeoutError(ctx.deadlineMs);
    }

    const controller = new AbortController();
    const callSignal = ctx.signal ? AbortSignal.any([ctx.signal, controller.signal]) : controller.signal;

    try {
      return await raceAbort(
        withTimeout(call(callSignal), budget, operation, () => controller.abort('deadline')),
        ctx.signal,
        operation
      );
    } catch (error) {
      if (ctx.signal?.aborted || isAbortError(error)) {
        throw new TurnCancelledError('retrieval', operation);
      }
      if (isTimeoutError(error)) {
        throw new RetrievalTimeoutError(ctx.deadlineMs, { cause: error });
      }

      lastError = error;
      logger.warn({
        requestId: ctx.requestId,
        event: 'retrieval_store_error',
        operation,
        attempt: attempt + 1,
        willRetry: attempt < STORE_RETRY_ATTEMPTS,
        error: error instanceof Error ? error.message : String(error)
      }, '[Retriever] Store call failed');
    }
  }

  const message = lastError instanceof Error ? lastError.message : String(lastError);
  throw new RetrievalUnavailableError(`${operation}: ${message}`, { cause: lastError });
}

async function searchGeo(
  query: (GeoQuery | HybridQuery) & { point: GeoPoint },
  limit: number,
  deps: RetrieverDeps,
  ctx: CallContext
): Promise<NearbyHit[]> {
  return callStore('geo_search', (signal) => deps.candidateStore.searchNearby({
    point: query.point,
    radiusMeters: query.radiusMeters ?? DEFAULT_RADIUS_METERS,
    minRating: query.minRating ?? DEFAULT_MIN_RATING,
    tags: query.tags,
    limit,
    signal
  }), ctx);
}

async function searchSemantic(
  query: SemanticQuery | HybridQuery,
  limit: number,
  deps: RetrieverDeps,
  ctx: CallContext
): Promise<SimilarHit[]> {
  const vector = await callStore('embed_query', (signal) => deps.embedder.embed(query.text, signal), ctx);
  return callStore('vector_search', (signal) => deps.candidateStore.searchSimilar({
    vector,
    minRating: query.minRating ?? DEFAULT_MIN_RATING,
    tags: query.tags,
    limit,
    signal
  }), ctx);
}

async function retrieveHybrid(
  query: HybridQuery & { point: GeoPoint },
  limit: number,
  deps: RetrieverDeps,
  ctx: CallContext
): Promise<RetrievalResult> {
  const [semantic, geo] = await Promise.allSettled([
    searchSemantic(query, limit, deps, ctx),
    searchGeo(query, limit, deps, ctx)
  ]);

  if (semantic.status === 'fulfilled' && geo.status === 'fulfilled') {
    return { candidates: mergeCandidates(semantic.value, geo.value).slice(0, limit), partial: false, failedSources: [] };
  }

  const errors: unknown[] = [semantic, geo].flatMap(r => (r.status === 'rejected' ? [r.reason] : []));
  const cancelled = errors.find(e => e instanceof TurnCancelledError);
  if (cancelled) {
    throw cancelled;
  }

  if (semantic.status === 'fulfilled') {
    logDegraded(ctx, 'geo', errors[0]);
    return { candidates: mergeCandidates(semantic.value, []).slice(0, limit), partial: true, failedSources: ['geo'] };
  }
  if (geo.status === 'fulfilled') {
    logDegraded(ctx, 'semantic', errors[0]);
    return { candidates: mergeCandidates([], geo.value).slice(0, limit), partial: true, failedSources: ['semantic'] };
  }

  throw errors[0];
}

function logDegraded(ctx: CallContext, failed: RetrievalSource, error: unknown): void {
  logger.warn({
    requestId: ctx.requestId,
    event: 'retrieval_degraded',
    failedSource: failed,
    errorKind: error instanceof RecommendationError ? error.kind : undefined,
    error: error instanceof Error ? error.message : String(error)
  }, '[Retriever] Hybrid sub-query failed, continuing with the other');
}

/**
 * Retrieve up to `limit` candidates (clamped to [1, 50]) for a query
 *
 * @throws RetrievalUnavailableError store unreachable after one retry
 * @throws RetrievalTimeoutError deadline passed with nothing gathered
 * @throws TurnCancelledError signal aborted
 */
export async function retrieve(
  query: RetrievalQuery,
  limit: number,
  deps: RetrieverDeps,
  options: RetrieveOptions = {}
): Promise<RetrievalResult> {
  if (query.mode === 'clarify') {
    return { candidates: [], partial: false, failedSources: [] };
  }

  const cap = clampLimit(limit);
  const deadlineMs = options.deadlineMs ?? NO_DEADLINE_MS;
  const ctx: CallContext = {
    signal: options.signal,
    deadlineAt: Date.now() + deadlineMs,
    deadlineMs,
    requestId: options.requestId
  };

  if (options.signal?.aborted) {
    throw new TurnCancelledError('retrieval', 'aborted before retrieval');
  }

  const timer = startTimer();
  let result: RetrievalResult;

  switch (query.mode) {
    case 'geo': {
      const hits = await searchGeo(query, cap, deps, ctx);
      result = { candidates: mergeCandidates([], hits), partial: false, failedSources: [] };
      break;
    }
    case 'semantic': {
      const hits = await searchSemantic(query, cap, deps, ctx);
      result = { candidates: mergeCandidates(hits, []), partial: false, failedSources: [] };
      break;
    }
    case 'hybrid':
      result = await retrieveHybrid(query, cap, deps, ctx);
      break;
  }

  logger.debug({
    requestId: options.requestId,
    event: 'retrieval_completed',
    mode: query.mode,
    limit: cap,
    count: result.candidates.length,
    partial: result.partial,
    durationMs: timer.stop()
  }, '[Retriever] Retrieval completed');

  return result;
}
