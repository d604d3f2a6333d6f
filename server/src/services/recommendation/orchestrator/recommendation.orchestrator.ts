/**
 * Recommendation Orchestrator
 *
 * Runs one user turn through the funnel:
 *   query -> (clarify | retrieve ≤50) -> personalize -> select 3..7 -> TurnResult
 *
 * - clarify mode never reaches the Retriever or the ProfileStore
 * - the profile snapshot loads concurrently with retrieval and is best-effort
 * - every stage is bounded by a deadline and observes the turn's AbortSignal
 */

import type { PersonalizationWeights, StageDeadlines } from '../../../config/env.js';
import { logger } from '../../../lib/logger/structured-logger.js';
import { raceAbort, withTimeout } from '../../../lib/reliability/timeout-guard.js';
import { endStage, startStage, startTimer, type StageTimingContext } from '../../../lib/telemetry/stage-timer.js';
import { resolveQueryLocation, type IUserLocationStore } from '../../session/user-location.store.js';
import type { IEmbeddingProvider } from '../embedding/embedding-provider.interface.js';
import { scoreCandidates, scoreCandidatesWithDeadline } from '../personalization/personalization-scorer.js';
import { requiresPoint, type ClarifyQuery } from '../query/recommendation-query.schema.js';
import {
  classifyRecommendationError,
  RecommendationError,
  RecommendationErrorKind,
  ScoringTimeoutError,
  TurnCancelledError,
  toUserMessage
} from '../recommendation-errors.js';
import { retrieve, type RetrievalQuery, type RetrievalResult } from '../retrieval/retriever.js';
import { selectVenues } from '../selection/selection-policy.js';
import type { ICandidateStore } from '../stores/candidate-store.interface.js';
import type { IProfileStore } from '../stores/profile-store.interface.js';
import type {
  GeoPoint,
  ProfileSnapshot,
  RecommendationQuery,
  RecommendedVenue,
  RelaxationLevel,
  ScoredCandidate,
  TurnDegradation,
  TurnOutcome,
  TurnResult
} from '../types.js';
import {
  INSUFFICIENT_MATCHES_MESSAGE,
  NO_MATCHES_MESSAGE,
  resolveClarifyingQuestion,
  type ClarifyReason
} from './clarification.js';
import { TurnStateMachine } from './turn-state-machine.js';

export interface RecommendationDeps {
  candidateStore: ICandidateStore;
  profileStore: IProfileStore;
  embedder: IEmbeddingProvider;
  locationStore: IUserLocationStore;
  weights: PersonalizationWeights;
  deadlines: StageDeadlines;
  retrievalLimit: number;
  /** Drop venues the user disliked at selection time */
  excludeDisliked: boolean;
}

export interface TurnInput {
  requestId: string;
  userId: string;
  query: RecommendationQuery;
  /** Location sent with this request; saved for later turns */
  userLocation?: GeoPoint;
  deadlines?: Partial<StageDeadlines>;
  signal?: AbortSignal;
}

interface TurnContext extends StageTimingContext {
  userId: string;
  mode: RecommendationQuery['mode'];
  machine: TurnStateMachine;
  timer: { stop: () => number };
  degraded: TurnDegradation;
  candidateCount: number;
  personalized: boolean;
  relaxation: RelaxationLevel | null;
}

interface SnapshotLoad {
  snapshot: ProfileSnapshot | undefined;
  failed: boolean;
}

function toRecommendedVenue(candidate: ScoredCandidate): RecommendedVenue {
  const { signals } = candidate;
  return {
    ...candidate.venue,
    tags: [...candidate.venue.tags],
    score: candidate.score,
    similarity: signals.similarity ?? null,
    distanceMeters: signals.distanceMeters === undefined ? null : Math.round(signals.distanceMeters)
  };
}

export class RecommendationOrchestrator {
  constructor(private readonly deps: RecommendationDeps) {}

  async runTurn(input: TurnInput): Promise<TurnResult> {
    const { requestId, userId, query, signal } = input;
    const deadlines = this.resolveDeadlines(input.deadlines);

    const ctx: TurnContext = {
      requestId,
      timings: {},
      userId,
      mode: query.mode,
      machine: new TurnStateMachine(),
      timer: startTimer(),
      degraded: { profile: false, retrievalPartial: false, scoring: false, selection: false },
      candidateCount: 0,
      personalized: false,
      relaxation: null
    };

    logger.info({ requestId, userId, event: 'turn_started', mode: query.mode }, '[Turn] Turn started');

    if (input.userLocation) {
      this.rememberLocation(userId, input.userLocation, requestId);
    }

    if (query.mode === 'clarify') {
      return this.clarify(ctx, query, 'vague_intent');
    }

    let retrievalQuery: RetrievalQuery;
    if (requiresPoint(query)) {
      const resolved = await resolveQueryLocation(query.point, input.userLocation, this.deps.locationStore, userId);
      if (!resolved.point) {
        return this.clarify(ctx, null, 'missing_location');
      }
      retrievalQuery = { ...query, point: resolved.point };
    } else {
      retrievalQuery = query;
    }

    if (signal?.aborted) {
      return this.cancelled(ctx, new TurnCancelledError(undefined, 'aborted before retrieval'));
    }

    // Retrieving (profile snapshot loads alongside)
    ctx.machine.transition('Retrieving');
    const snapshotPromise = this.loadSnapshot(userId, deadlines.profileMs, requestId);

    let retrieval: RetrievalResult;
    const retrievalStart = startStage(ctx, 'retrieval', { mode: query.mode });
    try {
      retrieval = await retrieve(retrievalQuery, this.deps.retrievalLimit, this.deps, {
        signal,
        deadlineMs: deadlines.retrievalMs,
        requestId
      });
    } catch (error) {
      endStage(ctx, 'retrieval', retrievalStart, { failed: true });
      return this.cancelledOrFailed(ctx, classifyRecommendationError(error, 'retrieval'));
    }
    endStage(ctx, 'retrieval', retrievalStart, { count: retrieval.candidates.length, partial: retrieval.partial });

    ctx.candidateCount = retrieval.candidates.length;
    ctx.degraded.retrievalPartial = retrieval.partial;

    const profileStart = startStage(ctx, 'profile');
    let snapshotLoad: SnapshotLoad;
    try {
      snapshotLoad = await raceAbort(snapshotPromise, signal, 'profile_load');
    } catch (error) {
      endStage(ctx, 'profile', profileStart, { cancelled: true });
      return this.cancelledOrFailed(ctx, classifyRecommendationError(error, 'profile'));
    }
    const { snapshot, failed: profileFailed } = snapshotLoad;
    endStage(ctx, 'profile', profileStart, { found: snapshot !== undefined });
    ctx.degraded.profile = profileFailed;

    if (signal?.aborted) {
      return this.cancelled(ctx, new TurnCancelledError('retrieval'));
    }

    // Scoring
    ctx.machine.transition('Scoring');
    const scoringStart = startStage(ctx, 'scoring');
    let scored: ScoredCandidate[];
    try {
      scored = await scoreCandidatesWithDeadline(retrieval.candidates, snapshot, this.deps.weights, {
        deadlineMs: deadlines.scoringMs,
        signal
      });
      ctx.personalized = snapshot !== undefined;
    } catch (error) {
      if (!(error instanceof ScoringTimeoutError)) {
        endStage(ctx, 'scoring', scoringStart, { failed: true });
        return this.cancelledOrFailed(ctx, classifyRecommendationError(error, 'scoring'));
      }
      logger.warn({
        requestId,
        event: 'scoring_degraded',
        timeoutMs: error.timeoutMs,
        scoredCount: error.scoredCount
      }, '[Turn] Scoring deadline hit, using retrieval order');
      ctx.degraded.scoring = true;
      scored = scoreCandidates(retrieval.candidates, undefined, this.deps.weights);
    }
    endStage(ctx, 'scoring', scoringStart, { personalized: ctx.personalized });

    if (signal?.aborted) {
      return this.cancelled(ctx, new TurnCancelledError('scoring'));
    }

    // Selecting
    ctx.machine.transition('Selecting');
    const selectionStart = startStage(ctx, 'selection');
    const selection = selectVenues(scored, {
      excludedVenueIds: this.excludedVenues(snapshot),
      deadlineMs: deadlines.selectionMs
    });
    endStage(ctx, 'selection', selectionStart, { count: selection.venues.length, relaxation: selection.relaxation });

    ctx.relaxation = selection.relaxation;
    ctx.degraded.selection = selection.timedOut;

    ctx.machine.transition('Done');

    const venues = selection.venues.map(toRecommendedVenue);
    let outcome: TurnOutcome = 'recommendations';
    let message: string | null = null;
    if (venues.length === 0) {
      outcome = 'no_matches';
      message = NO_MATCHES_MESSAGE;
    } else if (selection.insufficient) {
      outcome = 'insufficient_matches';
      message = INSUFFICIENT_MATCHES_MESSAGE;
    }

    return this.finish(ctx, outcome, venues, null, message);
  }

  private resolveDeadlines(overrides: Partial<StageDeadlines> | undefined): StageDeadlines {
    const defaults = this.deps.deadlines;
    return {
      retrievalMs: overrides?.retrievalMs ?? defaults.retrievalMs,
      profileMs: overrides?.profileMs ?? defaults.profileMs,
      scoringMs: overrides?.scoringMs ?? defaults.scoringMs,
      selectionMs: overrides?.selectionMs ?? defaults.selectionMs
    };
  }

  /**
   * Best-effort: a missing profile is not a failure, a failing store is logged and ignored
   */
  private async loadSnapshot(userId: string, deadlineMs: number, requestId: string): Promise<SnapshotLoad> {
    const { profileStore } = this.deps;
    try {
      const [profile, interactions] = await withTimeout(
        Promise.all([profileStore.getProfile(userId), profileStore.getInteractionSummary(userId)]),
        deadlineMs,
        'profile_load'
      );
      return { snapshot: profile ? { profile, interactions } : undefined, failed: false };
    } catch (error) {
      const classified = classifyRecommendationError(error, 'profile');
      logger.warn({
        requestId,
        userId,
        event: 'profile_unavailable',
        errorKind: classified.kind,
        error: classified.message
      }, '[Turn] Profile unavailable, scoring unpersonalized');
      return { snapshot: undefined, failed: true };
    }
  }

  private excludedVenues(snapshot: ProfileSnapshot | undefined): ReadonlySet<number> {
    const excluded = new Set<number>();
    if (!this.deps.excludeDisliked || !snapshot) return excluded;

    for (const [venueId, counts] of snapshot.interactions) {
      if (counts.disliked > 0) excluded.add(venueId);
    }
    return excluded;
  }

  private rememberLocation(userId: string, point: GeoPoint, requestId: string): void {
    void this.deps.locationStore.save(userId, point).catch((error: unknown) => {
      logger.warn({
        requestId,
        userId,
        event: 'location_save_failed',
        error: error instanceof Error ? error.message : String(error)
      }, '[Turn] Failed to save user location');
    });
  }

  private clarify(ctx: TurnContext, query: ClarifyQuery | null, reason: ClarifyReason): TurnResult {
    ctx.machine.transition('Clarifying');
    const question = resolveClarifyingQuestion(query, reason);

    logger.info({ requestId: ctx.requestId, event: 'turn_clarifying', reason }, '[Turn] Asking a clarifying question');
    return this.finish(ctx, 'clarify', [], question, null);
  }

  private cancelledOrFailed(ctx: TurnContext, error: RecommendationError): TurnResult {
    if (error.kind === RecommendationErrorKind.TURN_CANCELLED) {
      return this.cancelled(ctx, error);
    }

    logger.error({
      requestId: ctx.requestId,
      event: 'turn_failed',
      stage: error.stage,
      errorKind: error.kind,
      error: error.message
    }, '[Turn] Turn failed');

    ctx.machine.transition('Failed');
    return this.finish(ctx, 'unavailable', [], null, toUserMessage(error.kind));
  }

  private cancelled(ctx: TurnContext, error: RecommendationError): TurnResult {
    logger.info({
      requestId: ctx.requestId,
      event: 'turn_cancelled',
      stage: error.stage ?? ctx.machine.state
    }, '[Turn] Turn cancelled');

    ctx.machine.transition('Cancelled');
    return this.finish(ctx, 'cancelled', [], null, toUserMessage(RecommendationErrorKind.TURN_CANCELLED));
  }

  private finish(
    ctx: TurnContext,
    outcome: TurnOutcome,
    venues: RecommendedVenue[],
    clarifyingQuestion: string | null,
    message: string | null
  ): TurnResult {
    const tookMs = ctx.timer.stop();
    const state = ctx.machine.terminal();

    logger.info({
      requestId: ctx.requestId,
      userId: ctx.userId,
      event: 'turn_completed',
      state,
      outcome,
      mode: ctx.mode,
      venues: venues.length,
      candidateCount: ctx.candidateCount,
      personalized: ctx.personalized,
      relaxation: ctx.relaxation,
      degraded: ctx.degraded,
      tookMs
    }, '[Turn] Turn completed');

    return {
      requestId: ctx.requestId,
      userId: ctx.userId,
      state,
      outcome,
      venues,
      clarifyingQuestion,
      message,
      meta: {
        mode: ctx.mode,
        candidateCount: ctx.candidateCount,
        personalized: ctx.personalized,
        relaxation: ctx.relaxation,
        degraded: { ...ctx.degraded },
        statePath: ctx.machine.history,
        timings: { ...ctx.timings },
        tookMs
      }
    };
  }
}
