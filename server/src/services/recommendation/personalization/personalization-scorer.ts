/**
 * Personalization Scorer
 *
 * Re-scores retrieved candidates against an optional profile snapshot.
 * Pure and deterministic: same (candidates, snapshot, weights) => same scores and order.
 *
 * score = baseSignal + adjustment
 *   baseSignal: similarity (clamped to [0,1]) when present, else 1 / (1 + km), else 0
 *   adjustment: +preferred (capped matches) -avoided +favorite district -disliked
 *
 * Without a snapshot the input (retrieval) order is kept.
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';
import type { PersonalizationWeights } from '../../../config/env.js';
import { SCORING_BATCH_SIZE } from '../../../config/recommendation.config.js';
import { remainingMs } from '../../../lib/reliability/timeout-guard.js';
import { ScoringTimeoutError, TurnCancelledError } from '../recommendation-errors.js';
import { normalizeTag, toTagSet } from '../query/tag-normalizer.js';
import type { Candidate, ProfileSnapshot, RetrievalSignals, ScoreAdjustment, ScoredCandidate } from '../types.js';

const ZERO_ADJUSTMENT: ScoreAdjustment = Object.freeze({
  preferredMatches: 0,
  avoidedMatches: 0,
  favoriteDistrict: false,
  disliked: false,
  total: 0
});

export function computeBaseSignal(signals: RetrievalSignals): number {
  if (signals.similarity !== undefined) {
    return Math.min(1, Math.max(0, signals.similarity));
  }
  if (signals.distanceMeters !== undefined) {
    return 1 / (1 + signals.distanceMeters / 1000);
  }
  return 0;
}

/**
 * Personalization breakdown for one candidate (also used for logs)
 */
export function explainScore(
  candidate: Candidate,
  snapshot: ProfileSnapshot | undefined,
  weights: PersonalizationWeights
): ScoreAdjustment {
  if (!snapshot) {
    return ZERO_ADJUSTMENT;
  }

  const { profile, interactions } = snapshot;
  const venueTags = toTagSet(candidate.venue.tags);
  const preferred = toTagSet(profile.preferredTags);
  const avoided = toTagSet(profile.avoidedTags);
  const districts = toTagSet(profile.favoriteDistricts);

  let preferredMatches = 0;
  let avoidedMatches = 0;
  for (const tag of venueTags) {
    if (preferred.has(tag)) preferredMatches++;
    if (avoided.has(tag)) avoidedMatches++;
  }

  const favoriteDistrict = candidate.venue.district !== null && districts.has(normalizeTag(candidate.venue.district));
  const disliked = (interactions.get(candidate.venue.id)?.disliked ?? 0) > 0;

  const total =
    Math.min(preferredMatches, weights.maxPreferredMatches) * weights.preferredTag -
    avoidedMatches * weights.avoidedTag +
    (favoriteDistrict ? weights.favoriteDistrict : 0) -
    (disliked ? weights.dislikedVenue : 0);

  return { preferredMatches, avoidedMatches, favoriteDistrict, disliked, total };
}

function scoreOne(
  candidate: Candidate,
  snapshot: ProfileSnapshot | undefined,
  weights: PersonalizationWeights
): ScoredCandidate {
  const baseSignal = computeBaseSignal(candidate.signals);
  const adjustment = explainScore(candidate, snapshot, weights);
  return { ...candidate, baseSignal, adjustment, score: baseSignal + adjustment.total };
}

/**
 * Score desc, rating desc, reviews desc, then input position
 */
function rank(scored: readonly ScoredCandidate[]): ScoredCandidate[] {
  return scored
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) => {
      const scoreDiff = b.candidate.score - a.candidate.score;
      if (scoreDiff !== 0) return scoreDiff;

      const ratingDiff = (b.candidate.venue.rating ?? -1) - (a.candidate.venue.rating ?? -1);
      if (ratingDiff !== 0) return ratingDiff;

      const reviewsDiff = b.candidate.venue.reviewsCount - a.candidate.venue.reviewsCount;
      if (reviewsDiff !== 0) return reviewsDiff;

      return a.index - b.index;
    })
    .map(({ candidate }) => candidate);
}

export function scoreCandidates(
  candidates: readonly Candidate[],
  snapshot: ProfileSnapshot | undefined,
  weights: PersonalizationWeights
): ScoredCandidate[] {
  const scored = candidates.map(candidate => scoreOne(candidate, snapshot, weights));
  return snapshot ? rank(scored) : scored;
}

export interface ScoringOptions {
  deadlineMs?: number;
  signal?: AbortSignal;
  batchSize?: number;
  now?: () => number;
}

/**
 * scoreCandidates in batches, yielding between batches so the deadline and
 * the abort signal are observed
 *
 * @throws ScoringTimeoutError once the deadline passes
 * @throws TurnCancelledError when the signal aborts
 */
export async function scoreCandidatesWithDeadline(
  candidates: readonly Candidate[],
  snapshot: ProfileSnapshot | undefined,
  weights: PersonalizationWeights,
  options: ScoringOptions = {}
): Promise<ScoredCandidate[]> {
  const now = options.now ?? Date.now;
  const batchSize = Math.max(1, options.batchSize ?? SCORING_BATCH_SIZE);
  const deadlineMs = options.deadlineMs;
  const deadlineAt = deadlineMs === undefined ? Infinity : now() + deadlineMs;

  const scored: ScoredCandidate[] = [];
  for (let start = 0; start < candidates.length; start += batchSize) {
    if (options.signal?.aborted) {
      throw new TurnCancelledError('scoring');
    }
    if (deadlineMs !== undefined && remainingMs(deadlineAt, now()) <= 0) {
      throw new ScoringTimeoutError(deadlineMs, scored.length);
    }

    for (const candidate of candidates.slice(start, start + batchSize)) {
      scored.push(scoreOne(candidate, snapshot, weights));
    }

    if (start + batchSize < candidates.length) {
      await yieldToEventLoop();
    }
  }

  if (options.signal?.aborted) {
    throw new TurnCancelledError('scoring');
  }

  return snapshot ? rank(scored) : scored;
}
