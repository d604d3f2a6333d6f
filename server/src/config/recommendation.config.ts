/**
 * Recommendation Engine Constants
 * Funnel bounds: up to 50 candidates -> personalize -> pick 3..7
 */

import type { RelaxationLevel } from '../services/recommendation/types.js';

/** Retriever never returns more than this, whatever the caller asks for */
export const RETRIEVAL_HARD_CAP = 50;

export const DEFAULT_RADIUS_METERS = 5000;

export const DEFAULT_MIN_RATING = 0.0;

/** Immediate retries for an unreachable store (no backoff) */
export const STORE_RETRY_ATTEMPTS = 1;

/** Scorer yields to the event loop every N candidates when a deadline applies */
export const SCORING_BATCH_SIZE = 10;

export const SELECTION_MIN = 3;
export const SELECTION_MAX = 7;

/** Jaccard overlap above this marks two venues as near-duplicates */
export const TAG_OVERLAP_THRESHOLD = 0.8;

export interface RelaxationStep {
  level: RelaxationLevel;
  maxPerDistrict: number;
  enforceTagOverlap: boolean;
}

/**
 * Tried in order until the minimum is reached
 */
export const RELAXATION_LADDER: readonly RelaxationStep[] = [
  { level: 'strict', maxPerDistrict: 2, enforceTagOverlap: true },
  { level: 'district_relaxed', maxPerDistrict: 3, enforceTagOverlap: true },
  { level: 'overlap_relaxed', maxPerDistrict: 3, enforceTagOverlap: false }
];
