/**
 * Selection Policy
 *
 * Greedy walk over score-ordered candidates picking 3..7 diverse venues.
 * Diversity rules per walk:
 * - at most `maxPerDistrict` picks share a district (null districts are not counted)
 * - no pick whose tag set overlaps an accepted one by more than TAG_OVERLAP_THRESHOLD (Jaccard)
 *
 * When a walk ends below `min`, the next rung of RELAXATION_LADDER is tried.
 * The last walk is returned even when short; `insufficient` flags it.
 */

import {
  RELAXATION_LADDER,
  SELECTION_MAX,
  SELECTION_MIN,
  TAG_OVERLAP_THRESHOLD,
  type RelaxationStep
} from '../../../config/recommendation.config.js';
import { normalizeTag, toTagSet } from '../query/tag-normalizer.js';
import type { RelaxationLevel, ScoredCandidate } from '../types.js';

export interface SelectionOptions {
  min?: number;
  max?: number;
  /** Never selected (e.g. venues the user disliked) */
  excludedVenueIds?: ReadonlySet<number>;
  ladder?: readonly RelaxationStep[];
  /** Once passed, the remaining walks are skipped and the top unique candidates taken */
  deadlineMs?: number;
  now?: () => number;
}

export interface SelectionResult {
  venues: ScoredCandidate[];
  /** Ladder rung used; null when the deadline forced the fallback */
  relaxation: RelaxationLevel | null;
  insufficient: boolean;
  timedOut: boolean;
}

/**
 * |A ∩ B| / |A ∪ B|; two empty sets have no overlap
 */
export function tagOverlap(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;

  let intersection = 0;
  for (const tag of a) {
    if (b.has(tag)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

function walk(pool: readonly ScoredCandidate[], step: RelaxationStep, max: number): ScoredCandidate[] {
  const accepted: ScoredCandidate[] = [];
  const acceptedIds = new Set<number>();
  const acceptedTagSets: Set<string>[] = [];
  const perDistrict = new Map<string, number>();

  for (const candidate of pool) {
    if (accepted.length >= max) break;

    const { venue } = candidate;
    if (acceptedIds.has(venue.id)) continue;

    const district = venue.district ? normalizeTag(venue.district) : null;
    if (district !== null && (perDistrict.get(district) ?? 0) >= step.maxPerDistrict) continue;

    const tags = toTagSet(venue.tags);
    if (step.enforceTagOverlap && acceptedTagSets.some(other => tagOverlap(tags, other) > TAG_OVERLAP_THRESHOLD)) {
      continue;
    }

    accepted.push(candidate);
    acceptedIds.add(venue.id);
    acceptedTagSets.push(tags);
    if (district !== null) {
      perDistrict.set(district, (perDistrict.get(district) ?? 0) + 1);
    }
  }

  return accepted;
}

function topUnique(pool: readonly ScoredCandidate[], max: number): ScoredCandidate[] {
  const seen = new Set<number>();
  const result: ScoredCandidate[] = [];
  for (const candidate of pool) {
    if (result.length >= max) break;
    if (seen.has(candidate.venue.id)) continue;
    seen.add(candidate.venue.id);
    result.push(candidate);
  }
  return result;
}

export function selectVenues(scored: readonly ScoredCandidate[], options: SelectionOptions = {}): SelectionResult {
  const max = Math.max(0, Math.min(SELECTION_MAX, options.max ?? SELECTION_MAX));
  const min = Math.max(0, Math.min(max, options.min ?? SELECTION_MIN));
  const ladder = options.ladder ?? RELAXATION_LADDER;
  const now = options.now ?? Date.now;
  const deadlineAt = options.deadlineMs === undefined ? Infinity : now() + options.deadlineMs;

  const excluded = options.excludedVenueIds;
  const pool = excluded && excluded.size > 0 ? scored.filter(c => !excluded.has(c.venue.id)) : scored;

  let venues: ScoredCandidate[] = [];
  let relaxation: RelaxationLevel | null = null;

  for (const step of ladder) {
    if (now() >= deadlineAt) {
      const fallback = topUnique(pool, max);
      return { venues: fallback, relaxation: null, insufficient: fallback.length < min, timedOut: true };
    }

    venues = walk(pool, step, max);
    relaxation = step.level;
    if (venues.length >= min) break;
  }

  return { venues, relaxation, insufficient: venues.length < min, timedOut: false };
}
