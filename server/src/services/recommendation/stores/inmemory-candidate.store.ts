/**
 * In-Memory Candidate Store
 *
 * Brute-force geo radius + cosine nearest-neighbor over a loaded venue catalog.
 * Serves local development and tests; production deployments put a
 * geo-indexed relational store and a vector index behind ICandidateStore.
 */

import { distanceCalculator } from '../../../lib/geo/distance-calculator.js';
import type { Venue } from '../types.js';
import type {
  ICandidateStore,
  NearbyHit,
  NearbySearchParams,
  SimilarHit,
  SimilarSearchParams
} from './candidate-store.interface.js';

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Rating floor: unrated venues only pass when no floor is requested
 */
function passesRating(venue: Venue, minRating: number): boolean {
  if (venue.rating === null) return minRating <= 0;
  return venue.rating >= minRating;
}

function passesTags(venue: Venue, tags: readonly string[] | undefined): boolean {
  if (!tags || tags.length === 0) return true;
  return tags.some(tag => venue.tags.includes(tag));
}

export class InMemoryCandidateStore implements ICandidateStore {
  private readonly venues: readonly Venue[];
  private readonly byId: Map<number, Venue>;
  private readonly vectors: ReadonlyMap<number, readonly number[]>;

  constructor(venues: readonly Venue[], vectors: ReadonlyMap<number, readonly number[]> = new Map()) {
    this.venues = venues;
    this.byId = new Map(venues.map(v => [v.id, v]));
    this.vectors = vectors;
  }

  get size(): number {
    return this.venues.length;
  }

  async searchNearby(params: NearbySearchParams): Promise<NearbyHit[]> {
    params.signal?.throwIfAborted();
    const { point, radiusMeters, minRating, tags, limit } = params;

    const hits: NearbyHit[] = [];
    for (const venue of this.venues) {
      if (!venue.location) continue;
      if (!passesRating(venue, minRating) || !passesTags(venue, tags)) continue;

      const distanceMeters = distanceCalculator.distanceMeters(point, venue.location);
      if (distanceMeters <= radiusMeters) {
        hits.push({ venue, distanceMeters });
      }
    }

    hits.sort((a, b) => {
      const ratingDiff = (b.venue.rating ?? 0) - (a.venue.rating ?? 0);
      if (ratingDiff !== 0) return ratingDiff;
      return a.distanceMeters - b.distanceMeters;
    });

    return hits.slice(0, limit);
  }

  async searchSimilar(params: SimilarSearchParams): Promise<SimilarHit[]> {
    params.signal?.throwIfAborted();
    const { vector, minRating, tags, limit } = params;

    const hits: SimilarHit[] = [];
    for (const venue of this.venues) {
      const venueVector = this.vectors.get(venue.id);
      if (!venueVector) continue;
      if (!passesRating(venue, minRating) || !passesTags(venue, tags)) continue;

      hits.push({ venue, similarity: cosineSimilarity(vector, venueVector) });
    }

    hits.sort((a, b) => b.similarity - a.similarity || a.venue.id - b.venue.id);

    return hits.slice(0, limit);
  }

  async getVenue(id: number): Promise<Venue | null> {
    return this.byId.get(id) ?? null;
  }

  async isReady(): Promise<boolean> {
    return true;
  }
}
