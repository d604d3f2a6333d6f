/**
 * Candidate Store Interface - Retrieval Abstraction
 * Geo-indexed radius search + vector nearest-neighbor search.
 * Pure query surface: hard filters only, no ranking logic.
 */

import type { GeoPoint, Venue } from '../types.js';

export interface NearbySearchParams {
  point: GeoPoint;
  radiusMeters: number;
  minRating: number;
  /** Exact normalized match; a venue passes with at least one of these */
  tags?: readonly string[];
  limit: number;
  signal?: AbortSignal;
}

export interface SimilarSearchParams {
  vector: readonly number[];
  minRating: number;
  tags?: readonly string[];
  limit: number;
  signal?: AbortSignal;
}

export interface NearbyHit {
  venue: Venue;
  distanceMeters: number;
}

export interface SimilarHit {
  venue: Venue;
  similarity: number;
}

export interface ICandidateStore {
  /**
   * Venues within radius, ordered by rating desc then distance asc.
   * Venues without a location are never returned.
   */
  searchNearby(params: NearbySearchParams): Promise<NearbyHit[]>;

  /**
   * Venues ordered by similarity desc
   */
  searchSimilar(params: SimilarSearchParams): Promise<SimilarHit[]>;

  /**
   * Full venue record by id (profile inference after an interaction)
   */
  getVenue(id: number): Promise<Venue | null>;

  /**
   * Readiness probe for /ready
   */
  isReady(): Promise<boolean>;
}
