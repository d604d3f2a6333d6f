/**
 * Recommendation Types
 *
 * Domain model for one recommendation turn:
 * Venue / UserProfile are owned by the persistence layer,
 * Candidate / ScoredCandidate live only for the duration of a request.
 */

import type { GeoPoint } from '../../lib/geo/distance-calculator.js';
import type { RecommendationQuery } from './query/recommendation-query.schema.js';

export type { GeoPoint, RecommendationQuery };

export interface Venue {
  id: number;
  name: string;
  city: string | null;
  district: string | null;
  address: string | null;
  /** Venues without a location never appear in geo results */
  location: GeoPoint | null;
  /** 0..5 or null when unrated */
  rating: number | null;
  reviewsCount: number;
  ratingsCount: number;
  workingHours: string | null;
  website: string | null;
  phone: string | null;
  /** Normalized tags, catalog order */
  tags: readonly string[];
}

export interface UserProfile {
  userId: string;
  preferredTags: readonly string[];
  avoidedTags: readonly string[];
  favoriteDistricts: readonly string[];
  createdAt: number;
  updatedAt: number;
}

export type InteractionType = 'liked' | 'disliked';

export interface Interaction {
  userId: string;
  venueId: number;
  type: InteractionType;
  createdAt: number;
}

export interface InteractionCounts {
  liked: number;
  disliked: number;
}

/** Per-venue interaction counts for one user */
export type InteractionSummary = ReadonlyMap<number, InteractionCounts>;

/**
 * Everything the scorer needs to know about a user for one turn
 */
export interface ProfileSnapshot {
  profile: UserProfile;
  interactions: InteractionSummary;
}

export type RetrievalSource = 'semantic' | 'geo';

export interface RetrievalSignals {
  /** Cosine similarity from the vector store */
  similarity?: number;
  distanceMeters?: number;
  sources: readonly RetrievalSource[];
}

export interface Candidate {
  venue: Venue;
  signals: RetrievalSignals;
}

export interface ScoreAdjustment {
  preferredMatches: number;
  avoidedMatches: number;
  favoriteDistrict: boolean;
  disliked: boolean;
  total: number;
}

export interface ScoredCandidate extends Candidate {
  baseSignal: number;
  adjustment: ScoreAdjustment;
  score: number;
}

// ============================================================================
// Turn state & result
// ============================================================================

export type TurnState =
  | 'AwaitingQuery'
  | 'Retrieving'
  | 'Scoring'
  | 'Selecting'
  | 'Done'
  | 'Clarifying'
  | 'Failed'
  | 'Cancelled';

export type TerminalTurnState = Extract<TurnState, 'Done' | 'Clarifying' | 'Failed' | 'Cancelled'>;

export type TurnOutcome =
  | 'recommendations'
  | 'insufficient_matches'
  | 'no_matches'
  | 'clarify'
  | 'unavailable'
  | 'cancelled';

export type RelaxationLevel = 'strict' | 'district_relaxed' | 'overlap_relaxed';

export interface RecommendedVenue extends Venue {
  score: number;
  similarity: number | null;
  distanceMeters: number | null;
}

export interface TurnDegradation {
  /** Profile could not be loaded; scoring ran unpersonalized */
  profile: boolean;
  /** One hybrid sub-query failed or retrieval deadline cut it short */
  retrievalPartial: boolean;
  /** Scoring deadline hit; retrieval order used */
  scoring: boolean;
  /** Selection deadline hit; top candidates taken without diversity walk */
  selection: boolean;
}

export interface TurnResult {
  requestId: string;
  userId: string;
  state: TerminalTurnState;
  outcome: TurnOutcome;
  venues: RecommendedVenue[];
  clarifyingQuestion: string | null;
  /** User-safe message for unavailable / cancelled outcomes */
  message: string | null;
  meta: {
    mode: RecommendationQuery['mode'];
    candidateCount: number;
    personalized: boolean;
    relaxation: RelaxationLevel | null;
    degraded: TurnDegradation;
    statePath: TurnState[];
    timings: Record<string, number>;
    tookMs: number;
  };
}
