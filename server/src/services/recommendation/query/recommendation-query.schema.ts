/**
 * Recommendation Query schema
 *
 * Structured representation of one user turn, produced by the upstream
 * intent step. `mode` is decided once, upstream; the engine only dispatches on it.
 */

import { z } from 'zod';
import { normalizeTags } from './tag-normalizer.js';

// ============================================================================
// Zod Schemas
// ============================================================================

export const geoPointSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

const tagsSchema = z
  .array(z.string().max(100))
  .max(20)
  .optional()
  .transform((tags) => (tags ? normalizeTags(tags) : undefined));

const minRatingSchema = z.number().min(0).max(5).optional();

const radiusSchema = z.number().int().positive().max(50_000).optional();

const textSchema = z.string().trim().min(1).max(2000);

const semanticQuerySchema = z.object({
  mode: z.literal('semantic'),
  text: textSchema,
  tags: tagsSchema,
  minRating: minRatingSchema,
});

const geoQuerySchema = z.object({
  mode: z.literal('geo'),
  /** May be omitted for "near me"; resolved from the request or saved location */
  point: geoPointSchema.optional(),
  radiusMeters: radiusSchema,
  tags: tagsSchema,
  minRating: minRatingSchema,
});

const hybridQuerySchema = z.object({
  mode: z.literal('hybrid'),
  text: textSchema,
  point: geoPointSchema.optional(),
  radiusMeters: radiusSchema,
  tags: tagsSchema,
  minRating: minRatingSchema,
});

const clarifyQuerySchema = z.object({
  mode: z.literal('clarify'),
  /** Follow-up suggested by the intent step */
  question: z.string().trim().min(1).max(1000).optional(),
  reason: z.string().max(200).optional(),
});

export const recommendationQuerySchema = z.discriminatedUnion('mode', [
  semanticQuerySchema,
  geoQuerySchema,
  hybridQuerySchema,
  clarifyQuerySchema,
]);

// ============================================================================
// TypeScript Types (inferred from Zod)
// ============================================================================

export type RecommendationQuery = z.infer<typeof recommendationQuerySchema>;
export type SemanticQuery = z.infer<typeof semanticQuerySchema>;
export type GeoQuery = z.infer<typeof geoQuerySchema>;
export type HybridQuery = z.infer<typeof hybridQuerySchema>;
export type ClarifyQuery = z.infer<typeof clarifyQuerySchema>;

// ============================================================================
// Helper Functions
// ============================================================================

export function requiresPoint(query: RecommendationQuery): query is GeoQuery | HybridQuery {
  return query.mode === 'geo' || query.mode === 'hybrid';
}
