/**
 * Venue Catalog Loader
 *
 * Reads the venue catalog (JSON), validates it and builds the
 * in-memory vector index from venue descriptions.
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { logger } from '../../../lib/logger/structured-logger.js';
import { normalizeTags } from '../query/tag-normalizer.js';
import type { IEmbeddingProvider } from '../embedding/embedding-provider.interface.js';
import type { Venue } from '../types.js';

const nullableText = z.string().trim().min(1).nullish().transform(v => v ?? null);

const rawVenueSchema = z
  .object({
    id: z.number().int().positive(),
    name: z.string().trim().min(1),
    city: nullableText,
    district: nullableText,
    address: nullableText,
    lat: z.number().min(-90).max(90).nullish(),
    lon: z.number().min(-180).max(180).nullish(),
    rating: z.number().min(0).max(5).nullish(),
    reviewsCount: z.number().int().min(0).default(0),
    ratingsCount: z.number().int().min(0).default(0),
    workingHours: nullableText,
    website: nullableText,
    phone: nullableText,
    tags: z.array(z.string()).default([])
  });

const catalogSchema = z.array(rawVenueSchema);

export class CatalogValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogValidationError';
  }
}

/**
 * Validate raw catalog entries into Venues
 * Duplicate ids are rejected; tags are normalized.
 */
export function parseVenueCatalog(data: unknown): Venue[] {
  const parsed = catalogSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.slice(0, 5).map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new CatalogValidationError(`Invalid venue catalog: ${issues}`);
  }

  const seen = new Set<number>();
  return parsed.data.map((raw) => {
    if (seen.has(raw.id)) {
      throw new CatalogValidationError(`Invalid venue catalog: duplicate id ${raw.id}`);
    }
    seen.add(raw.id);

    const location = raw.lat != null && raw.lon != null ? { lat: raw.lat, lon: raw.lon } : null;
    return {
      id: raw.id,
      name: raw.name,
      city: raw.city,
      district: raw.district,
      address: raw.address,
      location,
      rating: raw.rating ?? null,
      reviewsCount: raw.reviewsCount,
      ratingsCount: raw.ratingsCount,
      workingHours: raw.workingHours,
      website: raw.website,
      phone: raw.phone,
      tags: normalizeTags(raw.tags)
    };
  });
}

export async function loadVenueCatalog(filePath: string): Promise<Venue[]> {
  const resolved = path.resolve(process.cwd(), filePath);
  const content = await readFile(resolved, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new CatalogValidationError(
      `Venue catalog at ${resolved} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const venues = parseVenueCatalog(data);
  logger.info({ event: 'venue_catalog_loaded', path: resolved, venues: venues.length }, '[Catalog] Venues loaded');
  return venues;
}

/**
 * Text that gets embedded for a venue
 * "<name>. Категории: <tags>. Район: <district>. Рейтинг: <x.x>"
 */
export function describeVenue(venue: Venue): string {
  const parts = [venue.name];
  if (venue.tags.length > 0) parts.push(`Категории: ${venue.tags.join(', ')}`);
  if (venue.district) parts.push(`Район: ${venue.district}`);
  if (venue.rating !== null) parts.push(`Рейтинг: ${venue.rating.toFixed(1)}`);
  return parts.join('. ');
}

/**
 * Embed every venue description. A venue whose embedding fails is left out of
 * the vector index (it stays reachable through geo search).
 */
export async function buildVectorIndex(
  venues: readonly Venue[],
  embedder: IEmbeddingProvider
): Promise<Map<number, number[]>> {
  const vectors = new Map<number, number[]>();
  let failed = 0;

  for (const venue of venues) {
    try {
      vectors.set(venue.id, await embedder.embed(describeVenue(venue)));
    } catch (error) {
      failed++;
      logger.warn({
        event: 'venue_embedding_failed',
        venueId: venue.id,
        error: error instanceof Error ? error.message : String(error)
      }, '[Catalog] Venue embedding failed');
    }
  }

  logger.info({
    event: 'vector_index_built',
    model: embedder.model,
    dimension: embedder.dimension,
    indexed: vectors.size,
    failed
  }, '[Catalog] Vector index built');

  return vectors;
}
