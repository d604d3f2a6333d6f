/**
 * Environment Configuration
 * Single source of truth for process-level settings
 *
 * - Loaded once from process.env (and .env via dotenv)
 * - Validated with zod; invalid config fails fast at startup
 * - loadConfig(env) is pure so tests can pass their own env map
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true'));

const positiveInt = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);

const weight = (defaultValue: number) => z.coerce.number().min(0).max(10).default(defaultValue);

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    PORT: positiveInt(3000),

    // Stores
    ENABLE_REDIS_STORES: booleanFlag(false),
    REDIS_URL: z.string().url().optional(),
    SESSION_TTL_SECONDS: positiveInt(24 * 60 * 60),

    // Embeddings
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_EMBEDDING_BASE_URL: z.string().url().optional().or(z.literal('').transform(() => undefined)),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
    EMBEDDING_DIM: positiveInt(256),

    // Catalog
    VENUES_DATA_PATH: z.string().min(1).default('./server/data/venues.sample.json'),

    // Pipeline budgets
    RETRIEVAL_LIMIT: z.coerce.number().int().min(1).max(50).default(50),
    RETRIEVAL_DEADLINE_MS: positiveInt(4000),
    PROFILE_DEADLINE_MS: positiveInt(1500),
    SCORING_DEADLINE_MS: positiveInt(500),
    SELECTION_DEADLINE_MS: positiveInt(200),

    // Personalization weights
    WEIGHT_PREFERRED_TAG: weight(0.1),
    WEIGHT_AVOIDED_TAG: weight(0.35),
    WEIGHT_FAVORITE_DISTRICT: weight(0.1),
    WEIGHT_DISLIKED_VENUE: weight(1.0),
    EXCLUDE_DISLIKED: booleanFlag(true)
  })
  .refine((env) => env.WEIGHT_AVOIDED_TAG > env.WEIGHT_PREFERRED_TAG, {
    message: 'WEIGHT_AVOIDED_TAG must be larger than WEIGHT_PREFERRED_TAG',
    path: ['WEIGHT_AVOIDED_TAG']
  })
  .refine((env) => !env.ENABLE_REDIS_STORES || !!env.REDIS_URL, {
    message: 'REDIS_URL is required when ENABLE_REDIS_STORES=true',
    path: ['REDIS_URL']
  });

export type AppEnv = 'development' | 'test' | 'staging' | 'production';

export interface PersonalizationWeights {
  preferredTag: number;
  avoidedTag: number;
  favoriteDistrict: number;
  dislikedVenue: number;
  /** Preferred-tag matches beyond this count add nothing */
  maxPreferredMatches: number;
}

export interface StageDeadlines {
  retrievalMs: number;
  profileMs: number;
  scoringMs: number;
  selectionMs: number;
}

export interface AppConfig {
  env: AppEnv;
  port: number;
  redis: {
    enabled: boolean;
    url: string | null;
    sessionTtlSeconds: number;
  };
  embedding: {
    openaiApiKey: string | null;
    baseUrl: string | null;
    model: string;
    dimension: number;
  };
  venuesDataPath: string;
  retrievalLimit: number;
  deadlines: StageDeadlines;
  weights: PersonalizationWeights;
  excludeDisliked: boolean;
}

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parse and validate an env map into AppConfig
 * @throws ConfigValidationError listing every invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;

  return Object.freeze({
    env: e.NODE_ENV,
    port: e.PORT,
    redis: {
      enabled: e.ENABLE_REDIS_STORES,
      url: e.REDIS_URL ?? null,
      sessionTtlSeconds: e.SESSION_TTL_SECONDS
    },
    embedding: {
      openaiApiKey: e.OPENAI_API_KEY ? e.OPENAI_API_KEY : null,
      baseUrl: e.OPENAI_EMBEDDING_BASE_URL ?? null,
      model: e.OPENAI_EMBEDDING_MODEL,
      dimension: e.EMBEDDING_DIM
    },
    venuesDataPath: e.VENUES_DATA_PATH,
    retrievalLimit: e.RETRIEVAL_LIMIT,
    deadlines: {
      retrievalMs: e.RETRIEVAL_DEADLINE_MS,
      profileMs: e.PROFILE_DEADLINE_MS,
      scoringMs: e.SCORING_DEADLINE_MS,
      selectionMs: e.SELECTION_DEADLINE_MS
    },
    weights: {
      preferredTag: e.WEIGHT_PREFERRED_TAG,
      avoidedTag: e.WEIGHT_AVOIDED_TAG,
      favoriteDistrict: e.WEIGHT_FAVORITE_DISTRICT,
      dislikedVenue: e.WEIGHT_DISLIKED_VENUE,
      maxPreferredMatches: 3
    },
    excludeDisliked: e.EXCLUDE_DISLIKED
  });
}

let cachedConfig: AppConfig | null = null;

/**
 * Process-wide config (memoized)
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}
