/**
 * Recommendation service wiring
 * Picks stores and embedding provider from config, loads the catalog and
 * builds the vector index once at startup.
 */

import type { AppConfig } from '../../config/env.js';
import { logger } from '../../lib/logger/structured-logger.js';
import { getRedisClient } from '../../lib/redis/redis-client.js';
import {
  InMemoryUserLocationStore,
  RedisUserLocationStore,
  type IUserLocationStore
} from '../session/user-location.store.js';
import type { IEmbeddingProvider } from './embedding/embedding-provider.interface.js';
import { HashingEmbeddingProvider } from './embedding/hashing-embedding.provider.js';
import { OpenAIEmbeddingProvider } from './embedding/openai-embedding.provider.js';
import { InteractionService } from './interactions/interaction.service.js';
import { RecommendationOrchestrator } from './orchestrator/recommendation.orchestrator.js';
import { TurnRegistry } from './orchestrator/turn-registry.js';
import type { ICandidateStore } from './stores/candidate-store.interface.js';
import { InMemoryCandidateStore } from './stores/inmemory-candidate.store.js';
import { InMemoryProfileStore } from './stores/inmemory-profile.store.js';
import type { IProfileStore } from './stores/profile-store.interface.js';
import { RedisProfileStore } from './stores/redis-profile.store.js';
import { buildVectorIndex, loadVenueCatalog } from './stores/venue-catalog.loader.js';

export interface RecommendationServices {
  orchestrator: RecommendationOrchestrator;
  interactions: InteractionService;
  turns: TurnRegistry;
  candidateStore: ICandidateStore;
  profileStore: IProfileStore;
  locationStore: IUserLocationStore;
}

export function createEmbeddingProvider(config: AppConfig): IEmbeddingProvider {
  const { openaiApiKey, baseUrl, model, dimension } = config.embedding;

  if (openaiApiKey) {
    logger.info({ event: 'embedding_provider_selected', provider: 'openai', model, dimension }, '[Recommendation] Using OpenAI embeddings');
    return new OpenAIEmbeddingProvider({ apiKey: openaiApiKey, baseUrl, model, dimension });
  }

  logger.info({ event: 'embedding_provider_selected', provider: 'hashing', dimension }, '[Recommendation] OPENAI_API_KEY not set, using local hashing embeddings');
  return new HashingEmbeddingProvider(dimension);
}

async function createStateStores(config: AppConfig): Promise<{ profileStore: IProfileStore; locationStore: IUserLocationStore }> {
  const { enabled, url, sessionTtlSeconds } = config.redis;

  if (enabled && url) {
    const redis = await getRedisClient({ url });
    if (redis) {
      logger.info({ event: 'stores_selected', backend: 'redis' }, '[Recommendation] Using Redis stores');
      return {
        profileStore: new RedisProfileStore(redis),
        locationStore: new RedisUserLocationStore(redis, sessionTtlSeconds)
      };
    }

    if (config.env === 'production') {
      throw new Error('ENABLE_REDIS_STORES=true but Redis is unreachable');
    }
  }

  logger.info({ event: 'stores_selected', backend: 'memory' }, '[Recommendation] Using in-memory stores');
  return {
    profileStore: new InMemoryProfileStore(),
    locationStore: new InMemoryUserLocationStore(sessionTtlSeconds)
  };
}

/**
 * Build the full service graph from config
 */
export async function createRecommendationServices(config: AppConfig): Promise<RecommendationServices> {
  const embedder = createEmbeddingProvider(config);

  const venues = await loadVenueCatalog(config.venuesDataPath);
  const vectors = await buildVectorIndex(venues, embedder);
  const candidateStore = new InMemoryCandidateStore(venues, vectors);

  const { profileStore, locationStore } = await createStateStores(config);

  const orchestrator = new RecommendationOrchestrator({
    candidateStore,
    profileStore,
    embedder,
    locationStore,
    weights: config.weights,
    deadlines: config.deadlines,
    retrievalLimit: config.retrievalLimit,
    excludeDisliked: config.excludeDisliked
  });

  return {
    orchestrator,
    interactions: new InteractionService({ profileStore, candidateStore }),
    turns: new TurnRegistry(),
    candidateStore,
    profileStore,
    locationStore
  };
}
