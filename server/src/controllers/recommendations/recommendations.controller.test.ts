/**
 * Recommendations HTTP API Tests
 * supertest against createApp() with in-memory stores
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';
import { createApp } from '../../app.js';
import type { RecommendationServices } from '../../services/recommendation/index.js';
import { RecommendationOrchestrator } from '../../services/recommendation/orchestrator/recommendation.orchestrator.js';
import { TurnRegistry } from '../../services/recommendation/orchestrator/turn-registry.js';
import { InteractionService } from '../../services/recommendation/interactions/interaction.service.js';
import { InMemoryCandidateStore } from '../../services/recommendation/stores/inmemory-candidate.store.js';
import { InMemoryProfileStore } from '../../services/recommendation/stores/inmemory-profile.store.js';
import { InMemoryUserLocationStore } from '../../services/session/user-location.store.js';
import type { ICandidateStore, SimilarHit } from '../../services/recommendation/stores/candidate-store.interface.js';
import type { IEmbeddingProvider } from '../../services/recommendation/embedding/embedding-provider.interface.js';
import { makeVenue } from '../../services/recommendation/__tests__/venue.fixtures.js';

const venues = [
  makeVenue({ id: 1, district: 'Тверской', tags: ['шумно', 'бар'] }),
  makeVenue({ id: 2, district: 'Арбат', tags: ['кафе', 'тихо'] }),
  makeVenue({ id: 3, district: 'Якиманка', tags: ['музей'] })
];

const vectors = new Map([
  [1, [1, 0]],
  [2, [0.95, 0.31]],
  [3, [0.9, 0.44]]
]);

const fixedEmbedder: IEmbeddingProvider = { dimension: 2, model: 'fixed', embed: async () => [1, 0] };

class DownCandidateStore extends InMemoryCandidateStore {
  async searchSimilar(): Promise<SimilarHit[]> {
    throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
  }

  async isReady(): Promise<boolean> {
    return false;
  }
}

function buildServices(candidateStore: ICandidateStore = new InMemoryCandidateStore(venues, vectors)): RecommendationServices {
  const profileStore = new InMemoryProfileStore();
  const locationStore = new InMemoryUserLocationStore(3600);

  return {
    orchestrator: new RecommendationOrchestrator({
      candidateStore,
      profileStore,
      embedder: fixedEmbedder,
      locationStore,
      weights: { preferredTag: 0.1, avoidedTag: 0.35, favoriteDistrict: 0.1, dislikedVenue: 1.0, maxPreferredMatches: 3 },
      deadlines: { retrievalMs: 2000, profileMs: 1000, scoringMs: 1000, selectionMs: 1000 },
      retrievalLimit: 50,
      excludeDisliked: true
    }),
    interactions: new InteractionService({ profileStore, candidateStore }),
    turns: new TurnRegistry(),
    candidateStore,
    profileStore,
    locationStore
  };
}

const semanticBody = {
  userId: 'user-1',
  query: { mode: 'semantic', text: 'куда сходить вечером' }
};

describe('POST /api/v1/recommendations', () => {
  it('returns the turn result', async () => {
    const app = createApp(buildServices());

    const response = await request(app)
      .post('/api/v1/recommendations')
      .set('x-trace-id', 'trace-abc')
      .send(semanticBody)
      .expect(200);

    assert.equal(response.headers['x-trace-id'], 'trace-abc');
    assert.equal(response.body.requestId, 'trace-abc');
    assert.equal(response.body.state, 'Done');
    assert.equal(response.body.outcome, 'recommendations');
    assert.deepEqual(response.body.venues.map((v: { id: number }) => v.id), [1, 2, 3]);
  });

  it('answers a clarify query with a question', async () => {
    const app = createApp(buildServices());

    const response = await request(app)
      .post('/api/v1/recommendations')
      .send({ userId: 'user-1', query: { mode: 'clarify', question: 'Кафе или бар?' } })
      .expect(200);

    assert.equal(response.body.state, 'Clarifying');
    assert.equal(response.body.clarifyingQuestion, 'Кафе или бар?');
  });

  it('rejects an invalid body with 400 and a traceId', async () => {
    const app = createApp(buildServices());

    const response = await request(app)
      .post('/api/v1/recommendations')
      .send({ userId: 'user-1', query: { mode: 'semantic' } })
      .expect(400);

    assert.equal(response.body.code, 'VALIDATION_ERROR');
    assert.deepEqual(response.body.details, [{ path: 'query.text', message: 'Required' }]);
    assert.equal(response.body.traceId, response.headers['x-trace-id']);
  });

  it('rejects malformed JSON', async () => {
    const app = createApp(buildServices());

    const response = await request(app)
      .post('/api/v1/recommendations')
      .set('content-type', 'application/json')
      .send('{"userId":')
      .expect(400);

    assert.equal(response.body.code, 'INVALID_JSON');
  });

  it('returns 503 with a user-safe message when the store is down', async () => {
    const app = createApp(buildServices(new DownCandidateStore(venues, vectors)));

    const response = await request(app)
      .post('/api/v1/recommendations')
      .send(semanticBody)
      .expect(503);

    assert.equal(response.body.state, 'Failed');
    assert.equal(response.body.message, 'Поиск сейчас недоступен. Попробуйте ещё раз через несколько секунд.');
  });

  it('releases the turn once answered', async () => {
    const app = createApp(buildServices());
    await request(app).post('/api/v1/recommendations').send(semanticBody).expect(200);

    const stats = await request(app).get('/api/v1/recommendations/stats').expect(200);
    assert.deepEqual(stats.body, { started: 1, superseded: 0, active: 0 });
  });
});

describe('interactions and profile', () => {
  it('accepts an interaction and builds the profile in the background', async () => {
    const services = buildServices();
    const app = createApp(services);

    const accepted = await request(app)
      .post('/api/v1/interactions')
      .send({ userId: 'user-1', venueId: 1, type: 'liked' })
      .expect(202);
    assert.equal(accepted.body.accepted, true);

    await services.interactions.drain();

    const response = await request(app).get('/api/v1/profile/user-1').expect(200);
    assert.deepEqual(response.body.profile.preferredTags, ['шумно', 'бар']);
    assert.deepEqual(response.body.profile.favoriteDistricts, ['Тверской']);
  });

  it('rejects an unknown interaction type', async () => {
    const app = createApp(buildServices());

    const response = await request(app)
      .post('/api/v1/interactions')
      .send({ userId: 'user-1', venueId: 1, type: 'loved' })
      .expect(400);

    assert.equal(response.body.code, 'VALIDATION_ERROR');
  });

  it('returns 404 for a user without a profile', async () => {
    const app = createApp(buildServices());

    const response = await request(app).get('/api/v1/profile/nobody').expect(404);
    assert.equal(response.body.code, 'PROFILE_NOT_FOUND');
  });
});

describe('DELETE /api/v1/session/:userId', () => {
  it('forgets the saved location', async () => {
    const services = buildServices();
    await services.locationStore.save('user-1', { lat: 55.75, lon: 37.62 });

    await request(createApp(services)).delete('/api/v1/session/user-1').expect(204);

    assert.equal(await services.locationStore.get('user-1'), null);
  });
});

describe('health', () => {
  it('reports liveness', async () => {
    const response = await request(createApp(buildServices())).get('/healthz').expect(200);
    assert.equal(response.body.status, 'UP');
  });

  it('reports readiness per store', async () => {
    const response = await request(createApp(buildServices())).get('/ready').expect(200);
    assert.deepEqual(response.body.checks, {
      process: 'UP',
      candidateStore: 'UP',
      profileStore: 'UP',
      locationStore: 'UP'
    });
  });

  it('returns 503 when a store is not ready', async () => {
    const response = await request(createApp(buildServices(new DownCandidateStore(venues, vectors))))
      .get('/ready')
      .expect(503);

    assert.equal(response.body.status, 'NOT_READY');
    assert.equal(response.body.checks.candidateStore, 'DOWN');
  });
});
