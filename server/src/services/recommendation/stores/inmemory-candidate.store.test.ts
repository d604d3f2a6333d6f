/**
 * InMemoryCandidateStore Tests
 * Geo ordering contract, hard filters and vector search
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InMemoryCandidateStore, cosineSimilarity } from './inmemory-candidate.store.js';
import { makeVenue } from '../__tests__/venue.fixtures.js';

const center = { lat: 55.75, lon: 37.62 };

const venues = [
  makeVenue({ id: 1, rating: 4.5, location: { lat: 55.76, lon: 37.62 } }),   // ~1112 m
  makeVenue({ id: 2, rating: 4.5, location: { lat: 55.755, lon: 37.62 } }),  // ~556 m
  makeVenue({ id: 3, rating: 4.8, location: { lat: 55.77, lon: 37.62 } }),   // ~2224 m
  makeVenue({ id: 4, rating: 3.9, location: { lat: 55.751, lon: 37.62 } }),  // below floor
  makeVenue({ id: 5, rating: 4.9, location: { lat: 55.79, lon: 37.62 } }),   // ~4448 m, outside
  makeVenue({ id: 6, rating: 4.7, location: null }),                          // no coordinates
  makeVenue({ id: 7, rating: null, location: { lat: 55.75, lon: 37.62 } })    // unrated
];

describe('InMemoryCandidateStore.searchNearby', () => {
  const store = new InMemoryCandidateStore(venues);

  it('applies radius and rating floor, ordered by rating desc then distance asc', async () => {
    const hits = await store.searchNearby({ point: center, radiusMeters: 3000, minRating: 4.0, limit: 50 });

    assert.deepEqual(hits.map(h => h.venue.id), [3, 2, 1]);
    for (const hit of hits) {
      assert.ok(hit.distanceMeters <= 3000);
      assert.ok((hit.venue.rating ?? 0) >= 4.0);
    }
    assert.ok(hits[1].distanceMeters < hits[2].distanceMeters);
  });

  it('keeps unrated venues only without a rating floor', async () => {
    const hits = await store.searchNearby({ point: center, radiusMeters: 3000, minRating: 0, limit: 50 });
    assert.deepEqual(hits.map(h => h.venue.id), [3, 2, 1, 4, 7]);
  });

  it('never returns venues without coordinates', async () => {
    const hits = await store.searchNearby({ point: center, radiusMeters: 50_000, minRating: 0, limit: 50 });
    assert.ok(hits.every(h => h.venue.id !== 6));
  });

  it('caps at limit', async () => {
    const hits = await store.searchNearby({ point: center, radiusMeters: 3000, minRating: 4.0, limit: 2 });
    assert.deepEqual(hits.map(h => h.venue.id), [3, 2]);
  });

  it('filters by exact tag match', async () => {
    const tagged = new InMemoryCandidateStore([
      makeVenue({ id: 10, location: center, tags: ['бар', 'шумно'] }),
      makeVenue({ id: 11, location: center, tags: ['кафе'] }),
      makeVenue({ id: 12, location: center, tags: ['барбершоп'] })
    ]);
    const hits = await tagged.searchNearby({ point: center, radiusMeters: 100, minRating: 0, tags: ['бар'], limit: 10 });
    assert.deepEqual(hits.map(h => h.venue.id), [10]);
  });

  it('throws when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(
      store.searchNearby({ point: center, radiusMeters: 3000, minRating: 0, limit: 5, signal: controller.signal })
    );
  });
});

describe('InMemoryCandidateStore.searchSimilar', () => {
  const store = new InMemoryCandidateStore(
    [
      makeVenue({ id: 1, rating: 4.2 }),
      makeVenue({ id: 2, rating: 4.8 }),
      makeVenue({ id: 3, rating: 3.0 }),
      makeVenue({ id: 4, rating: 4.9 })
    ],
    new Map([
      [1, [1, 0]],
      [2, [0.6, 0.8]],
      [3, [1, 0.1]]
      // venue 4 has no vector and is invisible to semantic search
    ])
  );

  it('orders by similarity desc and applies the rating floor', async () => {
    const hits = await store.searchSimilar({ vector: [1, 0], minRating: 4.0, limit: 10 });
    assert.deepEqual(hits.map(h => h.venue.id), [1, 2]);
    assert.equal(hits[0].similarity, 1);
    assert.ok(Math.abs(hits[1].similarity - 0.6) < 1e-9);
  });

  it('returns every vector-bearing venue without a floor', async () => {
    const hits = await store.searchSimilar({ vector: [1, 0], minRating: 0, limit: 10 });
    assert.deepEqual(hits.map(h => h.venue.id), [1, 3, 2]);
  });
});

describe('cosineSimilarity', () => {
  it('handles zero vectors and mismatched lengths', () => {
    assert.equal(cosineSimilarity([0, 0], [1, 0]), 0);
    assert.throws(() => cosineSimilarity([1], [1, 0]), /length mismatch/);
  });
});
