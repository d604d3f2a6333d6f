/**
 * Selection Policy Tests
 * Bounds, district cap, tag overlap, relaxation ladder
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { selectVenues, tagOverlap } from './selection-policy.js';
import { makeVenue, scored } from '../__tests__/venue.fixtures.js';
import type { ScoredCandidate } from '../types.js';

function ids(venues: readonly ScoredCandidate[]): number[] {
  return venues.map(c => c.venue.id);
}

describe('tagOverlap', () => {
  it('computes Jaccard overlap', () => {
    assert.equal(tagOverlap(new Set(['a', 'b', 'c', 'd', 'e']), new Set(['a', 'b', 'c', 'd'])), 0.8);
    assert.equal(tagOverlap(new Set(['a']), new Set(['b'])), 0);
  });

  it('treats two empty sets as unrelated', () => {
    assert.equal(tagOverlap(new Set(), new Set()), 0);
  });
});

describe('selectVenues', () => {
  it('never returns more than 7', () => {
    const pool = Array.from({ length: 20 }, (_, i) => scored(makeVenue({ id: i + 1, tags: [`tag-${i}`] }), 1 - i / 100));

    const result = selectVenues(pool, { max: 10 });

    assert.equal(result.venues.length, 7);
    assert.deepEqual(ids(result.venues), [1, 2, 3, 4, 5, 6, 7]);
    assert.equal(result.relaxation, 'strict');
  });

  it('caps picks per district under strict rules without relaxing', () => {
    const pool = [
      scored(makeVenue({ id: 1, district: 'Арбат', tags: ['a'] }), 0.9),
      scored(makeVenue({ id: 2, district: 'Арбат', tags: ['b'] }), 0.8),
      scored(makeVenue({ id: 3, district: 'арбат', tags: ['c'] }), 0.7),
      scored(makeVenue({ id: 4, district: 'Арбат', tags: ['d'] }), 0.6),
      scored(makeVenue({ id: 5, district: 'Тверской', tags: ['e'] }), 0.5),
      scored(makeVenue({ id: 6, district: 'Тверской', tags: ['f'] }), 0.4),
      scored(makeVenue({ id: 7, district: null, tags: ['g'] }), 0.3)
    ];

    const result = selectVenues(pool);

    assert.deepEqual(ids(result.venues), [1, 2, 5, 6, 7]);
    assert.equal(result.relaxation, 'strict');
    assert.equal(result.insufficient, false);
  });

  it('allows three per district when strict rules leave fewer than 3', () => {
    const pool = [1, 2, 3, 4].map(id => scored(makeVenue({ id, district: 'Арбат', tags: [`t${id}`] }), 1 - id / 10));

    const result = selectVenues(pool);

    assert.deepEqual(ids(result.venues), [1, 2, 3]);
    assert.equal(result.relaxation, 'district_relaxed');
  });

  it('drops the tag-overlap rule as the last rung', () => {
    const pool = [1, 2, 3].map(id => scored(makeVenue({ id, tags: ['кафе', 'кофе'] }), 1 - id / 10));

    const result = selectVenues(pool);

    assert.deepEqual(ids(result.venues), [1, 2, 3]);
    assert.equal(result.relaxation, 'overlap_relaxed');
  });

  it('does not treat untagged venues as duplicates', () => {
    const pool = [1, 2, 3].map(id => scored(makeVenue({ id, tags: [] }), 1 - id / 10));
    const result = selectVenues(pool);

    assert.deepEqual(ids(result.venues), [1, 2, 3]);
    assert.equal(result.relaxation, 'strict');
  });

  it('returns a short list flagged insufficient when the pool is small', () => {
    const pool = [scored(makeVenue({ id: 1 }), 0.9), scored(makeVenue({ id: 2 }), 0.8)];
    const result = selectVenues(pool);

    assert.deepEqual(ids(result.venues), [1, 2]);
    assert.equal(result.insufficient, true);
    assert.equal(result.relaxation, 'overlap_relaxed');
  });

  it('returns nothing for an empty pool', () => {
    const result = selectVenues([]);
    assert.deepEqual(result.venues, []);
    assert.equal(result.insufficient, true);
  });

  it('skips excluded and repeated venues', () => {
    const venue = makeVenue({ id: 2, tags: ['b'] });
    const pool = [
      scored(makeVenue({ id: 1, tags: ['a'] }), 0.9),
      scored(venue, 0.8),
      scored(venue, 0.7),
      scored(makeVenue({ id: 3, tags: ['c'] }), 0.6),
      scored(makeVenue({ id: 4, tags: ['d'] }), 0.5)
    ];

    const result = selectVenues(pool, { excludedVenueIds: new Set([1]) });

    assert.deepEqual(ids(result.venues), [2, 3, 4]);
  });

  it('takes the top unique candidates once the deadline has passed', () => {
    const pool = [1, 2, 3, 4].map(id => scored(makeVenue({ id, district: 'Арбат', tags: ['same'] }), 1 - id / 10));

    const result = selectVenues(pool, { deadlineMs: 0 });

    assert.equal(result.timedOut, true);
    assert.equal(result.relaxation, null);
    assert.deepEqual(ids(result.venues), [1, 2, 3, 4]);
  });
});
