import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { normalizeTag, normalizeTags, toTagSet } from './tag-normalizer.js';

describe('normalizeTag', () => {
  it('trims, lower-cases and collapses whitespace', () => {
    assert.equal(normalizeTag('  Живая   Музыка '), 'живая музыка');
    assert.equal(normalizeTag('BAR'), 'bar');
  });
});

describe('normalizeTags', () => {
  it('drops empties and duplicates, keeping first-seen order', () => {
    assert.deepEqual(normalizeTags(['Кафе', ' ', 'бар', 'кафе ', 'Бар']), ['кафе', 'бар']);
  });

  it('treats null as empty', () => {
    assert.deepEqual(normalizeTags(null), []);
  });
});

describe('toTagSet', () => {
  it('builds a normalized set', () => {
    const set = toTagSet(['Шумно', 'шумно', 'Бар']);
    assert.equal(set.size, 2);
    assert.ok(set.has('шумно'));
    assert.ok(set.has('бар'));
  });
});
