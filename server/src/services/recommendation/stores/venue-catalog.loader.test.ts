/**
 * Venue Catalog Loader Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  parseVenueCatalog,
  describeVenue,
  buildVectorIndex,
  CatalogValidationError
} from './venue-catalog.loader.js';
import { HashingEmbeddingProvider } from '../embedding/hashing-embedding.provider.js';
import type { IEmbeddingProvider } from '../embedding/embedding-provider.interface.js';
import { makeVenue } from '../__tests__/venue.fixtures.js';

describe('parseVenueCatalog', () => {
  it('normalizes tags and fills defaults', () => {
    const [venue] = parseVenueCatalog([
      {
        id: 1,
        name: ' Бар на крыше ',
        district: 'Тверской',
        lat: 55.76,
        lon: 37.61,
        rating: 4.2,
        tags: [' Шумно ', 'шумно', 'Живая   Музыка']
      }
    ]);

    assert.equal(venue.name, 'Бар на крыше');
    assert.equal(venue.district, 'Тверской');
    assert.deepEqual(venue.tags, ['шумно', 'живая музыка']);
    assert.deepEqual(venue.location, { lat: 55.76, lon: 37.61 });
    assert.equal(venue.city, null);
    assert.equal(venue.reviewsCount, 0);
    assert.equal(venue.rating, 4.2);
  });

  it('leaves location null when a coordinate is missing', () => {
    const [venue] = parseVenueCatalog([{ id: 2, name: 'Без адреса', lat: 55.7 }]);
    assert.equal(venue.location, null);
    assert.equal(venue.rating, null);
  });

  it('rejects duplicate ids', () => {
    assert.throws(
      () => parseVenueCatalog([{ id: 1, name: 'A' }, { id: 1, name: 'B' }]),
      (err: unknown) => err instanceof CatalogValidationError && /duplicate id 1/.test(err.message)
    );
  });

  it('rejects out-of-range ratings', () => {
    assert.throws(() => parseVenueCatalog([{ id: 1, name: 'A', rating: 7 }]), CatalogValidationError);
  });
});

describe('describeVenue', () => {
  it('joins name, tags, district and rating', () => {
    const venue = makeVenue({ id: 1, name: 'Кофемания', tags: ['кофе', 'завтраки'], district: 'Арбат', rating: 4.5 });
    assert.equal(describeVenue(venue), 'Кофемания. Категории: кофе, завтраки. Район: Арбат. Рейтинг: 4.5');
  });

  it('skips missing parts', () => {
    assert.equal(describeVenue(makeVenue({ id: 2, name: 'Парк', rating: null })), 'Парк');
  });
});

describe('buildVectorIndex', () => {
  const venues = [
    makeVenue({ id: 1, name: 'Каток', tags: ['зима'] }),
    makeVenue({ id: 2, name: 'Музей', tags: ['искусство'] })
  ];

  it('embeds every venue', async () => {
    const vectors = await buildVectorIndex(venues, new HashingEmbeddingProvider(32));
    assert.deepEqual([...vectors.keys()], [1, 2]);
    assert.equal(vectors.get(1)?.length, 32);
  });

  it('leaves out venues whose embedding fails', async () => {
    const hashing = new HashingEmbeddingProvider(32);
    const flaky: IEmbeddingProvider = {
      dimension: 32,
      model: 'flaky',
      embed: async (text) => {
        if (text.startsWith('Музей')) throw new Error('quota exceeded');
        return hashing.embedSync(text);
      }
    };

    const vectors = await buildVectorIndex(venues, flaky);
    assert.deepEqual([...vectors.keys()], [1]);
  });
});
