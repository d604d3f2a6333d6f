/**
 * Interaction Service Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InteractionService, applyInteraction } from './interaction.service.js';
import { InMemoryCandidateStore } from '../stores/inmemory-candidate.store.js';
import { InMemoryProfileStore } from '../stores/inmemory-profile.store.js';
import type { Interaction, UserProfile } from '../types.js';
import { makeProfile, makeVenue } from '../__tests__/venue.fixtures.js';

const bar = makeVenue({ id: 1, district: 'Тверской', tags: ['шумно', 'бар'] });
const park = makeVenue({ id: 2, district: null, tags: ['парк', 'тихо'] });

describe('applyInteraction', () => {
  it('creates a profile from the first like', () => {
    const profile = applyInteraction(null, 'user-1', bar, 'liked', 1000);

    assert.deepEqual(profile, {
      userId: 'user-1',
      preferredTags: ['шумно', 'бар'],
      avoidedTags: [],
      favoriteDistricts: ['Тверской'],
      createdAt: 1000,
      updatedAt: 1000
    });
  });

  it('moves tags from avoided to preferred on a like', () => {
    const current = makeProfile({ preferredTags: ['кафе'], avoidedTags: ['Шумно', 'театр'] });
    const profile = applyInteraction(current, 'user-1', bar, 'liked', 50);

    assert.deepEqual(profile.preferredTags, ['кафе', 'шумно', 'бар']);
    assert.deepEqual(profile.avoidedTags, ['театр']);
    assert.equal(profile.createdAt, 0);
    assert.equal(profile.updatedAt, 50);
  });

  it('does not repeat a favorite district', () => {
    const current = makeProfile({ favoriteDistricts: ['тверской'] });
    const profile = applyInteraction(current, 'user-1', bar, 'liked', 1);

    assert.deepEqual(profile.favoriteDistricts, ['тверской']);
  });

  it('moves tags from preferred to avoided on a dislike', () => {
    const current = makeProfile({ preferredTags: ['тихо', 'кафе'], favoriteDistricts: ['Арбат'] });
    const profile = applyInteraction(current, 'user-1', park, 'disliked', 1);

    assert.deepEqual(profile.preferredTags, ['кафе']);
    assert.deepEqual(profile.avoidedTags, ['парк', 'тихо']);
    assert.deepEqual(profile.favoriteDistricts, ['Арбат']);
  });
});

describe('InteractionService', () => {
  function setup(seed: UserProfile[] = []) {
    const profileStore = new InMemoryProfileStore(seed);
    const candidateStore = new InMemoryCandidateStore([bar, park]);
    const service = new InteractionService({ profileStore, candidateStore, now: () => 777 });
    return { profileStore, service };
  }

  it('appends the interaction and updates the profile', async () => {
    const { profileStore, service } = setup();

    const updated = await service.process({ userId: 'user-1', venueId: 2, type: 'disliked', createdAt: 5 });

    assert.deepEqual(updated?.avoidedTags, ['парк', 'тихо']);
    assert.deepEqual(await profileStore.getProfile('user-1'), updated);
    assert.deepEqual(profileStore.listInteractions('user-1'), [
      { userId: 'user-1', venueId: 2, type: 'disliked', createdAt: 5 }
    ]);
  });

  it('logs the interaction but leaves the profile alone for an unknown venue', async () => {
    const { profileStore, service } = setup();

    const updated = await service.process({ userId: 'user-1', venueId: 99, type: 'liked', createdAt: 5 });

    assert.equal(updated, null);
    assert.equal(await profileStore.getProfile('user-1'), null);
    assert.equal(profileStore.listInteractions('user-1').length, 1);
  });

  it('records in the background and drains on request', async () => {
    const { profileStore, service } = setup();

    service.record('user-1', 1, 'liked');
    await service.drain();

    const profile = await profileStore.getProfile('user-1');
    assert.deepEqual(profile?.preferredTags, ['шумно', 'бар']);
    assert.equal(profile?.updatedAt, 777);
  });

  it('keeps every update when one user likes two venues back to back', async () => {
    const museum = makeVenue({ id: 3, district: 'Арбат', tags: ['музей'] });
    const profileStore = new InMemoryProfileStore();
    const service = new InteractionService({
      profileStore,
      candidateStore: new InMemoryCandidateStore([bar, museum])
    });

    service.record('user-1', 1, 'liked');
    service.record('user-1', 3, 'liked');
    await service.drain();

    const profile = await profileStore.getProfile('user-1');
    assert.deepEqual(profile?.preferredTags, ['шумно', 'бар', 'музей']);
    assert.deepEqual(profile?.favoriteDistricts, ['Тверской', 'Арбат']);
    assert.equal(profileStore.listInteractions('user-1').length, 2);
  });

  it('applies queued interactions in arrival order', async () => {
    const { profileStore, service } = setup();

    const liked = service.process({ userId: 'user-1', venueId: 2, type: 'liked', createdAt: 1 });
    const disliked = service.process({ userId: 'user-1', venueId: 2, type: 'disliked', createdAt: 2 });

    assert.deepEqual((await liked)?.preferredTags, ['парк', 'тихо']);
    assert.deepEqual((await disliked)?.preferredTags, []);
    assert.deepEqual((await profileStore.getProfile('user-1'))?.avoidedTags, ['парк', 'тихо']);
  });

  it('keeps processing a user after one of their interactions fails', async () => {
    class FlakyStore extends InMemoryProfileStore {
      failNext = true;

      async appendInteraction(interaction: Interaction): Promise<void> {
        if (this.failNext) {
          this.failNext = false;
          throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
        }
        return super.appendInteraction(interaction);
      }
    }
    const profileStore = new FlakyStore();
    const service = new InteractionService({ profileStore, candidateStore: new InMemoryCandidateStore([bar]) });

    const first = service.process({ userId: 'user-1', venueId: 1, type: 'liked', createdAt: 1 });
    const second = service.process({ userId: 'user-1', venueId: 1, type: 'liked', createdAt: 2 });

    await assert.rejects(first, /ECONNREFUSED/);
    assert.deepEqual((await second)?.preferredTags, ['шумно', 'бар']);
  });

  it('survives a failing store', async () => {
    class BrokenStore extends InMemoryProfileStore {
      async appendInteraction(): Promise<void> {
        throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
      }
    }
    const service = new InteractionService({
      profileStore: new BrokenStore(),
      candidateStore: new InMemoryCandidateStore([bar])
    });

    service.record('user-1', 1, 'liked');
    await service.drain();
  });
});
