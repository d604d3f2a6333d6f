/**
 * Interaction Service
 *
 * Records liked/disliked feedback and folds it into the user's profile:
 * - liked    -> venue tags join preferredTags (and leave avoidedTags), district joins favoriteDistricts
 * - disliked -> venue tags join avoidedTags (and leave preferredTags)
 *
 * Recording is fire-and-forget relative to the response; failures are logged.
 * Interactions of one user are processed one at a time, in arrival order,
 * since each one reads and rewrites the whole profile.
 */

import { logger } from '../../../lib/logger/structured-logger.js';
import { normalizeTag, normalizeTags, toTagSet } from '../query/tag-normalizer.js';
import type { ICandidateStore } from '../stores/candidate-store.interface.js';
import type { IProfileStore } from '../stores/profile-store.interface.js';
import type { Interaction, InteractionType, UserProfile, Venue } from '../types.js';

export interface InteractionServiceDeps {
  profileStore: IProfileStore;
  candidateStore: ICandidateStore;
  now?: () => number;
}

function withoutTags(tags: readonly string[], removed: ReadonlySet<string>): string[] {
  return tags.filter(tag => !removed.has(normalizeTag(tag)));
}

/**
 * Profile after one interaction (pure). Creates the profile when there is none.
 */
export function applyInteraction(
  profile: UserProfile | null,
  userId: string,
  venue: Venue,
  type: InteractionType,
  now: number
): UserProfile {
  const base: UserProfile = profile ?? {
    userId,
    preferredTags: [],
    avoidedTags: [],
    favoriteDistricts: [],
    createdAt: now,
    updatedAt: now
  };

  const venueTags = toTagSet(venue.tags);

  if (type === 'liked') {
    const districts = [...base.favoriteDistricts];
    if (venue.district && !toTagSet(districts).has(normalizeTag(venue.district))) {
      districts.push(venue.district);
    }
    return {
      ...base,
      preferredTags: normalizeTags([...base.preferredTags, ...venueTags]),
      avoidedTags: withoutTags(base.avoidedTags, venueTags),
      favoriteDistricts: districts,
      updatedAt: now
    };
  }

  return {
    ...base,
    preferredTags: withoutTags(base.preferredTags, venueTags),
    avoidedTags: normalizeTags([...base.avoidedTags, ...venueTags]),
    updatedAt: now
  };
}

export class InteractionService {
  private readonly now: () => number;
  private pending = new Set<Promise<void>>();
  /** Tail of each user's processing chain */
  private chains = new Map<string, Promise<void>>();

  constructor(private readonly deps: InteractionServiceDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Fire-and-forget: returns immediately, processing continues in the background
   */
  record(userId: string, venueId: number, type: InteractionType, requestId?: string): void {
    const task = this.process({ userId, venueId, type, createdAt: this.now() })
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.error({
          requestId,
          event: 'interaction_failed',
          userId,
          venueId,
          type,
          error: error instanceof Error ? error.message : String(error)
        }, '[Interactions] Failed to record interaction');
      })
      .finally(() => {
        this.pending.delete(task);
      });

    this.pending.add(task);
  }

  /**
   * Append the interaction, then update the profile.
   * Queued behind any interaction of the same user still in progress.
   * @returns the updated profile, or null when the venue is unknown
   */
  process(interaction: Interaction): Promise<UserProfile | null> {
    const { userId } = interaction;
    const previous = this.chains.get(userId) ?? Promise.resolve();

    // Run after the previous one settles, whatever its outcome
    const run = previous.then(
      () => this.apply(interaction),
      () => this.apply(interaction)
    );

    const tail = run.then(() => undefined, () => undefined);
    this.chains.set(userId, tail);
    void tail.then(() => {
      if (this.chains.get(userId) === tail) {
        this.chains.delete(userId);
      }
    });

    return run;
  }

  private async apply(interaction: Interaction): Promise<UserProfile | null> {
    const { profileStore, candidateStore } = this.deps;

    await profileStore.appendInteraction(interaction);

    const venue = await candidateStore.getVenue(interaction.venueId);
    if (!venue) {
      logger.warn({
        event: 'interaction_unknown_venue',
        userId: interaction.userId,
        venueId: interaction.venueId
      }, '[Interactions] Venue not in catalog, profile left unchanged');
      return null;
    }

    const current = await profileStore.getProfile(interaction.userId);
    const updated = applyInteraction(current, interaction.userId, venue, interaction.type, interaction.createdAt);
    await profileStore.saveProfile(updated);

    logger.info({
      event: 'profile_updated',
      userId: interaction.userId,
      venueId: interaction.venueId,
      type: interaction.type,
      created: current === null,
      preferredTags: updated.preferredTags.length,
      avoidedTags: updated.avoidedTags.length
    }, '[Interactions] Profile updated from interaction');

    return updated;
  }

  /**
   * Wait for background work (graceful shutdown, tests)
   */
  async drain(): Promise<void> {
    await Promise.all([...this.pending]);
  }
}
