/**
 * In-Memory Profile Store
 * Profiles and interaction log for a single process (dev + tests)
 */

import { logger } from '../../../lib/logger/structured-logger.js';
import type { Interaction, InteractionCounts, InteractionSummary, UserProfile } from '../types.js';
import type { IProfileStore } from './profile-store.interface.js';

export class InMemoryProfileStore implements IProfileStore {
  private profiles = new Map<string, UserProfile>();
  private interactions = new Map<string, Interaction[]>();

  constructor(seed: readonly UserProfile[] = []) {
    for (const profile of seed) {
      this.profiles.set(profile.userId, profile);
    }
    logger.info({ profiles: this.profiles.size, msg: '[InMemoryProfileStore] Initialized' });
  }

  async getProfile(userId: string): Promise<UserProfile | null> {
    return this.profiles.get(userId) ?? null;
  }

  async getInteractionSummary(userId: string): Promise<InteractionSummary> {
    const summary = new Map<number, InteractionCounts>();
    for (const interaction of this.interactions.get(userId) ?? []) {
      const counts = summary.get(interaction.venueId) ?? { liked: 0, disliked: 0 };
      counts[interaction.type]++;
      summary.set(interaction.venueId, counts);
    }
    return summary;
  }

  async appendInteraction(interaction: Interaction): Promise<void> {
    const log = this.interactions.get(interaction.userId) ?? [];
    log.push(interaction);
    this.interactions.set(interaction.userId, log);
  }

  async saveProfile(profile: UserProfile): Promise<void> {
    this.profiles.set(profile.userId, profile);
  }

  async isReady(): Promise<boolean> {
    return true;
  }

  /**
   * Interactions recorded for a user, oldest first
   */
  listInteractions(userId: string): readonly Interaction[] {
    return this.interactions.get(userId) ?? [];
  }
}
