/**
 * Profile Store Interface - Storage Abstraction
 * Allows switching between InMemory and Redis implementations
 */

import type { Interaction, InteractionSummary, UserProfile } from '../types.js';

export interface IProfileStore {
  /**
   * Profile for a user, or null when none exists yet
   */
  getProfile(userId: string): Promise<UserProfile | null>;

  /**
   * Per-venue liked/disliked counts for a user
   */
  getInteractionSummary(userId: string): Promise<InteractionSummary>;

  /**
   * Append-only; idempotency not guaranteed
   */
  appendInteraction(interaction: Interaction): Promise<void>;

  saveProfile(profile: UserProfile): Promise<void>;

  isReady(): Promise<boolean>;
}
