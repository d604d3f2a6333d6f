/**
 * Turn Registry
 * One in-flight turn per user: starting a new turn aborts the previous one.
 */

import { logger } from '../../../lib/logger/structured-logger.js';

export const SUPERSEDED_REASON = 'superseded';

export interface TurnHandle {
  turnId: string;
  signal: AbortSignal;
  /** Abort this turn (e.g. client disconnected) */
  abort(reason: string): void;
  /** Forget this turn; no-op once a newer turn replaced it */
  release(): void;
}

interface InFlightTurn {
  turnId: string;
  controller: AbortController;
}

export class TurnRegistry {
  private inFlight = new Map<string, InFlightTurn>();
  private stats = {
    started: 0,
    superseded: 0
  };

  begin(userId: string, turnId: string): TurnHandle {
    const previous = this.inFlight.get(userId);
    if (previous) {
      this.stats.superseded++;
      previous.controller.abort(SUPERSEDED_REASON);
      logger.info({
        event: 'turn_superseded',
        userId,
        previousTurnId: previous.turnId,
        turnId
      }, '[TurnRegistry] Previous turn superseded');
    }

    const controller = new AbortController();
    const entry: InFlightTurn = { turnId, controller };
    this.inFlight.set(userId, entry);
    this.stats.started++;

    return {
      turnId,
      signal: controller.signal,
      abort: (reason: string) => controller.abort(reason),
      release: () => {
        if (this.inFlight.get(userId) === entry) {
          this.inFlight.delete(userId);
        }
      }
    };
  }

  /**
   * Abort the user's in-flight turn, if any
   */
  cancel(userId: string, reason = 'cancelled'): boolean {
    const entry = this.inFlight.get(userId);
    if (!entry) return false;

    entry.controller.abort(reason);
    this.inFlight.delete(userId);
    return true;
  }

  get activeCount(): number {
    return this.inFlight.size;
  }

  getStats() {
    return { ...this.stats, active: this.inFlight.size };
  }
}
