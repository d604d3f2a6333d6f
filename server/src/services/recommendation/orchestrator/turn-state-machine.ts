/**
 * Turn State Machine
 *
 * AwaitingQuery ─┬─> Retrieving ─> Scoring ─> Selecting ─> Done
 *                └─> Clarifying
 *
 * Failed and Cancelled are reachable from every non-terminal state.
 * Terminal states accept no further transitions.
 */

import type { TerminalTurnState, TurnState } from '../types.js';

const TRANSITIONS: Record<TurnState, readonly TurnState[]> = {
  AwaitingQuery: ['Retrieving', 'Clarifying', 'Failed', 'Cancelled'],
  Retrieving: ['Scoring', 'Failed', 'Cancelled'],
  Scoring: ['Selecting', 'Failed', 'Cancelled'],
  Selecting: ['Done', 'Failed', 'Cancelled'],
  Done: [],
  Clarifying: [],
  Failed: [],
  Cancelled: []
};

export class InvalidTurnTransitionError extends Error {
  constructor(public readonly from: TurnState, public readonly to: TurnState) {
    super(`Invalid turn transition ${from} -> ${to}`);
    this.name = 'InvalidTurnTransitionError';
  }
}

export function isTerminalState(state: TurnState): state is TerminalTurnState {
  return TRANSITIONS[state].length === 0;
}

export class TurnStateMachine {
  private current: TurnState = 'AwaitingQuery';
  private readonly path: TurnState[] = ['AwaitingQuery'];

  get state(): TurnState {
    return this.current;
  }

  /** Every state visited, starting with AwaitingQuery */
  get history(): TurnState[] {
    return [...this.path];
  }

  canTransition(to: TurnState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: TurnState): void {
    if (!this.canTransition(to)) {
      throw new InvalidTurnTransitionError(this.current, to);
    }
    this.current = to;
    this.path.push(to);
  }

  /**
   * Current state, which must be terminal
   */
  terminal(): TerminalTurnState {
    const state = this.current;
    if (!isTerminalState(state)) {
      throw new Error(`Turn is still in progress (${state})`);
    }
    return state;
  }
}
