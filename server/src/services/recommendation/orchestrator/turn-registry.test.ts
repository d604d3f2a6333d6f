/**
 * Turn Registry Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TurnRegistry, SUPERSEDED_REASON } from './turn-registry.js';

describe('TurnRegistry', () => {
  it('aborts the previous turn of the same user', () => {
    const registry = new TurnRegistry();
    const first = registry.begin('user-1', 'turn-1');
    const second = registry.begin('user-1', 'turn-2');

    assert.equal(first.signal.aborted, true);
    assert.equal(first.signal.reason, SUPERSEDED_REASON);
    assert.equal(second.signal.aborted, false);
    assert.equal(registry.activeCount, 1);
    assert.deepEqual(registry.getStats(), { started: 2, superseded: 1, active: 1 });
  });

  it('keeps turns of different users independent', () => {
    const registry = new TurnRegistry();
    const a = registry.begin('user-1', 'turn-1');
    const b = registry.begin('user-2', 'turn-2');

    assert.equal(a.signal.aborted, false);
    assert.equal(b.signal.aborted, false);
    assert.equal(registry.activeCount, 2);
  });

  it('ignores a late release from a superseded turn', () => {
    const registry = new TurnRegistry();
    const first = registry.begin('user-1', 'turn-1');
    registry.begin('user-1', 'turn-2');

    first.release();
    assert.equal(registry.activeCount, 1);
  });

  it('cancels the in-flight turn on request', () => {
    const registry = new TurnRegistry();
    const turn = registry.begin('user-1', 'turn-1');

    assert.equal(registry.cancel('user-1'), true);
    assert.equal(turn.signal.aborted, true);
    assert.equal(registry.cancel('user-1'), false);
    assert.equal(registry.activeCount, 0);
  });
});
