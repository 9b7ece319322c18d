import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { CadenceGate } from '../src/state/cadenceGate';

describe('CadenceGate', () => {
  it('is due before the first poll', () => {
    const gate = new CadenceGate(300);
    assert.equal(gate.shouldPoll(new Date('2024-01-01T00:00:00Z')), true);
    assert.equal(gate.lastPoll, null);
  });

  it('waits a full interval after a successful poll', () => {
    const gate = new CadenceGate(300);
    const t0 = new Date('2024-01-01T00:00:00Z');
    gate.markPolled(t0);

    assert.equal(gate.shouldPoll(new Date(t0.getTime() + 10_000)), false);
    assert.equal(gate.shouldPoll(new Date(t0.getTime() + 299_999)), false);
    assert.equal(gate.shouldPoll(new Date(t0.getTime() + 300_000)), true);
    assert.equal(gate.shouldPoll(new Date(t0.getTime() + 301_000)), true);
    assert.equal(gate.lastPoll?.toISOString(), '2024-01-01T00:00:00.000Z');
  });

  it('stays due until a poll is recorded', () => {
    const gate = new CadenceGate(300);
    const t0 = new Date('2024-01-01T00:00:00Z');
    assert.equal(gate.shouldPoll(t0), true);
    assert.equal(gate.shouldPoll(new Date(t0.getTime() + 60_000)), true);
  });
});
