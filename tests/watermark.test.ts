import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { filterNewReadings, resolveWatermark } from '../src/controllers/watermark';
import { QueryError } from '../src/errors';
import { FakeStore, inverterSnapshot, recordingLogger } from './support/fakes';

describe('filterNewReadings', () => {
  const snapshot = inverterSnapshot([
    ['A', '2024-01-01T12:00:00Z', 250],
    ['B', '2024-01-01T12:05:00Z', 260],
    ['C', '2024-01-01T11:55:00Z', 240],
  ]);

  it('keeps everything when there is no watermark', () => {
    const kept = filterNewReadings(snapshot, null);
    assert.deepEqual([...kept.keys()], ['A', 'B', 'C']);
    assert.notEqual(kept, snapshot);
  });

  it('drops readings at or before the watermark', () => {
    const kept = filterNewReadings(snapshot, new Date('2024-01-01T12:00:00Z'));
    assert.deepEqual([...kept.keys()], ['B']);
    assert.equal(kept.get('B')?.watts, 260);
  });

  it('drops everything when no inverter reported since the watermark', () => {
    const kept = filterNewReadings(snapshot, new Date('2024-01-01T13:00:00Z'));
    assert.equal(kept.size, 0);
  });
});

describe('resolveWatermark', () => {
  it('queries the newest inverter point within the lookback window', async () => {
    const store = new FakeStore();
    store.latest = new Date('2024-01-01T12:00:00Z');
    const { logger } = recordingLogger();

    const cutoff = await resolveWatermark(store, {
      bucket: 'envoy_hr',
      sourceTag: 'envoy',
      lookbackDays: 30,
      now: new Date('2024-01-31T00:00:00Z'),
      logger,
    });

    assert.equal(cutoff?.toISOString(), '2024-01-01T12:00:00.000Z');
    assert.deepEqual(store.latestQueries, [
      {
        bucket: 'envoy_hr',
        sourceTag: 'envoy',
        measurementType: 'inverter',
        since: new Date('2024-01-01T00:00:00Z'),
      },
    ]);
  });

  it('falls back to no filtering when the query fails', async () => {
    const store = new FakeStore();
    store.latestError = new QueryError('connection reset');
    const { logger, lines } = recordingLogger();

    const cutoff = await resolveWatermark(store, {
      bucket: 'envoy_hr',
      sourceTag: 'envoy',
      lookbackDays: 30,
      now: new Date('2024-01-31T00:00:00Z'),
      logger,
    });

    assert.equal(cutoff, null);
    assert.equal(lines.length, 1);
    assert.equal(lines[0].level, 'warn');
  });

  it('propagates unexpected errors', async () => {
    const store = new FakeStore();
    store.latestError = new RangeError('bug');
    const { logger } = recordingLogger();

    await assert.rejects(
      resolveWatermark(store, {
        bucket: 'envoy_hr',
        sourceTag: 'envoy',
        lookbackDays: 30,
        now: new Date('2024-01-31T00:00:00Z'),
        logger,
      }),
      RangeError,
    );
  });
});
