import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  RolloverTracker,
  computeInverterDailyPoints,
  computePowerDailyPoints,
  localDateKey,
} from '../src/controllers/rollover';
import { FakeStore } from './support/fakes';

describe('localDateKey', () => {
  it('formats the calendar date in the configured zone', () => {
    const instant = new Date('2024-01-01T23:30:00Z');
    assert.equal(localDateKey(instant, 'UTC'), '2024-01-01');
    assert.equal(localDateKey(instant, 'America/New_York'), '2024-01-01');
    assert.equal(localDateKey(instant, 'Asia/Tokyo'), '2024-01-02');
  });
});

describe('RolloverTracker', () => {
  it('does not roll over on the start day', () => {
    const tracker = new RolloverTracker(new Date('2024-01-01T10:00:00Z'), 'UTC');
    assert.equal(tracker.checkRollover(new Date('2024-01-01T23:59:59Z')), false);
    assert.equal(tracker.currentDay, '2024-01-01');
  });

  it('fires once per date change', () => {
    const tracker = new RolloverTracker(new Date('2024-01-01T23:59:00Z'), 'UTC');
    assert.equal(tracker.checkRollover(new Date('2024-01-02T00:00:30Z')), true);
    assert.equal(tracker.currentDay, '2024-01-02');
    assert.equal(tracker.checkRollover(new Date('2024-01-02T00:01:30Z')), false);
    assert.equal(tracker.checkRollover(new Date('2024-01-03T00:00:10Z')), true);
  });

  it('follows the local calendar rather than UTC', () => {
    const tracker = new RolloverTracker(new Date('2024-01-01T14:00:00Z'), 'Asia/Tokyo');
    assert.equal(tracker.currentDay, '2024-01-01');
    assert.equal(tracker.checkRollover(new Date('2024-01-01T15:00:00Z')), true);
    assert.equal(tracker.currentDay, '2024-01-02');
  });
});

describe('daily totals', () => {
  const now = new Date('2024-01-02T00:00:30Z');

  it('integrates every non-inverter series over the past day by line', async () => {
    const store = new FakeStore();
    store.integrals = () => [
      { key: { 'line-idx': '0', 'measurement-type': 'consumption' }, value: 12_345.6 },
      { key: { 'line-idx': '1', 'measurement-type': 'production' }, value: 8_000 },
    ];

    const points = await computePowerDailyPoints(store, {
      bucket: 'envoy_hr',
      sourceTag: 'envoy',
      now,
      timestamp: new Date('2024-01-02T00:00:15.900Z'),
    });

    assert.deepEqual(store.integralQueries, [
      {
        bucket: 'envoy_hr',
        field: 'P',
        start: new Date('2024-01-01T00:00:30Z'),
        stop: now,
        sourceTag: 'envoy',
        measurementType: 'inverter',
        match: 'exclude',
        groupBy: ['line-idx', 'measurement-type'],
      },
    ]);
    assert.deepEqual(points, [
      {
        measurement: 'consumption-daily-summary-line0',
        timestamp: new Date('2024-01-02T00:00:15Z'),
        tags: { source: 'envoy', 'measurement-type': 'consumption', 'line-idx': '0', interval: '24h' },
        fields: { Wh: 12_345.6 },
      },
      {
        measurement: 'production-daily-summary-line1',
        timestamp: new Date('2024-01-02T00:00:15Z'),
        tags: { source: 'envoy', 'measurement-type': 'production', 'line-idx': '1', interval: '24h' },
        fields: { Wh: 8_000 },
      },
    ]);
  });

  it('produces no power points when nothing was recorded', async () => {
    const store = new FakeStore();
    const points = await computePowerDailyPoints(store, {
      bucket: 'envoy_hr',
      sourceTag: 'envoy',
      now,
      timestamp: now,
    });
    assert.deepEqual(points, []);
  });

  it('reports expected inverters that produced nothing as zero', async () => {
    const store = new FakeStore();
    store.integrals = () => [{ key: { serial: 'A' }, value: 12.5 }];

    const points = await computeInverterDailyPoints(store, {
      bucket: 'envoy_hr',
      sourceTag: 'envoy',
      now,
      timestamp: now,
      inverters: { A: { array: 'east' }, B: {} },
    });

    assert.equal(store.integralQueries[0].match, 'include');
    assert.deepEqual(store.integralQueries[0].groupBy, ['serial']);
    assert.deepEqual(
      points.map((p) => [p.measurement, p.fields.Wh]),
      [
        ['inverter-daily-summary-A', 12.5],
        ['inverter-daily-summary-B', 0],
      ],
    );
    assert.deepEqual(points[0].tags, {
      array: 'east',
      source: 'envoy',
      'measurement-type': 'inverter',
      serial: 'A',
      interval: '24h',
    });
  });

  it('keeps inverters that reported without being configured', async () => {
    const store = new FakeStore();
    store.integrals = () => [{ key: { serial: 'Z' }, value: 3 }];

    const points = await computeInverterDailyPoints(store, {
      bucket: 'envoy_hr',
      sourceTag: 'envoy',
      now,
      timestamp: now,
      inverters: {},
    });

    assert.deepEqual(
      points.map((p) => p.measurement),
      ['inverter-daily-summary-Z'],
    );
  });
});
