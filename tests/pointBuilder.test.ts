import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  inverterHighRatePoints,
  linePoint,
  powerHighRatePoints,
  truncateToSeconds,
} from '../src/controllers/pointBuilder';
import { inverterSnapshot, line, powerSnapshot } from './support/fakes';

describe('point construction', () => {
  it('truncates timestamps to whole seconds', () => {
    assert.equal(truncateToSeconds(new Date('2024-01-01T00:00:05.999Z')).toISOString(), '2024-01-01T00:00:05.000Z');
  });

  it('builds one point per line with all electrical fields', () => {
    const point = linePoint('envoy', 'production', 1, line(1200), new Date('2024-01-01T12:00:00.250Z'));
    assert.deepEqual(point, {
      measurement: 'production-line1',
      timestamp: new Date('2024-01-01T12:00:00Z'),
      tags: { source: 'envoy', 'measurement-type': 'production', 'line-idx': '1' },
      fields: { P: 1200, Q: 10, S: 1220, I_rms: 1.5, V_rms: 240 },
    });
  });

  it('orders power points consumption, production, then net', () => {
    const snapshot = {
      ...powerSnapshot('2024-01-01T12:00:00Z'),
      net: [line(-700), line(-20)],
    };
    const points = powerHighRatePoints('envoy', snapshot);
    assert.deepEqual(
      points.map((p) => p.measurement),
      ['consumption-line0', 'production-line0', 'net-line0', 'net-line1'],
    );
    assert.ok(points.every((p) => p.timestamp.getTime() === Date.parse('2024-01-01T12:00:00Z')));
  });

  it('tags inverter points with configured tags and the serial', () => {
    const points = inverterHighRatePoints(
      'envoy',
      inverterSnapshot([
        ['A', '2024-01-01T12:00:00Z', 250],
        ['B', '2024-01-01T12:01:00Z', 0],
      ]),
      { A: { array: 'east', 'measurement-type': 'ignored' } },
    );

    assert.deepEqual(points, [
      {
        measurement: 'inverter-production-A',
        timestamp: new Date('2024-01-01T12:00:00Z'),
        tags: { array: 'east', 'measurement-type': 'inverter', source: 'envoy', serial: 'A' },
        fields: { P: 250 },
      },
      {
        measurement: 'inverter-production-B',
        timestamp: new Date('2024-01-01T12:01:00Z'),
        tags: { source: 'envoy', 'measurement-type': 'inverter', serial: 'B' },
        fields: { P: 0 },
      },
    ]);
  });
});
