import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { describeConfig, loadConfig, parseInverters } from '../src/config';

describe('parseInverters', () => {
  it('accepts a list of serials', () => {
    assert.deepEqual(parseInverters('["A", " B "]'), { A: {}, B: {} });
  });

  it('accepts per-serial tags and stringifies numbers', () => {
    assert.deepEqual(parseInverters('{"A": {"array": "east", "tilt": 30}, "B": null}'), {
      A: { array: 'east', tilt: '30' },
      B: {},
    });
  });

  it('treats an unset value as no expected inverters', () => {
    assert.deepEqual(parseInverters(undefined), {});
    assert.deepEqual(parseInverters('  '), {});
  });

  it('rejects malformed values', () => {
    assert.throws(() => parseInverters('{not json'), /INVERTERS must be valid JSON/);
    assert.throws(() => parseInverters('[""]'), /INVERTERS\[0\] must be a non-empty serial string/);
    assert.throws(() => parseInverters('{"A": "east"}'), /INVERTERS\["A"\] must be an object/);
    assert.throws(() => parseInverters('{"A": {"array": true}}'), /INVERTERS\["A"\]\.array must be a string or number/);
    assert.throws(() => parseInverters('42'), /INVERTERS must be a JSON object/);
  });
});

describe('loadConfig', () => {
  it('applies defaults around the required token', () => {
    const config = loadConfig({ ENVOY_TOKEN: 'test-secret' });

    assert.equal(config.port, 3001);
    assert.equal(config.httpEnabled, true);
    assert.deepEqual(config.envoy, {
      url: 'https://envoy.local',
      token: 'test-secret',
      requestTimeoutMs: 10_000,
      rejectUnauthorized: false,
    });
    assert.deepEqual(config.sampler, {
      pollingIntervalSeconds: 60,
      inverterPollingIntervalSeconds: 300,
      powerPollMaxAttempts: 10,
      powerPollRetryWaitSeconds: 5,
      watermarkLookbackDays: 30,
      sourceTag: 'envoy',
      inverters: {},
      buckets: { highRate: 'envoy_hr', daily: 'envoy_daily' },
      timeZone: undefined,
    });
    assert.equal(config.db.database, 'envoy_sampler');
    assert.equal(config.observability.prometheusPath, '/metrics');
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      ENVOY_TOKEN: 'test-secret',
      ENVOY_URL: 'https://192.0.2.10/',
      POLLING_INTERVAL_SECONDS: '30',
      INVERTER_POLLING_INTERVAL_SECONDS: '600',
      POWER_POLL_RETRY_WAIT_SECONDS: '0',
      INVERTERS: '["A"]',
      TIMEZONE: 'Europe/Berlin',
      PROMETHEUS_PATH: 'prom',
      HTTP_ENABLED: 'false',
    });

    assert.equal(config.envoy.url, 'https://192.0.2.10');
    assert.equal(config.sampler.pollingIntervalSeconds, 30);
    assert.equal(config.sampler.inverterPollingIntervalSeconds, 600);
    assert.equal(config.sampler.powerPollRetryWaitSeconds, 0);
    assert.deepEqual(config.sampler.inverters, { A: {} });
    assert.equal(config.sampler.timeZone, 'Europe/Berlin');
    assert.equal(config.observability.prometheusPath, '/prom');
    assert.equal(config.httpEnabled, false);
  });

  it('requires the gateway token', () => {
    assert.throws(() => loadConfig({}), /\[config\] ENVOY_TOKEN must be injected/);
  });

  it('rejects invalid numbers and time zones', () => {
    assert.throws(
      () => loadConfig({ ENVOY_TOKEN: 'test-secret', POLLING_INTERVAL_SECONDS: '0' }),
      /POLLING_INTERVAL_SECONDS must be a positive integer/,
    );
    assert.throws(
      () => loadConfig({ ENVOY_TOKEN: 'test-secret', POWER_POLL_RETRY_WAIT_SECONDS: '-1' }),
      /POWER_POLL_RETRY_WAIT_SECONDS must be zero or a positive number/,
    );
    assert.throws(
      () => loadConfig({ ENVOY_TOKEN: 'test-secret', TIMEZONE: 'Mars/Olympus_Mons' }),
      /TIMEZONE "Mars\/Olympus_Mons" is not a recognised IANA time zone/,
    );
  });

  it('takes the gateway address from ENVOY_URL only', () => {
    const config = loadConfig({ ENVOY_TOKEN: 'test-secret', ENVOY_SERIAL: '123456789012' });
    assert.deepEqual(Object.keys(config.envoy).sort(), ['rejectUnauthorized', 'requestTimeoutMs', 'token', 'url']);
    assert.ok(!('envoySerial' in describeConfig(config)));
  });

  it('never prints the token', () => {
    const summary = describeConfig(loadConfig({ ENVOY_TOKEN: 'test-secret' }));
    assert.equal(summary.envoyToken, 'set');
    assert.ok(!JSON.stringify(summary).includes('test-secret'));
  });
});
