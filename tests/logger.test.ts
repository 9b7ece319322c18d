import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { LogLevel, createLogger, isLogLevel } from '../src/logger';

function capture(level: string, pretty: boolean) {
  const lines: { level: LogLevel; line: string }[] = [];
  const logger = createLogger({ level, pretty, write: (lvl, line) => lines.push({ level: lvl, line }) });
  return { logger, lines };
}

describe('logger', () => {
  it('drops messages below the threshold', () => {
    const { logger, lines } = capture('warn', false);
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    assert.deepEqual(
      lines.map((l) => l.level),
      ['warn'],
    );
  });

  it('writes structured JSON lines', () => {
    const { logger, lines } = capture('info', false);
    logger.info('[power] sampled', { lines: 3 });

    const parsed: unknown = JSON.parse(lines[0].line);
    assert.ok(typeof parsed === 'object' && parsed !== null);
    assert.deepEqual({ ...parsed, ts: 'x' }, {
      ts: 'x',
      level: 'info',
      message: '[power] sampled',
      service: 'envoy-sampler',
      lines: 3,
    });
  });

  it('serializes errors passed as metadata', () => {
    const { logger, lines } = capture('info', false);
    logger.error({ err: new RangeError('bad range') }, '[power] failed');
    logger.error(new Error('boom'));

    const first: unknown = JSON.parse(lines[0].line);
    const second: unknown = JSON.parse(lines[1].line);
    assert.deepEqual(first, { ...objectOf(first), err: { name: 'RangeError', message: 'bad range' } });
    assert.equal(objectOf(second).message, 'boom');
    assert.deepEqual(objectOf(second).err, { name: 'Error', message: 'boom' });
  });

  it('formats readable lines in pretty mode', () => {
    const { logger, lines } = capture('debug', true);
    logger.debug('[inverter] tick', { kept: 2 });
    assert.match(lines[0].line, /^\d{4}-\d{2}-\d{2}T\S+Z \[debug\] \[inverter\] tick \{"kept":2\}$/);
  });

  it('falls back to info for unknown levels', () => {
    const { logger, lines } = capture('verbose', true);
    logger.debug('hidden');
    logger.info('shown');
    assert.equal(lines.length, 1);
    assert.equal(isLogLevel('verbose'), false);
    assert.equal(isLogLevel('toString'), false);
  });
});

function objectOf(value: unknown): Record<string, unknown> {
  assert.ok(typeof value === 'object' && value !== null && !Array.isArray(value));
  return Object.fromEntries(Object.entries(value));
}
