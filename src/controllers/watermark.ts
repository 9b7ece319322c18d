import { QueryError } from '../errors';
import { Logger } from '../logger';
import { TimeSeriesStore } from '../repositories/pointsRepo';
import { InverterSnapshot } from '../types/sampling';

const dayMs = 24 * 60 * 60 * 1000;

/**
 * Drops readings at or before the cutoff. The device re-reports its last
 * reading until the inverter checks in again, so equal timestamps are
 * already stored.
 */
export function filterNewReadings(snapshot: InverterSnapshot, cutoff: Date | null): InverterSnapshot {
  if (cutoff === null) return new Map(snapshot);
  const cutoffMs = cutoff.getTime();
  const kept: InverterSnapshot = new Map();
  for (const [deviceId, reading] of snapshot) {
    if (reading.timestamp.getTime() > cutoffMs) kept.set(deviceId, reading);
  }
  return kept;
}

export interface WatermarkOptions {
  bucket: string;
  sourceTag: string;
  lookbackDays: number;
  now: Date;
  logger: Logger;
}

/**
 * Newest inverter point already in the store, or null when there is none or
 * the query fails (in which case nothing gets filtered this cycle).
 */
export async function resolveWatermark(
  store: TimeSeriesStore,
  options: WatermarkOptions,
): Promise<Date | null> {
  try {
    return await store.queryLatestTimestamp({
      bucket: options.bucket,
      sourceTag: options.sourceTag,
      measurementType: 'inverter',
      since: new Date(options.now.getTime() - options.lookbackDays * dayMs),
    });
  } catch (err) {
    if (!(err instanceof QueryError)) throw err;
    options.logger.warn('[watermark] last inverter timestamp query failed; writing unfiltered', {
      error: err.message,
    });
    return null;
  }
}
