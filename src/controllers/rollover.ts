import { InverterTags } from '../config';
import { TimeSeriesStore } from '../repositories/pointsRepo';
import { Point } from '../types/sampling';
import { inverterDailyPoint, lineDailyPoint } from './pointBuilder';

const windowMs = 24 * 60 * 60 * 1000;

/**
 * Calendar date (YYYY-MM-DD) of `date` in the given IANA zone, or in the
 * process zone when none is configured.
 */
export function localDateKey(date: Date, timeZone?: string): string {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(date);
  const part = (type: 'year' | 'month' | 'day') => parts.find((p) => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}`;
}

/**
 * Last-rollover date for one loop. Owned by that loop alone.
 */
export class RolloverTracker {
  private day: string;

  constructor(startedAt: Date, private readonly timeZone?: string) {
    this.day = localDateKey(startedAt, timeZone);
  }

  get currentDay(): string {
    return this.day;
  }

  /**
   * True once per local-date change. The new date is recorded before the
   * caller runs any query, so a failed rollover is not retried the same day.
   */
  checkRollover(now: Date): boolean {
    const today = localDateKey(now, this.timeZone);
    if (today === this.day) return false;
    this.day = today;
    return true;
  }
}

export interface DailyTotalsOptions {
  bucket: string;
  sourceTag: string;
  now: Date;
  timestamp: Date;
}

export async function computePowerDailyPoints(
  store: TimeSeriesStore,
  options: DailyTotalsOptions,
): Promise<Point[]> {
  const groups = await store.queryIntegral({
    bucket: options.bucket,
    field: 'P',
    start: new Date(options.now.getTime() - windowMs),
    stop: options.now,
    sourceTag: options.sourceTag,
    measurementType: 'inverter',
    match: 'exclude',
    groupBy: ['line-idx', 'measurement-type'],
  });

  return groups.map((group) =>
    lineDailyPoint(
      options.sourceTag,
      group.key['measurement-type'],
      group.key['line-idx'],
      group.value,
      options.timestamp,
    ),
  );
}

/**
 * One daily point per inverter seen in the window, plus a zero point for each
 * expected inverter that produced nothing.
 */
export async function computeInverterDailyPoints(
  store: TimeSeriesStore,
  options: DailyTotalsOptions & { inverters: InverterTags },
): Promise<Point[]> {
  const groups = await store.queryIntegral({
    bucket: options.bucket,
    field: 'P',
    start: new Date(options.now.getTime() - windowMs),
    stop: options.now,
    sourceTag: options.sourceTag,
    measurementType: 'inverter',
    match: 'include',
    groupBy: ['serial'],
  });

  const unreported = new Set(Object.keys(options.inverters));
  const points: Point[] = [];
  for (const group of groups) {
    const serial = group.key.serial;
    unreported.delete(serial);
    points.push(inverterDailyPoint(options.sourceTag, serial, group.value, options.timestamp, options.inverters));
  }
  for (const serial of unreported) {
    points.push(inverterDailyPoint(options.sourceTag, serial, 0, options.timestamp, options.inverters));
  }
  return points;
}
