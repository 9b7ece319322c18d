import { SqlClient, SqlRow } from '../db';
import { QueryError, WriteError, describeError } from '../errors';
import { IntegralGroup, MeasurementType, Point } from '../types/sampling';

export interface LatestTimestampQuery {
  bucket: string;
  sourceTag: string;
  measurementType: MeasurementType;
  since: Date;
}

export interface IntegralQuery {
  bucket: string;
  field: string;
  start: Date;
  stop: Date;
  sourceTag: string;
  measurementType: MeasurementType;
  // include: only series of this type; exclude: every other series
  match: 'include' | 'exclude';
  groupBy: string[];
}

/**
 * Backend the sampling engine writes through. Implementations must tolerate
 * concurrent calls from both loops.
 */
export interface TimeSeriesStore {
  write(bucket: string, points: Point[]): Promise<void>;
  queryLatestTimestamp(query: LatestTimestampQuery): Promise<Date | null>;
  /** Integral over time in value-hours (W in, Wh out), per group. */
  queryIntegral(query: IntegralQuery): Promise<IntegralGroup[]>;
}

const writeChunkSize = 500;
const columnsPerRow = 5;

const latestTimestampSql = `
  SELECT MAX(ts) AS latest
  FROM points
  WHERE bucket = $1
    AND tags ->> 'source' = $2
    AND tags ->> 'measurement-type' = $3
    AND ts >= $4;
`;

// Trapezoidal integration per series (one series per measurement name),
// scaled from value-seconds to value-hours.
const integralSql = `
  WITH samples AS (
    SELECT
      measurement,
      tags,
      ts,
      (fields ->> $2)::double precision AS value,
      LAG(ts) OVER series AS prev_ts,
      LAG((fields ->> $2)::double precision) OVER series AS prev_value
    FROM points
    WHERE bucket = $1
      AND ts >= $3
      AND ts < $4
      AND tags ->> 'source' = $5
      AND fields ? $2
      AND (COALESCE(tags ->> 'measurement-type', '') = $6) = $7
    WINDOW series AS (PARTITION BY measurement ORDER BY ts)
  )
  SELECT
    measurement,
    (ARRAY_AGG(tags ORDER BY ts DESC))[1] AS tags,
    COALESCE(
      SUM((value + prev_value) / 2 * EXTRACT(EPOCH FROM ts - prev_ts))
        FILTER (WHERE prev_ts IS NOT NULL),
      0
    ) / 3600.0 AS value
  FROM samples
  GROUP BY measurement
  ORDER BY measurement;
`;

export function buildUpsertStatement(bucket: string, points: Point[]): { text: string; params: unknown[] } {
  const params: unknown[] = [];
  const values = points.map((point, idx) => {
    const base = idx * columnsPerRow;
    params.push(
      bucket,
      point.measurement,
      point.timestamp,
      JSON.stringify(point.tags),
      JSON.stringify(point.fields),
    );
    return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}::jsonb, $${base + 5}::jsonb)`;
  });

  const text = `
    INSERT INTO points (bucket, measurement, ts, tags, fields)
    VALUES ${values.join(',\n      ')}
    ON CONFLICT ON CONSTRAINT points_bucket_measurement_ts_key DO UPDATE
    SET
      tags = EXCLUDED.tags,
      fields = EXCLUDED.fields,
      written_at = NOW();
  `;
  return { text, params };
}

function readTags(raw: unknown): Record<string, string> {
  const parsed: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;
  if (typeof parsed !== 'object' || parsed === null) return {};
  const tags: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (value !== null && value !== undefined) tags[key] = String(value);
  }
  return tags;
}

function readTimestamp(raw: unknown): Date | null {
  if (raw === null || raw === undefined) return null;
  const date = raw instanceof Date ? raw : new Date(String(raw));
  return Number.isNaN(date.getTime()) ? null : date;
}

export function groupIntegralRows(rows: SqlRow[], groupBy: string[]): IntegralGroup[] {
  const groups = new Map<string, IntegralGroup>();
  for (const row of rows) {
    const value = Number(row.value);
    if (!Number.isFinite(value)) continue;
    const tags = readTags(row.tags);
    const key = Object.fromEntries(groupBy.map((tag) => [tag, tags[tag] ?? '']));
    const id = JSON.stringify(key);
    const existing = groups.get(id);
    if (existing) {
      existing.value += value;
    } else {
      groups.set(id, { key, value });
    }
  }
  return [...groups.values()];
}

export class PgTimeSeriesStore implements TimeSeriesStore {
  constructor(private readonly db: SqlClient) {}

  async write(bucket: string, points: Point[]): Promise<void> {
    for (let offset = 0; offset < points.length; offset += writeChunkSize) {
      const { text, params } = buildUpsertStatement(bucket, points.slice(offset, offset + writeChunkSize));
      try {
        await this.db.query(text, params);
      } catch (err) {
        throw new WriteError(bucket, `failed to write ${points.length} point(s) to ${bucket}: ${describeError(err)}`, {
          cause: err,
        });
      }
    }
  }

  async queryLatestTimestamp(query: LatestTimestampQuery): Promise<Date | null> {
    try {
      const { rows } = await this.db.query(latestTimestampSql, [
        query.bucket,
        query.sourceTag,
        query.measurementType,
        query.since,
      ]);
      return readTimestamp(rows[0]?.latest);
    } catch (err) {
      throw new QueryError(`latest ${query.measurementType} timestamp query failed: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  async queryIntegral(query: IntegralQuery): Promise<IntegralGroup[]> {
    let rows: SqlRow[];
    try {
      ({ rows } = await this.db.query(integralSql, [
        query.bucket,
        query.field,
        query.start,
        query.stop,
        query.sourceTag,
        query.measurementType,
        query.match === 'include',
      ]));
    } catch (err) {
      throw new QueryError(`integral query for ${query.field} failed: ${describeError(err)}`, { cause: err });
    }
    return groupIntegralRows(rows, query.groupBy);
  }
}
