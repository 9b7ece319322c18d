import dotenv from 'dotenv';
import { describeError } from './errors';

dotenv.config();

type Env = Record<string, string | undefined>;

export interface DbConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  queryTimeoutMs: number;
}

export interface EnvoyConfig {
  url: string;
  token: string;
  requestTimeoutMs: number;
  rejectUnauthorized: boolean;
}

export type InverterTags = Record<string, Record<string, string>>;

/**
 * The slice of configuration the sampling engine reads. Everything else
 * belongs to the process wiring in index.ts.
 */
export interface SamplerConfig {
  pollingIntervalSeconds: number;
  inverterPollingIntervalSeconds: number;
  powerPollMaxAttempts: number;
  powerPollRetryWaitSeconds: number;
  watermarkLookbackDays: number;
  sourceTag: string;
  // serial -> extra tags; the keys are the expected inverters for rollover
  inverters: InverterTags;
  buckets: {
    highRate: string;
    daily: string;
  };
  timeZone?: string;
}

export interface Config {
  port: number;
  httpEnabled: boolean;
  logLevel: string;
  logPretty: boolean;
  envoy: EnvoyConfig;
  sampler: SamplerConfig;
  db: DbConfig;
  observability: {
    prometheusEnabled: boolean;
    prometheusPath: string;
  };
}

function parsePositiveInt(raw: string | undefined, fallback: number, label: string): number {
  const parsed = Number(raw ?? fallback);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`[config] ${label} must be a positive integer`);
  }
  return parsed;
}

function parseNonNegativeNumber(raw: string | undefined, fallback: number, label: string): number {
  const parsed = Number(raw ?? fallback);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`[config] ${label} must be zero or a positive number`);
  }
  return parsed;
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw.trim().toLowerCase() === 'true';
}

function requireValue(raw: string | undefined, label: string): string {
  const value = raw?.trim();
  if (!value) {
    throw new Error(`[config] ${label} must be injected via environment variable or secret store`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseInverters(raw: string | undefined): InverterTags {
  if (raw === undefined || raw.trim() === '') return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`[config] INVERTERS must be valid JSON: ${describeError(err)}`);
  }

  if (Array.isArray(parsed)) {
    return Object.fromEntries(
      parsed.map((serial, idx) => {
        if (typeof serial !== 'string' || serial.trim() === '') {
          throw new Error(`[config] INVERTERS[${idx}] must be a non-empty serial string`);
        }
        return [serial.trim(), {}];
      }),
    );
  }

  if (!isRecord(parsed)) {
    throw new Error('[config] INVERTERS must be a JSON object of serial -> tags or an array of serials');
  }

  const inverters: InverterTags = {};
  for (const [serial, tags] of Object.entries(parsed)) {
    if (tags === null) {
      inverters[serial] = {};
      continue;
    }
    if (!isRecord(tags)) {
      throw new Error(`[config] INVERTERS["${serial}"] must be an object of tag name -> value`);
    }
    const tagSet: Record<string, string> = {};
    for (const [tag, value] of Object.entries(tags)) {
      if (typeof value !== 'string' && typeof value !== 'number') {
        throw new Error(`[config] INVERTERS["${serial}"].${tag} must be a string or number`);
      }
      tagSet[tag] = String(value);
    }
    inverters[serial] = tagSet;
  }
  return inverters;
}

function parseTimeZone(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  if (!value) return undefined;
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone: value });
  } catch {
    throw new Error(`[config] TIMEZONE "${value}" is not a recognised IANA time zone`);
  }
  return value;
}

function parsePath(raw: string | undefined, fallback: string): string {
  const value = raw?.trim() || fallback;
  return value.startsWith('/') ? value : `/${value}`;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    port: parsePositiveInt(env.PORT, 3001, 'PORT'),
    httpEnabled: parseBoolean(env.HTTP_ENABLED, true),
    logLevel: env.LOG_LEVEL ?? 'info',
    logPretty: parseBoolean(env.LOG_PRETTY, true),
    envoy: {
      url: (env.ENVOY_URL?.trim() || 'https://envoy.local').replace(/\/+$/, ''),
      token: requireValue(env.ENVOY_TOKEN, 'ENVOY_TOKEN'),
      requestTimeoutMs: parsePositiveInt(env.ENVOY_REQUEST_TIMEOUT_MS, 10_000, 'ENVOY_REQUEST_TIMEOUT_MS'),
      rejectUnauthorized: parseBoolean(env.ENVOY_TLS_REJECT_UNAUTHORIZED, false),
    },
    sampler: {
      pollingIntervalSeconds: parsePositiveInt(
        env.POLLING_INTERVAL_SECONDS,
        60,
        'POLLING_INTERVAL_SECONDS',
      ),
      inverterPollingIntervalSeconds: parsePositiveInt(
        env.INVERTER_POLLING_INTERVAL_SECONDS,
        300,
        'INVERTER_POLLING_INTERVAL_SECONDS',
      ),
      powerPollMaxAttempts: parsePositiveInt(env.POWER_POLL_MAX_ATTEMPTS, 10, 'POWER_POLL_MAX_ATTEMPTS'),
      powerPollRetryWaitSeconds: parseNonNegativeNumber(
        env.POWER_POLL_RETRY_WAIT_SECONDS,
        5,
        'POWER_POLL_RETRY_WAIT_SECONDS',
      ),
      watermarkLookbackDays: parsePositiveInt(env.WATERMARK_LOOKBACK_DAYS, 30, 'WATERMARK_LOOKBACK_DAYS'),
      sourceTag: env.SOURCE_TAG?.trim() || 'envoy',
      inverters: parseInverters(env.INVERTERS),
      buckets: {
        highRate: env.BUCKET_HIGH_RATE?.trim() || 'envoy_hr',
        daily: env.BUCKET_DAILY?.trim() || 'envoy_daily',
      },
      timeZone: parseTimeZone(env.TIMEZONE),
    },
    db: {
      host: env.DB_HOST ?? 'localhost',
      port: parsePositiveInt(env.DB_PORT, 5432, 'DB_PORT'),
      user: env.DB_USER ?? 'postgres',
      password: env.DB_PASSWORD ?? 'postgres',
      database: env.DB_NAME ?? 'envoy_sampler',
      queryTimeoutMs: parsePositiveInt(env.DB_QUERY_TIMEOUT_MS, 5_000, 'DB_QUERY_TIMEOUT_MS'),
    },
    observability: {
      prometheusEnabled: parseBoolean(env.PROMETHEUS_ENABLED, true),
      prometheusPath: parsePath(env.PROMETHEUS_PATH, '/metrics'),
    },
  };
}

/**
 * Startup summary with secrets reduced to set/not set.
 */
export function describeConfig(config: Config): Record<string, unknown> {
  return {
    envoyUrl: config.envoy.url,
    envoyToken: config.envoy.token ? 'set' : 'not set',
    sourceTag: config.sampler.sourceTag,
    pollingIntervalSeconds: config.sampler.pollingIntervalSeconds,
    inverterPollingIntervalSeconds: config.sampler.inverterPollingIntervalSeconds,
    expectedInverters: Object.keys(config.sampler.inverters).length,
    buckets: config.sampler.buckets,
    timeZone: config.sampler.timeZone ?? Intl.DateTimeFormat().resolvedOptions().timeZone,
    db: `${config.db.user}@${config.db.host}:${config.db.port}/${config.db.database}`,
  };
}
