export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LogMeta = Record<string, unknown>;

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(meta: LogMeta | Error, message?: string): void;
}

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
  service?: string;
  write?: (level: LogLevel, line: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelOrder, value);
}

function serializeMeta(meta: LogMeta): LogMeta {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    out[key] =
      value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}

function consoleWrite(level: LogLevel, line: string) {
  // eslint-disable-next-line no-console
  console[level === 'debug' ? 'log' : level](line);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const requested = options.level ?? 'info';
  const threshold = levelOrder[isLogLevel(requested) ? requested : 'info'];
  const pretty = options.pretty ?? true;
  const service = options.service ?? 'envoy-sampler';
  const write = options.write ?? consoleWrite;

  function format(level: LogLevel, message: string, meta?: LogMeta) {
    const safeMeta = meta ? serializeMeta(meta) : undefined;
    if (pretty) {
      const timestamp = new Date().toISOString();
      const metaText = safeMeta ? ` ${JSON.stringify(safeMeta)}` : '';
      return `${timestamp} [${level}] ${message}${metaText}`;
    }

    return JSON.stringify({
      ts: new Date().toISOString(),
      level,
      message,
      service,
      ...safeMeta,
    });
  }

  function log(level: LogLevel, message: string, meta?: LogMeta) {
    if (levelOrder[level] < threshold) return;
    write(level, format(level, message, meta));
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (meta, message) => {
      if (meta instanceof Error) {
        log('error', message ?? meta.message, { err: meta });
        return;
      }
      log('error', message ?? 'error', meta);
    },
  };
}

const logger = createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  pretty: (process.env.LOG_PRETTY ?? 'true').toLowerCase() === 'true',
});

export default logger;
