export type FailureKind =
  | 'timeout'
  | 'connection'
  | 'tls'
  | 'poll_exhausted'
  | 'query'
  | 'write'
  | 'unknown';

export class SamplerError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SamplerError';
    this.kind = kind;
  }
}

/**
 * Connect or read timeout talking to the device. The only failure the power
 * poll retries.
 */
export class DeviceTimeoutError extends SamplerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('timeout', message, options);
    this.name = 'DeviceTimeoutError';
  }
}

/**
 * Refused/reset sockets, DNS failures, HTTP error statuses and unreadable
 * payloads.
 */
export class DeviceConnectionError extends SamplerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('connection', message, options);
    this.name = 'DeviceConnectionError';
  }
}

export class DeviceTlsError extends SamplerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('tls', message, options);
    this.name = 'DeviceTlsError';
  }
}

export class PollExhaustedError extends SamplerError {
  readonly attempts: number;

  constructor(attempts: number, options?: { cause?: unknown }) {
    super('poll_exhausted', `power poll timed out after ${attempts} attempts`, options);
    this.name = 'PollExhaustedError';
    this.attempts = attempts;
  }
}

export class QueryError extends SamplerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('query', message, options);
    this.name = 'QueryError';
  }
}

export class WriteError extends SamplerError {
  readonly bucket: string;

  constructor(bucket: string, message: string, options?: { cause?: unknown }) {
    super('write', message, options);
    this.name = 'WriteError';
    this.bucket = bucket;
  }
}

export type DeviceError = DeviceTimeoutError | DeviceConnectionError | DeviceTlsError;

export function isDeviceError(err: unknown): err is DeviceError {
  return (
    err instanceof DeviceTimeoutError ||
    err instanceof DeviceConnectionError ||
    err instanceof DeviceTlsError
  );
}

export function classifyFailure(err: unknown): FailureKind {
  return err instanceof SamplerError ? err.kind : 'unknown';
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
