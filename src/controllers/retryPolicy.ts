import {
  DeviceError,
  DeviceTimeoutError,
  PollExhaustedError,
  describeError,
  isDeviceError,
} from '../errors';
import { Logger } from '../logger';
import { Sleep } from '../types/sampling';
import { abortableSleep } from './cycleAligner';

export interface RetryOptions {
  attempts: number;
  backoffMs: number;
  logger: Logger;
  label: string;
  sleep?: Sleep;
  signal?: AbortSignal;
  onAttempt?: (attempt: number) => void;
}

/**
 * Bounded retry for a poll that must produce data. Only timeouts are retried;
 * every other failure is rethrown on the first attempt.
 */
export async function pollWithRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? abortableSleep;
  const attempts = Math.max(1, options.attempts);
  let lastError: DeviceTimeoutError | null = null;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    options.onAttempt?.(attempt);
    try {
      const value = await fn();
      if (attempt > 1) {
        options.logger.info(`[${options.label}] poll succeeded after ${attempt} attempts`);
      }
      return value;
    } catch (err) {
      if (!(err instanceof DeviceTimeoutError)) throw err;
      lastError = err;
      options.logger.warn(`[${options.label}] poll timed out, attempt ${attempt}/${attempts}`, {
        error: err.message,
      });
      if (attempt < attempts) {
        await sleep(options.backoffMs, options.signal);
      }
    }
  }

  throw new PollExhaustedError(attempts, { cause: lastError });
}

export type PollOutcome<T> = { ok: true; value: T } | { ok: false; error: DeviceError };

/**
 * One attempt, no retry. Device failures degrade to an unsuccessful outcome;
 * anything else is a bug and propagates.
 */
export async function pollOnce<T>(
  fn: () => Promise<T>,
  options: { logger: Logger; label: string },
): Promise<PollOutcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    if (!isDeviceError(err)) throw err;
    options.logger.warn(`[${options.label}] poll failed (${err.name}): ${describeError(err)}`);
    return { ok: false, error: err };
  }
}
