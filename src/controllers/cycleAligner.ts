import { setTimeout as delay } from 'node:timers/promises';
import { Clock, Sleep, systemClock } from '../types/sampling';

const boundaryEpsilonMs = 100;

export const abortableSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Milliseconds until the next wall-clock multiple of the interval. A wake-up
 * that lands within 100ms past a boundary gets a 100ms nap rather than a zero
 * (or a full-interval) sleep.
 */
export function computeCycleDelayMs(nowMs: number, intervalSeconds: number): number {
  const intervalMs = intervalSeconds * 1000;
  const remainderMs = nowMs % intervalMs;
  if (remainderMs < boundaryEpsilonMs) {
    return boundaryEpsilonMs;
  }
  return intervalMs - remainderMs;
}

/**
 * The interval boundary a wait of computeCycleDelayMs(nowMs) lands on.
 */
export function nextBoundaryMs(nowMs: number, intervalSeconds: number): number {
  const intervalMs = intervalSeconds * 1000;
  const remainderMs = nowMs % intervalMs;
  if (remainderMs < boundaryEpsilonMs) {
    return nowMs - remainderMs;
  }
  return nowMs - remainderMs + intervalMs;
}

export interface WaitOptions {
  clock?: Clock;
  sleep?: Sleep;
  signal?: AbortSignal;
  // boundary of the previous cycle; the wait only returns a later one
  after?: Date | null;
}

/**
 * Sleep until the next interval boundary and return the nominal boundary time.
 * Rejects with an AbortError when the signal fires.
 */
export async function waitForNextCycle(
  intervalSeconds: number,
  options: WaitOptions = {},
): Promise<Date> {
  const clock = options.clock ?? systemClock;
  const sleep = options.sleep ?? abortableSleep;
  const afterMs = options.after?.getTime() ?? Number.NEGATIVE_INFINITY;

  for (;;) {
    options.signal?.throwIfAborted();
    const nowMs = clock.now().getTime();
    await sleep(computeCycleDelayMs(nowMs, intervalSeconds), options.signal);
    const boundaryMs = nextBoundaryMs(nowMs, intervalSeconds);
    if (boundaryMs > afterMs) return new Date(boundaryMs);
  }
}
