import { FailureKind } from '../errors';
import { LoopName } from '../types/sampling';

type LoopStatus = 'idle' | 'ok' | 'degraded' | 'error' | 'stalled';

export interface LoopStateSnapshot {
  status: LoopStatus;
  lastIterationIso: string | null;
  lastDurationMs: number | null;
  lastError: string | null;
  lastFailureKind: FailureKind | null;
  degradedReason: string | null;
  consecutiveFailures: number;
  stallThresholdSeconds: number;
}

interface LoopRecord {
  startedAt: number | null;
  completedAt: number | null;
  durationMs: number | null;
  status: LoopStatus;
  error: string | null;
  failureKind: FailureKind | null;
  consecutiveFailures: number;
}

function emptyRecord(): LoopRecord {
  return {
    startedAt: null,
    completedAt: null,
    durationMs: null,
    status: 'idle',
    error: null,
    failureKind: null,
    consecutiveFailures: 0,
  };
}

/**
 * Per-loop iteration bookkeeping for health reporting. Each loop only writes
 * its own record.
 */
export class LoopMonitor {
  private readonly loops: Record<LoopName, LoopRecord> = {
    power: emptyRecord(),
    inverter: emptyRecord(),
  };

  // a loop that has not completed an iteration for this long is stalled
  constructor(private readonly stallThresholdMs: Record<LoopName, number>) {}

  markIterationStart(loop: LoopName, atMs = Date.now()): void {
    this.loops[loop].startedAt = atMs;
  }

  private complete(loop: LoopName, atMs: number): LoopRecord {
    const record = this.loops[loop];
    record.completedAt = atMs;
    record.durationMs = record.startedAt !== null ? atMs - record.startedAt : null;
    return record;
  }

  markIterationSuccess(loop: LoopName, atMs = Date.now()): void {
    const record = this.complete(loop, atMs);
    record.status = 'ok';
    record.error = null;
    record.failureKind = null;
    record.consecutiveFailures = 0;
  }

  markIterationDegraded(loop: LoopName, reason: string, atMs = Date.now()): void {
    const record = this.complete(loop, atMs);
    record.status = 'degraded';
    record.error = reason;
    record.failureKind = null;
    record.consecutiveFailures = 0;
  }

  markIterationError(loop: LoopName, kind: FailureKind, err: unknown, atMs = Date.now()): void {
    const record = this.complete(loop, atMs);
    record.status = 'error';
    record.error = err instanceof Error ? err.message : String(err);
    record.failureKind = kind;
    record.consecutiveFailures += 1;
  }

  getLoopState(loop: LoopName, nowMs = Date.now()): LoopStateSnapshot {
    const record = this.loops[loop];
    const threshold = this.stallThresholdMs[loop];
    const reference = record.completedAt ?? record.startedAt;
    const stalled = reference !== null && nowMs - reference > threshold;

    let status = record.status;
    if (stalled) status = 'stalled';

    return {
      status,
      lastIterationIso: record.completedAt !== null ? new Date(record.completedAt).toISOString() : null,
      lastDurationMs: record.durationMs,
      lastError: record.error,
      lastFailureKind: record.failureKind,
      degradedReason: status === 'degraded' ? record.error : null,
      consecutiveFailures: record.consecutiveFailures,
      stallThresholdSeconds: threshold / 1000,
    };
  }

  snapshot(nowMs = Date.now()): Record<LoopName, LoopStateSnapshot> {
    return {
      power: this.getLoopState('power', nowMs),
      inverter: this.getLoopState('inverter', nowMs),
    };
  }

  isHealthy(nowMs = Date.now()): boolean {
    return (['power', 'inverter'] as const).every((loop) => {
      const status = this.getLoopState(loop, nowMs).status;
      return status !== 'error' && status !== 'stalled';
    });
  }
}
