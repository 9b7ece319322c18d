import { SamplerConfig } from '../config';
import { classifyFailure, describeError, isAbortError } from '../errors';
import { Logger } from '../logger';
import { incrementCounter, observeHistogram, setGaugeValue } from '../observability/metrics';
import { TimeSeriesStore } from '../repositories/pointsRepo';
import { DeviceClient } from '../services/envoy/envoyClient';
import { CadenceGate } from '../state/cadenceGate';
import { LoopMonitor } from '../state/loopMonitor';
import {
  Clock,
  InverterSnapshot,
  LoopName,
  Point,
  PowerSnapshot,
  Sleep,
  systemClock,
} from '../types/sampling';
import { abortableSleep, waitForNextCycle } from './cycleAligner';
import { inverterHighRatePoints, powerHighRatePoints } from './pointBuilder';
import { pollOnce, pollWithRetry } from './retryPolicy';
import { RolloverTracker, computeInverterDailyPoints, computePowerDailyPoints } from './rollover';
import { filterNewReadings, resolveWatermark } from './watermark';

export interface SamplingEngine {
  /** Resolves once every loop has exited after `signal` aborts. */
  run(signal: AbortSignal): Promise<void>;
}

export interface SamplingEngineDeps {
  device: DeviceClient;
  store: TimeSeriesStore;
  config: SamplerConfig;
  logger: Logger;
  monitor?: LoopMonitor;
  clock?: Clock;
  sleep?: Sleep;
}

export interface CycleResult {
  polled: boolean;
  highRatePoints: number;
  dailyPoints: number;
  droppedReadings: number;
  degradedReason?: string;
}

const stallIntervals = 3;

/**
 * Power and inverter sampling as two independent loops over one device and
 * one store. The loops share only the injected collaborators: the cadence
 * gate and each rollover tracker belong to a single loop.
 */
export class DualCadenceSamplingEngine implements SamplingEngine {
  readonly monitor: LoopMonitor;

  private readonly device: DeviceClient;
  private readonly store: TimeSeriesStore;
  private readonly config: SamplerConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly sleep: Sleep;

  private readonly inverterGate: CadenceGate;
  private readonly powerRollover: RolloverTracker;
  private readonly inverterRollover: RolloverTracker;

  constructor(deps: SamplingEngineDeps) {
    this.device = deps.device;
    this.store = deps.store;
    this.config = deps.config;
    this.logger = deps.logger;
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? abortableSleep;
    this.monitor =
      deps.monitor ??
      new LoopMonitor({
        power: this.config.pollingIntervalSeconds * stallIntervals * 1000,
        inverter: this.inverterTickSeconds * stallIntervals * 1000,
      });

    const startedAt = this.clock.now();
    this.inverterGate = new CadenceGate(this.config.inverterPollingIntervalSeconds);
    this.powerRollover = new RolloverTracker(startedAt, this.config.timeZone);
    this.inverterRollover = new RolloverTracker(startedAt, this.config.timeZone);
  }

  /**
   * The inverter loop wakes on the shorter interval so a failed poll is
   * retried at the next boundary; the gate keeps successful polls at the
   * inverter cadence.
   */
  get inverterTickSeconds(): number {
    return Math.min(this.config.pollingIntervalSeconds, this.config.inverterPollingIntervalSeconds);
  }

  async run(signal: AbortSignal): Promise<void> {
    this.logger.info('[sampler] sampling started', {
      powerIntervalSeconds: this.config.pollingIntervalSeconds,
      inverterIntervalSeconds: this.config.inverterPollingIntervalSeconds,
      expectedInverters: Object.keys(this.config.inverters).length,
    });

    await Promise.all([
      this.loop('power', this.config.pollingIntervalSeconds, signal, (tick) =>
        this.runPowerCycle(tick, signal),
      ),
      this.loop('inverter', this.inverterTickSeconds, signal, (tick) => this.runInverterCycle(tick)),
    ]);

    this.logger.info('[sampler] sampling stopped');
  }

  private async loop(
    name: LoopName,
    intervalSeconds: number,
    signal: AbortSignal,
    cycle: (tick: Date) => Promise<CycleResult>,
  ): Promise<void> {
    let lastTick: Date | null = null;
    while (!signal.aborted) {
      const tick = await this.nextTick(name, intervalSeconds, signal, lastTick);
      if (tick === null || signal.aborted) continue;
      lastTick = tick;
      await this.runGuarded(name, signal, () => cycle(tick));
    }
    this.logger.debug(`[${name}] loop exited`);
  }

  private async nextTick(
    name: LoopName,
    intervalSeconds: number,
    signal: AbortSignal,
    after: Date | null,
  ): Promise<Date | null> {
    try {
      return await waitForNextCycle(intervalSeconds, { clock: this.clock, sleep: this.sleep, signal, after });
    } catch (err) {
      if (!signal.aborted && !isAbortError(err)) {
        this.logger.error({ err, loop: name }, `[${name}] cycle wait failed`);
      }
      return null;
    }
  }

  private async runGuarded(
    name: LoopName,
    signal: AbortSignal,
    cycle: () => Promise<CycleResult>,
  ): Promise<void> {
    const startedMs = Date.now();
    this.monitor.markIterationStart(name, startedMs);
    try {
      const result = await cycle();
      if (result.degradedReason) {
        this.monitor.markIterationDegraded(name, result.degradedReason);
      } else {
        this.monitor.markIterationSuccess(name);
      }
    } catch (err) {
      if (signal.aborted && isAbortError(err)) {
        this.logger.info(`[${name}] cycle cancelled by shutdown`);
        return;
      }
      const kind = classifyFailure(err);
      this.monitor.markIterationError(name, kind, err);
      incrementCounter('sampler_cycle_skipped_total', { loop: name, reason: kind });
      if (kind === 'unknown') {
        this.logger.error({ err, loop: name }, `[${name}] unexpected failure; skipping this cycle`);
      } else {
        this.logger.warn(`[${name}] cycle skipped (${kind}): ${describeError(err)}`, { loop: name, kind });
      }
    } finally {
      observeHistogram('sampler_cycle_duration_seconds', (Date.now() - startedMs) / 1000, { loop: name });
    }
  }

  /**
   * One power tick: poll with retry, build line points, roll the day over if
   * the local date changed, then write. Throws on any failure; the loop
   * skips the tick.
   */
  async runPowerCycle(tick: Date, signal?: AbortSignal): Promise<CycleResult> {
    const snapshot = await this.pollPower(signal);
    this.logger.debug('[power] sampled power data', {
      tick: tick.toISOString(),
      timestamp: snapshot.timestamp.toISOString(),
      lines: snapshot.consumption.length + snapshot.production.length + snapshot.net.length,
    });

    const highRate = powerHighRatePoints(this.config.sourceTag, snapshot);
    const now = this.clock.now();
    const daily = this.powerRollover.checkRollover(now)
      ? await this.powerDailyTotals(now, snapshot.timestamp)
      : [];

    await this.writeCycle('power', highRate, daily);

    return { polled: true, highRatePoints: highRate.length, dailyPoints: daily.length, droppedReadings: 0 };
  }

  /**
   * One inverter tick. When the gate is due: read the watermark, poll once,
   * keep only readings newer than the watermark. A failed poll degrades the
   * tick to "no readings" and leaves the gate due.
   */
  async runInverterCycle(tick: Date): Promise<CycleResult> {
    let readings: InverterSnapshot = new Map();
    let polled = false;
    let droppedReadings = 0;
    let degradedReason: string | undefined;

    if (this.inverterGate.shouldPoll(tick)) {
      const cutoff = await resolveWatermark(this.store, {
        bucket: this.config.buckets.highRate,
        sourceTag: this.config.sourceTag,
        lookbackDays: this.config.watermarkLookbackDays,
        now: this.clock.now(),
        logger: this.logger,
      });
      setGaugeValue('sampler_inverter_watermark_seconds', cutoff ? Math.floor(cutoff.getTime() / 1000) : 0);

      const startedMs = Date.now();
      const outcome = await pollOnce(() => this.device.getInverterSnapshot(), {
        logger: this.logger,
        label: 'inverter',
      });
      observeHistogram('sampler_poll_latency_seconds', (Date.now() - startedMs) / 1000, { loop: 'inverter' });

      if (outcome.ok) {
        this.inverterGate.markPolled(tick);
        polled = true;
        readings = filterNewReadings(outcome.value, cutoff);
        droppedReadings = outcome.value.size - readings.size;
        incrementCounter('sampler_poll_total', { loop: 'inverter', result: 'success' });
        if (droppedReadings > 0) {
          incrementCounter('sampler_inverter_readings_dropped_total', {}, droppedReadings);
        }
        this.logger.debug('[inverter] sampled inverter data', {
          reported: outcome.value.size,
          kept: readings.size,
          cutoff: cutoff?.toISOString() ?? null,
        });
      } else {
        incrementCounter('sampler_poll_total', { loop: 'inverter', result: 'fail' });
        degradedReason = `inverter poll failed (${outcome.error.kind})`;
      }
    }

    const highRate = inverterHighRatePoints(this.config.sourceTag, readings, this.config.inverters);
    const now = this.clock.now();
    const daily = this.inverterRollover.checkRollover(now) ? await this.inverterDailyTotals(now) : [];

    await this.writeCycle('inverter', highRate, daily);

    return {
      polled,
      highRatePoints: highRate.length,
      dailyPoints: daily.length,
      droppedReadings,
      degradedReason,
    };
  }

  private async pollPower(signal?: AbortSignal): Promise<PowerSnapshot> {
    const startedMs = Date.now();
    try {
      const snapshot = await pollWithRetry(() => this.device.getPowerSnapshot(), {
        attempts: this.config.powerPollMaxAttempts,
        backoffMs: this.config.powerPollRetryWaitSeconds * 1000,
        logger: this.logger,
        label: 'power',
        sleep: this.sleep,
        signal,
        onAttempt: (attempt) => {
          if (attempt > 1) incrementCounter('sampler_poll_retries_total');
        },
      });
      incrementCounter('sampler_poll_total', { loop: 'power', result: 'success' });
      return snapshot;
    } catch (err) {
      incrementCounter('sampler_poll_total', { loop: 'power', result: 'fail' });
      throw err;
    } finally {
      observeHistogram('sampler_poll_latency_seconds', (Date.now() - startedMs) / 1000, { loop: 'power' });
    }
  }

  private async powerDailyTotals(now: Date, timestamp: Date): Promise<Point[]> {
    const points = await computePowerDailyPoints(this.store, {
      bucket: this.config.buckets.highRate,
      sourceTag: this.config.sourceTag,
      now,
      timestamp,
    });
    incrementCounter('sampler_rollover_total', { loop: 'power' });
    this.logger.info('[power] day rollover', { day: this.powerRollover.currentDay, dailyPoints: points.length });
    return points;
  }

  private async inverterDailyTotals(now: Date): Promise<Point[]> {
    const points = await computeInverterDailyPoints(this.store, {
      bucket: this.config.buckets.highRate,
      sourceTag: this.config.sourceTag,
      now,
      timestamp: now,
      inverters: this.config.inverters,
    });
    incrementCounter('sampler_rollover_total', { loop: 'inverter' });
    this.logger.info('[inverter] day rollover', {
      day: this.inverterRollover.currentDay,
      dailyPoints: points.length,
    });
    return points;
  }

  /**
   * Both batches are attempted even when the first fails: the rollover date
   * is already recorded, so dropped daily points would not be computed again.
   * The first failure is rethrown after both writes.
   */
  private async writeCycle(name: LoopName, highRate: Point[], daily: Point[]): Promise<void> {
    const batches: [string, Point[]][] = [
      [this.config.buckets.highRate, highRate],
      [this.config.buckets.daily, daily],
    ];
    let failure: unknown = null;
    for (const [bucket, points] of batches) {
      try {
        await this.writePoints(bucket, points);
      } catch (err) {
        if (failure === null) {
          failure = err;
        } else {
          this.logger.warn(`[${name}] write to ${bucket} also failed: ${describeError(err)}`, { loop: name });
        }
      }
    }
    if (failure !== null) throw failure;
  }

  private async writePoints(bucket: string, points: Point[]): Promise<void> {
    if (points.length === 0) return;
    await this.store.write(bucket, points);
    incrementCounter('sampler_points_written_total', { bucket }, points.length);
  }
}
