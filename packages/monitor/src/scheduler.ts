import { emptyCounters, errorMessage } from '@riverwatch/shared';
import type { CycleOutcome, CycleStatus, Logger, StationCounters, StationSnapshot } from '@riverwatch/shared';
import type { DeliveryGate } from './gate.js';
import { settlesWithin, sleep } from './timing.js';

/** Render/upload/notify for one approved cycle. `signal` aborts when the shutdown grace expires. */
export type CycleRunner = (outcome: CycleOutcome, signal: AbortSignal) => Promise<CycleStatus>;

export interface SchedulerOptions {
  stationCode: string;
  intervalMs: number;
  firstDelayMs: number;
  /** 0 = unbounded */
  maxCycles: number;
  shutdownGraceMs: number;
  takeSnapshot: () => StationSnapshot;
  gate: DeliveryGate;
  runCycle: CycleRunner;
  logger: Logger;
  counters?: StationCounters;
}

/**
 * Fixed-period cycle loop for one station. Ticks are anchored to the start
 * time, so slow deliveries never shift the schedule; a tick that finds the
 * previous delivery still running is skipped.
 */
export class CycleScheduler {
  private inFlight: Promise<void> | null = null;
  private readonly deliveryAbort = new AbortController();
  readonly counters: StationCounters;
  private readonly log: Logger;

  constructor(private readonly opts: SchedulerOptions) {
    if (opts.intervalMs <= 0) throw new RangeError(`intervalMs must be positive, got ${opts.intervalMs}`);
    this.counters = opts.counters ?? emptyCounters();
    this.log = opts.logger;
  }

  get busy(): boolean {
    return this.inFlight !== null;
  }

  async run(signal: AbortSignal): Promise<void> {
    const { intervalMs, firstDelayMs, maxCycles } = this.opts;
    const anchor = Date.now() + firstDelayMs;
    let slot = 0;
    let cycles = 0;

    while (!signal.aborted && (maxCycles === 0 || cycles < maxCycles)) {
      await sleep(anchor + slot * intervalMs - Date.now(), signal);
      if (signal.aborted) break;

      cycles++;
      this.tick(cycles);

      // Skip slots missed while the process was stalled instead of bursting through them
      const elapsed = Date.now() - anchor;
      slot = Math.max(slot + 1, Math.floor(elapsed / intervalMs) + 1);
    }

    await this.drain(signal.aborted);
  }

  /** Evaluate one cycle. Never awaits the delivery it starts. */
  tick(cycle: number): CycleOutcome | null {
    this.counters.cycles++;
    if (this.inFlight) {
      this.counters.skippedInFlight++;
      this.log.warn(`Cycle ${cycle} skipped: previous delivery still in flight`);
      return null;
    }

    const outcome = this.opts.gate.evaluate(this.opts.takeSnapshot());
    if (!outcome.shouldRender) {
      this.log.info(`Cycle ${cycle}: nothing to send (${outcome.reason})`);
      return outcome;
    }

    this.log.info(
      `Cycle ${cycle}: ${outcome.windowSnapshot.length} record(s), ` +
        `${outcome.shouldNotify ? 'rendering and notifying' : 'rendering only'} (${outcome.reason})`,
    );
    const delivery = this.opts
      .runCycle(outcome, this.deliveryAbort.signal)
      .then(status => this.record(status))
      .catch((err: unknown) => {
        this.counters.failedCycles++;
        this.log.error(`Cycle ${cycle} failed: ${errorMessage(err)}`);
      })
      .finally(() => {
        this.inFlight = null;
      });
    this.inFlight = delivery;
    return outcome;
  }

  private record(status: CycleStatus) {
    if (status === 'rendered') this.counters.rendered++;
    else if (status === 'notified') {
      this.counters.rendered++;
      this.counters.notified++;
    } else if (status === 'failed') this.counters.failedCycles++;
  }

  private async drain(shuttingDown: boolean): Promise<void> {
    const pending = this.inFlight;
    if (!pending) return;
    if (!shuttingDown) {
      await pending;
      return;
    }
    this.log.info(`Waiting up to ${this.opts.shutdownGraceMs}ms for in-flight delivery`);
    if (!(await settlesWithin(pending, this.opts.shutdownGraceMs))) {
      this.log.warn('In-flight delivery did not finish within the grace period; aborting it');
      this.deliveryAbort.abort();
    }
  }
}
