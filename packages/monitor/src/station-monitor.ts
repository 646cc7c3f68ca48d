import { emptyCounters, stationUrl } from '@riverwatch/shared';
import type { ConnectionState, CycleOutcome, CycleStatus, Logger, StationCounters, StationMeta } from '@riverwatch/shared';
import { ConnectionManager } from './connection.js';
import type { SocketFactory } from './connection.js';
import type { MonitorConfig } from './config.js';
import type { DeliveryPipeline } from './delivery/pipeline.js';
import { DeliveryGate } from './gate.js';
import { CycleScheduler } from './scheduler.js';
import { WindowAccumulator } from './window.js';

export interface StationMonitorOptions {
  stationCode: string;
  config: Readonly<MonitorConfig>;
  pipeline: Pick<DeliveryPipeline, 'run'>;
  logger: Logger;
  createSocket?: SocketFactory;
}

/**
 * Everything one station owns: its feed connection, window, gate and cycle
 * loop. Nothing here is shared with other stations.
 */
export class StationMonitor {
  readonly stationCode: string;
  readonly counters: StationCounters = emptyCounters();
  readonly accumulator: WindowAccumulator;
  readonly connection: ConnectionManager;
  readonly scheduler: CycleScheduler;
  private readonly log: Logger;

  constructor(opts: StationMonitorOptions) {
    const { stationCode, config, logger } = opts;
    this.stationCode = stationCode;
    this.log = logger;
    this.accumulator = new WindowAccumulator(config.windowCapacity);

    this.connection = new ConnectionManager({
      stationCode,
      url: stationUrl(config.stationUrlTemplate, stationCode),
      accumulator: this.accumulator,
      logger,
      baseDelayMs: config.reconnectBaseDelayMs,
      maxDelayMs: config.reconnectMaxDelayMs,
      idleTimeoutMs: config.idleTimeoutMs,
      counters: this.counters,
      createSocket: opts.createSocket,
      onStateChange: state => this.log.debug(`Connection ${describeState(state)}`),
    });

    this.scheduler = new CycleScheduler({
      stationCode,
      intervalMs: config.intervalMs,
      firstDelayMs: config.firstCycleDelayMs,
      maxCycles: config.maxCycles,
      shutdownGraceMs: config.shutdownGraceMs,
      takeSnapshot: () => this.accumulator.snapshot(stationCode),
      gate: new DeliveryGate(stationCode, { notifyEnabled: config.notifyEnabled }),
      runCycle: (outcome, signal) => this.deliver(outcome, opts.pipeline, signal),
      logger,
      counters: this.counters,
    });
  }

  private async deliver(
    outcome: CycleOutcome,
    pipeline: Pick<DeliveryPipeline, 'run'>,
    signal: AbortSignal,
  ): Promise<CycleStatus> {
    const status = await pipeline.run(outcome, this.meta(), signal);
    this.log.info(`Cycle ${status}; ${formatCounters(this.counters)}`);
    return status;
  }

  /** Metadata from the feed, or a placeholder until the first frame arrives. */
  meta(): StationMeta {
    return this.accumulator.meta(this.stationCode) ?? { code: this.stationCode, name: '', basin: '' };
  }

  /**
   * Runs the connection and the cycle loop until `signal` aborts, or until
   * the cycle loop finishes its `maxCycles`.
   */
  async run(signal: AbortSignal): Promise<void> {
    const local = new AbortController();
    const forward = () => local.abort();
    signal.addEventListener('abort', forward, { once: true });
    if (signal.aborted) local.abort();

    const connection = this.connection.run(local.signal);
    try {
      await this.scheduler.run(local.signal);
    } finally {
      // Single-shot mode ends here without a shutdown signal
      local.abort();
      signal.removeEventListener('abort', forward);
      await connection;
    }
  }
}

export function describeState(state: ConnectionState): string {
  return state.kind === 'backoff' ? `backoff(${state.failures}, ${state.delayMs}ms)` : state.kind;
}

export function formatCounters(c: StationCounters): string {
  return (
    `accepted=${c.recordsAccepted} duplicates=${c.duplicates} outOfOrder=${c.outOfOrder} ` +
    `parseErrors=${c.parseErrors} reconnects=${c.reconnects} cycles=${c.cycles} ` +
    `skipped=${c.skippedInFlight} rendered=${c.rendered} notified=${c.notified} failed=${c.failedCycles}`
  );
}
