import { errorMessage } from '@riverwatch/shared';
import type { Logger } from '@riverwatch/shared';
import { formatCounters } from './station-monitor.js';
import type { StationMonitor } from './station-monitor.js';

export type SupervisedStation = Pick<StationMonitor, 'stationCode' | 'counters' | 'run'>;

export type StationResult = { stationCode: string; ok: true } | { stationCode: string; ok: false; error: unknown };

/**
 * Runs every station under one cancellation scope. A station that crashes is
 * logged and left stopped; the others keep running.
 */
export class MonitorSupervisor {
  private readonly controller = new AbortController();

  constructor(
    private readonly stations: readonly SupervisedStation[],
    private readonly logger: Logger,
  ) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  shutdown(reason = 'shutdown requested'): void {
    if (this.controller.signal.aborted) return;
    this.logger.info(`Stopping ${this.stations.length} station(s): ${reason}`);
    this.controller.abort();
  }

  async run(): Promise<StationResult[]> {
    this.logger.info(`Monitoring stations: ${this.stations.map(s => s.stationCode).join(', ')}`);
    const results = await Promise.all(this.stations.map(station => this.runStation(station)));
    for (const station of this.stations) {
      this.logger.info(`Station ${station.stationCode} summary: ${formatCounters(station.counters)}`);
    }
    return results;
  }

  private async runStation(station: SupervisedStation): Promise<StationResult> {
    try {
      await station.run(this.controller.signal);
      return { stationCode: station.stationCode, ok: true };
    } catch (err) {
      this.logger.error(`Station ${station.stationCode} stopped: ${errorMessage(err)}`);
      return { stationCode: station.stationCode, ok: false, error: err };
    }
  }
}
