import { ConfigError, Logger } from '@riverwatch/shared';
import { USAGE, parseStationArgs } from './cli.js';
import { loadConfig } from './config.js';
import type { MonitorConfig } from './config.js';
import { DeliveryPipeline } from './delivery/pipeline.js';
import { LineNotifier } from './delivery/notifier.js';
import { SvgChartRenderer } from './delivery/renderer.js';
import { CloudinaryUploader } from './delivery/uploader.js';
import { StationMonitor } from './station-monitor.js';
import { MonitorSupervisor } from './supervisor.js';

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_CONFIG = 2;

export interface MonitorRunOptions {
  argv: readonly string[];
  env: NodeJS.ProcessEnv;
  /** Where usage and configuration errors go */
  stderr?: (line: string) => void;
  /** Receives the shutdown hook once stations are running */
  onReady?: (shutdown: (reason: string) => void) => void;
}

/** Runs the monitor for the stations in `argv` and resolves with the process exit code. */
export async function runMonitor({
  argv,
  env,
  stderr = line => console.error(line),
  onReady,
}: MonitorRunOptions): Promise<number> {
  const args = parseStationArgs(argv);
  if (!args.ok) {
    stderr(`[monitor] ${args.message}\n${USAGE}`);
    return EXIT_USAGE;
  }

  let config: Readonly<MonitorConfig>;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) {
      stderr(`[monitor] ${err.message}`);
      return EXIT_CONFIG;
    }
    throw err;
  }

  const logger = new Logger('monitor', config.logLevel);
  if (!config.notifyEnabled) {
    logger.info('LINE notifications disabled (SEND_TO_LINE=false); charts are rendered only');
  }

  const pipeline = new DeliveryPipeline(
    {
      renderer: new SvgChartRenderer(config.graphDir, config.displayTimeZone),
      uploader: config.cloudinary ? new CloudinaryUploader(config.cloudinary) : null,
      notifier: config.line ? new LineNotifier(config.line) : null,
    },
    logger.child('delivery'),
  );

  const stations = args.stations.map(
    stationCode =>
      new StationMonitor({
        stationCode,
        config,
        pipeline,
        logger: logger.child(`station:${stationCode}`),
      }),
  );

  const supervisor = new MonitorSupervisor(stations, logger);
  onReady?.(reason => supervisor.shutdown(reason));

  await supervisor.run();
  logger.info('Shut down cleanly');
  return EXIT_OK;
}
