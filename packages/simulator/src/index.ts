import { Logger } from '@riverwatch/shared';
import { StationFeedServer } from './feed-server.js';

const PORT = Number(process.env.SIMULATOR_PORT ?? 8765);
const INTERVAL_MS = Number(process.env.SIMULATOR_INTERVAL_MS ?? 30_000);

const logger = new Logger('simulator');
const server = new StationFeedServer({
  port: PORT,
  intervalMs: INTERVAL_MS,
  doubleEncode: process.env.SIMULATOR_DOUBLE_ENCODE === '1',
  logger,
});

server.start().then(
  port => {
    logger.info(`Point the monitor at it with STATION_URL_TEMPLATE=ws://127.0.0.1:${port}/ws/station/{station}/`);
  },
  (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      logger.error(`Port ${PORT} is already in use. Kill the other process and retry.`);
    } else {
      logger.error(`Cannot start: ${err.message}`);
    }
    process.exitCode = 1;
  },
);

process.on('SIGINT', () => {
  logger.info('Shutting down...');
  server.close().then(
    () => process.exit(0),
    (err: Error) => {
      logger.error(`Close failed: ${err.message}`);
      process.exit(1);
    },
  );
});
