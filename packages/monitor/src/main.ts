import { errorMessage } from '@riverwatch/shared';
import { runMonitor } from './app.js';
import { loadEnvFile } from './config.js';

loadEnvFile();

runMonitor({
  argv: process.argv.slice(2),
  env: process.env,
  onReady: shutdown => {
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  },
}).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`[monitor] Fatal: ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
