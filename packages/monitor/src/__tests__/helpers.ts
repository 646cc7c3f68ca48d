import { Logger } from '@riverwatch/shared';
import type { LogSink, StationRecord } from '@riverwatch/shared';
import type { MonitorConfig } from '../config.js';

export function silentLogger(): Logger {
  const sink: LogSink = { debug: () => undefined, log: () => undefined, warn: () => undefined, error: () => undefined };
  return new Logger('test', 'error', sink);
}

/** Record at `seconds` past the epoch with an optional level */
export function rec(seconds: number, waterLevel?: number, rainfall?: number): StationRecord {
  const record: StationRecord = { timestamp: seconds * 1000 };
  if (waterLevel !== undefined) record.waterLevel = waterLevel;
  if (rainfall !== undefined) record.rainfall = rainfall;
  return record;
}

export function testConfig(overrides: Partial<MonitorConfig> = {}): MonitorConfig {
  return {
    intervalMs: 1000,
    firstCycleDelayMs: 0,
    maxCycles: 0,
    notifyEnabled: false,
    line: null,
    cloudinary: null,
    stationUrlTemplate: 'ws://127.0.0.1:1/ws/station/{station}/',
    windowCapacity: 100,
    reconnectBaseDelayMs: 10,
    reconnectMaxDelayMs: 50,
    idleTimeoutMs: 5000,
    shutdownGraceMs: 1000,
    graphDir: 'graphs',
    displayTimeZone: 'UTC',
    logLevel: 'error',
    ...overrides,
  };
}

/** Logger that keeps every line it would print, at debug level */
export function captureLogger(tag = 'test'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const keep = (message: unknown) => {
    lines.push(String(message));
  };
  return { logger: new Logger(tag, 'debug', { debug: keep, log: keep, warn: keep, error: keep }), lines };
}
