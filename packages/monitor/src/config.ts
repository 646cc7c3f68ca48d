import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError, DEFAULT_STATION_URL_TEMPLATE, LOG_LEVELS } from '@riverwatch/shared';
import type { LogLevel } from '@riverwatch/shared';
import { MAX_TIMER_MS } from './timing.js';
import { DEFAULT_WINDOW_CAPACITY } from './window.js';

export interface LineConfig {
  url: string;
  groupId: string;
  apiKey: string;
}

export interface CloudinaryConfig {
  cloudName: string;
  apiKey: string;
  apiSecret: string;
}

export interface MonitorConfig {
  intervalMs: number;
  firstCycleDelayMs: number;
  /** 0 = run until shutdown */
  maxCycles: number;
  notifyEnabled: boolean;
  /** Present whenever notifyEnabled is true */
  line: LineConfig | null;
  cloudinary: CloudinaryConfig | null;
  stationUrlTemplate: string;
  windowCapacity: number;
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
  idleTimeoutMs: number;
  shutdownGraceMs: number;
  graphDir: string;
  displayTimeZone: string;
  logLevel: LogLevel;
}

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform(v => (v === '' ? undefined : v));

const boolFlag = (fallback: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v === '') return fallback;
      if (['true', '1', 'yes', 'on'].includes(v)) return true;
      if (['false', '0', 'no', 'off'].includes(v)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true or false, got "${v}"` });
      return z.NEVER;
    });

/** A duration counted in `unitMs` units, bounded by the longest timer delay */
const duration = (unitMs: number) =>
  z.coerce.number().max(MAX_TIMER_MS / unitMs, `must not exceed ${MAX_TIMER_MS} ms once converted`);

const envSchema = z.object({
  UPDATE_INTERVAL_MINUTES: duration(60_000).positive().default(2),
  FIRST_CYCLE_DELAY_SECONDS: duration(1000).min(0).default(15),
  MAX_CYCLES: z.coerce.number().int().min(0).default(0),
  SEND_TO_LINE: boolFlag(true),
  LINE_URL: optionalText.pipe(z.string().url().optional()),
  GROUP_ID: optionalText,
  LINE_API_KEY: optionalText,
  CLOUDINARY_CLOUD_NAME: optionalText,
  CLOUDINARY_API_KEY: optionalText,
  CLOUDINARY_API_SECRET: optionalText,
  STATION_URL_TEMPLATE: z
    .string()
    .trim()
    .default(DEFAULT_STATION_URL_TEMPLATE)
    .refine(v => v.includes('{station}'), 'must contain the {station} placeholder')
    .refine(v => /^wss?:\/\//.test(v), 'must be a ws:// or wss:// URL'),
  WINDOW_CAPACITY: z.coerce.number().int().positive().default(DEFAULT_WINDOW_CAPACITY),
  RECONNECT_BASE_DELAY_MS: duration(1).int().positive().default(5000),
  RECONNECT_MAX_DELAY_MS: duration(1).int().positive().default(60_000),
  STREAM_IDLE_TIMEOUT_SECONDS: duration(1000).positive().default(600),
  SHUTDOWN_GRACE_SECONDS: duration(1000).min(0).default(30),
  GRAPH_DIR: z.string().trim().min(1).default('graphs'),
  DISPLAY_TIMEZONE: z
    .string()
    .trim()
    .default('Asia/Bangkok')
    .refine(isTimeZone, 'unknown IANA time zone'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

function isTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Build the immutable runtime configuration from environment variables.
 * Throws ConfigError listing every invalid or missing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<MonitorConfig> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  const e = parsed.data;

  let line: LineConfig | null = null;
  let cloudinary: CloudinaryConfig | null = null;
  if (e.SEND_TO_LINE) {
    const { LINE_URL, GROUP_ID, LINE_API_KEY, CLOUDINARY_CLOUD_NAME, CLOUDINARY_API_KEY, CLOUDINARY_API_SECRET } = e;
    if (LINE_URL && GROUP_ID && LINE_API_KEY && CLOUDINARY_CLOUD_NAME && CLOUDINARY_API_KEY && CLOUDINARY_API_SECRET) {
      line = { url: LINE_URL, groupId: GROUP_ID, apiKey: LINE_API_KEY };
      cloudinary = { cloudName: CLOUDINARY_CLOUD_NAME, apiKey: CLOUDINARY_API_KEY, apiSecret: CLOUDINARY_API_SECRET };
    } else {
      const missing = Object.entries({
        LINE_URL, GROUP_ID, LINE_API_KEY, CLOUDINARY_CLOUD_NAME, CLOUDINARY_API_KEY, CLOUDINARY_API_SECRET,
      })
        .filter(([, v]) => !v)
        .map(([k]) => k);
      const issues = missing.map(k => `${k}: required when SEND_TO_LINE is enabled`);
      throw new ConfigError(`Missing credentials for notifications: ${missing.join(', ')}`, issues);
    }
  }

  if (e.RECONNECT_MAX_DELAY_MS < e.RECONNECT_BASE_DELAY_MS) {
    const issue = 'RECONNECT_MAX_DELAY_MS: must be >= RECONNECT_BASE_DELAY_MS';
    throw new ConfigError(`Invalid configuration: ${issue}`, [issue]);
  }

  return Object.freeze({
    intervalMs: Math.round(e.UPDATE_INTERVAL_MINUTES * 60_000),
    firstCycleDelayMs: Math.round(e.FIRST_CYCLE_DELAY_SECONDS * 1000),
    maxCycles: e.MAX_CYCLES,
    notifyEnabled: e.SEND_TO_LINE,
    line: line && Object.freeze(line),
    cloudinary: cloudinary && Object.freeze(cloudinary),
    stationUrlTemplate: e.STATION_URL_TEMPLATE,
    windowCapacity: e.WINDOW_CAPACITY,
    reconnectBaseDelayMs: e.RECONNECT_BASE_DELAY_MS,
    reconnectMaxDelayMs: e.RECONNECT_MAX_DELAY_MS,
    idleTimeoutMs: Math.round(e.STREAM_IDLE_TIMEOUT_SECONDS * 1000),
    shutdownGraceMs: Math.round(e.SHUTDOWN_GRACE_SECONDS * 1000),
    graphDir: e.GRAPH_DIR,
    displayTimeZone: e.DISPLAY_TIMEZONE,
    logLevel: e.LOG_LEVEL,
  });
}

/** Load `.env` from the working directory into process.env (existing variables win). */
export function loadEnvFile(path?: string): void {
  loadDotenv(path ? { path } : undefined);
}
