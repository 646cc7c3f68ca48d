import { z } from 'zod';
import { ParseError, WATER_LEVEL_SERIES_KEY, errorMessage } from '@riverwatch/shared';
import type { StationMeta, StationRecord } from '@riverwatch/shared';

export interface ParsedBatch {
  meta: StationMeta;
  /** Ascending by timestamp, one record per timestamp */
  records: StationRecord[];
  /** Samples whose timestamp could not be read */
  droppedSamples: number;
}

export type ParseResult =
  | { ok: true; batch: ParsedBatch }
  | { ok: false; error: ParseError };

/** Unix-seconds values beyond this are more likely milliseconds; refuse to guess. */
const MAX_UNIX_SECONDS = 1e11;

// ISO-8601 with an explicit zone; a local time without offset is ambiguous
const ZONED_ISO = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})$/i;

const seriesSchema = z.object({
  time: z.array(z.unknown()).catch([]),
  value: z.array(z.unknown()).catch([]),
});

const messageSchema = z.object({
  code: z.union([z.string(), z.number()]).transform(String).pipe(z.string().trim().min(1)),
  name: z.string().optional().catch(undefined),
  basin: z.object({ name: z.string().optional().catch(undefined) }).optional().catch(undefined),
  water_level_warning: z.unknown().optional(),
  water_level_critical: z.unknown().optional(),
  values: z
    .object({
      // Only the water level series is read; sibling series may hold anything
      water_level_graph: z.record(z.unknown()).optional().catch(undefined),
      rain_graph: seriesSchema.optional().catch(undefined),
      time: z.unknown().optional(),
      water_level: z.unknown().optional(),
      rain: z.unknown().optional(),
    })
    .optional()
    .catch(undefined),
});

type FeedSeries = z.infer<typeof seriesSchema>;

function readSeries(raw: unknown): FeedSeries | undefined {
  const parsed = seriesSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/** Canonical UTC epoch ms, or null when the value is not an unambiguous instant. */
export function parseTimestamp(raw: unknown): number | null {
  if (typeof raw === 'string') {
    const text = raw.trim();
    if (ZONED_ISO.test(text)) {
      const ms = Date.parse(text.replace(' ', 'T'));
      return Number.isFinite(ms) ? ms : null;
    }
    if (text === '' || !/^\d+(\.\d+)?$/.test(text)) return null;
    return parseTimestamp(Number(text));
  }
  if (typeof raw !== 'number' || !Number.isFinite(raw)) return null;
  if (raw < 0 || raw > MAX_UNIX_SECONDS) return null;
  return Math.round(raw * 1000);
}

/** Numeric reading, or undefined for a gap. */
export function parseReading(raw: unknown): number | undefined {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : undefined;
  if (typeof raw === 'string') {
    const text = raw.trim();
    if (text === '') return undefined;
    const value = Number(text);
    return Number.isFinite(value) ? value : undefined;
  }
  return undefined;
}

function parseRainfall(raw: unknown): number | undefined {
  const value = parseReading(raw);
  return value !== undefined && value >= 0 ? value : undefined;
}

function decodeJson(text: string): unknown {
  const decoded: unknown = JSON.parse(text);
  // Frames are sometimes JSON-encoded twice
  return typeof decoded === 'string' ? JSON.parse(decoded) : decoded;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class RecordJoin {
  private readonly byTime = new Map<number, StationRecord>();
  dropped = 0;

  add(rawTime: unknown, field: 'waterLevel' | 'rainfall', value: number | undefined) {
    const timestamp = parseTimestamp(rawTime);
    if (timestamp === null) {
      this.dropped++;
      return;
    }
    let record = this.byTime.get(timestamp);
    if (!record) {
      record = { timestamp };
      this.byTime.set(timestamp, record);
    }
    if (value !== undefined && record[field] === undefined) record[field] = value;
  }

  addSeries(series: FeedSeries, field: 'waterLevel' | 'rainfall') {
    const count = Math.min(series.time.length, series.value.length);
    const read = field === 'rainfall' ? parseRainfall : parseReading;
    for (let i = 0; i < count; i++) {
      this.add(series.time[i], field, read(series.value[i]));
    }
  }

  records(): StationRecord[] {
    return [...this.byTime.values()].sort((a, b) => a.timestamp - b.timestamp);
  }
}

/**
 * Normalize one feed frame into station metadata and its records. Water level
 * and rainfall series are joined on timestamp; missing readings stay absent.
 */
export function parseMessage(raw: string | Buffer): ParseResult {
  let frame: unknown;
  try {
    frame = decodeJson(typeof raw === 'string' ? raw : raw.toString('utf8'));
  } catch (err) {
    return { ok: false, error: new ParseError(`Invalid JSON frame: ${errorMessage(err)}`, { cause: err }) };
  }

  if (!isRecord(frame)) {
    return { ok: false, error: new ParseError('Frame is not an object') };
  }

  let message: unknown = frame.message;
  if (typeof message === 'string') {
    try {
      message = JSON.parse(message);
    } catch (err) {
      return { ok: false, error: new ParseError(`Invalid JSON in message field: ${errorMessage(err)}`, { cause: err }) };
    }
  }

  const parsed = messageSchema.safeParse(message);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'message';
    return { ok: false, error: new ParseError(`Malformed message at ${where}: ${issue.message}`) };
  }

  const msg = parsed.data;
  const meta: StationMeta = {
    code: msg.code,
    name: msg.name ?? '',
    basin: msg.basin?.name ?? '',
  };
  const warningLevel = parseReading(msg.water_level_warning);
  const criticalLevel = parseReading(msg.water_level_critical);
  if (warningLevel !== undefined) meta.warningLevel = warningLevel;
  if (criticalLevel !== undefined) meta.criticalLevel = criticalLevel;

  const values = msg.values;
  const levelSeries = readSeries(values?.water_level_graph?.[WATER_LEVEL_SERIES_KEY]);
  const rainSeries = values?.rain_graph;
  const join = new RecordJoin();

  if (levelSeries || rainSeries) {
    if (levelSeries) join.addSeries(levelSeries, 'waterLevel');
    if (rainSeries) join.addSeries(rainSeries, 'rainfall');
  } else if (values && values.time !== undefined) {
    join.add(values.time, 'waterLevel', parseReading(values.water_level));
    join.add(values.time, 'rainfall', parseRainfall(values.rain));
    // A single sample with a bad timestamp is counted once, not per field
    if (join.dropped > 0) join.dropped = 1;
  } else {
    return { ok: false, error: new ParseError(`Station ${meta.code}: frame carries no water level or rainfall data`) };
  }

  return { ok: true, batch: { meta, records: join.records(), droppedSamples: join.dropped } };
}
