// ---- Station Feed Wire Format ----
// Frames are JSON; the frame itself and its `message` field may each arrive
// as a JSON-encoded string.

export interface FeedSeries {
  /** Unix seconds */
  time: Array<number | string | null>;
  value: Array<number | string | null>;
}

export interface FeedValues {
  water_level_graph?: Record<string, FeedSeries>;
  rain_graph?: FeedSeries;
  /** Single-sample frames */
  time?: number | string;
  water_level?: number | string | null;
  rain?: number | string | null;
}

export interface FeedMessage {
  code: string;
  name?: string;
  basin?: { name?: string };
  water_level_warning?: number | string | null;
  water_level_critical?: number | string | null;
  values?: FeedValues;
}

export interface FeedFrame {
  message: FeedMessage | string;
}

/** Key of the water level series inside `water_level_graph` */
export const WATER_LEVEL_SERIES_KEY = '0';

export const DEFAULT_STATION_URL_TEMPLATE = 'wss://telerid.rid.go.th/ws/station/{station}/';

export function stationUrl(template: string, stationCode: string): string {
  return template.replaceAll('{station}', encodeURIComponent(stationCode));
}
