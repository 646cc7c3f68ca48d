export const USAGE = 'Usage: riverwatch <station-id> [station-id...]\n  e.g. riverwatch 703 704 705';

const STATION_ID = /^[A-Za-z0-9_-]+$/;

export type StationArgs = { ok: true; stations: string[] } | { ok: false; message: string };

/** Station ids from positional arguments, deduplicated in order of appearance. */
export function parseStationArgs(argv: readonly string[]): StationArgs {
  const ids = argv.map(a => a.trim()).filter(a => a !== '');
  if (ids.length === 0) return { ok: false, message: 'No station ids given' };

  const invalid = ids.filter(id => !STATION_ID.test(id));
  if (invalid.length > 0) {
    return { ok: false, message: `Invalid station id(s): ${invalid.join(', ')} (letters, digits, "-" and "_" only)` };
  }
  return { ok: true, stations: [...new Set(ids)] };
}
