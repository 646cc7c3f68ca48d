import { describe, it, expect } from 'vitest';
import { parseStationArgs } from '../cli.js';

describe('parseStationArgs', () => {
  it('returns station ids in order without duplicates', () => {
    expect(parseStationArgs(['703', '704', '703', ' 705 '])).toEqual({ ok: true, stations: ['703', '704', '705'] });
  });

  it('requires at least one id', () => {
    expect(parseStationArgs([])).toEqual({ ok: false, message: 'No station ids given' });
    expect(parseStationArgs(['', '  '])).toEqual({ ok: false, message: 'No station ids given' });
  });

  it('names every invalid id', () => {
    expect(parseStationArgs(['703', '../etc', 'a b'])).toEqual({
      ok: false,
      message: 'Invalid station id(s): ../etc, a b (letters, digits, "-" and "_" only)',
    });
  });

  it('accepts letters, dashes and underscores', () => {
    expect(parseStationArgs(['CPY-01', 'ping_2'])).toEqual({ ok: true, stations: ['CPY-01', 'ping_2'] });
  });
});
