import type { AcceptResult, BatchAcceptResult, StationMeta, StationRecord, StationSnapshot } from '@riverwatch/shared';

export const DEFAULT_WINDOW_CAPACITY = 1000;

/**
 * Bounded, timestamp-ordered buffer for one station. Acts as a monotonic
 * watermark filter: anything at or below the newest accepted timestamp is
 * rejected, so samples re-delivered after a reconnect are deduplicated.
 */
export class StationWindow {
  private records: StationRecord[] = [];
  private timestamps = new Set<number>();
  meta: StationMeta | null = null;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Window capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.records.length;
  }

  /** Newest accepted timestamp, or null before the first record */
  get watermark(): number | null {
    return this.records.length > 0 ? this.records[this.records.length - 1].timestamp : null;
  }

  accept(record: StationRecord): AcceptResult {
    const watermark = this.watermark;
    if (watermark !== null && record.timestamp <= watermark) {
      return record.timestamp === watermark || this.timestamps.has(record.timestamp)
        ? 'rejected_duplicate'
        : 'rejected_out_of_order';
    }

    this.records.push({ ...record });
    this.timestamps.add(record.timestamp);
    if (this.records.length > this.capacity) {
      for (const evicted of this.records.splice(0, this.records.length - this.capacity)) {
        this.timestamps.delete(evicted.timestamp);
      }
    }
    return 'accepted';
  }

  snapshot(): StationSnapshot {
    return Object.freeze(this.records.map(r => Object.freeze({ ...r })));
  }
}

/**
 * Owns the windows of the stations fed into it. Each station monitor holds its
 * own accumulator, so windows are never shared between station tasks.
 */
export class WindowAccumulator {
  private readonly windows = new Map<string, StationWindow>();

  constructor(readonly capacity: number = DEFAULT_WINDOW_CAPACITY) {}

  private windowFor(stationCode: string): StationWindow {
    let window = this.windows.get(stationCode);
    if (!window) {
      window = new StationWindow(this.capacity);
      this.windows.set(stationCode, window);
    }
    return window;
  }

  accept(stationCode: string, record: StationRecord): AcceptResult {
    return this.windowFor(stationCode).accept(record);
  }

  acceptBatch(stationCode: string, records: readonly StationRecord[]): BatchAcceptResult {
    const result: BatchAcceptResult = { accepted: 0, duplicates: 0, outOfOrder: 0 };
    for (const record of records) {
      switch (this.accept(stationCode, record)) {
        case 'accepted':
          result.accepted++;
          break;
        case 'rejected_duplicate':
          result.duplicates++;
          break;
        case 'rejected_out_of_order':
          result.outOfOrder++;
          break;
      }
    }
    return result;
  }

  snapshot(stationCode: string): StationSnapshot {
    return this.windows.get(stationCode)?.snapshot() ?? Object.freeze([]);
  }

  setMeta(stationCode: string, meta: StationMeta): void {
    this.windowFor(stationCode).meta = Object.freeze({ ...meta });
  }

  meta(stationCode: string): StationMeta | null {
    return this.windows.get(stationCode)?.meta ?? null;
  }

  size(stationCode: string): number {
    return this.windows.get(stationCode)?.size ?? 0;
  }
}
