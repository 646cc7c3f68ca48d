// ---- Station Telemetry ----

export interface StationMeta {
  /** Station code as published by the feed, e.g. "STN06" */
  code: string;
  name: string;
  basin: string;
  /** Water level (m) at which the station enters the watch zone */
  warningLevel?: number;
  /** Water level (m) at which the station is critical */
  criticalLevel?: number;
}

/**
 * One telemetry sample. Absent fields are sensor gaps and must never be
 * rendered as zero.
 */
export interface StationRecord {
  /** Epoch milliseconds, UTC */
  timestamp: number;
  /** Metres */
  waterLevel?: number;
  /** Millimetres, >= 0 */
  rainfall?: number;
}

export type StationSnapshot = readonly Readonly<StationRecord>[];

export type AcceptResult = 'accepted' | 'rejected_duplicate' | 'rejected_out_of_order';

export interface BatchAcceptResult {
  accepted: number;
  duplicates: number;
  outOfOrder: number;
}

// ---- Connection ----

export type ConnectionState =
  | { kind: 'disconnected' }
  | { kind: 'connecting' }
  | { kind: 'streaming' }
  | { kind: 'backoff'; failures: number; delayMs: number };

export type ConnectionStateKind = ConnectionState['kind'];

// ---- Cycles ----

export type GateReason =
  | 'no_data'
  | 'unchanged'
  | 'notify_disabled'
  | 'new_data'
  | 'fingerprint_failed';

export interface CycleOutcome {
  stationCode: string;
  windowSnapshot: StationSnapshot;
  /** Render the chart (true whenever there is new data) */
  shouldRender: boolean;
  /** Upload and push the chart to the notification channel */
  shouldNotify: boolean;
  reason: GateReason;
  /** Fingerprint of the latest record, null when the snapshot is empty */
  fingerprint: string | null;
}

export type CycleStatus = 'skipped' | 'rendered' | 'notified' | 'failed';

export interface StationCounters {
  recordsAccepted: number;
  duplicates: number;
  outOfOrder: number;
  parseErrors: number;
  droppedSamples: number;
  reconnects: number;
  cycles: number;
  skippedInFlight: number;
  rendered: number;
  notified: number;
  failedCycles: number;
}

export function emptyCounters(): StationCounters {
  return {
    recordsAccepted: 0, duplicates: 0, outOfOrder: 0, parseErrors: 0, droppedSamples: 0,
    reconnects: 0, cycles: 0, skippedInFlight: 0, rendered: 0, notified: 0, failedCycles: 0,
  };
}
