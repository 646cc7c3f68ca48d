import type { CycleOutcome, StationSnapshot } from '@riverwatch/shared';

export interface GateConfig {
  /** When false, cycles still render but never upload or notify */
  notifyEnabled: boolean;
  fingerprint?: (snapshot: StationSnapshot) => string;
}

function formatReading(value: number | undefined): string {
  return value === undefined ? '-' : String(value);
}

/** Latest record's timestamp and readings. Throws on an empty snapshot. */
export function fingerprintSnapshot(snapshot: StationSnapshot): string {
  if (snapshot.length === 0) throw new Error('Cannot fingerprint an empty snapshot');
  const latest = snapshot[snapshot.length - 1];
  return `${latest.timestamp}|${formatReading(latest.waterLevel)}|${formatReading(latest.rainfall)}`;
}

/**
 * Decide whether a cycle renders and notifies. Never throws: a fingerprint
 * that cannot be computed counts as new data.
 */
export function decide(
  stationCode: string,
  previousFingerprint: string | null,
  snapshot: StationSnapshot,
  config: GateConfig,
): CycleOutcome {
  const base = { stationCode, windowSnapshot: snapshot };

  if (snapshot.length === 0) {
    return { ...base, shouldRender: false, shouldNotify: false, reason: 'no_data', fingerprint: null };
  }

  let fingerprint: string | null;
  try {
    fingerprint = (config.fingerprint ?? fingerprintSnapshot)(snapshot);
  } catch {
    fingerprint = null;
  }

  if (fingerprint !== null && fingerprint === previousFingerprint) {
    return { ...base, shouldRender: false, shouldNotify: false, reason: 'unchanged', fingerprint };
  }
  if (!config.notifyEnabled) {
    return { ...base, shouldRender: true, shouldNotify: false, reason: 'notify_disabled', fingerprint };
  }
  return {
    ...base,
    shouldRender: true,
    shouldNotify: true,
    reason: fingerprint === null ? 'fingerprint_failed' : 'new_data',
    fingerprint,
  };
}

/** Per-station gate remembering the fingerprint of the last approved cycle. */
export class DeliveryGate {
  private lastFingerprint: string | null = null;

  constructor(
    readonly stationCode: string,
    private readonly config: GateConfig,
  ) {}

  get previousFingerprint(): string | null {
    return this.lastFingerprint;
  }

  evaluate(snapshot: StationSnapshot): CycleOutcome {
    const outcome = decide(this.stationCode, this.lastFingerprint, snapshot, this.config);
    if (outcome.shouldRender) this.lastFingerprint = outcome.fingerprint;
    return outcome;
  }
}
