import { describe, it, expect } from 'vitest';
import { DeliveryGate, decide, fingerprintSnapshot } from '../gate.js';
import { rec } from './helpers.js';

describe('fingerprintSnapshot', () => {
  it('summarizes the latest record', () => {
    expect(fingerprintSnapshot([rec(1, 1.0), rec(2, 1.25)])).toBe('2000|1.25|-');
    expect(fingerprintSnapshot([rec(3, undefined, 0.5)])).toBe('3000|-|0.5');
  });
});

describe('decide', () => {
  it('declines an empty snapshot', () => {
    expect(decide('703', null, [], { notifyEnabled: true })).toEqual({
      stationCode: '703',
      windowSnapshot: [],
      shouldRender: false,
      shouldNotify: false,
      reason: 'no_data',
      fingerprint: null,
    });
  });

  it('approves new data', () => {
    const outcome = decide('703', null, [rec(1, 1.0)], { notifyEnabled: true });
    expect(outcome.shouldNotify).toBe(true);
    expect(outcome.shouldRender).toBe(true);
    expect(outcome.reason).toBe('new_data');
    expect(outcome.fingerprint).toBe('1000|1|-');
  });

  it('declines when the latest record matches the previous fingerprint', () => {
    const outcome = decide('703', '1000|1|-', [rec(1, 1.0)], { notifyEnabled: true });
    expect(outcome.shouldNotify).toBe(false);
    expect(outcome.shouldRender).toBe(false);
    expect(outcome.reason).toBe('unchanged');
  });

  it('renders without notifying when notifications are disabled', () => {
    const outcome = decide('703', null, [rec(1, 1.0)], { notifyEnabled: false });
    expect(outcome.shouldRender).toBe(true);
    expect(outcome.shouldNotify).toBe(false);
    expect(outcome.reason).toBe('notify_disabled');
  });

  it('fails open when the fingerprint cannot be computed', () => {
    const outcome = decide('703', 'anything', [rec(1, 1.0)], {
      notifyEnabled: true,
      fingerprint: () => {
        throw new Error('broken');
      },
    });
    expect(outcome.shouldNotify).toBe(true);
    expect(outcome.reason).toBe('fingerprint_failed');
    expect(outcome.fingerprint).toBeNull();
  });
});

describe('DeliveryGate', () => {
  it('notifies once for two identical consecutive snapshots', () => {
    const gate = new DeliveryGate('703', { notifyEnabled: true });
    const snapshot = [rec(1, 1.0), rec(2, 1.1)];

    expect(gate.evaluate(snapshot).shouldNotify).toBe(true);
    expect(gate.evaluate([...snapshot]).shouldNotify).toBe(false);
  });

  it('notifies again on the first cycle where the latest timestamp changes', () => {
    const gate = new DeliveryGate('703', { notifyEnabled: true });
    gate.evaluate([rec(1, 1.0)]);
    gate.evaluate([rec(1, 1.0)]);

    const outcome = gate.evaluate([rec(1, 1.0), rec(2, 1.0)]);
    expect(outcome.shouldNotify).toBe(true);
    expect(gate.previousFingerprint).toBe('2000|1|-');
  });

  it('does not commit a fingerprint for declined cycles', () => {
    const gate = new DeliveryGate('703', { notifyEnabled: true });
    gate.evaluate([]);
    expect(gate.previousFingerprint).toBeNull();
  });
});
