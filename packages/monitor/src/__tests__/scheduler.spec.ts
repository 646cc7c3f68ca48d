import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { CycleOutcome, CycleStatus, StationSnapshot } from '@riverwatch/shared';
import { DeliveryGate } from '../gate.js';
import { CycleScheduler } from '../scheduler.js';
import type { CycleRunner } from '../scheduler.js';
import { rec, silentLogger } from './helpers.js';

function makeScheduler(opts: {
  runCycle: CycleRunner;
  intervalMs?: number;
  maxCycles?: number;
  takeSnapshot?: () => StationSnapshot;
  firstDelayMs?: number;
  shutdownGraceMs?: number;
}) {
  let t = 0;
  return new CycleScheduler({
    stationCode: '703',
    intervalMs: opts.intervalMs ?? 1000,
    firstDelayMs: opts.firstDelayMs ?? 0,
    maxCycles: opts.maxCycles ?? 0,
    shutdownGraceMs: opts.shutdownGraceMs ?? 500,
    // A new record every tick unless the test says otherwise
    takeSnapshot: opts.takeSnapshot ?? (() => [rec(++t, 1.0)]),
    gate: new DeliveryGate('703', { notifyEnabled: true }),
    runCycle: opts.runCycle,
    logger: silentLogger(),
  });
}

describe('CycleScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('stops by itself after maxCycles', async () => {
    const runCycle = vi.fn<CycleRunner>().mockResolvedValue('notified');
    const scheduler = makeScheduler({ runCycle, maxCycles: 3 });

    const done = scheduler.run(new AbortController().signal);
    await vi.advanceTimersByTimeAsync(2500);
    await done;

    expect(runCycle).toHaveBeenCalledTimes(3);
    expect(scheduler.counters.cycles).toBe(3);
    expect(scheduler.counters.notified).toBe(3);
  });

  it('runs a single cycle when maxCycles is 1', async () => {
    const runCycle = vi.fn<CycleRunner>().mockResolvedValue('rendered');
    const scheduler = makeScheduler({ runCycle, maxCycles: 1, firstDelayMs: 200 });

    const done = scheduler.run(new AbortController().signal);
    await vi.advanceTimersByTimeAsync(199);
    expect(runCycle).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await done;

    expect(runCycle).toHaveBeenCalledTimes(1);
    expect(scheduler.counters.rendered).toBe(1);
  });

  it('waits out a period longer than a single timer allows', async () => {
    const runCycle = vi.fn<CycleRunner>().mockResolvedValue('rendered');
    const scheduler = makeScheduler({ runCycle, maxCycles: 5, intervalMs: 36_000 * 60_000 });
    const controller = new AbortController();

    const done = scheduler.run(controller.signal);
    await vi.advanceTimersByTimeAsync(300);
    expect(scheduler.counters.cycles).toBe(1);

    controller.abort();
    await done;
    expect(runCycle).toHaveBeenCalledTimes(1);
  });

  it('skips ticks while the previous delivery is in flight', async () => {
    let finish: (status: CycleStatus) => void = () => undefined;
    const runCycle = vi.fn<CycleRunner>(
      () => new Promise<CycleStatus>(resolve => {
        finish = resolve;
      }),
    );
    const scheduler = makeScheduler({ runCycle, maxCycles: 3 });

    const done = scheduler.run(new AbortController().signal);
    await vi.advanceTimersByTimeAsync(2500);

    expect(runCycle).toHaveBeenCalledTimes(1);
    expect(scheduler.counters.skippedInFlight).toBe(2);
    expect(scheduler.busy).toBe(true);

    finish('notified');
    await done;
    expect(scheduler.busy).toBe(false);
  });

  it('keeps the schedule fixed when a delivery runs long', async () => {
    const start = Date.now();
    const startedAt: number[] = [];
    const runCycle = vi.fn<CycleRunner>(() => {
      startedAt.push(Date.now() - start);
      return new Promise<CycleStatus>(resolve => setTimeout(() => resolve('notified'), 1500));
    });
    const scheduler = makeScheduler({ runCycle, maxCycles: 3 });

    const done = scheduler.run(new AbortController().signal);
    await vi.advanceTimersByTimeAsync(4000);
    await done;

    // Tick at 1000 is skipped because the first delivery ends at 1500
    expect(startedAt).toEqual([0, 2000]);
    expect(scheduler.counters.skippedInFlight).toBe(1);
  });

  it('does not deliver when the gate declines', async () => {
    const runCycle = vi.fn<CycleRunner>().mockResolvedValue('notified');
    const scheduler = makeScheduler({ runCycle, maxCycles: 2, takeSnapshot: () => [] });

    const done = scheduler.run(new AbortController().signal);
    await vi.advanceTimersByTimeAsync(1500);
    await done;

    expect(runCycle).not.toHaveBeenCalled();
    expect(scheduler.counters.cycles).toBe(2);
  });

  it('passes the approved outcome to the delivery', async () => {
    const runCycle = vi.fn<CycleRunner>().mockResolvedValue('notified');
    const scheduler = makeScheduler({ runCycle, maxCycles: 1, takeSnapshot: () => [rec(7, 2.5)] });

    const done = scheduler.run(new AbortController().signal);
    await vi.advanceTimersByTimeAsync(0);
    await done;

    const outcome: CycleOutcome = runCycle.mock.calls[0][0];
    expect(outcome).toMatchObject({ stationCode: '703', shouldNotify: true, reason: 'new_data', fingerprint: '7000|2.5|-' });
    expect(outcome.windowSnapshot).toEqual([rec(7, 2.5)]);
  });

  it('counts a rejected delivery as a failed cycle', async () => {
    const runCycle = vi.fn<CycleRunner>().mockRejectedValue(new Error('render crashed'));
    const scheduler = makeScheduler({ runCycle, maxCycles: 1 });

    const done = scheduler.run(new AbortController().signal);
    await vi.advanceTimersByTimeAsync(0);
    await done;

    expect(scheduler.counters.failedCycles).toBe(1);
  });

  it('stops on shutdown and aborts a delivery that outlives the grace period', async () => {
    let deliverySignal: AbortSignal | undefined;
    const runCycle = vi.fn<CycleRunner>((_outcome, signal) => {
      deliverySignal = signal;
      return new Promise<CycleStatus>(resolve => {
        signal.addEventListener('abort', () => resolve('failed'));
      });
    });
    const scheduler = makeScheduler({ runCycle, shutdownGraceMs: 500 });
    const controller = new AbortController();

    const done = scheduler.run(controller.signal);
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();
    await vi.advanceTimersByTimeAsync(499);
    expect(deliverySignal?.aborted).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await done;

    expect(deliverySignal?.aborted).toBe(true);
    expect(runCycle).toHaveBeenCalledTimes(1);
  });

  it('lets an in-flight delivery finish within the grace period', async () => {
    const runCycle = vi.fn<CycleRunner>(
      () => new Promise<CycleStatus>(resolve => setTimeout(() => resolve('notified'), 300)),
    );
    const scheduler = makeScheduler({ runCycle, shutdownGraceMs: 500 });
    const controller = new AbortController();

    const done = scheduler.run(controller.signal);
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();
    await vi.advanceTimersByTimeAsync(300);
    await done;

    expect(scheduler.counters.notified).toBe(1);
  });
});
