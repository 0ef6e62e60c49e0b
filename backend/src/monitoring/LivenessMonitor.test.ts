import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createMachineStatus } from '../machines/status.js';
import { LivenessMonitor } from './LivenessMonitor.js';
import { StateReconciler } from './StateReconciler.js';

interface MutableTarget {
  machineId: number;
  generation: number;
  intervalMs: number;
  lastSeen: number;
  running: boolean;
}

describe('LivenessMonitor', () => {
  let reconciler: StateReconciler;
  let liveness: LivenessMonitor;
  let target: MutableTarget;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    reconciler = new StateReconciler();
    liveness = new LivenessMonitor(reconciler);
    reconciler.open(1, 1);
    target = { machineId: 1, generation: 1, intervalMs: 1000, lastSeen: 0, running: true };
  });

  afterEach(() => {
    liveness.cleanup();
    vi.useRealTimers();
  });

  it('derives the check cadence from the polling interval', () => {
    expect(liveness.checkIntervalFor(1000)).toBe(100);
    expect(liveness.checkIntervalFor(200)).toBe(50);
    expect(liveness.checkIntervalFor(20)).toBe(20);
  });

  it('declares Offline once the silence exceeds two intervals', () => {
    liveness.watch(target);

    vi.advanceTimersByTime(2000);
    expect(reconciler.get(1)).toBeUndefined();

    vi.advanceTimersByTime(100);
    expect(reconciler.get(1)?.state).toBe('Offline');
  });

  it('honours a custom multiplier', () => {
    liveness.cleanup();
    liveness = new LivenessMonitor(reconciler, { offlineMultiplier: 3 });
    liveness.watch(target);

    vi.advanceTimersByTime(2100);
    expect(reconciler.get(1)).toBeUndefined();

    vi.advanceTimersByTime(1000);
    expect(reconciler.get(1)?.state).toBe('Offline');
  });

  it('declares Offline only once per silence', () => {
    const listener = vi.fn();
    reconciler.subscribe(listener);
    liveness.watch(target);

    vi.advanceTimersByTime(5000);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('declares again after the machine reported and went silent', () => {
    const listener = vi.fn();
    reconciler.subscribe(listener);
    liveness.watch(target);

    vi.advanceTimersByTime(2100);
    reconciler.accept(1, 1, createMachineStatus(1, { state: 'Idle' }));
    target.lastSeen = Date.now();

    vi.advanceTimersByTime(2100);
    expect(reconciler.get(1)?.state).toBe('Offline');
    expect(listener).toHaveBeenCalledTimes(3);
  });

  it('leaves a reporting machine alone', () => {
    liveness.watch(target);

    for (let i = 0; i < 5; i++) {
      vi.advanceTimersByTime(1000);
      target.lastSeen = Date.now();
    }
    expect(reconciler.get(1)).toBeUndefined();
  });

  it('skips targets that are not running', () => {
    target.running = false;
    liveness.watch(target);

    vi.advanceTimersByTime(5000);
    expect(reconciler.get(1)).toBeUndefined();
  });

  it('synthesizes nothing after unwatch', () => {
    liveness.watch(target);
    vi.advanceTimersByTime(1500);
    liveness.unwatch(1);

    vi.advanceTimersByTime(5000);
    expect(reconciler.get(1)).toBeUndefined();
    expect(liveness.isWatching(1)).toBe(false);
  });
});
