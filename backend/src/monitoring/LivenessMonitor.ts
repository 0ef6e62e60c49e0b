/**
 * Liveness Monitor - declares a machine Offline when its provider goes quiet.
 *
 * One recurring check per watched handle. When nothing has been accepted for
 * longer than `intervalMs * offlineMultiplier`, an Offline envelope is
 * synthesized and written through the reconciler under the handle's current
 * generation. This is the only place envelopes are synthesized.
 */

import { createLogger, type Logger } from '../logger.js';
import { createOfflineStatus } from '../machines/status.js';
import type { StateReconciler } from './StateReconciler.js';

export interface LivenessTarget {
  readonly machineId: number;
  readonly generation: number;
  readonly intervalMs: number;
  /** Epoch ms of the last accepted provider status */
  readonly lastSeen: number;
  readonly running: boolean;
}

export interface LivenessOptions {
  /** K: silent intervals tolerated before Offline (default 2) */
  offlineMultiplier?: number;
  /** Lower bound for the check cadence in ms (default 50) */
  minCheckMs?: number;
  /** Checks per polling interval (default 10) */
  checksPerInterval?: number;
  logger?: Logger;
}

interface WatchEntry {
  target: LivenessTarget;
  timer: NodeJS.Timeout;
  /** lastSeen value for which Offline was already declared */
  declaredFor: number | null;
}

export const DEFAULT_OFFLINE_MULTIPLIER = 2;
const DEFAULT_MIN_CHECK_MS = 50;
const DEFAULT_CHECKS_PER_INTERVAL = 10;

export class LivenessMonitor {
  private reconciler: StateReconciler;
  private entries: Map<number, WatchEntry> = new Map();
  private logger: Logger;
  readonly offlineMultiplier: number;
  private minCheckMs: number;
  private checksPerInterval: number;

  constructor(reconciler: StateReconciler, options: LivenessOptions = {}) {
    this.reconciler = reconciler;
    this.logger = (options.logger ?? createLogger('liveness')).child({ component: 'liveness' });
    this.offlineMultiplier = options.offlineMultiplier ?? DEFAULT_OFFLINE_MULTIPLIER;
    this.minCheckMs = options.minCheckMs ?? DEFAULT_MIN_CHECK_MS;
    this.checksPerInterval = options.checksPerInterval ?? DEFAULT_CHECKS_PER_INTERVAL;
  }

  /** Check cadence for a polling interval; never coarser than the interval itself. */
  checkIntervalFor(intervalMs: number): number {
    const fine = Math.max(this.minCheckMs, Math.floor(intervalMs / this.checksPerInterval));
    return Math.max(1, Math.min(intervalMs, fine));
  }

  watch(target: LivenessTarget): void {
    this.unwatch(target.machineId);

    const entry: WatchEntry = {
      target,
      declaredFor: null,
      timer: setInterval(() => this.check(entry), this.checkIntervalFor(target.intervalMs)),
    };
    this.entries.set(target.machineId, entry);
  }

  /** Stops checking a machine. No Offline is synthesized after this returns. */
  unwatch(machineId: number): void {
    const entry = this.entries.get(machineId);
    if (entry) {
      clearInterval(entry.timer);
      this.entries.delete(machineId);
    }
  }

  isWatching(machineId: number): boolean {
    return this.entries.has(machineId);
  }

  private check(entry: WatchEntry): void {
    const { target } = entry;
    if (!target.running || entry.declaredFor === target.lastSeen) return;

    const silence = Date.now() - target.lastSeen;
    const window = target.intervalMs * this.offlineMultiplier;
    if (silence <= window) return;

    entry.declaredFor = target.lastSeen;
    this.logger.warn(
      { machineId: target.machineId, generation: target.generation, silenceMs: silence },
      'No status within liveness window, marking machine offline',
    );
    this.reconciler.accept(target.machineId, target.generation, createOfflineStatus(target.machineId));
  }

  cleanup(): void {
    for (const entry of this.entries.values()) {
      clearInterval(entry.timer);
    }
    this.entries.clear();
  }
}
