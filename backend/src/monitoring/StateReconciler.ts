/**
 * State Reconciler - the single writer of the current-state table.
 *
 * Every status envelope, from providers and from the liveness monitor, goes
 * through accept(). Envelopes are tagged with the generation of the handle
 * that produced them; anything from an older or closed generation is
 * dropped, so a slow poll answered after a restart cannot overwrite fresher
 * state. Within a generation the last accepted envelope wins.
 */

import { createLogger, type Logger } from '../logger.js';
import { statusEquals, statusHash } from '../machines/status.js';
import type { MachineStatus } from '../machines/types.js';

export type StateChange =
  | {
      type: 'status';
      machineId: number;
      status: MachineStatus;
      previous: MachineStatus | undefined;
      /** false when the new envelope is structurally equal to the previous one */
      changed: boolean;
      /** statusHash of the envelope; equal for structurally equal envelopes */
      hash: number;
    }
  | {
      type: 'removed';
      machineId: number;
      previous: MachineStatus;
    };

export type StateListener = (change: StateChange) => void;

interface GenerationRecord {
  current: number;
  active: boolean;
  recentIds: string[];
}

export interface StateReconcilerOptions {
  logger?: Logger;
  /** How many envelope ids per machine are remembered for deduplication */
  recentIdLimit?: number;
}

const DEFAULT_RECENT_ID_LIMIT = 64;

export class StateReconciler {
  private table: Map<number, MachineStatus> = new Map();
  private generations: Map<number, GenerationRecord> = new Map();
  private listeners: Set<StateListener> = new Set();
  private logger: Logger;
  private recentIdLimit: number;

  constructor(options: StateReconcilerOptions = {}) {
    this.logger = (options.logger ?? createLogger('reconciler')).child({ component: 'reconciler' });
    this.recentIdLimit = options.recentIdLimit ?? DEFAULT_RECENT_ID_LIMIT;
  }

  // =========================================
  // GENERATIONS
  // =========================================

  /**
   * Makes `generation` the current, active incarnation for a machine.
   * Returns false if a newer or equal generation was already opened.
   */
  open(machineId: number, generation: number): boolean {
    const record = this.generations.get(machineId);
    if (record && generation <= record.current) {
      this.logger.warn(
        { machineId, generation, current: record.current },
        'Ignoring open of an outdated generation',
      );
      return false;
    }

    this.generations.set(machineId, { current: generation, active: true, recentIds: [] });
    return true;
  }

  /**
   * Closes a generation: nothing tagged with it is accepted afterwards.
   * With `clear` the machine's table entry is removed as well.
   */
  close(machineId: number, generation: number, options: { clear: boolean }): void {
    const record = this.generations.get(machineId);
    if (!record || generation < record.current) return;

    record.current = generation;
    record.active = false;

    if (options.clear) {
      const previous = this.table.get(machineId);
      if (previous) {
        this.table.delete(machineId);
        this.notify({ type: 'removed', machineId, previous });
      }
    }
  }

  currentGeneration(machineId: number): number | undefined {
    return this.generations.get(machineId)?.current;
  }

  // =========================================
  // WRITES
  // =========================================

  /**
   * Applies an envelope. Returns true when the table was written.
   */
  accept(machineId: number, generation: number, status: MachineStatus): boolean {
    const log = this.logger.child({ machineId, generation, statusId: status.id });

    if (status.machineId !== machineId) {
      log.warn({ statusMachineId: status.machineId }, 'Dropping status addressed to another machine');
      return false;
    }

    const record = this.generations.get(machineId);
    if (!record) {
      log.debug('Dropping status for a machine that is not monitored');
      return false;
    }

    if (generation < record.current) {
      log.debug({ current: record.current }, 'Dropping status from a stale generation');
      return false;
    }

    if (generation === record.current && !record.active) {
      log.debug('Dropping status from a stopped generation');
      return false;
    }

    if (generation > record.current) {
      record.current = generation;
      record.active = true;
      record.recentIds = [];
    }

    const previous = this.table.get(machineId);
    this.table.set(machineId, status);

    if (record.recentIds.includes(status.id)) {
      log.debug('Duplicate status delivery');
      return true;
    }

    record.recentIds.push(status.id);
    if (record.recentIds.length > this.recentIdLimit) {
      record.recentIds.shift();
    }

    const changed = previous === undefined || !statusEquals(previous, status);
    const hash = statusHash(status);
    if (changed) {
      log.debug({ state: status.state, hash }, 'Machine status changed');
    }

    this.notify({ type: 'status', machineId, status, previous, changed, hash });
    return true;
  }

  // =========================================
  // READS
  // =========================================

  get(machineId: number): MachineStatus | undefined {
    return this.table.get(machineId);
  }

  getAll(): MachineStatus[] {
    return Array.from(this.table.values()).sort((a, b) => a.machineId - b.machineId);
  }

  size(): number {
    return this.table.size;
  }

  // =========================================
  // SUBSCRIPTIONS
  // =========================================

  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(change: StateChange): void {
    for (const listener of this.listeners) {
      try {
        listener(change);
      } catch (error) {
        this.logger.error({ err: error, machineId: change.machineId }, 'State listener failed');
      }
    }
  }
}
