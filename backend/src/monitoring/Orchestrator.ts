/**
 * Orchestrator - keeps running provider handles in line with the enabled
 * machine registrations.
 */

import { isDeepStrictEqual } from 'node:util';
import { errorMessage, ProviderStartError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { ProviderRegistry } from '../machines/registry.js';
import type { MachineRegistration } from '../machines/types.js';
import type { LivenessMonitor } from './LivenessMonitor.js';
import { ProviderHandle } from './ProviderHandle.js';
import type { StateReconciler } from './StateReconciler.js';

export interface SyncFailure {
  machineId: number;
  error: ProviderStartError;
}

export interface SyncResult {
  started: number[];
  restarted: number[];
  stopped: number[];
  failed: SyncFailure[];
}

export interface OrchestratorOptions {
  registry: ProviderRegistry;
  reconciler: StateReconciler;
  liveness: LivenessMonitor;
  logger?: Logger;
}

/** A running handle needs a restart when anything its provider was built from changed. */
function requiresRestart(current: MachineRegistration, next: MachineRegistration): boolean {
  return (
    current.machineType !== next.machineType ||
    current.pollIntervalMs !== next.pollIntervalMs ||
    !isDeepStrictEqual(current.properties, next.properties)
  );
}

export class Orchestrator {
  private registry: ProviderRegistry;
  private reconciler: StateReconciler;
  private liveness: LivenessMonitor;
  private logger: Logger;

  private handles: Map<number, ProviderHandle> = new Map();
  /** Last generation handed out per machine id; never reset */
  private generations: Map<number, number> = new Map();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.reconciler = options.reconciler;
    this.liveness = options.liveness;
    this.logger = (options.logger ?? createLogger('orchestrator')).child({ component: 'orchestrator' });
  }

  /**
   * Reconciles running handles with `registrations`. Calls are serialised;
   * machines within one call are started and stopped concurrently, and a
   * failure for one machine is reported in the result without affecting the
   * others.
   */
  sync(registrations: MachineRegistration[]): Promise<SyncResult> {
    const run = this.queue.then(() => this.reconcile(registrations));
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async reconcile(registrations: MachineRegistration[]): Promise<SyncResult> {
    const result: SyncResult = { started: [], restarted: [], stopped: [], failed: [] };
    const desired = new Map<number, MachineRegistration>();
    for (const machine of registrations) {
      if (machine.enabled) desired.set(machine.id, machine);
    }

    const tasks: Array<Promise<void>> = [];

    for (const [machineId, handle] of this.handles) {
      if (!desired.has(machineId)) {
        tasks.push(
          this.stopHandle(handle, true).then(() => {
            result.stopped.push(machineId);
          }),
        );
      }
    }

    for (const [machineId, machine] of desired) {
      const handle = this.handles.get(machineId);

      if (!handle) {
        tasks.push(
          this.startHandle(machine).then((error) => {
            if (error) result.failed.push({ machineId, error });
            else result.started.push(machineId);
          }),
        );
      } else if (requiresRestart(handle.machine, machine)) {
        tasks.push(
          this.stopHandle(handle, false)
            .then(() => this.startHandle(machine))
            .then((error) => {
              if (error) result.failed.push({ machineId, error });
              else result.restarted.push(machineId);
            }),
        );
      }
    }

    await Promise.all(tasks);

    for (const list of [result.started, result.restarted, result.stopped]) {
      list.sort((a, b) => a - b);
    }
    result.failed.sort((a, b) => a.machineId - b.machineId);

    this.logger.info(
      {
        started: result.started,
        restarted: result.restarted,
        stopped: result.stopped,
        failed: result.failed.map((f) => f.machineId),
      },
      'Machines synchronised',
    );
    return result;
  }

  /** Resolves with the start error instead of rejecting, so one machine cannot fail the batch. */
  private async startHandle(machine: MachineRegistration): Promise<ProviderStartError | undefined> {
    const generation = (this.generations.get(machine.id) ?? 0) + 1;
    this.generations.set(machine.id, generation);

    try {
      const provider = this.registry.create(
        machine,
        this.logger.child({ machineId: machine.id, machineType: machine.machineType }),
      );
      const handle = new ProviderHandle({
        machine,
        provider,
        generation,
        reconciler: this.reconciler,
        liveness: this.liveness,
        logger: this.logger,
      });

      await handle.start();
      this.handles.set(machine.id, handle);
      return undefined;
    } catch (error) {
      // Registry or provider construction failures never reached the handle
      this.reconciler.close(machine.id, generation, { clear: true });
      const startError =
        error instanceof ProviderStartError
          ? error
          : new ProviderStartError(
              `Could not start monitoring machine ${machine.id}: ${errorMessage(error)}`,
              'PROVIDER_START_FAILED',
              { machineId: machine.id, machineType: machine.machineType },
              { cause: error },
            );
      this.logger.error({ err: startError, machineId: machine.id }, 'Machine not monitored');
      return startError;
    }
  }

  private async stopHandle(handle: ProviderHandle, clear: boolean): Promise<void> {
    this.handles.delete(handle.machineId);
    await handle.stop({ clear });
  }

  // =========================================
  // QUERIES
  // =========================================

  getHandle(machineId: number): ProviderHandle | undefined {
    return this.handles.get(machineId);
  }

  isRunning(machineId: number): boolean {
    return this.handles.get(machineId)?.running ?? false;
  }

  getHandles(): ProviderHandle[] {
    return Array.from(this.handles.values()).sort((a, b) => a.machineId - b.machineId);
  }

  /** Stops every handle; used on shutdown. */
  shutdown(): Promise<SyncResult> {
    return this.sync([]);
  }
}
