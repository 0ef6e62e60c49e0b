/**
 * Machine Service - registration management and the caller-facing API of the
 * monitoring core (state queries, commands).
 *
 * Registrations are kept in memory; every change is followed by an
 * orchestrator sync over the full set.
 */

import { z } from 'zod';
import { MachineNotFoundError, ValidationError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { CommandDispatcher } from '../monitoring/CommandDispatcher.js';
import type { Orchestrator, SyncResult } from '../monitoring/Orchestrator.js';
import type { StateReconciler } from '../monitoring/StateReconciler.js';
import type { ProviderRegistry } from './registry.js';
import type { MachineCommand, MachineRegistration, MachineStatus } from './types.js';

export const MachineInputSchema = z.object({
  id: z.number().int().positive().optional(),
  name: z.string().trim().min(1),
  machineType: z.string().min(1),
  enabled: z.boolean().default(true),
  pollIntervalMs: z.number().int().min(100).optional(),
  properties: z.record(z.unknown()).default({}),
});

export const MachineUpdateSchema = MachineInputSchema.omit({ id: true }).partial();

export type MachineInput = z.input<typeof MachineInputSchema>;
export type MachineUpdate = z.input<typeof MachineUpdateSchema>;

export interface MachineView extends MachineRegistration {
  running: boolean;
  generation: number | null;
  lastSeen: number | null;
}

export interface MachineServiceOptions {
  registry: ProviderRegistry;
  orchestrator: Orchestrator;
  reconciler: StateReconciler;
  dispatcher: CommandDispatcher;
  defaultPollIntervalMs: number;
  logger?: Logger;
}

export class MachineService {
  private machines: Map<number, MachineRegistration> = new Map();
  private mutations: Promise<unknown> = Promise.resolve();
  private registry: ProviderRegistry;
  private orchestrator: Orchestrator;
  private reconciler: StateReconciler;
  private dispatcher: CommandDispatcher;
  private defaultPollIntervalMs: number;
  private logger: Logger;

  constructor(options: MachineServiceOptions) {
    this.registry = options.registry;
    this.orchestrator = options.orchestrator;
    this.reconciler = options.reconciler;
    this.dispatcher = options.dispatcher;
    this.defaultPollIntervalMs = options.defaultPollIntervalMs;
    this.logger = (options.logger ?? createLogger('machines')).child({ component: 'machines' });
  }

  /**
   * Loads the configured machines and starts monitoring them. Start failures
   * are reported in the result; they do not prevent startup.
   */
  initialize(registrations: MachineRegistration[]): Promise<SyncResult> {
    return this.mutate(async () => {
      for (const machine of registrations) {
        this.machines.set(machine.id, machine);
      }
      const result = await this.synchronise();
      this.logger.info({ machines: this.machines.size, failed: result.failed.length }, 'Machines initialised');
      return result;
    });
  }

  // =========================================
  // REGISTRATIONS
  // =========================================

  list(): MachineView[] {
    return Array.from(this.machines.values())
      .sort((a, b) => a.id - b.id)
      .map((machine) => this.view(machine));
  }

  get(machineId: number): MachineView {
    return this.view(this.require(machineId));
  }

  async add(input: MachineInput): Promise<MachineView> {
    const parsed = MachineInputSchema.parse(input);
    this.requireType(parsed.machineType);

    return this.mutate(async () => {
      const id = parsed.id ?? this.nextId();
      if (this.machines.has(id)) {
        throw new ValidationError(`Machine ${id} already exists`, 'VALIDATION_DUPLICATE_MACHINE', { machineId: id });
      }

      const machine = await this.registry.configure({
        id,
        name: parsed.name,
        machineType: parsed.machineType,
        enabled: parsed.enabled,
        pollIntervalMs: parsed.pollIntervalMs ?? this.defaultPollIntervalMs,
        properties: parsed.properties,
      });
      return this.store(machine);
    });
  }

  async update(machineId: number, patch: MachineUpdate): Promise<MachineView> {
    const parsed = MachineUpdateSchema.parse(patch);
    if (parsed.machineType !== undefined) this.requireType(parsed.machineType);

    return this.mutate(async () => {
      const current = this.require(machineId);
      const machine = await this.registry.configure({
        ...current,
        name: parsed.name ?? current.name,
        machineType: parsed.machineType ?? current.machineType,
        enabled: parsed.enabled ?? current.enabled,
        pollIntervalMs: parsed.pollIntervalMs ?? current.pollIntervalMs,
        properties: parsed.properties ?? current.properties,
        id: machineId,
      });
      return this.store(machine);
    });
  }

  setEnabled(machineId: number, enabled: boolean): Promise<MachineView> {
    return this.mutate(() => this.store({ ...this.require(machineId), enabled }));
  }

  remove(machineId: number): Promise<void> {
    return this.mutate(async () => {
      this.require(machineId);
      this.machines.delete(machineId);
      await this.synchronise();
    });
  }

  providerTypes(): Array<{ type: string; displayName: string }> {
    return this.registry.types();
  }

  // =========================================
  // STATE & COMMANDS
  // =========================================

  getStatus(machineId: number): MachineStatus | undefined {
    return this.reconciler.get(machineId);
  }

  getAllStatuses(): MachineStatus[] {
    return this.reconciler.getAll();
  }

  sendCommand(machineId: number, command: MachineCommand): Promise<void> {
    return this.dispatcher.dispatch(machineId, command);
  }

  async shutdown(): Promise<void> {
    await this.orchestrator.shutdown();
  }

  // =========================================
  // INTERNALS
  // =========================================

  /**
   * Registration changes run one at a time, each seeing the result of the
   * previous one, so ids and existence checks hold across `configure`.
   */
  private mutate<T>(change: () => Promise<T>): Promise<T> {
    const run = this.mutations.then(change);
    this.mutations = run.catch(() => undefined);
    return run;
  }

  /** Stores a registration, syncs, and surfaces a start failure of that machine. */
  private async store(machine: MachineRegistration): Promise<MachineView> {
    this.machines.set(machine.id, machine);
    const result = await this.synchronise();

    const failure = result.failed.find((f) => f.machineId === machine.id);
    if (failure) throw failure.error;

    return this.view(machine);
  }

  private synchronise(): Promise<SyncResult> {
    return this.orchestrator.sync(Array.from(this.machines.values()));
  }

  private view(machine: MachineRegistration): MachineView {
    const info = this.orchestrator.getHandle(machine.id)?.info();
    return {
      ...machine,
      running: info?.running ?? false,
      generation: info?.generation ?? null,
      lastSeen: info?.lastSeen ?? null,
    };
  }

  private require(machineId: number): MachineRegistration {
    const machine = this.machines.get(machineId);
    if (!machine) throw new MachineNotFoundError(machineId);
    return machine;
  }

  private requireType(machineType: string): void {
    if (!this.registry.has(machineType)) {
      throw new ValidationError(`Unknown machine type "${machineType}"`, 'VALIDATION_MACHINE_TYPE', {
        machineType,
      });
    }
  }

  private nextId(): number {
    let max = 0;
    for (const id of this.machines.keys()) max = Math.max(max, id);
    return max + 1;
  }
}
