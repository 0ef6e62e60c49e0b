/**
 * Machine contract - registrations, status envelopes and the provider
 * interface every machine type implements.
 */

import type { Logger } from '../logger.js';

export const MACHINE_STATES = ['Offline', 'Idle', 'Paused', 'Operational'] as const;

export type MachineState = (typeof MACHINE_STATES)[number];

export interface TemperatureStatus {
  heaterIndex: number;
  actual: number;
  target: number;
}

/**
 * One point-in-time status of a machine. Immutable once created; `id` is
 * unique per emission and only used for deduplication and tracing.
 */
export interface MachineStatus {
  readonly id: string;
  readonly machineId: number;
  readonly state: MachineState;
  /** Seconds the current job has been running */
  readonly elapsedJobTime: number;
  /** Seconds left on the current job, as estimated by the machine */
  readonly estimatedTimeRemaining: number;
  /** Completion fraction in [0, 1] */
  readonly progress: number;
  /** Keyed by the machine's heater index */
  readonly temperatures: Readonly<Record<number, Readonly<TemperatureStatus>>>;
}

/**
 * What a provider emits. The handle stamps the machine id; a provider that
 * redelivers an update keeps its id so subscribers see it only once.
 */
export interface StatusReport {
  id?: string;
  state: MachineState;
  elapsedJobTime?: number;
  estimatedTimeRemaining?: number;
  progress?: number;
  temperatures?: Record<number, { actual: number; target: number }>;
}

export type StatusSink = (report: StatusReport) => void;

/**
 * A configured machine. `properties` is provider-specific configuration
 * (host, api key, ...) passed through untouched.
 */
export interface MachineRegistration {
  id: number;
  name: string;
  machineType: string;
  enabled: boolean;
  pollIntervalMs: number;
  properties: Record<string, unknown>;
}

export const MACHINE_COMMANDS = ['pause', 'resume', 'cancel'] as const;

export type MachineCommand = (typeof MACHINE_COMMANDS)[number];

/**
 * Implemented once per machine type. A provider instance monitors exactly
 * one machine.
 */
export interface MachineProvider {
  /**
   * Begin monitoring. Push-driven providers report through `sink`; they must
   * report at least once per interval while the machine is reachable.
   * Rejects when the machine cannot be monitored.
   */
  start(intervalMs: number, sink: StatusSink): Promise<void>;

  /** Stop monitoring. Calling it twice is harmless. */
  stop(): Promise<void>;

  /**
   * One status read. Providers that implement it are polled once per
   * interval; the signal aborts when the handle stops or the read times out.
   */
  poll?(signal: AbortSignal): Promise<StatusReport | undefined>;

  pauseJob(): Promise<void>;
  resumeJob(): Promise<void>;
  cancelJob(): Promise<void>;
}

export interface ProviderDefinition {
  /** Human readable name for listings */
  displayName?: string;

  create(machine: MachineRegistration, logger: Logger): MachineProvider;

  /**
   * Called when a machine of this type is added or updated, before it is
   * stored. May validate or enrich the registration, e.g. by probing the
   * machine for details.
   */
  configure?(machine: MachineRegistration): Promise<MachineRegistration>;
}
