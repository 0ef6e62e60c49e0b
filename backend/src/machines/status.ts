/**
 * Status envelopes - creation, equality and hashing
 */

import { randomUUID } from 'node:crypto';
import { ValidationError } from '../errors.js';
import {
  MACHINE_STATES,
  type MachineState,
  type MachineStatus,
  type StatusReport,
  type TemperatureStatus,
} from './types.js';

function isMachineState(value: unknown): value is MachineState {
  return MACHINE_STATES.some((state) => state === value);
}

function finite(value: number | undefined, field: string, machineId: number): number {
  if (value === undefined) return 0;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`Invalid ${field} in status report`, 'VALIDATION_STATUS', {
      machineId,
      field,
      value,
    });
  }
  return value;
}

function normalizeTemperatures(
  machineId: number,
  temperatures: StatusReport['temperatures'],
): Readonly<Record<number, Readonly<TemperatureStatus>>> {
  const result: Record<number, Readonly<TemperatureStatus>> = {};
  if (!temperatures) return Object.freeze(result);

  for (const [key, value] of Object.entries(temperatures)) {
    const heaterIndex = Number(key);
    if (!Number.isInteger(heaterIndex)) {
      throw new ValidationError(`Invalid heater index "${key}"`, 'VALIDATION_STATUS', {
        machineId,
        field: 'temperatures',
      });
    }
    result[heaterIndex] = Object.freeze({
      heaterIndex,
      actual: finite(value.actual, `temperatures[${key}].actual`, machineId),
      target: finite(value.target, `temperatures[${key}].target`, machineId),
    });
  }

  return Object.freeze(result);
}

/**
 * Wraps a provider report into an immutable envelope. Timers are whole,
 * non-negative seconds and progress is clamped to [0, 1].
 */
export function createMachineStatus(machineId: number, report: StatusReport): MachineStatus {
  if (!isMachineState(report.state)) {
    throw new ValidationError(`Invalid machine state "${String(report.state)}"`, 'VALIDATION_STATUS', {
      machineId,
      field: 'state',
    });
  }

  const progress = finite(report.progress, 'progress', machineId);

  return Object.freeze({
    id: report.id ?? randomUUID(),
    machineId,
    state: report.state,
    elapsedJobTime: Math.max(0, Math.round(finite(report.elapsedJobTime, 'elapsedJobTime', machineId))),
    estimatedTimeRemaining: Math.max(
      0,
      Math.round(finite(report.estimatedTimeRemaining, 'estimatedTimeRemaining', machineId)),
    ),
    progress: Math.min(1, Math.max(0, progress)),
    temperatures: normalizeTemperatures(machineId, report.temperatures),
  });
}

export function createOfflineStatus(machineId: number): MachineStatus {
  return createMachineStatus(machineId, { state: 'Offline' });
}

function heaterEntries(status: MachineStatus): Array<[number, Readonly<TemperatureStatus>]> {
  return Object.values(status.temperatures)
    .map((t): [number, Readonly<TemperatureStatus>] => [t.heaterIndex, t])
    .sort((a, b) => a[0] - b[0]);
}

/**
 * Structural equality over every field but `id`. Heater maps are compared
 * by key and value, so insertion order does not matter.
 */
export function statusEquals(a: MachineStatus, b: MachineStatus): boolean {
  if (
    a.machineId !== b.machineId ||
    a.state !== b.state ||
    a.elapsedJobTime !== b.elapsedJobTime ||
    a.estimatedTimeRemaining !== b.estimatedTimeRemaining ||
    a.progress !== b.progress
  ) {
    return false;
  }

  const left = heaterEntries(a);
  const right = heaterEntries(b);
  if (left.length !== right.length) return false;

  return left.every(([index, temp], i) => {
    const [otherIndex, other] = right[i];
    return index === otherIndex && temp.actual === other.actual && temp.target === other.target;
  });
}

/** 32-bit FNV-1a over the same fields statusEquals compares. */
export function statusHash(status: MachineStatus): number {
  const parts: Array<string | number> = [
    status.machineId,
    status.state,
    status.elapsedJobTime,
    status.estimatedTimeRemaining,
    status.progress,
  ];
  for (const [index, temp] of heaterEntries(status)) {
    parts.push(index, temp.actual, temp.target);
  }

  let hash = 0x811c9dc5;
  for (const char of parts.join('|')) {
    hash ^= char.charCodeAt(0);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
