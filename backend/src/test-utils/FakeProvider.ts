/**
 * In-process providers for monitoring tests
 */

import { vi } from 'vitest';
import type {
  MachineProvider,
  MachineRegistration,
  StatusReport,
  StatusSink,
} from '../machines/types.js';

/** Push-driven provider; tests call emit() to report. */
export class FakeProvider implements MachineProvider {
  sink: StatusSink | null = null;
  intervalMs: number | null = null;
  startError: Error | null = null;

  start = vi.fn(async (intervalMs: number, sink: StatusSink): Promise<void> => {
    if (this.startError) throw this.startError;
    this.intervalMs = intervalMs;
    this.sink = sink;
  });

  stop = vi.fn(async (): Promise<void> => {});
  pauseJob = vi.fn(async (): Promise<void> => {});
  resumeJob = vi.fn(async (): Promise<void> => {});
  cancelJob = vi.fn(async (): Promise<void> => {});

  /** Reports through the sink captured at start, even after stop. */
  emit(report: StatusReport): void {
    this.sink?.(report);
  }
}

/** Poll-driven provider; each poll resolves with `next` unless overridden. */
export class FakePollingProvider extends FakeProvider {
  next: StatusReport | undefined = { state: 'Idle' };

  poll = vi.fn(async (_signal: AbortSignal): Promise<StatusReport | undefined> => this.next);
}

export function machine(overrides: Partial<MachineRegistration> = {}): MachineRegistration {
  return {
    id: 1,
    name: 'Test Printer',
    machineType: 'fake',
    enabled: true,
    pollIntervalMs: 1000,
    properties: {},
    ...overrides,
  };
}

/** Lets pending promise continuations run without advancing fake time. */
export async function flushPromises(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
