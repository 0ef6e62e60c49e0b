/**
 * Provider Handle - owns one running provider instance.
 *
 * A handle is single-use: start() once, stop() once (further stops are
 * no-ops). Each handle carries the generation it was started with; the
 * orchestrator creates a new handle with a higher generation for every
 * restart of the same machine.
 */

import { DeviceNotRunningError, ProviderStartError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { createMachineStatus } from '../machines/status.js';
import type {
  MachineCommand,
  MachineProvider,
  MachineRegistration,
  MachineStatus,
  StatusReport,
} from '../machines/types.js';
import type { LivenessMonitor, LivenessTarget } from './LivenessMonitor.js';
import type { StateReconciler } from './StateReconciler.js';

type HandleState = 'idle' | 'starting' | 'running' | 'stopped';

export interface ProviderHandleOptions {
  machine: MachineRegistration;
  provider: MachineProvider;
  generation: number;
  reconciler: StateReconciler;
  liveness: LivenessMonitor;
  logger: Logger;
}

export interface HandleInfo {
  generation: number;
  running: boolean;
  lastSeen: number;
}

export class PollTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Status poll timed out after ${timeoutMs}ms`);
    this.name = 'PollTimeoutError';
  }
}

/** Resolves after `ms`, or early when the signal aborts. Never rejects. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export class ProviderHandle implements LivenessTarget {
  readonly machine: MachineRegistration;
  readonly machineId: number;
  readonly generation: number;
  readonly intervalMs: number;

  lastSeen = 0;
  /**
   * Last envelope this provider delivered that the reconciler accepted. An
   * Offline written by the liveness monitor does not show up here; the
   * reconciler holds the machine's current state.
   */
  latestStatus: MachineStatus | undefined;

  private provider: MachineProvider;
  private reconciler: StateReconciler;
  private liveness: LivenessMonitor;
  private logger: Logger;

  private state: HandleState = 'idle';
  private abort = new AbortController();
  private loop: Promise<void> = Promise.resolve();
  private pendingStart: Promise<unknown> = Promise.resolve();
  private stopping: Promise<void> | null = null;

  constructor(options: ProviderHandleOptions) {
    this.machine = options.machine;
    this.machineId = options.machine.id;
    this.generation = options.generation;
    this.intervalMs = options.machine.pollIntervalMs;
    this.provider = options.provider;
    this.reconciler = options.reconciler;
    this.liveness = options.liveness;
    this.logger = options.logger.child({ machineId: this.machineId, generation: this.generation });
  }

  get running(): boolean {
    return this.state === 'running';
  }

  info(): HandleInfo {
    return {
      generation: this.generation,
      running: this.running,
      lastSeen: this.lastSeen,
    };
  }

  private get stopped(): boolean {
    return this.state === 'stopped';
  }

  // =========================================
  // LIFECYCLE
  // =========================================

  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new ProviderStartError(
        `Handle for machine ${this.machineId} was already started`,
        'PROVIDER_ALREADY_STARTED',
        { machineId: this.machineId, generation: this.generation },
      );
    }

    this.state = 'starting';
    this.reconciler.open(this.machineId, this.generation);

    try {
      const started = this.provider.start(this.intervalMs, (report) => this.deliver(report));
      this.pendingStart = started.catch(() => undefined);
      await started;
    } catch (error) {
      // stop() already closed this generation with its own clear option
      if (!this.stopped) {
        this.state = 'stopped';
        this.abort.abort();
        this.reconciler.close(this.machineId, this.generation, { clear: true });
      }
      this.logger.error({ err: error }, 'Provider failed to start');

      if (error instanceof ProviderStartError) throw error;
      throw new ProviderStartError(
        `Could not start monitoring machine ${this.machineId}: ${errorMessage(error)}`,
        'PROVIDER_START_FAILED',
        { machineId: this.machineId, machineType: this.machine.machineType },
        { cause: error },
      );
    }

    // stop() was called while the provider was starting
    if (this.stopped) return;

    this.state = 'running';
    this.lastSeen = Date.now();
    this.liveness.watch(this);

    const { poll } = this.provider;
    if (poll) {
      this.loop = this.runPollLoop((signal) => poll.call(this.provider, signal));
    }

    this.logger.info({ intervalMs: this.intervalMs }, 'Monitoring started');
  }

  /**
   * Stops monitoring. Once the returned promise settles the poll loop has
   * finished and nothing more is accepted under this generation.
   * `clear` removes the machine's entry from the state table; a restart keeps
   * it until the next generation reports.
   */
  stop(options: { clear: boolean } = { clear: true }): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown(options.clear);
    }
    return this.stopping;
  }

  private async shutdown(clear: boolean): Promise<void> {
    const wasActive = this.state === 'running' || this.state === 'starting';
    this.state = 'stopped';
    if (!wasActive) return;

    this.liveness.unwatch(this.machineId);
    this.abort.abort();
    this.reconciler.close(this.machineId, this.generation, { clear });

    // A provider is only stopped once its start has settled
    await this.pendingStart;
    await this.loop;

    try {
      await this.provider.stop();
    } catch (error) {
      this.logger.warn({ err: error }, 'Provider stop failed');
    }

    this.logger.info('Monitoring stopped');
  }

  // =========================================
  // STATUS
  // =========================================

  private deliver(report: StatusReport): void {
    if (this.state !== 'running' && this.state !== 'starting') {
      this.logger.debug('Ignoring status reported after stop');
      return;
    }

    let status: MachineStatus;
    try {
      status = createMachineStatus(this.machineId, report);
    } catch (error) {
      this.logger.warn({ err: error }, 'Dropping malformed status report');
      return;
    }

    if (this.reconciler.accept(this.machineId, this.generation, status)) {
      this.lastSeen = Date.now();
      this.latestStatus = status;
    }
  }

  private async runPollLoop(
    poll: (signal: AbortSignal) => Promise<StatusReport | undefined>,
  ): Promise<void> {
    const signal = this.abort.signal;

    while (!signal.aborted) {
      const startedAt = Date.now();
      try {
        const report = await this.pollOnce(poll, signal);
        if (report && !signal.aborted) {
          this.deliver(report);
        }
      } catch (error) {
        // Transient failures are expected; the liveness monitor takes over if they persist
        if (!signal.aborted) {
          this.logger.warn({ err: error }, 'Status poll failed');
        }
      }

      await sleep(Math.max(0, this.intervalMs - (Date.now() - startedAt)), signal);
    }
  }

  /** One poll, bounded by the polling interval and by cancellation. */
  private async pollOnce(
    poll: (signal: AbortSignal) => Promise<StatusReport | undefined>,
    signal: AbortSignal,
  ): Promise<StatusReport | undefined> {
    const request = new AbortController();
    const onAbort = () => request.abort(signal.reason);
    const timer = setTimeout(() => request.abort(new PollTimeoutError(this.intervalMs)), this.intervalMs);
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      return await Promise.race([poll(request.signal), rejectOnAbort(request.signal)]);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    }
  }

  // =========================================
  // COMMANDS
  // =========================================

  async execute(command: MachineCommand): Promise<void> {
    if (!this.running) {
      throw new DeviceNotRunningError(this.machineId, { generation: this.generation });
    }

    switch (command) {
      case 'pause':
        return this.provider.pauseJob();
      case 'resume':
        return this.provider.resumeJob();
      case 'cancel':
        return this.provider.cancelJob();
    }
  }
}
