/**
 * Command Dispatcher - routes pause/resume/cancel to the running handle of a
 * machine.
 *
 * Commands for one machine run strictly one after another; commands for
 * different machines do not wait on each other. The dispatcher neither
 * retries nor checks whether a command makes sense in the machine's current
 * state - providers differ in what they tolerate.
 */

import { DeviceNotRunningError, MonitorError, ProviderCommandError, errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { MachineCommand } from '../machines/types.js';
import type { ProviderHandle } from './ProviderHandle.js';

export interface HandleSource {
  getHandle(machineId: number): ProviderHandle | undefined;
}

export class CommandDispatcher {
  private handles: HandleSource;
  private logger: Logger;
  private queues: Map<number, Promise<void>> = new Map();

  constructor(handles: HandleSource, logger?: Logger) {
    this.handles = handles;
    this.logger = (logger ?? createLogger('dispatcher')).child({ component: 'dispatcher' });
  }

  dispatch(machineId: number, command: MachineCommand): Promise<void> {
    const previous = this.queues.get(machineId) ?? Promise.resolve();
    const run = previous.then(() => this.execute(machineId, command));
    const tail = run.catch(() => undefined);
    this.queues.set(machineId, tail);

    // Drop the queue entry once it drains so idle machines hold nothing
    void tail.then(() => {
      if (this.queues.get(machineId) === tail) {
        this.queues.delete(machineId);
      }
    });

    return run;
  }

  pendingMachines(): number {
    return this.queues.size;
  }

  private async execute(machineId: number, command: MachineCommand): Promise<void> {
    const handle = this.handles.getHandle(machineId);
    if (!handle || !handle.running) {
      throw new DeviceNotRunningError(machineId, { command });
    }

    const log = this.logger.child({ machineId, generation: handle.generation, command });
    log.info('Dispatching command');

    try {
      await handle.execute(command);
    } catch (error) {
      log.warn({ err: error }, 'Command failed');
      if (error instanceof MonitorError) throw error;
      throw new ProviderCommandError(errorMessage(error), { machineId, command }, { cause: error });
    }
  }
}
