/**
 * Simulated machine - runs a synthetic job in-process.
 *
 * Properties:
 *   jobDuration  job length in seconds (default 600)
 *   autoStart    begin with a job running (default true)
 *   hotendTarget / bedTarget  heater targets while printing (default 210 / 60)
 */

import { z } from 'zod';
import { ProviderCommandError, ValidationError } from '../../errors.js';
import type { Logger } from '../../logger.js';
import type {
  MachineProvider,
  MachineRegistration,
  MachineState,
  ProviderDefinition,
  StatusReport,
  StatusSink,
} from '../types.js';

const SimulatedPropertiesSchema = z.object({
  jobDuration: z.number().positive().default(600),
  autoStart: z.boolean().default(true),
  hotendTarget: z.number().min(0).default(210),
  bedTarget: z.number().min(0).default(60),
});

export type SimulatedProperties = z.infer<typeof SimulatedPropertiesSchema>;

const AMBIENT_TEMPERATURE = 22;
/** Fraction of the gap to target closed per tick */
const HEATING_RATE = 0.25;

export class SimulatedProvider implements MachineProvider {
  private properties: SimulatedProperties;
  private logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private sink: StatusSink | null = null;
  private intervalMs = 1000;

  private state: MachineState = 'Idle';
  private elapsed = 0;
  private hotend = AMBIENT_TEMPERATURE;
  private bed = AMBIENT_TEMPERATURE;

  constructor(properties: SimulatedProperties, logger: Logger) {
    this.properties = properties;
    this.logger = logger;
  }

  async start(intervalMs: number, sink: StatusSink): Promise<void> {
    this.intervalMs = intervalMs;
    this.sink = sink;
    this.state = this.properties.autoStart ? 'Operational' : 'Idle';
    this.elapsed = 0;

    this.emit();
    this.timer = setInterval(() => this.tick(), intervalMs);
    this.logger.debug('Simulation started');
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.sink = null;
  }

  async pauseJob(): Promise<void> {
    if (this.state !== 'Operational') {
      throw new ProviderCommandError('No running job to pause');
    }
    this.state = 'Paused';
    this.emit();
  }

  async resumeJob(): Promise<void> {
    if (this.state !== 'Paused') {
      throw new ProviderCommandError('No paused job to resume');
    }
    this.state = 'Operational';
    this.emit();
  }

  async cancelJob(): Promise<void> {
    if (this.state !== 'Operational' && this.state !== 'Paused') {
      throw new ProviderCommandError('No job to cancel');
    }
    this.finishJob();
    this.emit();
  }

  snapshot(): StatusReport {
    const duration = this.properties.jobDuration;
    const printing = this.state === 'Operational' || this.state === 'Paused';
    const hotendTarget = printing ? this.properties.hotendTarget : 0;
    const bedTarget = printing ? this.properties.bedTarget : 0;

    return {
      state: this.state,
      elapsedJobTime: this.elapsed,
      estimatedTimeRemaining: printing ? Math.max(0, duration - this.elapsed) : 0,
      progress: printing ? Math.min(1, this.elapsed / duration) : 0,
      temperatures: {
        0: { actual: round(this.hotend), target: hotendTarget },
        1: { actual: round(this.bed), target: bedTarget },
      },
    };
  }

  private tick(): void {
    const printing = this.state === 'Operational' || this.state === 'Paused';
    this.hotend = approach(this.hotend, printing ? this.properties.hotendTarget : AMBIENT_TEMPERATURE);
    this.bed = approach(this.bed, printing ? this.properties.bedTarget : AMBIENT_TEMPERATURE);

    if (this.state === 'Operational') {
      this.elapsed += this.intervalMs / 1000;
      if (this.elapsed >= this.properties.jobDuration) {
        this.logger.info('Simulated job finished');
        this.finishJob();
      }
    }

    this.emit();
  }

  private finishJob(): void {
    this.state = 'Idle';
    this.elapsed = 0;
  }

  private emit(): void {
    this.sink?.(this.snapshot());
  }
}

function approach(current: number, target: number): number {
  return current + (target - current) * HEATING_RATE;
}

function round(value: number): number {
  return Math.round(value * 10) / 10;
}

function parseProperties(machine: MachineRegistration): SimulatedProperties {
  const result = SimulatedPropertiesSchema.safeParse(machine.properties);
  if (!result.success) {
    throw new ValidationError(`Invalid simulated machine properties: ${result.error.message}`, 'VALIDATION_PROPERTIES', {
      machineId: machine.id,
    });
  }
  return result.data;
}

export const simulatedProvider: ProviderDefinition = {
  displayName: 'Simulated machine',
  create: (machine, logger) => new SimulatedProvider(parseProperties(machine), logger),
  configure: async (machine) => ({ ...machine, properties: parseProperties(machine) }),
};
