/**
 * OctoPrint - polled over the REST API
 *
 * Properties:
 *   url     base URL of the OctoPrint server
 *   apiKey  application or user API key
 *
 * Heater indexes: tool0..N -> 0..N, bed -> -1, chamber -> -2
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ProviderCommandError, ProviderStartError, ValidationError } from '../../errors.js';
import type { Logger } from '../../logger.js';
import type {
  MachineProvider,
  MachineRegistration,
  MachineState,
  ProviderDefinition,
  StatusReport,
} from '../types.js';

const OctoPrintPropertiesSchema = z.object({
  url: z.string().url(),
  apiKey: z.string().min(1),
});

export type OctoPrintProperties = z.infer<typeof OctoPrintPropertiesSchema>;

interface TemperatureReading {
  actual: number | null;
  target: number | null;
}

interface JobResponse {
  state: string;
  progress: {
    completion: number | null;
    printTime: number | null;
    printTimeLeft: number | null;
  };
}

interface PrinterResponse {
  temperature?: Record<string, TemperatureReading | undefined>;
}

export const BED_HEATER_INDEX = -1;
export const CHAMBER_HEATER_INDEX = -2;

/** Maps OctoPrint's state text onto the machine state model. */
export function mapOctoPrintState(text: string): MachineState {
  if (text.startsWith('Paus')) return 'Paused';
  if (text === 'Operational') return 'Idle';
  if (
    text.startsWith('Printing') ||
    text === 'Starting' ||
    text === 'Resuming' ||
    text === 'Finishing' ||
    text === 'Cancelling'
  ) {
    return 'Operational';
  }
  return 'Offline';
}

export function mapTemperatures(
  temperature: PrinterResponse['temperature'],
): Record<number, { actual: number; target: number }> {
  const result: Record<number, { actual: number; target: number }> = {};
  if (!temperature) return result;

  for (const [key, reading] of Object.entries(temperature)) {
    if (!reading) continue;

    let index: number | undefined;
    const tool = /^tool(\d+)$/.exec(key);
    if (tool) index = Number(tool[1]);
    else if (key === 'bed') index = BED_HEATER_INDEX;
    else if (key === 'chamber') index = CHAMBER_HEATER_INDEX;

    if (index !== undefined) {
      result[index] = { actual: reading.actual ?? 0, target: reading.target ?? 0 };
    }
  }
  return result;
}

export class OctoPrintProvider implements MachineProvider {
  private properties: OctoPrintProperties;
  private logger: Logger;
  private http: AxiosInstance | null = null;

  constructor(properties: OctoPrintProperties, logger: Logger) {
    this.properties = properties;
    this.logger = logger;
  }

  async start(intervalMs: number): Promise<void> {
    this.http = axios.create({
      baseURL: this.properties.url,
      timeout: intervalMs,
      headers: { 'X-Api-Key': this.properties.apiKey },
    });

    try {
      const response = await this.http.get<{ server?: string }>('/api/version');
      this.logger.info({ server: response.data.server }, 'Connected to OctoPrint');
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      if (status === 401 || status === 403) {
        throw new ProviderStartError('OctoPrint rejected the API key', 'PROVIDER_START_FAILED', { status });
      }
      throw new ProviderStartError(
        `OctoPrint unreachable at ${this.properties.url}`,
        'PROVIDER_START_FAILED',
        { status },
        { cause: error },
      );
    }
  }

  async stop(): Promise<void> {
    this.http = null;
  }

  async poll(signal: AbortSignal): Promise<StatusReport | undefined> {
    const http = this.http;
    if (!http) return undefined;

    const job = await http.get<JobResponse>('/api/job', { signal });
    const state = mapOctoPrintState(job.data.state);
    if (state === 'Offline') {
      return { state };
    }

    let temperatures: StatusReport['temperatures'] = {};
    try {
      const printer = await http.get<PrinterResponse>('/api/printer', { signal });
      temperatures = mapTemperatures(printer.data.temperature);
    } catch (error) {
      // 409: the server is up but the printer is disconnected
      if (axios.isAxiosError(error) && error.response?.status === 409) {
        return { state: 'Offline' };
      }
      throw error;
    }

    const { completion, printTime, printTimeLeft } = job.data.progress;
    return {
      state,
      elapsedJobTime: printTime ?? 0,
      estimatedTimeRemaining: printTimeLeft ?? 0,
      progress: (completion ?? 0) / 100,
      temperatures,
    };
  }

  pauseJob(): Promise<void> {
    return this.jobCommand('pause', { command: 'pause', action: 'pause' });
  }

  resumeJob(): Promise<void> {
    return this.jobCommand('resume', { command: 'pause', action: 'resume' });
  }

  cancelJob(): Promise<void> {
    return this.jobCommand('cancel', { command: 'cancel' });
  }

  private async jobCommand(name: string, body: Record<string, string>): Promise<void> {
    if (!this.http) {
      throw new ProviderCommandError(`Cannot ${name}: OctoPrint connection is closed`);
    }

    try {
      await this.http.post('/api/job', body);
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      const reason = status === 409 ? 'no job in a state that allows it' : `request failed (${status ?? 'network error'})`;
      throw new ProviderCommandError(`OctoPrint could not ${name} the job: ${reason}`, { status }, { cause: error });
    }
  }
}

function parseProperties(machine: MachineRegistration): OctoPrintProperties {
  const result = OctoPrintPropertiesSchema.safeParse(machine.properties);
  if (!result.success) {
    throw new ValidationError(
      `Invalid OctoPrint properties: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      'VALIDATION_PROPERTIES',
      { machineId: machine.id },
    );
  }
  return result.data;
}

export const octoPrintProvider: ProviderDefinition = {
  displayName: 'OctoPrint',
  create: (machine, logger) => new OctoPrintProvider(parseProperties(machine), logger),
  configure: async (machine) => ({ ...machine, properties: parseProperties(machine) }),
};
