/**
 * Moonraker (Klipper) - push updates over the JSON-RPC WebSocket
 *
 * Properties:
 *   url               WebSocket endpoint, e.g. ws://printer.local:7125/websocket
 *   reconnectDelayMs  wait before reconnecting after the socket closes (default 5000)
 *
 * Moonraker only notifies on change, so the last known snapshot is re-sent
 * once per polling interval while the socket is open. When the socket drops
 * the provider goes quiet and the liveness monitor reports the machine
 * offline until the connection is back.
 *
 * Heater indexes: extruder -> 0, extruderN -> N, heater_bed -> -1
 */

import WebSocket from 'ws';
import { z } from 'zod';
import { ProviderCommandError, ProviderStartError, ValidationError, errorMessage } from '../../errors.js';
import type { Logger } from '../../logger.js';
import type {
  MachineProvider,
  MachineRegistration,
  MachineState,
  ProviderDefinition,
  StatusReport,
  StatusSink,
} from '../types.js';

const MoonrakerPropertiesSchema = z.object({
  url: z.string().regex(/^wss?:\/\//, 'must be a ws:// or wss:// URL'),
  reconnectDelayMs: z.number().int().positive().default(5000),
});

export type MoonrakerProperties = z.infer<typeof MoonrakerPropertiesSchema>;

const PrinterObjectsSchema = z.record(z.record(z.unknown()));

type PrinterObjects = z.infer<typeof PrinterObjectsSchema>;

const RpcMessageSchema = z.object({
  id: z.number().optional(),
  method: z.string().optional(),
  params: z.array(z.unknown()).optional(),
  result: z.unknown().optional(),
  error: z.object({ code: z.number().optional(), message: z.string().optional() }).optional(),
});

type RpcMessage = z.infer<typeof RpcMessageSchema>;

const SubscribeResultSchema = z.object({ status: PrinterObjectsSchema });

interface PendingRequest {
  resolve: (message: RpcMessage) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const SUBSCRIBED_OBJECTS = {
  print_stats: null,
  virtual_sdcard: null,
  extruder: null,
  heater_bed: null,
};

const CONNECT_TIMEOUT_MS = 10000;
const REQUEST_TIMEOUT_MS = 10000;
export const HEATER_BED_INDEX = -1;

function num(source: Record<string, unknown> | undefined, key: string): number {
  const value = source?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function mapPrintState(state: unknown): MachineState {
  switch (state) {
    case 'printing':
      return 'Operational';
    case 'paused':
      return 'Paused';
    case 'standby':
    case 'complete':
    case 'cancelled':
    case 'error':
      return 'Idle';
    default:
      return 'Offline';
  }
}

/** Builds a status report from the merged Klipper object model. */
export function buildReport(objects: PrinterObjects): StatusReport {
  const stats = objects.print_stats;
  const state = mapPrintState(stats?.state);
  const active = state === 'Operational' || state === 'Paused';

  const progress = active ? num(objects.virtual_sdcard, 'progress') : 0;
  const elapsed = active ? num(stats, 'print_duration') : 0;
  const remaining = progress > 0 ? elapsed / progress - elapsed : 0;

  const temperatures: Record<number, { actual: number; target: number }> = {};
  for (const [name, values] of Object.entries(objects)) {
    const extruder = /^extruder(\d*)$/.exec(name);
    let index: number | undefined;
    if (extruder) index = extruder[1] ? Number(extruder[1]) : 0;
    else if (name === 'heater_bed') index = HEATER_BED_INDEX;

    if (index !== undefined) {
      temperatures[index] = { actual: num(values, 'temperature'), target: num(values, 'target') };
    }
  }

  return {
    state,
    elapsedJobTime: elapsed,
    estimatedTimeRemaining: remaining,
    progress,
    temperatures,
  };
}

export class MoonrakerProvider implements MachineProvider {
  private properties: MoonrakerProperties;
  private logger: Logger;

  private socket: WebSocket | null = null;
  private sink: StatusSink | null = null;
  private intervalMs = 1000;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private stopped = false;

  private objects: PrinterObjects = {};
  private ready = false;
  private nextRequestId = 1;
  private pending: Map<number, PendingRequest> = new Map();

  constructor(properties: MoonrakerProperties, logger: Logger) {
    this.properties = properties;
    this.logger = logger;
  }

  async start(intervalMs: number, sink: StatusSink): Promise<void> {
    this.intervalMs = intervalMs;
    this.sink = sink;
    this.stopped = false;

    try {
      await this.connect();
    } catch (error) {
      await this.stop();
      throw new ProviderStartError(
        `Moonraker unreachable at ${this.properties.url}: ${errorMessage(error)}`,
        'PROVIDER_START_FAILED',
        {},
        { cause: error },
      );
    }
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.sink = null;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.closeSocket();
  }

  pauseJob(): Promise<void> {
    return this.printCommand('printer.print.pause');
  }

  resumeJob(): Promise<void> {
    return this.printCommand('printer.print.resume');
  }

  cancelJob(): Promise<void> {
    return this.printCommand('printer.print.cancel');
  }

  // =========================================
  // CONNECTION
  // =========================================

  private connect(): Promise<void> {
    this.closeSocket();

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.properties.url, { handshakeTimeout: CONNECT_TIMEOUT_MS });
      this.socket = socket;
      let opened = false;

      socket.on('open', () => {
        opened = true;
        this.logger.info('Moonraker WebSocket connected');
        this.startHeartbeat();
        this.subscribe().catch((error) => {
          this.logger.warn({ err: error }, 'Moonraker subscription failed');
        });
        resolve();
      });

      socket.on('message', (data) => {
        this.handleMessage(data.toString());
      });

      socket.on('error', (error) => {
        this.logger.warn({ err: error }, 'Moonraker WebSocket error');
        if (!opened) reject(error);
      });

      socket.on('close', () => {
        this.logger.info('Moonraker WebSocket closed');
        this.onDisconnected();
        if (!opened) reject(new Error('connection closed before it was established'));
      });
    });
  }

  private onDisconnected(): void {
    this.stopHeartbeat();
    this.ready = false;
    this.socket = null;
    this.rejectPending(new ProviderCommandError('Moonraker connection closed'));
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.stopped || this.reconnectTimer) return;

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.stopped) return;
      this.logger.info('Reconnecting to Moonraker');
      this.connect().catch((error) => {
        this.logger.warn({ err: error }, 'Moonraker reconnect failed');
      });
    }, this.properties.reconnectDelayMs);
  }

  private closeSocket(): void {
    this.stopHeartbeat();
    const socket = this.socket;
    if (!socket) return;

    this.socket = null;
    this.ready = false;
    socket.removeAllListeners();
    // Keep a listener so a late socket error cannot become an uncaught exception
    socket.on('error', () => undefined);
    if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
      socket.close();
    }
    this.rejectPending(new ProviderCommandError('Moonraker connection closed'));
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => this.emit(), this.intervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  // =========================================
  // JSON-RPC
  // =========================================

  private async subscribe(): Promise<void> {
    const response = await this.request('printer.objects.subscribe', { objects: SUBSCRIBED_OBJECTS });
    const result = SubscribeResultSchema.safeParse(response.result);
    if (result.success) {
      this.objects = {};
      this.merge(result.data.status);
    }
    this.ready = true;
    this.emit();
  }

  private request(method: string, params?: Record<string, unknown>): Promise<RpcMessage> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ProviderCommandError('Moonraker is not connected'));
    }

    const id = this.nextRequestId++;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new ProviderCommandError(`Moonraker did not answer ${method}`));
      }, REQUEST_TIMEOUT_MS);

      this.pending.set(id, { resolve, reject, timer });
      socket.send(JSON.stringify({ jsonrpc: '2.0', method, params, id }));
    });
  }

  private async printCommand(method: string): Promise<void> {
    const response = await this.request(method);
    if (response.error) {
      throw new ProviderCommandError(response.error.message ?? `Moonraker rejected ${method}`, {
        rpcCode: response.error.code,
      });
    }
  }

  private rejectPending(error: Error): void {
    for (const request of this.pending.values()) {
      clearTimeout(request.timer);
      request.reject(error);
    }
    this.pending.clear();
  }

  private handleMessage(raw: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ err: error }, 'Unparseable Moonraker message');
      return;
    }

    const envelope = RpcMessageSchema.safeParse(parsed);
    if (!envelope.success) {
      this.logger.warn({ issues: envelope.error.issues }, 'Unexpected Moonraker message');
      return;
    }
    const message = envelope.data;

    if (message.id !== undefined) {
      const request = this.pending.get(message.id);
      if (request) {
        clearTimeout(request.timer);
        this.pending.delete(message.id);
        request.resolve(message);
      }
      return;
    }

    switch (message.method) {
      case 'notify_status_update': {
        const update = PrinterObjectsSchema.safeParse(message.params?.[0]);
        if (update.success) {
          this.merge(update.data);
          this.emit();
        }
        break;
      }

      case 'notify_klippy_disconnected':
        this.ready = false;
        this.sink?.({ state: 'Offline' });
        break;

      case 'notify_klippy_ready':
        this.subscribe().catch((error) => {
          this.logger.warn({ err: error }, 'Moonraker resubscription failed');
        });
        break;
    }
  }

  private merge(update: PrinterObjects): void {
    for (const [name, values] of Object.entries(update)) {
      this.objects[name] = { ...this.objects[name], ...values };
    }
  }

  private emit(): void {
    if (!this.ready || !this.sink) return;
    this.sink(buildReport(this.objects));
  }
}

function parseProperties(machine: MachineRegistration): MoonrakerProperties {
  const result = MoonrakerPropertiesSchema.safeParse(machine.properties);
  if (!result.success) {
    throw new ValidationError(
      `Invalid Moonraker properties: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      'VALIDATION_PROPERTIES',
      { machineId: machine.id },
    );
  }
  return result.data;
}

export const moonrakerProvider: ProviderDefinition = {
  displayName: 'Moonraker (Klipper)',
  create: (machine, logger) => new MoonrakerProvider(parseProperties(machine), logger),
  configure: async (machine) => ({ ...machine, properties: parseProperties(machine) }),
};
