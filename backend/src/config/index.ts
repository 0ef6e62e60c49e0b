/**
 * Configuration Loader
 *
 * Reads config/system.yaml and config/machines.yaml. Both files are
 * optional; invalid content raises ConfigError with the zod issues.
 */

import { readFileSync, existsSync } from 'fs';
import { parse } from 'yaml';
import { join } from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { MachineRegistration } from '../machines/types.js';

const ServerSchema = z
  .object({
    host: z.string().min(1).default('0.0.0.0'),
    port: z.number().int().min(1).max(65535).default(4001),
  })
  .default({});

const WebSocketSchema = z
  .object({
    ping_interval: z.number().int().positive().default(25000),
    ping_timeout: z.number().int().positive().default(60000),
  })
  .default({});

const MonitoringSchema = z
  .object({
    offline_multiplier: z.number().min(1).default(2),
    default_poll_interval: z.number().int().min(100).default(1000),
    min_check_interval: z.number().int().positive().default(50),
    checks_per_interval: z.number().int().min(1).default(10),
  })
  .default({});

export const SystemConfigSchema = z.object({
  server: ServerSchema,
  websocket: WebSocketSchema,
  monitoring: MonitoringSchema,
});

export const MachineConfigEntrySchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  type: z.string().min(1),
  enabled: z.boolean().default(true),
  poll_interval: z.number().int().min(100).optional(),
  properties: z.record(z.unknown()).default({}),
});

export const MachinesConfigSchema = z.object({
  machines: z.array(MachineConfigEntrySchema).default([]),
});

export type SystemConfig = z.infer<typeof SystemConfigSchema>;
export type MachineConfigEntry = z.infer<typeof MachineConfigEntrySchema>;

export interface AppConfig extends SystemConfig {
  machines: MachineRegistration[];
}

function readYaml(path: string): unknown {
  if (!existsSync(path)) return {};

  try {
    return parse(readFileSync(path, 'utf-8')) ?? {};
  } catch (error) {
    throw new ConfigError(`Cannot parse ${path}`, 'CONFIG_PARSE', {
      path,
      reason: error instanceof Error ? error.message : String(error),
    });
  }
}

function validate<T extends z.ZodTypeAny>(schema: T, data: unknown, path: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration in ${path}: ${issues.join('; ')}`, 'CONFIG_INVALID', {
      path,
      issues,
    });
  }
  return result.data;
}

export function toRegistration(entry: MachineConfigEntry, defaultPollInterval: number): MachineRegistration {
  return {
    id: entry.id,
    name: entry.name,
    machineType: entry.type,
    enabled: entry.enabled,
    pollIntervalMs: entry.poll_interval ?? defaultPollInterval,
    properties: entry.properties,
  };
}

export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.CONFIG_DIR || join(process.cwd(), '..', 'config');
}

export async function loadConfig(
  configDir: string = resolveConfigDir(),
  env: NodeJS.ProcessEnv = process.env,
): Promise<AppConfig> {
  const systemPath = join(configDir, 'system.yaml');
  const machinesPath = join(configDir, 'machines.yaml');

  const system = validate(SystemConfigSchema, readYaml(systemPath), systemPath);
  const { machines } = validate(MachinesConfigSchema, readYaml(machinesPath), machinesPath);

  const ids = new Set<number>();
  for (const machine of machines) {
    if (ids.has(machine.id)) {
      throw new ConfigError(`Duplicate machine id ${machine.id} in ${machinesPath}`, 'CONFIG_DUPLICATE_MACHINE', {
        path: machinesPath,
        machineId: machine.id,
      });
    }
    ids.add(machine.id);
  }

  if (env.HOST) system.server.host = env.HOST;
  if (env.PORT) {
    const port = Number(env.PORT);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigError(`Invalid PORT "${env.PORT}"`, 'CONFIG_INVALID', { port: env.PORT });
    }
    system.server.port = port;
  }

  return {
    ...system,
    machines: machines.map((entry) => toRegistration(entry, system.monitoring.default_poll_interval)),
  };
}
