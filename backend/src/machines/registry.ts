/**
 * Provider Registry - machine type tag -> provider definition
 */

import { ConfigError, ProviderStartError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { MachineProvider, MachineRegistration, ProviderDefinition } from './types.js';

export class ProviderRegistry {
  private definitions: Map<string, ProviderDefinition> = new Map();

  register(machineType: string, definition: ProviderDefinition): this {
    if (this.definitions.has(machineType)) {
      throw new ConfigError(
        `Provider already registered for machine type "${machineType}"`,
        'CONFIG_DUPLICATE_PROVIDER',
        { machineType },
      );
    }
    this.definitions.set(machineType, definition);
    return this;
  }

  has(machineType: string): boolean {
    return this.definitions.has(machineType);
  }

  types(): Array<{ type: string; displayName: string }> {
    return Array.from(this.definitions.entries()).map(([type, definition]) => ({
      type,
      displayName: definition.displayName ?? type,
    }));
  }

  create(machine: MachineRegistration, logger: Logger): MachineProvider {
    return this.require(machine).create(machine, logger);
  }

  /** Runs the type's configure hook; machines without one pass through. */
  async configure(machine: MachineRegistration): Promise<MachineRegistration> {
    const definition = this.require(machine);
    return definition.configure ? definition.configure(machine) : machine;
  }

  private require(machine: MachineRegistration): ProviderDefinition {
    const definition = this.definitions.get(machine.machineType);
    if (!definition) {
      throw new ProviderStartError(
        `No provider for machine type "${machine.machineType}"`,
        'PROVIDER_UNKNOWN_TYPE',
        { machineId: machine.id, machineType: machine.machineType },
      );
    }
    return definition;
  }
}
