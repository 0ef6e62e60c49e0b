/**
 * Error hierarchy for the monitoring backend.
 *
 * Every error raised on purpose extends MonitorError, which carries:
 *   - `code`: machine-readable code (e.g. "DEVICE_NOT_RUNNING")
 *   - `context`: structured metadata for logs, never shown to end users
 *
 * The code prefix decides the HTTP status in the API error handler.
 */

export class MonitorError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MonitorError';
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * The provider could not begin monitoring (bad credentials, unreachable host,
 * unknown machine type). The machine stays unmonitored.
 */
export class ProviderStartError extends MonitorError {
  constructor(
    message: string,
    code: string = 'PROVIDER_START_FAILED',
    context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, code, context, options);
    this.name = 'ProviderStartError';
  }
}

/** A command targeted a machine without a running handle. */
export class DeviceNotRunningError extends MonitorError {
  constructor(machineId: number, context: Record<string, unknown> = {}) {
    super(`Machine ${machineId} is not being monitored`, 'DEVICE_NOT_RUNNING', {
      machineId,
      ...context,
    });
    this.name = 'DeviceNotRunningError';
  }
}

/**
 * Opaque provider failure during pause/resume/cancel. The message is the
 * provider's own.
 */
export class ProviderCommandError extends MonitorError {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, 'PROVIDER_COMMAND_FAILED', context, options);
    this.name = 'ProviderCommandError';
  }
}

export class MachineNotFoundError extends MonitorError {
  constructor(machineId: number) {
    super(`Machine ${machineId} not found`, 'MACHINE_NOT_FOUND', { machineId });
    this.name = 'MachineNotFoundError';
  }
}

/**
 * Invalid input: malformed status reports, bad registrations.
 * Code prefix: VALIDATION_*
 */
export class ValidationError extends MonitorError {
  constructor(
    message: string,
    code: string = 'VALIDATION_ERROR',
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = 'ValidationError';
  }
}

/**
 * Configuration files that cannot be parsed or fail validation.
 * Code prefix: CONFIG_*
 */
export class ConfigError extends MonitorError {
  constructor(
    message: string,
    code: string = 'CONFIG_ERROR',
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = 'ConfigError';
  }
}

/**
 * Returns the first MonitorError found in `err` or its `cause` chain.
 * Providers may wrap a user-facing error in their own errors; the API layer
 * uses this to report the meaningful one.
 */
export function findMonitorError(err: unknown): MonitorError | undefined {
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof MonitorError) return current;
    seen.add(current);
    current = current.cause;
  }

  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
