import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigError } from '../errors.js';
import { loadConfig, resolveConfigDir } from './index.js';

describe('loadConfig', () => {
  let dir: string;

  function write(name: string, content: string): void {
    writeFileSync(join(dir, name), content);
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'printfleet-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('applies defaults when no files exist', async () => {
    const config = await loadConfig(dir, {});

    expect(config).toEqual({
      server: { host: '0.0.0.0', port: 4001 },
      websocket: { ping_interval: 25000, ping_timeout: 60000 },
      monitoring: {
        offline_multiplier: 2,
        default_poll_interval: 1000,
        min_check_interval: 50,
        checks_per_interval: 10,
      },
      machines: [],
    });
  });

  it('reads machines and fills the polling interval from the system default', async () => {
    write('system.yaml', 'monitoring:\n  default_poll_interval: 2000\n');
    write(
      'machines.yaml',
      [
        'machines:',
        '  - id: 1',
        '    name: Left Printer',
        '    type: octoprint',
        '    properties:',
        '      url: http://octopi.local',
        '      apiKey: test-secret',
        '  - id: 2',
        '    name: Right Printer',
        '    type: simulated',
        '    enabled: false',
        '    poll_interval: 500',
      ].join('\n'),
    );

    const config = await loadConfig(dir, {});

    expect(config.machines).toEqual([
      {
        id: 1,
        name: 'Left Printer',
        machineType: 'octoprint',
        enabled: true,
        pollIntervalMs: 2000,
        properties: { url: 'http://octopi.local', apiKey: 'test-secret' },
      },
      {
        id: 2,
        name: 'Right Printer',
        machineType: 'simulated',
        enabled: false,
        pollIntervalMs: 500,
        properties: {},
      },
    ]);
  });

  it('applies HOST and PORT overrides', async () => {
    write('system.yaml', 'server:\n  port: 5000\n');

    const config = await loadConfig(dir, { HOST: '127.0.0.1', PORT: '6000' });

    expect(config.server).toEqual({ host: '127.0.0.1', port: 6000 });
  });

  it('rejects an invalid PORT', async () => {
    await expect(loadConfig(dir, { PORT: 'eighty' })).rejects.toMatchObject({
      code: 'CONFIG_INVALID',
      message: 'Invalid PORT "eighty"',
    });
  });

  it('rejects unparseable YAML', async () => {
    write('system.yaml', 'server: [unclosed\n');

    await expect(loadConfig(dir, {})).rejects.toMatchObject({ code: 'CONFIG_PARSE' });
  });

  it('rejects invalid values with the offending path', async () => {
    write('system.yaml', 'monitoring:\n  default_poll_interval: 10\n');

    const error = await loadConfig(dir, {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ code: 'CONFIG_INVALID' });
    expect(error instanceof ConfigError ? error.message : '').toContain('monitoring.default_poll_interval');
  });

  it('rejects duplicate machine ids', async () => {
    write(
      'machines.yaml',
      'machines:\n  - { id: 1, name: A, type: simulated }\n  - { id: 1, name: B, type: simulated }\n',
    );

    await expect(loadConfig(dir, {})).rejects.toMatchObject({ code: 'CONFIG_DUPLICATE_MACHINE' });
  });
});

describe('resolveConfigDir', () => {
  it('prefers CONFIG_DIR', () => {
    expect(resolveConfigDir({ CONFIG_DIR: '/etc/printfleet' })).toBe('/etc/printfleet');
  });

  it('defaults to the config directory beside the backend', () => {
    expect(resolveConfigDir({})).toBe(join(process.cwd(), '..', 'config'));
  });
});
