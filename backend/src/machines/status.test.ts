import { describe, it, expect } from 'vitest';
import { ValidationError } from '../errors.js';
import { createMachineStatus, createOfflineStatus, statusEquals, statusHash } from './status.js';

describe('createMachineStatus', () => {
  it('fills defaults and assigns an id', () => {
    const status = createMachineStatus(3, { state: 'Idle' });

    expect(status.machineId).toBe(3);
    expect(status.state).toBe('Idle');
    expect(status.elapsedJobTime).toBe(0);
    expect(status.estimatedTimeRemaining).toBe(0);
    expect(status.progress).toBe(0);
    expect(status.temperatures).toEqual({});
    expect(typeof status.id).toBe('string');
    expect(status.id.length).toBeGreaterThan(0);
  });

  it('keeps an explicit id', () => {
    expect(createMachineStatus(1, { id: 'status-a', state: 'Idle' }).id).toBe('status-a');
  });

  it('rounds timers to non-negative whole seconds and clamps progress', () => {
    const status = createMachineStatus(1, {
      state: 'Operational',
      elapsedJobTime: 12.6,
      estimatedTimeRemaining: -4,
      progress: 1.7,
    });

    expect(status.elapsedJobTime).toBe(13);
    expect(status.estimatedTimeRemaining).toBe(0);
    expect(status.progress).toBe(1);
    expect(createMachineStatus(1, { state: 'Operational', progress: -0.2 }).progress).toBe(0);
  });

  it('indexes temperatures by heater', () => {
    const status = createMachineStatus(1, {
      state: 'Idle',
      temperatures: { 0: { actual: 200.5, target: 210 }, [-1]: { actual: 58, target: 60 } },
    });

    expect(status.temperatures[0]).toEqual({ heaterIndex: 0, actual: 200.5, target: 210 });
    expect(status.temperatures[-1]).toEqual({ heaterIndex: -1, actual: 58, target: 60 });
  });

  it('returns a frozen envelope', () => {
    const status = createMachineStatus(1, { state: 'Idle', temperatures: { 0: { actual: 1, target: 2 } } });

    expect(Object.isFrozen(status)).toBe(true);
    expect(Object.isFrozen(status.temperatures)).toBe(true);
    expect(Object.isFrozen(status.temperatures[0])).toBe(true);
  });

  it('rejects an unknown state', () => {
    const report = JSON.parse('{"state":"Printing"}');
    expect(() => createMachineStatus(1, report)).toThrow(ValidationError);
    expect(() => createMachineStatus(1, report)).toThrow('Invalid machine state "Printing"');
  });

  it('rejects non-finite numbers', () => {
    expect(() => createMachineStatus(1, { state: 'Idle', progress: Number.NaN })).toThrow(
      'Invalid progress in status report',
    );
    expect(() =>
      createMachineStatus(1, { state: 'Idle', temperatures: { 0: { actual: Infinity, target: 0 } } }),
    ).toThrow('Invalid temperatures[0].actual in status report');
  });
});

describe('createOfflineStatus', () => {
  it('builds an empty Offline envelope', () => {
    const status = createOfflineStatus(7);

    expect(status).toMatchObject({
      machineId: 7,
      state: 'Offline',
      elapsedJobTime: 0,
      estimatedTimeRemaining: 0,
      progress: 0,
      temperatures: {},
    });
  });
});

describe('statusEquals', () => {
  it('ignores the envelope id', () => {
    const a = createMachineStatus(1, { id: 'a', state: 'Paused', progress: 0.5 });
    const b = createMachineStatus(1, { id: 'b', state: 'Paused', progress: 0.5 });

    expect(statusEquals(a, b)).toBe(true);
    expect(statusHash(a)).toBe(statusHash(b));
  });

  it('ignores heater insertion order', () => {
    const a = createMachineStatus(1, {
      state: 'Idle',
      temperatures: { 0: { actual: 20, target: 0 }, 1: { actual: 21, target: 0 } },
    });
    const b = createMachineStatus(1, {
      state: 'Idle',
      temperatures: { 1: { actual: 21, target: 0 }, 0: { actual: 20, target: 0 } },
    });

    expect(statusEquals(a, b)).toBe(true);
    expect(statusHash(a)).toBe(statusHash(b));
  });

  it('detects differing fields', () => {
    const base = createMachineStatus(1, { state: 'Idle', temperatures: { 0: { actual: 20, target: 0 } } });

    expect(statusEquals(base, createMachineStatus(2, { state: 'Idle', temperatures: { 0: { actual: 20, target: 0 } } }))).toBe(false);
    expect(statusEquals(base, createMachineStatus(1, { state: 'Paused', temperatures: { 0: { actual: 20, target: 0 } } }))).toBe(false);
    expect(statusEquals(base, createMachineStatus(1, { state: 'Idle', temperatures: { 0: { actual: 20, target: 5 } } }))).toBe(false);
    expect(statusEquals(base, createMachineStatus(1, { state: 'Idle' }))).toBe(false);
  });
});
