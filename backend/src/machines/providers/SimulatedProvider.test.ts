import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ProviderCommandError, ValidationError } from '../../errors.js';
import { createLogger } from '../../logger.js';
import { machine } from '../../test-utils/FakeProvider.js';
import type { StatusReport } from '../types.js';
import { SimulatedProvider, simulatedProvider } from './SimulatedProvider.js';

describe('SimulatedProvider', () => {
  const logger = createLogger('test');
  let reports: StatusReport[];
  let provider: SimulatedProvider;

  function latest(): StatusReport | undefined {
    return reports.at(-1);
  }

  beforeEach(() => {
    vi.useFakeTimers();
    reports = [];
    provider = new SimulatedProvider(
      { jobDuration: 3, autoStart: true, hotendTarget: 210, bedTarget: 60 },
      logger,
    );
  });

  afterEach(async () => {
    await provider.stop();
    vi.useRealTimers();
  });

  it('reports immediately on start and once per interval', async () => {
    await provider.start(1000, (report) => reports.push(report));
    expect(reports).toHaveLength(1);
    expect(latest()).toMatchObject({ state: 'Operational', elapsedJobTime: 0, progress: 0 });

    vi.advanceTimersByTime(2000);
    expect(reports).toHaveLength(3);
    expect(latest()).toMatchObject({ state: 'Operational', elapsedJobTime: 2, estimatedTimeRemaining: 1 });
  });

  it('heats towards the targets while printing', async () => {
    await provider.start(1000, (report) => reports.push(report));
    vi.advanceTimersByTime(1000);

    expect(latest()?.temperatures).toEqual({
      0: { actual: 69, target: 210 },
      1: { actual: 31.5, target: 60 },
    });
  });

  it('finishes the job after its duration', async () => {
    await provider.start(1000, (report) => reports.push(report));
    vi.advanceTimersByTime(3000);

    expect(latest()).toMatchObject({ state: 'Idle', elapsedJobTime: 0, progress: 0 });
  });

  it('pauses, resumes and cancels the job', async () => {
    await provider.start(1000, (report) => reports.push(report));

    await provider.pauseJob();
    expect(latest()?.state).toBe('Paused');
    vi.advanceTimersByTime(5000);
    expect(latest()).toMatchObject({ state: 'Paused', elapsedJobTime: 0 });

    await provider.resumeJob();
    expect(latest()?.state).toBe('Operational');

    await provider.cancelJob();
    expect(latest()?.state).toBe('Idle');
  });

  it('rejects commands that do not fit the job state', async () => {
    provider = new SimulatedProvider({ jobDuration: 3, autoStart: false, hotendTarget: 210, bedTarget: 60 }, logger);
    await provider.start(1000, (report) => reports.push(report));

    await expect(provider.pauseJob()).rejects.toThrow(new ProviderCommandError('No running job to pause'));
    await expect(provider.resumeJob()).rejects.toThrow('No paused job to resume');
    await expect(provider.cancelJob()).rejects.toThrow('No job to cancel');
  });

  it('stops reporting after stop', async () => {
    await provider.start(1000, (report) => reports.push(report));
    await provider.stop();

    vi.advanceTimersByTime(5000);
    expect(reports).toHaveLength(1);
  });

  describe('definition', () => {
    it('fills property defaults on configure', async () => {
      const configured = await simulatedProvider.configure?.(machine({ machineType: 'simulated' }));

      expect(configured?.properties).toEqual({ jobDuration: 600, autoStart: true, hotendTarget: 210, bedTarget: 60 });
    });

    it('rejects invalid properties', () => {
      expect(() =>
        simulatedProvider.create(machine({ machineType: 'simulated', properties: { jobDuration: -1 } }), logger),
      ).toThrow(ValidationError);
    });
  });
});
