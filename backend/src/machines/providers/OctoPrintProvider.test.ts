import { describe, it, expect, beforeEach, vi } from 'vitest';
import axios from 'axios';
import { ProviderCommandError, ProviderStartError, ValidationError } from '../../errors.js';
import { createLogger } from '../../logger.js';
import { machine } from '../../test-utils/FakeProvider.js';
import {
  OctoPrintProvider,
  mapOctoPrintState,
  mapTemperatures,
  octoPrintProvider,
} from './OctoPrintProvider.js';

const http = vi.hoisted(() => ({
  get: vi.fn(),
  post: vi.fn(),
}));

// Mock axios
vi.mock('axios', () => ({
  default: {
    create: vi.fn(() => http),
    isAxiosError: (error: unknown) => error instanceof Error && 'isAxiosError' in error,
  },
}));

function httpError(status: number): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    isAxiosError: true,
    response: { status },
  });
}

describe('mapOctoPrintState', () => {
  it.each([
    ['Operational', 'Idle'],
    ['Printing', 'Operational'],
    ['Printing from SD', 'Operational'],
    ['Starting', 'Operational'],
    ['Cancelling', 'Operational'],
    ['Paused', 'Paused'],
    ['Pausing', 'Paused'],
    ['Offline', 'Offline'],
    ['Error', 'Offline'],
    ['Closed', 'Offline'],
  ])('maps %s to %s', (text, state) => {
    expect(mapOctoPrintState(text)).toBe(state);
  });
});

describe('mapTemperatures', () => {
  it('indexes tools, bed and chamber', () => {
    expect(
      mapTemperatures({
        tool0: { actual: 205.1, target: 210 },
        tool1: { actual: 25, target: null },
        bed: { actual: 59.8, target: 60 },
        chamber: { actual: null, target: null },
        W: { actual: 1, target: 1 },
      }),
    ).toEqual({
      0: { actual: 205.1, target: 210 },
      1: { actual: 25, target: 0 },
      [-1]: { actual: 59.8, target: 60 },
      [-2]: { actual: 0, target: 0 },
    });
  });

  it('returns an empty map without readings', () => {
    expect(mapTemperatures(undefined)).toEqual({});
  });
});

describe('OctoPrintProvider', () => {
  const logger = createLogger('test');
  const signal = new AbortController().signal;
  let provider: OctoPrintProvider;

  beforeEach(() => {
    vi.clearAllMocks();
    provider = new OctoPrintProvider({ url: 'http://octopi.local', apiKey: 'test-secret' }, logger);
  });

  async function started(): Promise<void> {
    http.get.mockResolvedValueOnce({ data: { server: '1.10.0' } });
    await provider.start(1000);
  }

  describe('start', () => {
    it('creates a client with the api key and checks the server', async () => {
      await started();

      expect(axios.create).toHaveBeenCalledWith({
        baseURL: 'http://octopi.local',
        timeout: 1000,
        headers: { 'X-Api-Key': 'test-secret' },
      });
      expect(http.get).toHaveBeenCalledWith('/api/version');
    });

    it('reports a rejected api key', async () => {
      http.get.mockRejectedValueOnce(httpError(403));

      const error = await provider.start(1000).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderStartError);
      expect(error).toMatchObject({ message: 'OctoPrint rejected the API key' });
    });

    it('reports an unreachable server', async () => {
      http.get.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      await expect(provider.start(1000)).rejects.toThrow('OctoPrint unreachable at http://octopi.local');
    });
  });

  describe('poll', () => {
    it('returns nothing before start', async () => {
      expect(await provider.poll(signal)).toBeUndefined();
    });

    it('combines job progress and temperatures', async () => {
      await started();
      http.get
        .mockResolvedValueOnce({
          data: { state: 'Printing', progress: { completion: 42.5, printTime: 120, printTimeLeft: 300 } },
        })
        .mockResolvedValueOnce({
          data: { temperature: { tool0: { actual: 210, target: 210 }, bed: { actual: 60, target: 60 } } },
        });

      const report = await provider.poll(signal);

      expect(report).toEqual({
        state: 'Operational',
        elapsedJobTime: 120,
        estimatedTimeRemaining: 300,
        progress: 0.425,
        temperatures: { 0: { actual: 210, target: 210 }, [-1]: { actual: 60, target: 60 } },
      });
      expect(http.get).toHaveBeenCalledWith('/api/job', { signal });
      expect(http.get).toHaveBeenCalledWith('/api/printer', { signal });
    });

    it('treats missing progress values as zero', async () => {
      await started();
      http.get
        .mockResolvedValueOnce({
          data: { state: 'Operational', progress: { completion: null, printTime: null, printTimeLeft: null } },
        })
        .mockResolvedValueOnce({ data: {} });

      expect(await provider.poll(signal)).toEqual({
        state: 'Idle',
        elapsedJobTime: 0,
        estimatedTimeRemaining: 0,
        progress: 0,
        temperatures: {},
      });
    });

    it('stops at the job endpoint when the printer is offline', async () => {
      await started();
      http.get.mockResolvedValueOnce({
        data: { state: 'Offline', progress: { completion: null, printTime: null, printTimeLeft: null } },
      });

      expect(await provider.poll(signal)).toEqual({ state: 'Offline' });
      expect(http.get).toHaveBeenCalledTimes(2);
    });

    it('reports Offline when the printer is disconnected', async () => {
      await started();
      http.get
        .mockResolvedValueOnce({
          data: { state: 'Operational', progress: { completion: null, printTime: null, printTimeLeft: null } },
        })
        .mockRejectedValueOnce(httpError(409));

      expect(await provider.poll(signal)).toEqual({ state: 'Offline' });
    });

    it('propagates other request failures', async () => {
      await started();
      const failure = new Error('socket hang up');
      http.get.mockRejectedValueOnce(failure);

      await expect(provider.poll(signal)).rejects.toBe(failure);
    });
  });

  describe('commands', () => {
    it('posts job commands', async () => {
      await started();
      http.post.mockResolvedValue({ data: {} });

      await provider.pauseJob();
      await provider.resumeJob();
      await provider.cancelJob();

      expect(http.post.mock.calls).toEqual([
        ['/api/job', { command: 'pause', action: 'pause' }],
        ['/api/job', { command: 'pause', action: 'resume' }],
        ['/api/job', { command: 'cancel' }],
      ]);
    });

    it('explains a conflicting job state', async () => {
      await started();
      http.post.mockRejectedValueOnce(httpError(409));

      const error = await provider.pauseJob().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderCommandError);
      expect(error).toMatchObject({
        message: 'OctoPrint could not pause the job: no job in a state that allows it',
        context: { status: 409 },
      });
    });

    it('refuses commands before start', async () => {
      await expect(provider.cancelJob()).rejects.toThrow('Cannot cancel: OctoPrint connection is closed');
    });
  });

  describe('definition', () => {
    it('validates properties', () => {
      expect(() =>
        octoPrintProvider.create(machine({ machineType: 'octoprint', properties: { url: 'not a url' } }), logger),
      ).toThrow(ValidationError);
    });

    it('creates a provider from valid properties', () => {
      const created = octoPrintProvider.create(
        machine({ machineType: 'octoprint', properties: { url: 'http://octopi.local', apiKey: 'test-secret' } }),
        logger,
      );

      expect(created).toBeInstanceOf(OctoPrintProvider);
    });
  });
});
