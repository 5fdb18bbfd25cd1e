import { describe, it, expect } from 'vitest';
import type { IService } from '../../interfaces/IService';
import { createTestLogger } from '../../test/fixtures';
import { ServiceContainer } from '../ServiceContainer';

class RecordingService implements IService {
  constructor(private name: string, private calls: string[], private healthy = true) {}

  async initialize(): Promise<void> {
    this.calls.push(`init:${this.name}`);
  }

  async shutdown(): Promise<void> {
    this.calls.push(`shutdown:${this.name}`);
  }

  async isHealthy(): Promise<boolean> {
    return this.healthy;
  }
}

describe('ServiceContainer', () => {
  it('initializes services one at a time in registration order', async () => {
    const calls: string[] = [];
    const container = new ServiceContainer(createTestLogger());
    container.registerSingleton('catalog', new RecordingService('catalog', calls));
    container.registerSingleton('settings', { retries: 3 });
    container.registerSingleton('parser', new RecordingService('parser', calls));

    await container.initializeAll();

    expect(calls).toEqual(['init:catalog', 'init:parser']);
  });

  it('stops at the first failing service', async () => {
    const calls: string[] = [];
    const failing: IService = {
      initialize: async () => {
        throw new Error('catalog unavailable');
      },
      shutdown: async () => undefined,
      isHealthy: async () => false
    };
    const container = new ServiceContainer(createTestLogger());
    container.registerSingleton('catalog', failing);
    container.registerSingleton('parser', new RecordingService('parser', calls));

    await expect(container.initializeAll()).rejects.toThrow('catalog unavailable');
    expect(calls).toEqual([]);
  });

  it('logs a failed shutdown without stopping the others', async () => {
    const calls: string[] = [];
    const logger = createTestLogger();
    const broken: IService = {
      initialize: async () => undefined,
      shutdown: async () => {
        throw new Error('cache write failed');
      },
      isHealthy: async () => {
        throw new Error('no answer');
      }
    };
    const container = new ServiceContainer(logger);
    container.registerSingleton('catalog', broken);
    container.registerSingleton('parser', new RecordingService('parser', calls));

    expect(await container.checkHealth()).toEqual({ catalog: false, parser: true });
    await expect(container.shutdownAll()).resolves.toBeUndefined();

    expect(calls).toEqual(['shutdown:parser']);
    expect(logger.error).toHaveBeenCalledWith('Failed to shutdown singleton catalog', expect.any(Error));
    expect(logger.error).toHaveBeenCalledWith('Health check failed for catalog', expect.any(Error));
  });

  it('reports health and shuts everything down', async () => {
    const calls: string[] = [];
    const container = new ServiceContainer();
    container.registerSingleton('catalog', new RecordingService('catalog', calls, false));
    container.registerSingleton('parser', new RecordingService('parser', calls));

    expect(await container.checkHealth()).toEqual({ catalog: false, parser: true });

    await container.shutdownAll();
    expect(calls).toEqual(['shutdown:catalog', 'shutdown:parser']);
  });
});
