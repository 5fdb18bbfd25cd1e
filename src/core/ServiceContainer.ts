import type { IService, ILogger } from '../interfaces/IService';

function isService(instance: unknown): instance is IService {
  return typeof instance === 'object' &&
    instance !== null &&
    'initialize' in instance &&
    typeof instance.initialize === 'function' &&
    'shutdown' in instance &&
    typeof instance.shutdown === 'function' &&
    'isHealthy' in instance &&
    typeof instance.isHealthy === 'function';
}

export class ServiceContainer {
  private singletons: Map<string, unknown> = new Map();
  private logger?: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger;
  }

  // Register a singleton instance
  registerSingleton<T>(name: string, instance: T): void {
    this.singletons.set(name, instance);
    this.logger?.debug(`Registered singleton: ${name}`);
  }

  // Initialize all registered services, in registration order
  async initializeAll(): Promise<void> {
    this.logger?.info('Initializing all services...');

    let initialized = 0;
    for (const [name, instance] of this.singletons) {
      if (!isService(instance)) {
        continue;
      }
      try {
        await instance.initialize();
        initialized++;
      } catch (error) {
        this.logger?.error(`Failed to initialize singleton ${name}`, error as Error);
        throw error;
      }
    }

    this.logger?.info(`Initialized ${initialized} services`);
  }

  // Shutdown all services
  async shutdownAll(): Promise<void> {
    this.logger?.info('Shutting down all services...');

    const shutdownPromises: Promise<void>[] = [];

    for (const [name, instance] of this.singletons) {
      if (isService(instance)) {
        shutdownPromises.push(
          instance.shutdown().catch((error: Error) => {
            this.logger?.error(`Failed to shutdown singleton ${name}`, error);
          })
        );
      }
    }

    await Promise.all(shutdownPromises);
    this.logger?.info('All services shut down');
  }

  // Check health of all services
  async checkHealth(): Promise<{ [serviceName: string]: boolean }> {
    const healthStatus: { [serviceName: string]: boolean } = {};

    for (const [name, instance] of this.singletons) {
      if (isService(instance)) {
        try {
          healthStatus[name] = await instance.isHealthy();
        } catch (error) {
          this.logger?.error(`Health check failed for ${name}`, error as Error);
          healthStatus[name] = false;
        }
      }
    }

    return healthStatus;
  }
}
