import { config } from 'dotenv';
import Joi from 'joi';
import type { IConfigService, ILogger } from '../interfaces/IService';
import type { SystemConfig } from '../types';

const configSchema = Joi.object<SystemConfig>({
  logging: Joi.object({
    level: Joi.string().valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly').required(),
    directory: Joi.string().optional()
  }).required(),
  catalog: Joi.object({
    url: Joi.string().uri().required(),
    cacheFile: Joi.string().required(),
    cacheMaxAgeSeconds: Joi.number().min(0).required(),
    timeoutMs: Joi.number().min(1000).required()
  }).required(),
  tracker: Joi.object({
    minRarity: Joi.number().min(0).required(),
    challenges: Joi.array().items(Joi.string().min(1)).required()
  }).required(),
  feed: Joi.object({
    flightsFile: Joi.string().required()
  }).required()
});

export class ConfigService implements IConfigService {
  private configuration: SystemConfig;
  private logger?: ILogger;

  constructor(logger?: ILogger, env: NodeJS.ProcessEnv = process.env) {
    this.logger = logger;

    // Load environment variables
    if (env === process.env) {
      config();
    }

    this.configuration = this.validateConfiguration(this.buildConfiguration(env));
  }

  async initialize(): Promise<void> {
    this.logger?.info('ConfigService initialized');
  }

  async shutdown(): Promise<void> {
    this.logger?.info('ConfigService shutdown');
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  get<K extends keyof SystemConfig>(key: K): SystemConfig[K] {
    return this.configuration[key];
  }

  getConfig(): SystemConfig {
    return { ...this.configuration };
  }

  private buildConfiguration(env: NodeJS.ProcessEnv): SystemConfig {
    return {
      logging: {
        level: env.LOG_LEVEL || 'info',
        directory: env.LOG_DIR || undefined
      },
      catalog: {
        url: env.CATALOG_URL || 'https://api.skycards.oldapes.com/models',
        cacheFile: env.CATALOG_CACHE_FILE || 'models_cache.json',
        // Rarity is revised a few times a year; six hours keeps restarts cheap
        cacheMaxAgeSeconds: parseInt(env.CATALOG_CACHE_MAX_AGE || '21600', 10),
        timeoutMs: parseInt(env.CATALOG_TIMEOUT || '30000', 10)
      },
      tracker: {
        minRarity: parseFloat(env.MIN_RARITY || '10'),
        challenges: (env.CHALLENGES || '')
          .split('|')
          .map(text => text.trim())
          .filter(text => text.length > 0)
      },
      feed: {
        flightsFile: env.FLIGHTS_FILE || 'flights.json'
      }
    };
  }

  private validateConfiguration(candidate: SystemConfig): SystemConfig {
    const result = configSchema.validate(candidate, { abortEarly: false });
    if (result.error) {
      const errorMessage = `Configuration validation failed: ${result.error.details.map(d => d.message).join(', ')}`;
      this.logger?.error(errorMessage);
      throw new Error(errorMessage);
    }

    this.logger?.info('Configuration validation passed');
    return result.value;
  }
}
