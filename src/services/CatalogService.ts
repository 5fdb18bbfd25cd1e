import { promises as fs } from 'fs';
import path from 'path';
import axios from 'axios';
import type { AxiosRequestConfig } from 'axios';
import Joi from 'joi';
import type { ICatalogService } from '../interfaces/IChallengeServices';
import type { IConfigService, ILogger } from '../interfaces/IService';
import type { EventEmitter } from '../core/EventEmitter';
import type { CatalogRow, ModelCatalog } from '../types';

export interface CatalogHttpClient {
  get(url: string, config: AxiosRequestConfig): Promise<{ data: unknown }>;
}

interface CatalogCache {
  /** Epoch milliseconds */
  cachedAt: number;
  catalog: ModelCatalog;
}

interface CatalogEnvelope {
  rows: unknown[];
  blacklist: string[];
}

interface CacheEnvelope {
  cachedAt: number;
  catalog: unknown;
}

const text = () => Joi.string().allow('').empty(null);

const catalogRowSchema = Joi.object<CatalogRow>({
  id: Joi.string().required(),
  name: text().default(''),
  manufacturer: text().default(''),
  type: text().default(''),
  military: Joi.boolean().empty(null).default(false),
  rareness: Joi.number().empty(null).default(0),
  cardCategory: text().default('unknown'),
  xp: Joi.number().empty(null).default(0)
});

// Rows are checked individually; invalid ones are dropped
const catalogSchema = Joi.object<CatalogEnvelope>({
  rows: Joi.array().required(),
  blacklist: Joi.array().items(Joi.string()).empty(null).default([])
});

const cacheSchema = Joi.object<CacheEnvelope>({
  cachedAt: Joi.number().required(),
  catalog: Joi.object().required()
});

export function parseCatalog(payload: unknown, logger?: ILogger): ModelCatalog {
  const result = catalogSchema.validate(payload, { stripUnknown: true });
  if (result.error) {
    throw new Error(`Invalid model catalog: ${result.error.message}`);
  }

  const rows: CatalogRow[] = [];
  let rejected = 0;
  for (const row of result.value.rows) {
    const rowResult = catalogRowSchema.validate(row, { stripUnknown: true });
    if (rowResult.error) {
      rejected++;
      logger?.debug('Skipping invalid catalog row', { reason: rowResult.error.message });
      continue;
    }
    rows.push(rowResult.value);
  }

  if (rejected > 0) {
    logger?.warn('Some catalog rows were rejected', { rejected, accepted: rows.length });
  }
  return { rows, blacklist: result.value.blacklist };
}

/**
 * Aircraft model catalog: memory, then a JSON file cache younger than the
 * configured age, then the network. A stale cache is still served when the
 * network is down.
 */
export class CatalogService implements ICatalogService {
  private logger: ILogger;
  private config: IConfigService;
  private eventEmitter?: EventEmitter;
  private http: CatalogHttpClient;
  private catalog: ModelCatalog | null = null;

  constructor(
    logger: ILogger,
    config: IConfigService,
    eventEmitter?: EventEmitter,
    http: CatalogHttpClient = axios
  ) {
    this.logger = logger;
    this.config = config;
    this.eventEmitter = eventEmitter;
    this.http = http;
  }

  async initialize(): Promise<void> {
    const catalog = await this.getCatalog();
    this.logger.info('Catalog service initialized', { aircraftTypes: catalog.rows.length });
  }

  async shutdown(): Promise<void> {
    this.catalog = null;
    this.logger.info('Catalog service shutdown completed');
  }

  async isHealthy(): Promise<boolean> {
    return this.catalog !== null;
  }

  async getCatalog(): Promise<ModelCatalog> {
    if (this.catalog) {
      return this.catalog;
    }

    const { cacheMaxAgeSeconds } = this.config.get('catalog');
    const cached = await this.readCache();
    if (cached && Date.now() - cached.cachedAt < cacheMaxAgeSeconds * 1000) {
      return this.remember(cached.catalog, 'cache');
    }

    try {
      const catalog = await this.fetchCatalog();
      await this.writeCache(catalog);
      return this.remember(catalog, 'network');
    } catch (error) {
      if (cached) {
        this.logger.warn('Catalog fetch failed, using stale cache', {
          cachedAt: new Date(cached.cachedAt).toISOString(),
          reason: (error as Error).message
        });
        return this.remember(cached.catalog, 'stale-cache');
      }
      this.logger.error('Failed to load model catalog', error as Error);
      throw error;
    }
  }

  private async fetchCatalog(): Promise<ModelCatalog> {
    const { url, timeoutMs } = this.config.get('catalog');
    const startTime = Date.now();

    const response = await this.http.get(url, {
      params: { updatedAt: 0 },
      headers: {
        Accept: 'application/json',
        'X-Client-Version': '3.0.0'
      },
      timeout: timeoutMs
    });
    const catalog = parseCatalog(response.data, this.logger);

    this.logger.info('Model catalog fetched', {
      url,
      aircraftTypes: catalog.rows.length,
      processingTime: Date.now() - startTime
    });
    return catalog;
  }

  private async readCache(): Promise<CatalogCache | null> {
    const { cacheFile } = this.config.get('catalog');
    let raw: string;
    try {
      raw = await fs.readFile(cacheFile, 'utf8');
    } catch (error) {
      this.logger.debug('No catalog cache available', { cacheFile, reason: (error as Error).message });
      return null;
    }

    try {
      const result = cacheSchema.validate(JSON.parse(raw), { stripUnknown: true });
      if (result.error) {
        throw result.error;
      }
      return { cachedAt: result.value.cachedAt, catalog: parseCatalog(result.value.catalog, this.logger) };
    } catch (error) {
      this.logger.warn('Ignoring unreadable catalog cache', { cacheFile, reason: (error as Error).message });
      return null;
    }
  }

  private async writeCache(catalog: ModelCatalog): Promise<void> {
    const { cacheFile } = this.config.get('catalog');
    const cache: CatalogCache = { cachedAt: Date.now(), catalog };
    try {
      await fs.mkdir(path.dirname(cacheFile), { recursive: true });
      await fs.writeFile(cacheFile, JSON.stringify(cache));
    } catch (error) {
      // A missing cache only costs a refetch next time
      this.logger.warn('Failed to write catalog cache', { cacheFile, reason: (error as Error).message });
    }
  }

  private remember(catalog: ModelCatalog, source: 'cache' | 'network' | 'stale-cache'): ModelCatalog {
    this.catalog = catalog;
    this.eventEmitter?.emit('catalog:loaded', { source, rowCount: catalog.rows.length });
    return catalog;
  }
}
