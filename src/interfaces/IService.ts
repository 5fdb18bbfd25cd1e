// Base service interface for dependency injection
import type { SystemConfig } from '../types';

export type LogMeta = Record<string, unknown>;

export interface IService {
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
  isHealthy(): Promise<boolean>;
}

export interface ILogger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
}

export interface IConfigService extends IService {
  get<K extends keyof SystemConfig>(key: K): SystemConfig[K];
  getConfig(): SystemConfig;
}

export interface IEventEmitter<Events> {
  emit<E extends keyof Events & string>(event: E, data: Events[E]): void;
  on<E extends keyof Events & string>(event: E, handler: (data: Events[E]) => void): void;
  off<E extends keyof Events & string>(event: E, handler: (data: Events[E]) => void): void;
}
