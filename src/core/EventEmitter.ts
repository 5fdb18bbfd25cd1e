import { EventEmitter as NodeEventEmitter } from 'events';
import type { IEventEmitter, ILogger } from '../interfaces/IService';
import type { ChallengeFilter, FlightRecord } from '../types';

export interface ChallengeEvents {
  'catalog:loaded': { source: 'cache' | 'network' | 'stale-cache'; rowCount: number };
  'challenge:parsed': { text: string; filter: ChallengeFilter; rule: string };
  'challenge:matched': { filter: ChallengeFilter; matchCount: number };
  'tracker:evaluated': { flightCount: number; highlighted: FlightRecord[] };
}

export class EventEmitter<Events = ChallengeEvents> implements IEventEmitter<Events> {
  private emitter: NodeEventEmitter;
  private logger?: ILogger;

  constructor(logger?: ILogger) {
    this.emitter = new NodeEventEmitter();
    this.logger = logger;

    // Set max listeners to handle multiple subscribers
    this.emitter.setMaxListeners(100);
  }

  emit<E extends keyof Events & string>(event: E, data: Events[E]): void {
    try {
      this.logger?.debug(`Emitting event: ${event}`);
      this.emitter.emit(event, data);
    } catch (error) {
      this.logger?.error(`Error emitting event: ${event}`, error as Error);
    }
  }

  on<E extends keyof Events & string>(event: E, handler: (data: Events[E]) => void): void {
    this.logger?.debug(`Registering handler for event: ${event}`);
    this.emitter.on(event, handler);
  }

  off<E extends keyof Events & string>(event: E, handler: (data: Events[E]) => void): void {
    this.logger?.debug(`Removing handler for event: ${event}`);
    this.emitter.off(event, handler);
  }

  once<E extends keyof Events & string>(event: E, handler: (data: Events[E]) => void): void {
    this.emitter.once(event, handler);
  }

  removeAllListeners(event?: keyof Events & string): void {
    if (event === undefined) {
      this.emitter.removeAllListeners();
    } else {
      this.emitter.removeAllListeners(event);
    }
  }

  listenerCount(event: keyof Events & string): number {
    return this.emitter.listenerCount(event);
  }
}
