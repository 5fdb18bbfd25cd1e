import type { IService, ILogger } from '../interfaces/IService';
import type { IChallengeParser, IFlightMatcher } from '../interfaces/IChallengeServices';
import type { EventEmitter } from '../core/EventEmitter';
import type { ChallengeFilter, FlightRecord, LiveFlight, ModelCatalog } from '../types';
import { hasPosition } from './FlightMatcher';
import type { RarityService } from './RarityService';

export interface TrackedFlight extends FlightRecord {
  /** 1-based number of the first challenge this flight satisfies */
  challenge?: number;
}

export interface ChallengeSummary {
  number: number;
  text: string;
  description: string;
  matchCount: number;
}

export interface TrackerSnapshot {
  scanned: number;
  rareCount: number;
  flights: TrackedFlight[];
  challenges: ChallengeSummary[];
}

export interface ChallengeTrackerOptions {
  minRarity: number;
}

/**
 * Per refresh cycle: rare flights first, then flights matching any of the
 * configured challenges, each flight listed once.
 */
export class ChallengeTracker implements IService {
  private logger: ILogger;
  private parser: IChallengeParser;
  private matcher: IFlightMatcher;
  private rarity: RarityService;
  private eventEmitter?: EventEmitter;
  private minRarity: number;
  private filters: ChallengeFilter[] = [];

  constructor(
    logger: ILogger,
    parser: IChallengeParser,
    matcher: IFlightMatcher,
    rarity: RarityService,
    options: ChallengeTrackerOptions,
    eventEmitter?: EventEmitter
  ) {
    this.logger = logger;
    this.parser = parser;
    this.matcher = matcher;
    this.rarity = rarity;
    this.minRarity = options.minRarity;
    this.eventEmitter = eventEmitter;
  }

  async initialize(): Promise<void> {
    this.logger.info('Challenge tracker initialized', { minRarity: this.minRarity });
  }

  async shutdown(): Promise<void> {
    this.filters = [];
    this.logger.info('Challenge tracker shutdown completed');
  }

  async isHealthy(): Promise<boolean> {
    return this.rarity.isHealthy();
  }

  /** Parse challenges once against the catalog; refreshes only re-match. */
  configure(catalog: ModelCatalog, challengeTexts: readonly string[]): ChallengeFilter[] {
    this.rarity.loadCatalog(catalog);
    this.filters = this.parser.parseMany(challengeTexts, catalog.rows);

    this.filters.forEach((filter, i) => {
      this.logger.info(`Challenge ${i + 1}: ${filter.description}`, { challengeType: filter.type });
    });
    return [...this.filters];
  }

  getFilters(): readonly ChallengeFilter[] {
    return this.filters;
  }

  evaluate(liveFlights: readonly LiveFlight[]): TrackerSnapshot {
    const startTime = Date.now();
    const enriched = this.rarity.enrich(liveFlights);

    const results: TrackedFlight[] = [];
    const indexById = new Map<string, number>();

    const rare = enriched.filter(flight => flight.rarity >= this.minRarity && hasPosition(flight));
    for (const flight of rare) {
      if (!indexById.has(flight.flightId)) {
        indexById.set(flight.flightId, results.length);
        results.push({ ...flight });
      }
    }

    const challenges = this.matcher.matchMany(enriched, this.filters).map(({ filter, flights }, i) => {
      const number = i + 1;
      for (const flight of flights) {
        const existing = indexById.get(flight.flightId);
        if (existing !== undefined) {
          if (results[existing].challenge === undefined) {
            results[existing].challenge = number;
          }
          continue;
        }
        if (!hasPosition(flight)) {
          continue;
        }
        indexById.set(flight.flightId, results.length);
        results.push({ ...flight, challenge: number });
      }
      return {
        number,
        text: filter.originalText,
        description: filter.description,
        matchCount: flights.length
      };
    });

    this.logger.info('Flight batch evaluated', {
      scanned: liveFlights.length,
      rare: rare.length,
      highlighted: results.length,
      processingTime: Date.now() - startTime
    });
    this.eventEmitter?.emit('tracker:evaluated', { flightCount: liveFlights.length, highlighted: results });

    return {
      scanned: liveFlights.length,
      rareCount: rare.length,
      flights: results,
      challenges
    };
  }
}
