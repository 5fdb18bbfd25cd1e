import type { IService, ILogger } from '../interfaces/IService';
import type { IFlightMatcher } from '../interfaces/IChallengeServices';
import type { EventEmitter } from '../core/EventEmitter';
import { ChallengeType, Region } from '../types';
import type {
  AirportFilter,
  AirportPairFilter,
  ChallengeFilter,
  ChallengeMatch,
  FlightRecord,
  LatitudeRegionFilter,
  RouteFilter,
  RouteName
} from '../types';
import type { AirportDirectory } from './AirportDirectory';
import type { RegionClassifier } from './RegionClassifier';

export interface RouteDefinition {
  sideA: ReadonlySet<Region>;
  sideB: ReadonlySet<Region>;
}

export const ROUTE_DEFINITIONS: Readonly<Record<RouteName, RouteDefinition>> = {
  transpacific: {
    sideA: new Set([Region.ASIA, Region.OCEANIA]),
    sideB: new Set([Region.AMERICAS])
  },
  transatlantic: {
    sideA: new Set([Region.EUROPE, Region.AFRICA, Region.MIDDLE_EAST]),
    sideB: new Set([Region.AMERICAS])
  }
};

/** Null coordinates and the (0, 0) placeholder both mean the feed had no fix. */
export function hasPosition(flight: FlightRecord): boolean {
  const { latitude, longitude } = flight;
  if (latitude === null || longitude === null) {
    return false;
  }
  return !(latitude === 0 && longitude === 0);
}

export function sortByRarity(flights: readonly FlightRecord[]): FlightRecord[] {
  return [...flights].sort((a, b) => b.rarity - a.rarity);
}

export class FlightMatcher implements IService, IFlightMatcher {
  private logger: ILogger;
  private airports: AirportDirectory;
  private regions: RegionClassifier;
  private eventEmitter?: EventEmitter;

  constructor(
    logger: ILogger,
    airports: AirportDirectory,
    regions: RegionClassifier,
    eventEmitter?: EventEmitter
  ) {
    this.logger = logger;
    this.airports = airports;
    this.regions = regions;
    this.eventEmitter = eventEmitter;
  }

  async initialize(): Promise<void> {
    this.logger.info('Flight matcher initialized', { regionCodes: this.regions.size });
  }

  async shutdown(): Promise<void> {
    this.logger.info('Flight matcher shutdown completed');
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  /** Flights satisfying the filter, rarest first. */
  match(flights: readonly FlightRecord[], filter: ChallengeFilter): FlightRecord[] {
    const matches = flights.length === 0 ? [] : sortByRarity(this.select(flights, filter));

    this.logger.debug('Challenge matched', {
      challengeType: filter.type,
      description: filter.description,
      scanned: flights.length,
      matched: matches.length
    });
    this.eventEmitter?.emit('challenge:matched', { filter, matchCount: matches.length });

    return matches;
  }

  matchMany(flights: readonly FlightRecord[], filters: readonly ChallengeFilter[]): ChallengeMatch[] {
    return filters.map(filter => ({ filter, flights: this.match(flights, filter) }));
  }

  private select(flights: readonly FlightRecord[], filter: ChallengeFilter): FlightRecord[] {
    switch (filter.type) {
      case ChallengeType.MANUFACTURER:
      case ChallengeType.AIRCRAFT_TYPE:
      case ChallengeType.AIRCRAFT_CLASS:
        return flights.filter(flight => filter.typecodes.has(flight.typecode));
      case ChallengeType.AIRPORT:
        return this.selectAirport(flights, filter);
      case ChallengeType.AIRPORT_PAIR:
        return this.selectAirportPair(flights, filter);
      case ChallengeType.ROUTE:
        return this.selectRoute(flights, filter);
      case ChallengeType.LATITUDE_REGION:
        return this.selectLatitude(flights, filter);
      case ChallengeType.RARITY_TIER:
        return flights.filter(flight => flight.tier === filter.tier);
      default: {
        const unhandled: never = filter;
        this.logger.warn('Unknown challenge filter', { filter: unhandled });
        return [];
      }
    }
  }

  // Feeds mostly report IATA while names resolve to ICAO, so test both forms
  private selectAirport(flights: readonly FlightRecord[], filter: AirportFilter): FlightRecord[] {
    const codes = this.airports.expandCodes(filter.airportCodes);
    if (codes.size === 0) {
      return [];
    }
    return flights.filter(flight => codes.has(flight.origin) || codes.has(flight.destination));
  }

  private selectAirportPair(flights: readonly FlightRecord[], filter: AirportPairFilter): FlightRecord[] {
    const a = filter.originCodes;
    const b = filter.destinationCodes;
    return flights.filter(flight =>
      (a.has(flight.origin) && b.has(flight.destination)) ||
      (b.has(flight.origin) && a.has(flight.destination))
    );
  }

  private selectRoute(flights: readonly FlightRecord[], filter: RouteFilter): FlightRecord[] {
    const { sideA, sideB } = ROUTE_DEFINITIONS[filter.routeName];

    const regionByCode = new Map<string, Region>();
    for (const flight of flights) {
      for (const code of [flight.origin, flight.destination]) {
        if (!code || regionByCode.has(code)) {
          continue;
        }
        const region = this.regions.regionOf(code);
        if (region) {
          regionByCode.set(code, region);
        }
      }
    }

    return flights.filter(flight => {
      const from = regionByCode.get(flight.origin);
      const to = regionByCode.get(flight.destination);
      if (!from || !to) {
        return false;
      }
      return (sideA.has(from) && sideB.has(to)) || (sideB.has(from) && sideA.has(to));
    });
  }

  private selectLatitude(flights: readonly FlightRecord[], filter: LatitudeRegionFilter): FlightRecord[] {
    const { minLat, maxLat } = filter;
    return flights.filter(flight => {
      if (!hasPosition(flight) || flight.latitude === null) {
        return false;
      }
      if (minLat !== undefined && flight.latitude < minLat) {
        return false;
      }
      return maxLat === undefined || flight.latitude <= maxLat;
    });
  }
}
