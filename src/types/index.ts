// Core data types for the flight challenge engine

export enum Region {
  AMERICAS = 'americas',
  EUROPE = 'europe',
  ASIA = 'asia',
  OCEANIA = 'oceania',
  MIDDLE_EAST = 'middle_east',
  AFRICA = 'africa'
}

export enum ChallengeType {
  MANUFACTURER = 'manufacturer',
  AIRPORT = 'airport',
  AIRPORT_PAIR = 'airport_pair',
  ROUTE = 'route',
  AIRCRAFT_TYPE = 'aircraft_type',
  RARITY_TIER = 'rarity_tier',
  AIRCRAFT_CLASS = 'aircraft_class',
  LATITUDE_REGION = 'latitude_region'
}

export const RARITY_TIERS = ['Ultra', 'Rare', 'Scarce', 'Uncommon', 'Common', 'Historical', 'Fantasy'] as const;
export type RarityTier = typeof RARITY_TIERS[number];

export const AIRCRAFT_CLASSES = [
  'helicopter',
  'military',
  'gyrocopter',
  'autogyro',
  'tiltrotor',
  'amphibian',
  'glider'
] as const;
export type AircraftClass = typeof AIRCRAFT_CLASSES[number];

export type RouteName = 'transpacific' | 'transatlantic';

/** One row of the aircraft model catalog, keyed by ICAO type code. */
export interface CatalogRow {
  id: string;
  name: string;
  manufacturer: string;
  /** Single-letter classification: H helicopter, G gyrocopter, T tiltrotor, A amphibian, S glider, L landplane... */
  type: string;
  military: boolean;
  /** Raw rarity on a 0-2000 scale; display rarity is rareness / 100 */
  rareness: number;
  cardCategory: string;
  xp: number;
}

export interface ModelCatalog {
  rows: CatalogRow[];
  blacklist: string[];
}

/** A flight as delivered by the live feed, before enrichment. */
export interface LiveFlight {
  flightId: string;
  callsign: string;
  registration: string;
  /** IATA-style code, may be empty */
  origin: string;
  destination: string;
  typecode: string;
  latitude: number | null;
  longitude: number | null;
  altitude: number;
  groundSpeed: number;
}

export interface FlightRecord extends LiveFlight {
  rarity: number;
  tier: string;
  aircraftName: string;
  xp: number;
}

interface ChallengeFilterBase {
  originalText: string;
  description: string;
}

export interface ManufacturerFilter extends ChallengeFilterBase {
  type: ChallengeType.MANUFACTURER;
  manufacturer: string;
  typecodes: ReadonlySet<string>;
}

export interface AircraftTypeFilter extends ChallengeFilterBase {
  type: ChallengeType.AIRCRAFT_TYPE;
  typecodes: ReadonlySet<string>;
}

export interface AircraftClassFilter extends ChallengeFilterBase {
  type: ChallengeType.AIRCRAFT_CLASS;
  aircraftClass: AircraftClass;
  typecodes: ReadonlySet<string>;
}

export interface AirportFilter extends ChallengeFilterBase {
  type: ChallengeType.AIRPORT;
  airportCodes: ReadonlySet<string>;
  unresolvedNames: readonly string[];
}

export interface AirportPairFilter extends ChallengeFilterBase {
  type: ChallengeType.AIRPORT_PAIR;
  originCodes: ReadonlySet<string>;
  destinationCodes: ReadonlySet<string>;
}

export interface RouteFilter extends ChallengeFilterBase {
  type: ChallengeType.ROUTE;
  routeName: RouteName;
}

export interface RarityTierFilter extends ChallengeFilterBase {
  type: ChallengeType.RARITY_TIER;
  tier: RarityTier;
}

export interface LatitudeRegionFilter extends ChallengeFilterBase {
  type: ChallengeType.LATITUDE_REGION;
  minLat?: number;
  maxLat?: number;
}

export type ChallengeFilter =
  | ManufacturerFilter
  | AircraftTypeFilter
  | AircraftClassFilter
  | AirportFilter
  | AirportPairFilter
  | RouteFilter
  | RarityTierFilter
  | LatitudeRegionFilter;

export type TypecodeFilter = ManufacturerFilter | AircraftTypeFilter | AircraftClassFilter;

export interface ChallengeMatch {
  filter: ChallengeFilter;
  flights: FlightRecord[];
}

export interface SystemConfig {
  logging: {
    level: string;
    directory?: string;
  };
  catalog: {
    url: string;
    cacheFile: string;
    cacheMaxAgeSeconds: number;
    timeoutMs: number;
  };
  tracker: {
    minRarity: number;
    challenges: string[];
  };
  feed: {
    flightsFile: string;
  };
}
