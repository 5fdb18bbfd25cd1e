import type { IService } from './IService';
import type {
  CatalogRow,
  ChallengeFilter,
  ChallengeMatch,
  FlightRecord,
  LiveFlight,
  ModelCatalog
} from '../types';

export interface IChallengeParser {
  parse(text: string, rows: readonly CatalogRow[]): ChallengeFilter;
  parseMany(texts: readonly string[], rows: readonly CatalogRow[]): ChallengeFilter[];
}

export interface IFlightMatcher {
  match(flights: readonly FlightRecord[], filter: ChallengeFilter): FlightRecord[];
  matchMany(flights: readonly FlightRecord[], filters: readonly ChallengeFilter[]): ChallengeMatch[];
}

export interface ICatalogService extends IService {
  getCatalog(): Promise<ModelCatalog>;
}

export interface IFlightSource {
  readFlights(): Promise<LiveFlight[]>;
}
