import airportData from '../data/airports.json';
import { editDistance } from '../utils/editDistance';

export interface AirportData {
  /** Lowercase display name, nickname or code -> ICAO */
  names: Record<string, string>;
  iataToIcao: Record<string, string>;
  /** Lowercase city -> every ICAO code serving it */
  cityAirports: Record<string, string[]>;
}

const ICAO_PATTERN = /^[A-Z]{4}$/;
const IATA_PATTERN = /^[A-Z]{3}$/;

/**
 * Read-only airport lookup: names, IATA/ICAO equivalence and
 * multi-airport cities, with an edit-distance fallback for typos.
 */
export class AirportDirectory {
  private readonly names: ReadonlyMap<string, string>;
  private readonly sortedNameKeys: readonly string[];
  private readonly iataToIcao: ReadonlyMap<string, string>;
  private readonly icaoToIata: ReadonlyMap<string, string>;
  private readonly cityAirports: ReadonlyMap<string, readonly string[]>;

  constructor(data: AirportData) {
    this.names = new Map(Object.entries(data.names));
    this.sortedNameKeys = Array.from(this.names.keys()).sort();
    this.iataToIcao = new Map(Object.entries(data.iataToIcao));
    this.icaoToIata = new Map(Object.entries(data.iataToIcao).map(([iata, icao]) => [icao, iata]));
    this.cityAirports = new Map(Object.entries(data.cityAirports));
  }

  static fromDefaults(): AirportDirectory {
    return new AirportDirectory(airportData);
  }

  /**
   * Resolve a code, name or slightly misspelled name to an ICAO code.
   * Three-letter input is always treated as IATA.
   */
  resolveAirport(text: string): string | null {
    const name = text.trim();
    if (ICAO_PATTERN.test(name)) {
      return name;
    }

    const upper = name.toUpperCase();
    if (IATA_PATTERN.test(upper)) {
      return this.iataToIcao.get(upper) ?? null;
    }

    const exact = this.names.get(name.toLowerCase());
    if (exact) {
      return exact;
    }

    return this.fuzzyMatch(name);
  }

  /**
   * Every ICAO and IATA code for a city or airport name. Flight feeds report
   * either form, so both go in the set.
   */
  resolveCityAirports(text: string): Set<string> {
    const codes = new Set<string>();

    const cityCodes = this.cityAirports.get(text.trim().toLowerCase());
    if (cityCodes) {
      for (const icao of cityCodes) {
        this.addWithIata(codes, icao);
      }
      return codes;
    }

    const icao = this.resolveAirport(text);
    if (icao) {
      this.addWithIata(codes, icao);
    }
    return codes;
  }

  toIata(icao: string): string | undefined {
    return this.icaoToIata.get(icao);
  }

  toIcao(iata: string): string | undefined {
    return this.iataToIcao.get(iata);
  }

  /** The given codes plus their IATA/ICAO counterparts. */
  expandCodes(codes: Iterable<string>): Set<string> {
    const expanded = new Set<string>();
    for (const code of codes) {
      expanded.add(code);
      const counterpart = code.length === 4 ? this.icaoToIata.get(code) : this.iataToIcao.get(code);
      if (counterpart) {
        expanded.add(counterpart);
      }
    }
    return expanded;
  }

  /** [IATA, ICAO] pairs known to the directory, in table order */
  iataEntries(): IterableIterator<[string, string]> {
    return this.iataToIcao.entries();
  }

  private addWithIata(codes: Set<string>, icao: string): void {
    codes.add(icao);
    const iata = this.icaoToIata.get(icao);
    if (iata) {
      codes.add(iata);
    }
  }

  // Keys are visited in lexical order so equidistant candidates resolve the same way every run
  private fuzzyMatch(name: string): string | null {
    const lower = name.toLowerCase();
    let bestKey: string | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;

    for (const key of this.sortedNameKeys) {
      const distance = editDistance(lower, key);
      const maxAllowed = Math.max(2, Math.floor(key.length / 4));
      if (distance < bestDistance && distance <= maxAllowed) {
        bestDistance = distance;
        bestKey = key;
      }
    }

    return bestKey === null ? null : this.names.get(bestKey) ?? null;
  }
}
