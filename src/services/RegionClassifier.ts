import regionData from '../data/regions.json';
import { Region } from '../types';
import type { AirportDirectory } from './AirportDirectory';

export interface RegionData {
  /** First letter of an ICAO code -> region name */
  icaoPrefixes: Record<string, string>;
  /** Region name -> IATA codes placed there explicitly */
  airports: Record<string, string[]>;
}

const REGIONS = Object.values(Region);

function toRegion(value: string | undefined): Region | undefined {
  return REGIONS.find(region => region === value);
}

/**
 * Build the IATA -> region table. Explicit per-region lists are applied first
 * and are never replaced; codes only known through the directory are filled
 * in afterwards from the ICAO prefix letter.
 */
export function buildRegionTable(
  directory: AirportDirectory,
  data: RegionData = regionData
): ReadonlyMap<string, Region> {
  const table = new Map<string, Region>();

  for (const [name, codes] of Object.entries(data.airports)) {
    const region = toRegion(name);
    if (!region) {
      continue;
    }
    for (const code of codes) {
      if (!table.has(code)) {
        table.set(code, region);
      }
    }
  }

  for (const [iata, icao] of directory.iataEntries()) {
    if (table.has(iata)) {
      continue;
    }
    const region = toRegion(data.icaoPrefixes[icao.charAt(0)]);
    if (region) {
      table.set(iata, region);
    }
  }

  return table;
}

export class RegionClassifier {
  private directory: AirportDirectory;
  private data: RegionData;
  private table: ReadonlyMap<string, Region> | null = null;

  constructor(directory: AirportDirectory, data: RegionData = regionData) {
    this.directory = directory;
    this.data = data;
  }

  regionOf(code: string): Region | null {
    const normalized = code.trim().toUpperCase();
    if (!normalized) {
      return null;
    }

    const region = this.getTable().get(normalized);
    if (region) {
      return region;
    }

    // Feeds occasionally carry ICAO codes; the prefix letter is enough for a coarse region
    if (normalized.length === 4) {
      return toRegion(this.data.icaoPrefixes[normalized.charAt(0)]) ?? null;
    }
    return null;
  }

  get size(): number {
    return this.getTable().size;
  }

  private getTable(): ReadonlyMap<string, Region> {
    if (this.table === null) {
      this.table = buildRegionTable(this.directory, this.data);
    }
    return this.table;
  }
}
