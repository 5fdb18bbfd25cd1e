import type { IService, ILogger } from '../interfaces/IService';
import { RARITY_TIERS } from '../types';
import type { FlightRecord, LiveFlight, ModelCatalog } from '../types';
import { sortByRarity } from './FlightMatcher';

export interface RarityInfo {
  name: string;
  /** Raw 0-2000 scale from the catalog */
  rareness: number;
  /** In-game display scale (rareness / 100) */
  rarity: number;
  tier: string;
  xp: number;
  manufacturer: string;
}

export const UNKNOWN_TIER = 'Unknown';

/** "ultra" -> "Ultra"; categories outside the known tiers are title-cased. */
export function tierLabel(category: string): string {
  const known = RARITY_TIERS.find(tier => tier.toLowerCase() === category.toLowerCase());
  if (known) {
    return known;
  }
  return category.charAt(0).toUpperCase() + category.slice(1).toLowerCase();
}

export function buildRarityLookup(catalog: ModelCatalog): Map<string, RarityInfo> {
  const blacklist = new Set(catalog.blacklist);
  const lookup = new Map<string, RarityInfo>();

  for (const row of catalog.rows) {
    if (!row.id || blacklist.has(row.id)) {
      continue;
    }
    lookup.set(row.id, {
      name: row.name || row.id,
      rareness: row.rareness,
      rarity: row.rareness / 100,
      tier: tierLabel(row.cardCategory),
      xp: row.xp,
      manufacturer: row.manufacturer
    });
  }

  return lookup;
}

/**
 * Attaches catalog rarity, tier, name and XP to live flights by type code.
 */
export class RarityService implements IService {
  private logger: ILogger;
  private lookup: Map<string, RarityInfo> = new Map();

  constructor(logger: ILogger) {
    this.logger = logger;
  }

  async initialize(): Promise<void> {
    this.logger.info('Rarity service initialized');
  }

  async shutdown(): Promise<void> {
    this.lookup.clear();
    this.logger.info('Rarity service shutdown completed');
  }

  async isHealthy(): Promise<boolean> {
    return this.lookup.size > 0;
  }

  loadCatalog(catalog: ModelCatalog): void {
    this.lookup = buildRarityLookup(catalog);
    this.logger.info('Rarity lookup built', { aircraftTypes: this.lookup.size });
  }

  get(typecode: string): RarityInfo | undefined {
    return this.lookup.get(typecode);
  }

  get size(): number {
    return this.lookup.size;
  }

  /** Enriched copies, rarest first. Unknown types score 0 in the "Unknown" tier. */
  enrich(flights: readonly LiveFlight[]): FlightRecord[] {
    const enriched = flights.map((flight): FlightRecord => {
      const info = this.lookup.get(flight.typecode);
      return {
        ...flight,
        rarity: info?.rarity ?? 0,
        tier: info?.tier ?? UNKNOWN_TIER,
        aircraftName: info?.name ?? flight.typecode,
        xp: info?.xp ?? 0
      };
    });
    return sortByRarity(enriched);
  }
}
