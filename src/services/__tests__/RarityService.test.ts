import { describe, it, expect } from 'vitest';
import { catalogRow, createTestLogger, liveFlight } from '../../test/fixtures';
import { RarityService, UNKNOWN_TIER, buildRarityLookup, tierLabel } from '../RarityService';

const catalog = {
  rows: [
    catalogRow({ id: 'V22', name: 'V-22 Osprey', manufacturer: 'Bell-Boeing', rareness: 1500, cardCategory: 'ultra', xp: 500 }),
    catalogRow({ id: 'A320', name: 'Airbus A320', manufacturer: 'Airbus', rareness: 40, cardCategory: 'common', xp: 5 }),
    catalogRow({ id: 'ZEPP', name: 'Zeppelin NT', rareness: 1900, cardCategory: 'fantasy' }),
    catalogRow({ id: 'X1', name: '', rareness: 250, cardCategory: 'prototype' })
  ],
  blacklist: ['ZEPP']
};

describe('tierLabel', () => {
  it('returns the canonical tier name', () => {
    expect(tierLabel('ultra')).toBe('Ultra');
    expect(tierLabel('UNCOMMON')).toBe('Uncommon');
  });

  it('title-cases unknown categories', () => {
    expect(tierLabel('PROTOTYPE')).toBe('Prototype');
  });
});

describe('buildRarityLookup', () => {
  const lookup = buildRarityLookup(catalog);

  it('scales rareness to display rarity', () => {
    expect(lookup.get('V22')).toEqual({
      name: 'V-22 Osprey',
      rareness: 1500,
      rarity: 15,
      tier: 'Ultra',
      xp: 500,
      manufacturer: 'Bell-Boeing'
    });
    expect(lookup.get('A320')?.rarity).toBe(0.4);
  });

  it('skips blacklisted types', () => {
    expect(lookup.has('ZEPP')).toBe(false);
    expect(lookup.size).toBe(3);
  });

  it('falls back to the id for a missing name', () => {
    expect(lookup.get('X1')?.name).toBe('X1');
  });
});

describe('RarityService', () => {
  it('enriches flights and sorts rarest first', async () => {
    const service = new RarityService(createTestLogger());
    expect(await service.isHealthy()).toBe(false);

    service.loadCatalog(catalog);
    const enriched = service.enrich([
      liveFlight({ flightId: 'common', typecode: 'A320' }),
      liveFlight({ flightId: 'unknown', typecode: 'C919' }),
      liveFlight({ flightId: 'ultra', typecode: 'V22' })
    ]);

    expect(enriched.map(flight => flight.flightId)).toEqual(['ultra', 'common', 'unknown']);
    expect(enriched[0]).toMatchObject({ rarity: 15, tier: 'Ultra', aircraftName: 'V-22 Osprey', xp: 500 });
    expect(enriched[2]).toMatchObject({ rarity: 0, tier: UNKNOWN_TIER, aircraftName: 'C919', xp: 0 });
    expect(service.size).toBe(3);
    expect(await service.isHealthy()).toBe(true);
  });

  it('forgets the catalog on shutdown', async () => {
    const service = new RarityService(createTestLogger());
    service.loadCatalog(catalog);
    await service.shutdown();

    expect(service.get('V22')).toBeUndefined();
  });
});
