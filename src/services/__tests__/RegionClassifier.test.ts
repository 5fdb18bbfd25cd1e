import { describe, it, expect } from 'vitest';
import regionData from '../../data/regions.json';
import { Region } from '../../types';
import { AirportDirectory } from '../AirportDirectory';
import { RegionClassifier, buildRegionTable } from '../RegionClassifier';

describe('RegionClassifier', () => {
  const directory = AirportDirectory.fromDefaults();
  const classifier = new RegionClassifier(directory);

  it('places every explicitly listed airport in its own region', () => {
    for (const [region, codes] of Object.entries(regionData.airports)) {
      for (const code of codes) {
        expect(classifier.regionOf(code)).toBe(region);
      }
    }
  });

  it('prefers the explicit list over the ICAO prefix', () => {
    // UUDD would read as asia by its prefix letter
    expect(directory.toIcao('DME')).toBe('UUDD');
    expect(classifier.regionOf('DME')).toBe(Region.EUROPE);
  });

  it('derives unlisted airports from their ICAO prefix', () => {
    expect(classifier.regionOf('LAX')).toBe(Region.AMERICAS);
    expect(classifier.regionOf('LYR')).toBe(Region.EUROPE);
    expect(classifier.regionOf('USH')).toBe(Region.AMERICAS);
  });

  it('classifies raw ICAO codes by prefix letter', () => {
    expect(classifier.regionOf('KJFK')).toBe(Region.AMERICAS);
    expect(classifier.regionOf('YMML')).toBe(Region.OCEANIA);
    expect(classifier.regionOf('QQQQ')).toBeNull();
  });

  it('normalizes case and whitespace', () => {
    expect(classifier.regionOf(' lhr ')).toBe(Region.EUROPE);
  });

  it('returns null for blank and unknown codes', () => {
    expect(classifier.regionOf('')).toBeNull();
    expect(classifier.regionOf('   ')).toBeNull();
    expect(classifier.regionOf('XQX')).toBeNull();
  });
});

describe('buildRegionTable', () => {
  const directory = new AirportDirectory({
    names: {},
    iataToIcao: { DME: 'UUDD', SVO: 'UUEE', XYZ: 'QXYZ' },
    cityAirports: {}
  });

  it('keeps explicit entries and fills the rest from prefixes', () => {
    const table = buildRegionTable(directory, {
      icaoPrefixes: { U: 'asia' },
      airports: { europe: ['DME'] }
    });

    expect(table.get('DME')).toBe(Region.EUROPE);
    expect(table.get('SVO')).toBe(Region.ASIA);
    expect(table.has('XYZ')).toBe(false);
    expect(table.size).toBe(2);
  });

  it('ignores region names it does not know', () => {
    const table = buildRegionTable(directory, {
      icaoPrefixes: { U: 'atlantis' },
      airports: { atlantis: ['DME'] }
    });

    expect(table.size).toBe(0);
  });

  it('keeps the first region for a code listed twice', () => {
    const table = buildRegionTable(directory, {
      icaoPrefixes: {},
      airports: { europe: ['DME'], asia: ['DME'] }
    });

    expect(table.get('DME')).toBe(Region.EUROPE);
  });
});
