import { vi } from 'vitest';
import type { ILogger } from '../interfaces/IService';
import type { CatalogRow, FlightRecord, LiveFlight, ModelCatalog } from '../types';

export function createTestLogger(): ILogger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  };
}

export function catalogRow(overrides: Partial<CatalogRow> & Pick<CatalogRow, 'id'>): CatalogRow {
  return {
    name: overrides.id,
    manufacturer: '',
    type: 'L',
    military: false,
    rareness: 100,
    cardCategory: 'common',
    xp: 10,
    ...overrides
  };
}

export const sampleRows: CatalogRow[] = [
  catalogRow({ id: 'B744', name: 'Boeing 747-400', manufacturer: 'Boeing', rareness: 900, cardCategory: 'rare', xp: 90 }),
  catalogRow({ id: 'B748', name: 'Boeing 747-8', manufacturer: 'Boeing', rareness: 700, cardCategory: 'scarce', xp: 70 }),
  catalogRow({ id: 'B738', name: 'Boeing 737-800', manufacturer: 'Boeing', rareness: 50 }),
  catalogRow({ id: 'A320', name: 'Airbus A320', manufacturer: 'Airbus', rareness: 40 }),
  catalogRow({ id: 'A388', name: 'Airbus A380-800', manufacturer: 'Airbus', rareness: 600, cardCategory: 'uncommon' }),
  catalogRow({ id: 'EC35', name: 'H135', manufacturer: 'Airbus Helicopters', type: 'H', rareness: 300 }),
  catalogRow({ id: 'PC12', name: 'Pilatus PC-12', manufacturer: 'Pilatus', rareness: 400 }),
  catalogRow({ id: 'PC24', name: 'Pilatus PC-24', manufacturer: 'Pilatus', rareness: 500 }),
  catalogRow({ id: 'SR22', name: 'Cirrus SR22', manufacturer: 'Cirrus Design', rareness: 200 }),
  catalogRow({ id: 'C172', name: 'Cessna 172 Skyhawk', manufacturer: 'Cessna', rareness: 30 }),
  catalogRow({
    id: 'V22',
    name: 'V-22 Osprey',
    manufacturer: 'Bell-Boeing',
    type: 'T',
    military: true,
    rareness: 1500,
    cardCategory: 'ultra',
    xp: 500
  }),
  catalogRow({ id: 'CL2T', name: 'Canadair CL-415', manufacturer: 'Canadair', type: 'A', rareness: 1100 }),
  catalogRow({ id: 'MTOS', name: 'MTOsport', manufacturer: 'AutoGyro', type: 'G', rareness: 800 }),
  catalogRow({ id: 'AS21', name: 'ASK 21', manufacturer: 'Schleicher', type: 'S', rareness: 650 }),
  catalogRow({ id: 'GLID', name: 'Unidentified sailplane', rareness: 0 })
];

export const sampleCatalog: ModelCatalog = {
  rows: sampleRows,
  blacklist: []
};

export function liveFlight(overrides: Partial<LiveFlight> & Pick<LiveFlight, 'flightId'>): LiveFlight {
  return {
    callsign: '',
    registration: '',
    origin: '',
    destination: '',
    typecode: '',
    latitude: 45,
    longitude: 10,
    altitude: 35000,
    groundSpeed: 450,
    ...overrides
  };
}

export function flightRecord(overrides: Partial<FlightRecord> & Pick<FlightRecord, 'flightId'>): FlightRecord {
  return {
    ...liveFlight(overrides),
    rarity: 1,
    tier: 'Common',
    aircraftName: overrides.typecode ?? '',
    xp: 10,
    ...overrides
  };
}
