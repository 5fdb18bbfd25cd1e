import type { AircraftClass, CatalogRow } from '../types';

export interface ManufacturerEntry {
  canonical: string;
  typecodes: ReadonlySet<string>;
}

export type ManufacturerIndex = ReadonlyMap<string, ManufacturerEntry>;
export type ClassIndex = Readonly<Record<AircraftClass, ReadonlySet<string>>>;

/** "Piper-Aircraft's" -> "piper aircrafts" */
export function punctuationKey(text: string): string {
  return text.toLowerCase().replace(/'/g, '').replace(/-/g, ' ').trim();
}

/** "De Havilland Canada" -> "dehavillandcanada" */
export function collapsedKey(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Map several normalized spellings of each manufacturer to its canonical
 * name and type codes. A first-word key is only added when no other
 * manufacturer has claimed it.
 */
export function buildManufacturerIndex(rows: readonly CatalogRow[]): ManufacturerIndex {
  const codesByManufacturer = new Map<string, Set<string>>();
  for (const row of rows) {
    if (!row.manufacturer || !row.id) {
      continue;
    }
    const codes = codesByManufacturer.get(row.manufacturer) ?? new Set<string>();
    codes.add(row.id);
    codesByManufacturer.set(row.manufacturer, codes);
  }

  const index = new Map<string, ManufacturerEntry>();
  for (const [manufacturer, typecodes] of codesByManufacturer) {
    const entry: ManufacturerEntry = { canonical: manufacturer, typecodes };
    const lower = manufacturer.toLowerCase();

    index.set(lower, entry);
    index.set(punctuationKey(manufacturer), entry);
    index.set(collapsedKey(manufacturer), entry);

    if (manufacturer.includes(' ')) {
      const firstWord = lower.split(/\s+/)[0];
      if (firstWord && !index.has(firstWord)) {
        index.set(firstWord, entry);
      }
    }
  }

  return index;
}

const CLASS_BY_TYPE_LETTER: Record<string, readonly AircraftClass[]> = {
  H: ['helicopter'],
  G: ['gyrocopter', 'autogyro'],
  T: ['tiltrotor'],
  A: ['amphibian'],
  S: ['glider']
};

// The catalog files some gliders as landplanes
const GLIDER_IDS = new Set(['GLID', 'GLIM']);

export function buildClassIndex(rows: readonly CatalogRow[]): ClassIndex {
  const classes: Record<AircraftClass, Set<string>> = {
    helicopter: new Set(),
    military: new Set(),
    gyrocopter: new Set(),
    autogyro: new Set(),
    tiltrotor: new Set(),
    amphibian: new Set(),
    glider: new Set()
  };

  for (const row of rows) {
    if (!row.id) {
      continue;
    }
    for (const aircraftClass of CLASS_BY_TYPE_LETTER[row.type] ?? []) {
      classes[aircraftClass].add(row.id);
    }
    if (row.name.toLowerCase().includes('glider') || GLIDER_IDS.has(row.id)) {
      classes.glider.add(row.id);
    }
    if (row.military) {
      classes.military.add(row.id);
    }
  }

  return classes;
}

/** Lazily built, read-only indices over one catalog snapshot. */
export class AircraftIndex {
  readonly rows: readonly CatalogRow[];
  private manufacturerIndex?: ManufacturerIndex;
  private classIndex?: ClassIndex;

  constructor(rows: readonly CatalogRow[]) {
    this.rows = rows;
  }

  get manufacturers(): ManufacturerIndex {
    if (!this.manufacturerIndex) {
      this.manufacturerIndex = buildManufacturerIndex(this.rows);
    }
    return this.manufacturerIndex;
  }

  get classes(): ClassIndex {
    if (!this.classIndex) {
      this.classIndex = buildClassIndex(this.rows);
    }
    return this.classIndex;
  }

  findManufacturer(key: string): ManufacturerEntry | undefined {
    return this.manufacturers.get(key);
  }
}
