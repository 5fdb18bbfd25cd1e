import type { AirportDirectory } from '../services/AirportDirectory';
import type { AircraftIndex } from '../services/AircraftIndex';
import { ChallengeType } from '../types';
import type { AircraftTypeFilter, ChallengeFilter } from '../types';

export interface ParseContext {
  /** Input as given, trimmed */
  originalText: string;
  /** Input with the leading "Catch a/an" removed */
  text: string;
  airports: AirportDirectory;
  aircraft: AircraftIndex;
  /** Parse a sub-challenge against the same catalog */
  reparse(text: string): ChallengeFilter;
}

export interface ChallengeRule {
  readonly name: string;
  tryMatch(context: ParseContext): ChallengeFilter | null;
}

const AIRCRAFT_SUFFIX = /\s*(?:aircraft|plane|airplane|aeroplane)s?\s*$/i;

export function stripAircraftSuffix(text: string): string {
  return text.replace(AIRCRAFT_SUFFIX, '').trim();
}

/** "3 types: A320, A321, A332" with at most eight codes listed */
export function summarizeTypecodes(codes: ReadonlySet<string>): string {
  const sorted = Array.from(codes).sort();
  const listed = sorted.slice(0, 8).join(', ');
  return `${codes.size} types: ${listed}${codes.size > 8 ? '...' : ''}`;
}

export function typecodesOf(filter: ChallengeFilter): ReadonlySet<string> | undefined {
  switch (filter.type) {
    case ChallengeType.MANUFACTURER:
    case ChallengeType.AIRCRAFT_TYPE:
    case ChallengeType.AIRCRAFT_CLASS:
      return filter.typecodes;
    default:
      return undefined;
  }
}

export function aircraftTypeFilter(
  context: ParseContext,
  typecodes: ReadonlySet<string>,
  description: string
): AircraftTypeFilter {
  return {
    type: ChallengeType.AIRCRAFT_TYPE,
    originalText: context.originalText,
    description,
    typecodes
  };
}
