import {
  AircraftTypeRule,
  CompoundOrRule,
  ManufacturerModelRule,
  ManufacturerRule,
  WordSearchRule
} from './AircraftRules';
import { AircraftClassRule, RarityTierRule } from './CategoryRules';
import type { ChallengeRule } from './ChallengeRule';
import { AirportPairRule, AirportRule, LatitudeRegionRule, RouteRule } from './LocationRules';

export * from './AircraftRules';
export * from './CategoryRules';
export * from './ChallengeRule';
export * from './LocationRules';

/**
 * Precedence order. Specific location phrases come before the looser aircraft
 * rules so that e.g. "transpacific" is never read as a manufacturer prefix.
 */
export function createDefaultRules(): readonly ChallengeRule[] {
  return [
    new RouteRule(),
    new LatitudeRegionRule(),
    new AirportPairRule(),
    new AirportRule(),
    new RarityTierRule(),
    new AircraftClassRule(),
    new CompoundOrRule(),
    new ManufacturerRule(),
    new ManufacturerModelRule(),
    new AircraftTypeRule(),
    new WordSearchRule()
  ];
}
