import { AIRCRAFT_CLASSES, ChallengeType, RARITY_TIERS } from '../types';
import type { AircraftClassFilter, RarityTierFilter } from '../types';
import type { ChallengeRule, ParseContext } from './ChallengeRule';

const TIER_PATTERN = new RegExp(`\\b(${RARITY_TIERS.join('|')})\\b`, 'i');
const CLASS_PATTERN = new RegExp(`\\b(${AIRCRAFT_CLASSES.join('|')})\\b`, 'i');

export class RarityTierRule implements ChallengeRule {
  readonly name = 'rarity-tier';

  tryMatch(context: ParseContext): RarityTierFilter | null {
    const word = TIER_PATTERN.exec(context.text)?.[1].toLowerCase();
    const tier = RARITY_TIERS.find(candidate => candidate.toLowerCase() === word);
    if (!tier) {
      return null;
    }

    return {
      type: ChallengeType.RARITY_TIER,
      originalText: context.originalText,
      description: `${tier} tier aircraft`,
      tier
    };
  }
}

export class AircraftClassRule implements ChallengeRule {
  readonly name = 'aircraft-class';

  tryMatch(context: ParseContext): AircraftClassFilter | null {
    const word = CLASS_PATTERN.exec(context.text)?.[1].toLowerCase();
    const aircraftClass = AIRCRAFT_CLASSES.find(candidate => candidate === word);
    if (!aircraftClass) {
      return null;
    }

    const typecodes = context.aircraft.classes[aircraftClass];
    const title = aircraftClass.charAt(0).toUpperCase() + aircraftClass.slice(1);
    return {
      type: ChallengeType.AIRCRAFT_CLASS,
      originalText: context.originalText,
      description: `${title} aircraft (${typecodes.size} types)`,
      aircraftClass,
      typecodes
    };
  }
}
