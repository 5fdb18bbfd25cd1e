import { collapsedKey, punctuationKey } from '../services/AircraftIndex';
import { ChallengeType } from '../types';
import type { AircraftTypeFilter, CatalogRow, ManufacturerFilter } from '../types';
import {
  aircraftTypeFilter,
  stripAircraftSuffix,
  summarizeTypecodes,
  typecodesOf
} from './ChallengeRule';
import type { ChallengeRule, ParseContext } from './ChallengeRule';

/**
 * "Pilatus PC-12 or PC-24": each alternative is parsed on its own and the
 * type codes are merged. A bare model after the first alternative borrows the
 * first alternative's leading word.
 */
export class CompoundOrRule implements ChallengeRule {
  readonly name = 'compound-or';

  tryMatch(context: ParseContext): AircraftTypeFilter | null {
    const { text } = context;
    if (!/\s+or\s+/i.test(text) || /\bback\b/i.test(text)) {
      return null;
    }

    const parts = text.split(/\s+or\s+/i).map(part => part.trim());
    const firstWords = parts[0].split(/\s+/);
    const merged = new Set<string>();
    const descriptions: string[] = [];

    parts.forEach((rawPart, i) => {
      if (!rawPart) {
        return;
      }
      const part = i > 0 && !rawPart.includes(' ') && firstWords.length > 1
        ? `${firstWords[0]} ${rawPart}`
        : rawPart;
      // Only strictly shorter fragments are re-parsed, which bounds the recursion
      if (part.length >= text.length) {
        return;
      }

      const sub = context.reparse(`Catch a ${part}`);
      const codes = typecodesOf(sub);
      if (codes && codes.size > 0) {
        codes.forEach(code => merged.add(code));
        descriptions.push(sub.description);
      }
    });

    if (merged.size === 0) {
      return null;
    }
    return aircraftTypeFilter(context, merged, descriptions.join(' + '));
  }
}

export class ManufacturerRule implements ChallengeRule {
  readonly name = 'manufacturer';

  tryMatch(context: ParseContext): ManufacturerFilter | null {
    const candidate = stripAircraftSuffix(context.text);
    if (!candidate) {
      return null;
    }

    for (const key of [candidate.toLowerCase(), punctuationKey(candidate), collapsedKey(candidate)]) {
      const entry = key ? context.aircraft.findManufacturer(key) : undefined;
      if (entry) {
        return {
          type: ChallengeType.MANUFACTURER,
          originalText: context.originalText,
          description: `${entry.canonical} aircraft (${summarizeTypecodes(entry.typecodes)})`,
          manufacturer: entry.canonical,
          typecodes: entry.typecodes
        };
      }
    }
    return null;
  }
}

function rowMentions(row: CatalogRow, fragments: readonly string[]): boolean {
  const id = row.id.toLowerCase();
  const name = row.name.toLowerCase();
  return fragments.some(fragment => fragment.length > 0 && (id.includes(fragment) || name.includes(fragment)));
}

function withoutHyphens(text: string): string {
  return text.replace(/-/g, '');
}

/** "Boeing 747", "Airbus A380", "Cirrus SR-22" */
export class ManufacturerModelRule implements ChallengeRule {
  readonly name = 'manufacturer-model';

  tryMatch(context: ParseContext): AircraftTypeFilter | null {
    const search = stripAircraftSuffix(context.text).toLowerCase();

    for (const [key, entry] of context.aircraft.manufacturers) {
      if (!key || !search.startsWith(key) || search.length <= key.length) {
        continue;
      }
      const model = search.slice(key.length).trim();
      if (!model) {
        continue;
      }

      const fragments = [model, withoutHyphens(model)];
      const matched = new Set<string>();
      for (const row of context.aircraft.rows) {
        if (entry.typecodes.has(row.id) && rowMentions(row, fragments)) {
          matched.add(row.id);
        }
      }

      if (matched.size > 0) {
        return aircraftTypeFilter(
          context,
          matched,
          `${entry.canonical} ${model.toUpperCase()} variants (${summarizeTypecodes(matched)})`
        );
      }
    }
    return null;
  }
}

/** Any catalog row whose id or name contains the text */
export class AircraftTypeRule implements ChallengeRule {
  readonly name = 'aircraft-type';

  tryMatch(context: ParseContext): AircraftTypeFilter | null {
    const search = stripAircraftSuffix(context.text).toLowerCase();
    if (!search) {
      return null;
    }

    const fragments = [search, withoutHyphens(search)];
    const matched = new Set<string>();
    for (const row of context.aircraft.rows) {
      if (rowMentions(row, fragments)) {
        matched.add(row.id);
      }
    }

    if (matched.size === 0) {
      return null;
    }
    return aircraftTypeFilter(context, matched, `Aircraft matching '${context.text}' (${matched.size} types)`);
  }
}

/**
 * Last resort: every word longer than two characters must appear in the
 * row's name or manufacturer. Any-word matching would let one common word
 * pull in half the catalog.
 */
export class WordSearchRule implements ChallengeRule {
  readonly name = 'word-search';

  tryMatch(context: ParseContext): AircraftTypeFilter | null {
    const words = stripAircraftSuffix(context.text)
      .toLowerCase()
      .split(/\s+/)
      .filter(word => word.length > 2);
    if (words.length === 0) {
      return null;
    }

    const matched = new Set<string>();
    for (const row of context.aircraft.rows) {
      const name = row.name.toLowerCase();
      const manufacturer = row.manufacturer.toLowerCase();
      if (words.every(word => name.includes(word) || manufacturer.includes(word))) {
        matched.add(row.id);
      }
    }

    if (matched.size === 0) {
      return null;
    }
    return aircraftTypeFilter(context, matched, `Best-effort match for '${context.text}' (${matched.size} types)`);
  }
}
