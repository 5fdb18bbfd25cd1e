import type { IService, ILogger } from '../interfaces/IService';
import type { IChallengeParser } from '../interfaces/IChallengeServices';
import type { EventEmitter } from '../core/EventEmitter';
import { createDefaultRules } from '../rules';
import type { ChallengeRule, ParseContext } from '../rules';
import { ChallengeType } from '../types';
import type { AircraftTypeFilter, CatalogRow, ChallengeFilter } from '../types';
import { AircraftIndex } from './AircraftIndex';
import type { AirportDirectory } from './AirportDirectory';

export interface ParseResult {
  filter: ChallengeFilter;
  /** Name of the rule that produced the filter, or "unresolved" */
  rule: string;
}

export interface ChallengeParserOptions {
  eventEmitter?: EventEmitter;
  rules?: readonly ChallengeRule[];
}

export const UNRESOLVED_RULE = 'unresolved';

export function cleanChallengeText(text: string): string {
  return text.trim().replace(/^catch\s+(?:a|an)\s+/i, '').trim();
}

/**
 * Cascading classifier from challenge text to a typed filter. The first rule
 * that returns a filter wins; text nothing recognises becomes an aircraft-type
 * filter that matches no flights.
 */
export class ChallengeParser implements IService, IChallengeParser {
  private logger: ILogger;
  private airports: AirportDirectory;
  private eventEmitter?: EventEmitter;
  private rules: readonly ChallengeRule[];
  private indexCache = new WeakMap<readonly CatalogRow[], AircraftIndex>();

  constructor(logger: ILogger, airports: AirportDirectory, options: ChallengeParserOptions = {}) {
    this.logger = logger;
    this.airports = airports;
    this.eventEmitter = options.eventEmitter;
    this.rules = options.rules ?? createDefaultRules();
  }

  async initialize(): Promise<void> {
    this.logger.info('Challenge parser initialized', {
      rules: this.rules.map(rule => rule.name)
    });
  }

  async shutdown(): Promise<void> {
    this.indexCache = new WeakMap();
    this.logger.info('Challenge parser shutdown completed');
  }

  async isHealthy(): Promise<boolean> {
    return this.rules.length > 0;
  }

  parse(text: string, rows: readonly CatalogRow[]): ChallengeFilter {
    return this.classify(text, rows).filter;
  }

  parseMany(texts: readonly string[], rows: readonly CatalogRow[]): ChallengeFilter[] {
    return texts.map(text => this.parse(text, rows));
  }

  classify(text: string, rows: readonly CatalogRow[]): ParseResult {
    const result = this.classifyWithIndex(text, this.indexFor(rows));

    this.logger.debug('Challenge parsed', {
      text,
      rule: result.rule,
      challengeType: result.filter.type,
      description: result.filter.description
    });
    this.eventEmitter?.emit('challenge:parsed', { text, filter: result.filter, rule: result.rule });

    return result;
  }

  private classifyWithIndex(text: string, aircraft: AircraftIndex): ParseResult {
    const originalText = text.trim();
    const cleaned = cleanChallengeText(originalText);

    if (cleaned) {
      const context: ParseContext = {
        originalText,
        text: cleaned,
        airports: this.airports,
        aircraft,
        reparse: subText => this.classifyWithIndex(subText, aircraft).filter
      };

      for (const rule of this.rules) {
        const filter = rule.tryMatch(context);
        if (filter) {
          return { filter, rule: rule.name };
        }
      }
    }

    return { filter: this.unresolved(originalText, cleaned), rule: UNRESOLVED_RULE };
  }

  private unresolved(originalText: string, cleaned: string): AircraftTypeFilter {
    return {
      type: ChallengeType.AIRCRAFT_TYPE,
      originalText,
      description: `Could not parse: '${cleaned}' (no matching aircraft found)`,
      typecodes: new Set<string>()
    };
  }

  // The catalog changes rarely, so indices are kept per row array
  private indexFor(rows: readonly CatalogRow[]): AircraftIndex {
    let index = this.indexCache.get(rows);
    if (!index) {
      index = new AircraftIndex(rows);
      this.indexCache.set(rows, index);
    }
    return index;
  }
}
