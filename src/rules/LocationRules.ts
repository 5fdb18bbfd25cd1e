import { ChallengeType } from '../types';
import type { AirportFilter, AirportPairFilter, LatitudeRegionFilter, RouteFilter, RouteName } from '../types';
import type { ChallengeRule, ParseContext } from './ChallengeRule';

export class RouteRule implements ChallengeRule {
  readonly name = 'route';

  tryMatch(context: ParseContext): RouteFilter | null {
    const match = /(transpacific|transatlantic)/i.exec(context.text);
    if (!match) {
      return null;
    }

    const routeName: RouteName = match[1].toLowerCase() === 'transpacific' ? 'transpacific' : 'transatlantic';
    return {
      type: ChallengeType.ROUTE,
      originalText: context.originalText,
      description: `Flights on ${routeName} routes`,
      routeName
    };
  }
}

interface LatitudeBound {
  minLat?: number;
  maxLat?: number;
  label: string;
}

interface LatitudeLandmark {
  keys: readonly string[];
  bound(northCue: boolean): LatitudeBound;
}

function directional(latitude: number, name: string): (northCue: boolean) => LatitudeBound {
  return northCue => northCue
    ? { minLat: latitude, label: `north of ${name}` }
    : { maxLat: latitude, label: `south of ${name}` };
}

// "antarctic circle" contains "arctic circle", so the southern keys go first
const LATITUDE_LANDMARKS: readonly LatitudeLandmark[] = [
  {
    keys: ['antarctic circle', 'antartic circle'],
    bound: () => ({ maxLat: -66.5, label: 'south of the Antarctic Circle (below 66.5S)' })
  },
  {
    keys: ['arctic circle', 'artic circle'],
    bound: () => ({ minLat: 66.5, label: 'north of the Arctic Circle (above 66.5N)' })
  },
  { keys: ['equator'], bound: directional(0, 'the Equator') },
  { keys: ['tropic of cancer'], bound: directional(23.4, 'the Tropic of Cancer') },
  { keys: ['tropic of capricorn'], bound: directional(-23.4, 'the Tropic of Capricorn') }
];

/**
 * Latitude landmarks. The equator and tropics read "north of" from the text
 * and otherwise mean "south of".
 */
export class LatitudeRegionRule implements ChallengeRule {
  readonly name = 'latitude-region';

  tryMatch(context: ParseContext): LatitudeRegionFilter | null {
    const lower = context.text.toLowerCase();
    const landmark = LATITUDE_LANDMARKS.find(candidate => candidate.keys.some(key => lower.includes(key)));
    if (!landmark) {
      return null;
    }

    const { minLat, maxLat, label } = landmark.bound(/north\s+of/i.test(context.text));
    const filter: LatitudeRegionFilter = {
      type: ChallengeType.LATITUDE_REGION,
      originalText: context.originalText,
      description: `Flights ${label}`
    };
    if (minLat !== undefined) {
      filter.minLat = minLat;
    }
    if (maxLat !== undefined) {
      filter.maxLat = maxLat;
    }
    return filter;
  }
}

const FROM_TO_PATTERN = /(?:flight\s+)?(?:going\s+)?\bfrom\s+(.+?)\s+to\s+(.+?)(?:\s+or\s+back)?(?:\s+airport)?\.?$/i;

/** "Flight from London to New York or back" */
export class AirportPairRule implements ChallengeRule {
  readonly name = 'airport-pair';

  tryMatch(context: ParseContext): AirportPairFilter | null {
    const match = FROM_TO_PATTERN.exec(context.text);
    if (!match) {
      return null;
    }

    const cityA = match[1].trim();
    const cityB = match[2].trim();
    const originCodes = context.airports.resolveCityAirports(cityA);
    const destinationCodes = context.airports.resolveCityAirports(cityB);
    if (originCodes.size === 0 || destinationCodes.size === 0) {
      return null;
    }

    return {
      type: ChallengeType.AIRPORT_PAIR,
      originalText: context.originalText,
      description: `Flights from ${cityA} to ${cityB} or back`,
      originCodes,
      destinationCodes
    };
  }
}

const TO_OR_FROM_PATTERN =
  /(?:flight\s+)?(?:going\s+)?\b(?:to|from)\s+(?:or\s+(?:to|from)\s+)?(.+?)(?:\s+airport)?(?:\s+in\s+the\s+world)?\.?$/i;

/**
 * "Flight going to or from X or Y". Parenthesised names take precedence, as in
 * "the northernmost (Longyearbyen) or southernmost (Ushuaia) airport".
 */
export class AirportRule implements ChallengeRule {
  readonly name = 'airport';

  tryMatch(context: ParseContext): AirportFilter | null {
    const match = TO_OR_FROM_PATTERN.exec(context.text);
    if (!match) {
      return null;
    }

    const airportText = match[1];
    const parenthesised = Array.from(airportText.matchAll(/\(([^)]+)\)/g), groups => groups[1]);
    const names = parenthesised.length > 0 ? parenthesised : airportText.split(/\s+or\s+/i);

    const airportCodes = new Set<string>();
    const unresolvedNames: string[] = [];
    const labels: string[] = [];

    for (const rawName of names) {
      const name = rawName.trim().replace(/\.+$/, '');
      if (!name) {
        continue;
      }
      const code = context.airports.resolveAirport(name);
      if (code) {
        airportCodes.add(code);
        labels.push(`${name} (${code})`);
      } else {
        unresolvedNames.push(name);
        labels.push(`${name} (unresolved)`);
      }
    }

    if (airportCodes.size === 0) {
      return null;
    }

    return {
      type: ChallengeType.AIRPORT,
      originalText: context.originalText,
      description: `Flights to/from ${labels.join(', ')}`,
      airportCodes,
      unresolvedNames
    };
  }
}
