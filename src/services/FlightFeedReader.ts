import { promises as fs } from 'fs';
import Joi from 'joi';
import type { IFlightSource } from '../interfaces/IChallengeServices';
import type { ILogger } from '../interfaces/IService';
import type { LiveFlight } from '../types';

const code = () => Joi.string().allow('').empty(null).uppercase().trim().default('');
const coordinate = (limit: number) => Joi.number().min(-limit).max(limit).allow(null).default(null);

export const liveFlightSchema = Joi.object<LiveFlight>({
  flightId: Joi.alternatives().try(Joi.string(), Joi.number().cast('string')).required(),
  callsign: Joi.string().allow('').empty(null).default(''),
  registration: Joi.string().allow('').empty(null).default(''),
  origin: code(),
  destination: code(),
  typecode: code(),
  latitude: coordinate(90),
  longitude: coordinate(180),
  altitude: Joi.number().empty(null).default(0),
  groundSpeed: Joi.number().empty(null).default(0)
});

/**
 * Reads a snapshot of live flights from a JSON array on disk. Records that
 * fail validation are skipped and counted.
 */
export class FlightFeedReader implements IFlightSource {
  private logger: ILogger;
  private filePath: string;

  constructor(logger: ILogger, filePath: string) {
    this.logger = logger;
    this.filePath = filePath;
  }

  async readFlights(): Promise<LiveFlight[]> {
    let payload: unknown;
    try {
      payload = JSON.parse(await fs.readFile(this.filePath, 'utf8'));
    } catch (error) {
      this.logger.error('Failed to read flight snapshot', error as Error, { filePath: this.filePath });
      throw error;
    }

    if (!Array.isArray(payload)) {
      throw new Error(`Flight snapshot ${this.filePath} must contain a JSON array`);
    }

    const flights: LiveFlight[] = [];
    let rejected = 0;
    for (const record of payload) {
      const result = liveFlightSchema.validate(record, { stripUnknown: true });
      if (result.error) {
        rejected++;
        this.logger.debug('Skipping invalid flight record', { reason: result.error.message });
        continue;
      }
      flights.push(result.value);
    }

    if (rejected > 0) {
      this.logger.warn('Some flight records were rejected', { rejected, accepted: flights.length });
    }
    this.logger.info('Flight snapshot loaded', { filePath: this.filePath, flights: flights.length });
    return flights;
  }
}
