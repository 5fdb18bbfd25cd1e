import { Logger } from './core/Logger';
import { ConfigService } from './core/ConfigService';
import { ServiceContainer } from './core/ServiceContainer';
import { EventEmitter } from './core/EventEmitter';
import { AirportDirectory } from './services/AirportDirectory';
import { RegionClassifier } from './services/RegionClassifier';
import { CatalogService } from './services/CatalogService';
import { ChallengeParser } from './services/ChallengeParser';
import { FlightMatcher } from './services/FlightMatcher';
import { RarityService } from './services/RarityService';
import { ChallengeTracker } from './services/ChallengeTracker';
import { FlightFeedReader } from './services/FlightFeedReader';
import { formatSnapshot } from './utils/formatSnapshot';

async function main() {
  // Initialize core services
  const configService = new ConfigService();
  const config = configService.getConfig();
  const logger = new Logger({ level: config.logging.level, directory: config.logging.directory });
  const eventEmitter = new EventEmitter(logger);

  const airports = AirportDirectory.fromDefaults();
  const regions = new RegionClassifier(airports);
  const catalogService = new CatalogService(logger, configService, eventEmitter);
  const parser = new ChallengeParser(logger, airports, { eventEmitter });
  const matcher = new FlightMatcher(logger, airports, regions, eventEmitter);
  const rarity = new RarityService(logger);
  const tracker = new ChallengeTracker(logger, parser, matcher, rarity, {
    minRarity: config.tracker.minRarity
  }, eventEmitter);

  // Create service container; initialization follows registration order
  const serviceContainer = new ServiceContainer(logger);
  serviceContainer.registerSingleton('logger', logger);
  serviceContainer.registerSingleton('config', configService);
  serviceContainer.registerSingleton('eventEmitter', eventEmitter);
  serviceContainer.registerSingleton('catalog', catalogService);
  serviceContainer.registerSingleton('rarity', rarity);
  serviceContainer.registerSingleton('parser', parser);
  serviceContainer.registerSingleton('matcher', matcher);
  serviceContainer.registerSingleton('tracker', tracker);

  try {
    logger.info('Starting flight challenge engine...');

    await serviceContainer.initializeAll();

    const catalog = await catalogService.getCatalog();
    tracker.configure(catalog, config.tracker.challenges);

    const flights = await new FlightFeedReader(logger, config.feed.flightsFile).readFlights();
    const snapshot = tracker.evaluate(flights);

    logger.info(`Scanned ${snapshot.scanned} flights, ${snapshot.rareCount} with rarity >= ${config.tracker.minRarity}`);
    for (const challenge of snapshot.challenges) {
      logger.info(`Challenge ${challenge.number}: ${challenge.matchCount} matching flights`, {
        description: challenge.description
      });
    }
    for (const line of formatSnapshot(snapshot, 100)) {
      logger.info(line);
    }

    const healthStatus = await serviceContainer.checkHealth();
    logger.info('System health check completed', { healthStatus });
  } catch (error) {
    logger.error('Flight challenge engine failed', error as Error);
    process.exitCode = 1;
  } finally {
    await serviceContainer.shutdownAll();
  }
}

// Start the application
if (require.main === module) {
  main().catch((error) => {
    console.error('Unhandled error during startup:', error);
    process.exit(1);
  });
}

export { main };
export * from './types';
export { Logger } from './core/Logger';
export { ConfigService } from './core/ConfigService';
export { EventEmitter } from './core/EventEmitter';
export type { ChallengeEvents } from './core/EventEmitter';
export { ServiceContainer } from './core/ServiceContainer';
export { AirportDirectory } from './services/AirportDirectory';
export { RegionClassifier, buildRegionTable } from './services/RegionClassifier';
export { AircraftIndex, buildManufacturerIndex, buildClassIndex } from './services/AircraftIndex';
export { ChallengeParser, cleanChallengeText } from './services/ChallengeParser';
export { FlightMatcher, ROUTE_DEFINITIONS, sortByRarity } from './services/FlightMatcher';
export { RarityService, buildRarityLookup } from './services/RarityService';
export { CatalogService, parseCatalog } from './services/CatalogService';
export { FlightFeedReader } from './services/FlightFeedReader';
export { ChallengeTracker } from './services/ChallengeTracker';
export type { TrackerSnapshot, TrackedFlight } from './services/ChallengeTracker';
export { createDefaultRules } from './rules';
export type { ChallengeRule, ParseContext } from './rules';
export { editDistance } from './utils/editDistance';
export { formatSnapshot } from './utils/formatSnapshot';
