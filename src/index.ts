// Load environment variables before anything reads them
import 'dotenv/config';
import { createServer } from './api/server';
import { loadConfig, type AppConfig } from './config';
import { ContextOrchestrator } from './services/ContextOrchestrator';
import { GeocoderAddressProvider } from './sources/GeocoderAddressProvider';
import { MockPOIProvider } from './sources/MockPOIProvider';
import { MockWeatherProvider } from './sources/MockWeatherProvider';
import { OpenMeteoWeatherProvider } from './sources/OpenMeteoWeatherProvider';
import { OverpassPOIProvider } from './sources/OverpassPOIProvider';
import { PushLocationProvider } from './sources/PushLocationProvider';
import { SimulatedLocationProvider } from './sources/SimulatedLocationProvider';
import type { LocationProvider, POIProvider, WeatherProvider } from './types/providers';
import { logger } from './utils/logger';

function createWeatherProvider(config: AppConfig): WeatherProvider {
  if (config.useMockWeather) {
    logger.info('🌤️  Using mock weather');
    return new MockWeatherProvider();
  }
  return new OpenMeteoWeatherProvider({ baseUrl: config.weatherApiUrl });
}

function createPOIProvider(config: AppConfig): POIProvider {
  if (config.useMockPOI) {
    logger.info('📍 Using mock POI data');
    return new MockPOIProvider();
  }
  return new OverpassPOIProvider({ baseUrl: config.overpassApiUrl });
}

function main(): void {
  const config = loadConfig();

  logger.info('🚀 Starting camera context service...');

  let locationFeed: PushLocationProvider | undefined;
  let location: LocationProvider;

  if (config.locationSource === 'push') {
    logger.info('📡 Location source: client push (POST /api/location)');
    locationFeed = new PushLocationProvider({ maxReadingAgeMs: config.maxReadingAgeMs });
    location = locationFeed;
  } else {
    logger.info({ coordinate: config.simulated.coordinate }, '🧭 Location source: simulated');
    location = new SimulatedLocationProvider({
      coordinate: config.simulated.coordinate,
      altitude: config.simulated.altitude,
    });
  }

  const orchestrator = new ContextOrchestrator({
    location,
    address: new GeocoderAddressProvider(config.geocoder),
    weather: createWeatherProvider(config),
    poi: createPOIProvider(config),
    altitudeUnit: config.altitudeUnit,
  });

  const app = createServer(orchestrator, { locationFeed });

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, `✅ Server running on http://localhost:${config.port}`);
    logger.info('📊 API endpoints:');
    logger.info('   GET  /health                   - Health check');
    logger.info('   GET  /api/scenes               - Available scenes');
    logger.info('   GET  /api/context?scene&mode   - Camera context for the current position');
    logger.info('   POST /api/location             - Push a location fix (push mode)');
    logger.info('   GET  /api/cache/status         - Cache status');
    logger.info('   POST /api/cache/clear          - Clear cache');
    logger.info('   GET  /api/stream               - Real-time SSE stream 📡');
  });

  // Graceful shutdown
  const shutdown = () => {
    logger.info('🛑 Shutting down gracefully...');
    locationFeed?.close();
    server.close(() => {
      logger.info('✅ Server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main();
