import { EventEmitter } from 'node:events';
import {
  LOCATION_DEADLINE_MS,
  SCENE_DEFAULT_MODE,
  SCENE_POI_KEYWORDS,
  WEATHER_TIMEOUT_MS,
} from '../constants';
import type {
  Address,
  AltitudeUnit,
  CacheStatus,
  CameraContext,
  LocationMode,
  LocationReading,
  POIItem,
  Scene,
  WeatherSnapshot,
} from '../types/CameraContext';
import type {
  AddressProvider,
  LocationProvider,
  POIProvider,
  WeatherProvider,
} from '../types/providers';
import { errorMessage, isFatalContextError, LocationUnavailableError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { withDeadline } from '../utils/timeout';
import { buildContext } from './ContextBuilder';
import { ContextCache } from './ContextCache';

export interface ContextOrchestratorOptions {
  location: LocationProvider;
  address: AddressProvider;
  weather: WeatherProvider;
  poi: POIProvider;
  cache?: ContextCache;
  altitudeUnit?: AltitudeUnit;
  /** Clock used for capture instants and cache checks */
  now?: () => Date;
}

export interface ContextUpdatedEvent {
  context: CameraContext;
  timestamp: Date;
}

interface WeatherOutcome {
  weather?: WeatherSnapshot;
  timedOut: boolean;
}

/**
 * Context Orchestrator
 *
 * Per call: read the location, try the single-slot cache, and on a miss
 * fan out to the address, weather and POI sources at once. Each branch
 * absorbs its own failure, so the join always sees three values and only
 * a failed location read can fail the call.
 *
 * Emits:
 * - 'context-updated' after a fresh fan-out
 * - 'cache-hit' when a cached context is reused
 * - 'cache-cleared'
 */
export class ContextOrchestrator extends EventEmitter {
  private readonly location: LocationProvider;
  private readonly address: AddressProvider;
  private readonly weather: WeatherProvider;
  private readonly poi: POIProvider;
  private readonly cache: ContextCache;
  private readonly altitudeUnit: AltitudeUnit;
  private readonly usingMockWeather: boolean;
  private readonly now: () => Date;
  private readonly logger = createLogger({ component: 'ContextOrchestrator' });

  constructor(options: ContextOrchestratorOptions) {
    super();
    this.location = options.location;
    this.address = options.address;
    this.weather = options.weather;
    this.poi = options.poi;
    this.cache = options.cache ?? new ContextCache();
    this.altitudeUnit = options.altitudeUnit ?? 'meters';
    this.usingMockWeather = options.weather.isMock === true;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Complete camera context for the current position.
   * @param mode defaults to the scene's preferred mode
   * @throws LocationUnavailableError | PermissionDeniedError | LocationTimeoutError
   */
  async fetchContext(scene: Scene, mode: LocationMode = SCENE_DEFAULT_MODE[scene]): Promise<CameraContext> {
    this.logger.debug({ scene, mode }, 'Fetching context');

    const reading = await this.readLocation(mode);

    const cached = this.cache.get(reading.coordinate, this.now());
    if (cached) {
      this.logger.debug({ timeString: cached.display.timeString }, 'Cache hit - reusing context');
      this.emit('cache-hit', { context: cached, timestamp: cached.raw.timestamp });
      return cached;
    }

    this.logger.debug('Cache miss - fetching sources');

    const capturedAt = this.now();
    const startedAt = Date.now();

    // All three start together; none of them can reject
    const [address, weatherOutcome, poiList] = await Promise.all([
      this.lookupAddress(reading),
      this.lookupWeather(reading),
      this.lookupPOI(reading, scene),
    ]);

    const context = buildContext({
      reading,
      address,
      weather: weatherOutcome.weather,
      poiList,
      capturedAt,
      weatherTimedOut: weatherOutcome.timedOut,
      scene,
      mode,
      usingMockWeather: this.usingMockWeather,
      altitudeUnit: this.altitudeUnit,
    });

    this.cache.put(reading, context);

    this.logger.info({
      scene,
      mode,
      durationMs: Date.now() - startedAt,
      hasAddress: address !== undefined,
      weatherTimedOut: weatherOutcome.timedOut,
      poiCount: poiList.length,
    }, 'Context fetched');

    const event: ContextUpdatedEvent = { context, timestamp: capturedAt };
    this.emit('context-updated', event);

    return context;
  }

  /** Watermark camera: work scene, fast fix */
  fetchWorkContext(): Promise<CameraContext> {
    return this.fetchContext('work', 'fast');
  }

  /** Travel camera: travel scene, accurate fix */
  fetchTravelContext(): Promise<CameraContext> {
    return this.fetchContext('travel', 'accurate');
  }

  /** Continuous shooting; relies on the cache for every frame after the first */
  fetchBurstContext(): Promise<CameraContext> {
    return this.fetchContext('work', 'fast');
  }

  clearCache(): void {
    this.cache.clear();
    this.logger.info('Cache cleared');
    this.emit('cache-cleared', { timestamp: this.now() });
  }

  cacheStatus(): CacheStatus {
    return this.cache.status();
  }

  private async readLocation(mode: LocationMode): Promise<LocationReading> {
    const deadlineMs = LOCATION_DEADLINE_MS[mode];
    try {
      return await this.location.currentReading(deadlineMs);
    } catch (error) {
      this.logger.error({ mode, deadlineMs, error: errorMessage(error) }, 'Location read failed');
      if (isFatalContextError(error)) {
        throw error;
      }
      throw new LocationUnavailableError(undefined, { cause: error });
    }
  }

  private async lookupAddress(reading: LocationReading): Promise<Address | undefined> {
    try {
      return await this.address.reverseGeocode(reading.coordinate);
    } catch (error) {
      this.logger.warn({ branch: 'address', error: errorMessage(error) }, 'Address lookup failed');
      return undefined;
    }
  }

  private async lookupWeather(reading: LocationReading): Promise<WeatherOutcome> {
    try {
      const weather = await withDeadline(
        (signal) => this.weather.currentWeather(reading.coordinate, signal),
        WEATHER_TIMEOUT_MS,
        'weather'
      );
      return { weather, timedOut: false };
    } catch (error) {
      this.logger.warn({ branch: 'weather', error: errorMessage(error) }, 'Weather timed out or failed');
      return { weather: undefined, timedOut: true };
    }
  }

  private async lookupPOI(reading: LocationReading, scene: Scene): Promise<POIItem[]> {
    try {
      return await this.poi.search(reading.coordinate, SCENE_POI_KEYWORDS[scene]);
    } catch (error) {
      this.logger.warn({ branch: 'poi', error: errorMessage(error) }, 'POI lookup failed');
      return [];
    }
  }
}
