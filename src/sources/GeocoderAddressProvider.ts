import NodeGeocoder, { type Entry } from 'node-geocoder';
import type { Address, Coordinate } from '../types/CameraContext';
import type { AddressProvider } from '../types/providers';
import { CameraContextError, errorMessage, NoResultError, ProviderError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { delay } from '../utils/timeout';

/**
 * Reverse geocoding through node-geocoder
 */

// =============================================================================
// Types
// =============================================================================

export type GeocoderProviderName = 'openstreetmap' | 'mapbox' | 'google';

/**
 * The part of node-geocoder's Geocoder this adapter calls
 */
export interface ReverseGeocoder {
  reverse(location: { lat: number; lon: number }): Promise<Entry[]>;
}

/**
 * Fields the OpenStreetMap and Mapbox formatters add beyond Google's shape
 */
export interface RegionalEntry extends Entry {
  state?: string;
  neighbourhood?: string;
}

export interface GeocoderAddressProviderOptions {
  /** Geocoding provider (default: openstreetmap) */
  provider?: GeocoderProviderName;
  /** API key for paid providers */
  apiKey?: string;
  /** Prebuilt geocoder; overrides provider/apiKey */
  geocoder?: ReverseGeocoder;
  /** Cache TTL in milliseconds (default: 1 hour) */
  cacheTTL?: number;
  /** Rate limit delay in ms (default: 1100 for Nominatim) */
  rateLimitDelay?: number;
}

interface CacheEntry {
  address: Address;
  timestamp: number;
}

export const DEFAULT_GEOCODE_CACHE_TTL_MS = 3_600_000;
export const DEFAULT_GEOCODE_RATE_LIMIT_MS = 1100;

function createGeocoder(provider: GeocoderProviderName, apiKey: string): ReverseGeocoder {
  if (provider === 'google' && apiKey) {
    return NodeGeocoder({ provider: 'google', apiKey });
  }
  if (provider === 'mapbox' && apiKey) {
    return NodeGeocoder({ provider: 'mapbox', apiKey });
  }
  // Nominatim needs no key
  return NodeGeocoder({ provider: 'openstreetmap' });
}

const clean = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * Map a node-geocoder entry onto the address model
 */
export function toAddress(entry: RegionalEntry): Address {
  const locality = clean(entry.city);
  const thoroughfare = clean(entry.streetName);
  const subThoroughfare = clean(entry.streetNumber);
  const establishment = clean(entry.extra?.establishment);
  const administrativeArea = clean(entry.administrativeLevels?.level1long) ?? clean(entry.state);

  const formattedAddress =
    clean(entry.formattedAddress) ??
    [subThoroughfare, thoroughfare, locality, administrativeArea, clean(entry.country)]
      .filter((part): part is string => part !== undefined)
      .join(', ');

  return {
    formattedAddress,
    country: clean(entry.country),
    countryCode: clean(entry.countryCode),
    administrativeArea,
    subAdministrativeArea: clean(entry.administrativeLevels?.level2long),
    locality,
    subLocality: clean(entry.extra?.neighborhood) ?? clean(entry.neighbourhood),
    thoroughfare,
    subThoroughfare,
    postalCode: clean(entry.zipcode),
    areasOfInterest: establishment ? [establishment] : undefined,
    name: establishment ?? (thoroughfare && subThoroughfare ? `${subThoroughfare} ${thoroughfare}` : undefined),
  };
}

// =============================================================================
// Provider
// =============================================================================

/**
 * Key on the coordinate rounded to 5 decimals (about 1 m)
 */
export function geocodeCacheKey(coordinate: Coordinate): string {
  return `${coordinate.latitude.toFixed(5)},${coordinate.longitude.toFixed(5)}`;
}

export class GeocoderAddressProvider implements AddressProvider {
  private readonly logger = createLogger({ component: 'GeocoderAddressProvider' });
  private readonly geocoder: ReverseGeocoder;
  private readonly cacheTTL: number;
  private readonly rateLimitDelay: number;
  private readonly cache = new Map<string, CacheEntry>();
  private readonly pendingRequests = new Map<string, Promise<Address>>();
  private lastRequestTime = 0;

  // One request per rateLimitDelay across all callers
  private readonly requestQueue: Array<() => void> = [];
  private isProcessingQueue = false;

  constructor(options: GeocoderAddressProviderOptions = {}) {
    const provider = options.provider ?? 'openstreetmap';
    this.geocoder = options.geocoder ?? createGeocoder(provider, options.apiKey ?? '');
    this.cacheTTL = options.cacheTTL ?? DEFAULT_GEOCODE_CACHE_TTL_MS;
    this.rateLimitDelay = options.rateLimitDelay ?? DEFAULT_GEOCODE_RATE_LIMIT_MS;
    this.logger.info({ provider: options.geocoder ? 'custom' : provider }, 'Address provider initialized');
  }

  async reverseGeocode(coordinate: Coordinate): Promise<Address> {
    const cacheKey = geocodeCacheKey(coordinate);

    const cached = this.cache.get(cacheKey);
    if (cached && Date.now() - cached.timestamp < this.cacheTTL) {
      this.logger.debug({ cacheKey, cached: true }, 'Cache hit');
      return cached.address;
    }
    if (cached) {
      this.cache.delete(cacheKey);
    }

    const pending = this.pendingRequests.get(cacheKey);
    if (pending) {
      return pending;
    }

    const request = this.doReverseGeocode(coordinate, cacheKey);
    this.pendingRequests.set(cacheKey, request);

    try {
      return await request;
    } finally {
      this.pendingRequests.delete(cacheKey);
    }
  }

  private async doReverseGeocode(coordinate: Coordinate, cacheKey: string): Promise<Address> {
    await this.waitForRateLimit();

    let entries: RegionalEntry[];

    try {
      entries = await this.geocoder.reverse({ lat: coordinate.latitude, lon: coordinate.longitude });
    } catch (error) {
      if (error instanceof CameraContextError) {
        throw error;
      }
      this.logger.error({ error: errorMessage(error) }, 'Reverse geocoding failed');
      throw new ProviderError('geocoder', `Reverse geocoding failed: ${errorMessage(error)}`, { cause: error });
    }

    const first = entries[0];
    if (!first) {
      throw new NoResultError();
    }

    const address = toAddress(first);
    this.cache.set(cacheKey, { address, timestamp: Date.now() });
    this.logger.debug({ locality: address.locality, thoroughfare: address.thoroughfare }, 'Address resolved');
    return address;
  }

  private waitForRateLimit(): Promise<void> {
    return new Promise((resolve) => {
      this.requestQueue.push(resolve);
      void this.processQueue();
    });
  }

  private async processQueue(): Promise<void> {
    if (this.isProcessingQueue) return;
    this.isProcessingQueue = true;

    while (this.requestQueue.length > 0) {
      const sinceLastRequest = Date.now() - this.lastRequestTime;
      if (sinceLastRequest < this.rateLimitDelay) {
        await delay(this.rateLimitDelay - sinceLastRequest);
      }

      this.lastRequestTime = Date.now();
      this.requestQueue.shift()?.();
    }

    this.isProcessingQueue = false;
  }
}
