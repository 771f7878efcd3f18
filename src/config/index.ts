import type { AltitudeUnit, Coordinate } from '../types/CameraContext';
import type { GeocoderProviderName } from '../sources/GeocoderAddressProvider';
import { DEFAULT_OPEN_METEO_URL } from '../sources/OpenMeteoWeatherProvider';
import { DEFAULT_OVERPASS_URL } from '../sources/OverpassPOIProvider';
import { DEFAULT_MAX_READING_AGE_MS } from '../sources/PushLocationProvider';

export type LocationSourceName = 'simulated' | 'push';

export interface AppConfig {
  port: number;
  locationSource: LocationSourceName;
  simulated: {
    coordinate: Coordinate;
    altitude: number;
  };
  maxReadingAgeMs: number;
  useMockWeather: boolean;
  useMockPOI: boolean;
  geocoder: {
    provider: GeocoderProviderName;
    apiKey: string;
  };
  weatherApiUrl: string;
  overpassApiUrl: string;
  altitudeUnit: AltitudeUnit;
}

const DEFAULT_PORT = 3000;
// Beijing city centre
const DEFAULT_SIMULATED_COORDINATE: Coordinate = { latitude: 39.9042, longitude: 116.4074 };
const DEFAULT_SIMULATED_ALTITUDE = 50;

function parseInteger(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value?.trim()) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseOption<T extends string>(value: string | undefined, options: readonly T[], fallback: T): T {
  const normalized = value?.trim().toLowerCase();
  return options.find((option) => option === normalized) ?? fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseInteger(env.PORT, DEFAULT_PORT),
    locationSource: parseOption(env.LOCATION_SOURCE, ['simulated', 'push'], 'simulated'),
    simulated: {
      coordinate: {
        latitude: parseNumber(env.SIMULATED_LATITUDE, DEFAULT_SIMULATED_COORDINATE.latitude),
        longitude: parseNumber(env.SIMULATED_LONGITUDE, DEFAULT_SIMULATED_COORDINATE.longitude),
      },
      altitude: parseNumber(env.SIMULATED_ALTITUDE, DEFAULT_SIMULATED_ALTITUDE),
    },
    maxReadingAgeMs: parseInteger(env.MAX_READING_AGE_MS, DEFAULT_MAX_READING_AGE_MS),
    useMockWeather: env.USE_MOCK_WEATHER === 'true', // Default: real weather
    useMockPOI: env.USE_MOCK_POI === 'true',
    geocoder: {
      provider: parseOption(env.GEOCODER_PROVIDER, ['openstreetmap', 'mapbox', 'google'], 'openstreetmap'),
      apiKey: env.GEOCODER_API_KEY?.trim() ?? '',
    },
    weatherApiUrl: env.WEATHER_API_URL?.trim() || DEFAULT_OPEN_METEO_URL,
    overpassApiUrl: env.OVERPASS_API_URL?.trim() || DEFAULT_OVERPASS_URL,
    altitudeUnit: parseOption(env.ALTITUDE_UNIT, ['meters', 'feet'], 'meters'),
  };
}
