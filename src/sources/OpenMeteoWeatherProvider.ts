import axios, { type AxiosInstance } from 'axios';
import type { Coordinate, WeatherSnapshot } from '../types/CameraContext';
import type { WeatherProvider } from '../types/providers';
import { ProviderError, UnauthorizedError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import weatherCodes from './data/wmo-weather-codes.json';

/**
 * Current weather from Open-Meteo
 * https://open-meteo.com/en/docs
 */

// =============================================================================
// Types
// =============================================================================

interface OpenMeteoCurrent {
  time: string;
  temperature_2m: number;
  relative_humidity_2m: number;
  weather_code: number;
}

interface OpenMeteoResponse {
  latitude: number;
  longitude: number;
  current?: OpenMeteoCurrent;
}

interface WeatherCodeEntry {
  condition: string;
  icon: string;
}

export interface OpenMeteoWeatherProviderOptions {
  baseUrl?: string;
  attributionUrl?: string;
  /** Request timeout; the orchestrator's own deadline is shorter */
  timeoutMs?: number;
  http?: AxiosInstance;
}

const WEATHER_CODES: Record<string, WeatherCodeEntry> = weatherCodes;
const UNKNOWN_CONDITION: WeatherCodeEntry = { condition: 'Unknown', icon: 'questionmark' };

export const DEFAULT_OPEN_METEO_URL = 'https://api.open-meteo.com/v1/forecast';
const DEFAULT_ATTRIBUTION_URL = 'https://open-meteo.com/';

export function describeWeatherCode(code: number): WeatherCodeEntry {
  return WEATHER_CODES[String(code)] ?? UNKNOWN_CONDITION;
}

// =============================================================================
// Open-Meteo Provider
// =============================================================================

export class OpenMeteoWeatherProvider implements WeatherProvider {
  readonly isMock = false;
  private readonly logger = createLogger({ component: 'OpenMeteoWeatherProvider' });
  private readonly baseUrl: string;
  private readonly attributionUrl: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;

  constructor(options: OpenMeteoWeatherProviderOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_OPEN_METEO_URL;
    this.attributionUrl = options.attributionUrl ?? DEFAULT_ATTRIBUTION_URL;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.http = options.http ?? axios.create();
  }

  async currentWeather(coordinate: Coordinate, signal?: AbortSignal): Promise<WeatherSnapshot> {
    let data: OpenMeteoResponse;

    try {
      const response = await this.http.get<OpenMeteoResponse>(this.baseUrl, {
        params: {
          latitude: coordinate.latitude,
          longitude: coordinate.longitude,
          current: 'temperature_2m,relative_humidity_2m,weather_code',
        },
        timeout: this.timeoutMs,
        signal,
      });
      data = response.data;
    } catch (error) {
      if (signal?.aborted) {
        // Deadline already decided the outcome
        throw signal.reason;
      }
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        this.logger.error({ error: error.message, status }, 'Error fetching weather');
        if (status === 401 || status === 403) {
          throw new UnauthorizedError('open-meteo', { cause: error });
        }
        throw new ProviderError('open-meteo', `Weather request failed: ${error.message}`, { cause: error });
      }
      throw new ProviderError('open-meteo', 'Weather request failed', { cause: error });
    }

    const current = data.current;
    if (!current || !Number.isFinite(current.temperature_2m)) {
      throw new ProviderError('open-meteo', 'Weather response has no current conditions');
    }

    const { condition, icon } = describeWeatherCode(current.weather_code);

    this.logger.debug({
      condition,
      temperature: current.temperature_2m,
      humidity: current.relative_humidity_2m,
    }, 'Weather fetched');

    return {
      condition,
      temperature: current.temperature_2m,
      humidity: Math.round(current.relative_humidity_2m),
      iconName: icon,
      attributionUrl: this.attributionUrl,
    };
  }
}
