import type { Coordinate, WeatherSnapshot } from '../types/CameraContext';
import type { WeatherProvider } from '../types/providers';
import { ProviderError } from '../utils/errors';
import { formatWeather } from '../utils/formatters';
import { createLogger } from '../utils/logger';
import { delay } from '../utils/timeout';

/**
 * Simulated weather for development and demos.
 * Delays are drawn from `delayRangeMs`, so with the default range some
 * requests outlive the orchestrator's weather deadline.
 */

export interface MockWeatherProviderOptions {
  /** [min, max] simulated latency */
  delayRangeMs?: [number, number];
  simulateFailures?: boolean;
  /** 0-1, only used when simulateFailures is on */
  failureProbability?: number;
  /** Source of randomness, [0, 1) */
  random?: () => number;
}

const CONDITIONS: ReadonlyArray<{ condition: string; icon: string; baseTemperature: number }> = [
  { condition: 'Sunny', icon: 'sun.max.fill', baseTemperature: 25 },
  { condition: 'Cloudy', icon: 'cloud.fill', baseTemperature: 20 },
  { condition: 'Partly Cloudy', icon: 'cloud.sun.fill', baseTemperature: 22 },
  { condition: 'Rainy', icon: 'cloud.rain.fill', baseTemperature: 18 },
  { condition: 'Windy', icon: 'wind', baseTemperature: 16 },
  { condition: 'Thunderstorms', icon: 'cloud.bolt.rain.fill', baseTemperature: 15 },
  { condition: 'Snow', icon: 'snowflake', baseTemperature: 0 },
  { condition: 'Foggy', icon: 'cloud.fog.fill', baseTemperature: 12 },
];

export class MockWeatherProvider implements WeatherProvider {
  readonly isMock = true;
  private readonly logger = createLogger({ component: 'MockWeatherProvider' });
  private readonly delayRangeMs: [number, number];
  private readonly simulateFailures: boolean;
  private readonly failureProbability: number;
  private readonly random: () => number;

  constructor(options: MockWeatherProviderOptions = {}) {
    this.delayRangeMs = options.delayRangeMs ?? [500, 4000];
    this.simulateFailures = options.simulateFailures ?? false;
    this.failureProbability = options.failureProbability ?? 0.2;
    this.random = options.random ?? Math.random;
  }

  async currentWeather(_coordinate: Coordinate, signal?: AbortSignal): Promise<WeatherSnapshot> {
    const [min, max] = this.delayRangeMs;
    const latency = Math.round(min + this.random() * (max - min));
    this.logger.debug({ latency }, 'Mock weather request started');

    await delay(latency, signal);

    if (this.simulateFailures && this.random() < this.failureProbability) {
      throw new ProviderError('mock-weather', 'Simulated network failure');
    }

    const selected = CONDITIONS[Math.floor(this.random() * CONDITIONS.length)] ?? CONDITIONS[0];
    const weather: WeatherSnapshot = {
      condition: selected.condition,
      temperature: selected.baseTemperature + (this.random() * 10 - 5),
      humidity: 40 + Math.floor(this.random() * 41),
      iconName: selected.icon,
      attributionUrl: 'https://example.com/weather/legal',
      attributionLogoUrl: 'https://example.com/weather/logo.png',
    };

    this.logger.debug({ weather: formatWeather(weather) }, 'Mock weather completed');
    return weather;
  }
}
