import type {
  Address,
  Coordinate,
  LocationReading,
  POIItem,
  WeatherSnapshot,
} from '../../types/CameraContext';
import type {
  AddressProvider,
  LocationProvider,
  POIProvider,
  WeatherProvider,
} from '../../types/providers';
import { delay } from '../../utils/timeout';

export const BEIJING: Coordinate = { latitude: 39.9042, longitude: 116.4074 };

// ~11.1 m north of BEIJING
export const NEARBY: Coordinate = { latitude: 39.9043, longitude: 116.4074 };

// ~22.2 m north of BEIJING
export const ACROSS_THE_STREET: Coordinate = { latitude: 39.9044, longitude: 116.4074 };

export function makeReading(coordinate: Coordinate = BEIJING, altitude = 50): LocationReading {
  return {
    coordinate,
    altitude,
    horizontalAccuracy: 5,
    verticalAccuracy: 3,
    timestamp: new Date(),
  };
}

export const TEST_ADDRESS: Address = {
  formattedAddress: '1 Jianguo Road, Chaoyang, Beijing, China',
  country: 'China',
  administrativeArea: 'Beijing',
  locality: 'Beijing',
  subLocality: 'Chaoyang',
  thoroughfare: 'Jianguo Road',
  subThoroughfare: '1',
};

export const TEST_WEATHER: WeatherSnapshot = {
  condition: 'Sunny',
  temperature: 25.6,
  humidity: 40,
  iconName: 'sun.max.fill',
};

export const TEST_POIS: POIItem[] = [
  { id: 'poi-1', name: 'Test Office Tower', category: 'Office', distance: 40 },
  { id: 'poi-2', name: 'Test Business Center', category: 'Business', distance: 90 },
];

// ===== Stub providers =====

export class StubLocationProvider implements LocationProvider {
  readonly deadlines: number[] = [];
  private readonly queue: Coordinate[];
  private last: Coordinate;
  failure?: Error;

  constructor(...coordinates: Coordinate[]) {
    this.queue = coordinates.length > 0 ? coordinates : [BEIJING];
    this.last = this.queue[0];
  }

  async currentReading(deadlineMs: number): Promise<LocationReading> {
    this.deadlines.push(deadlineMs);
    if (this.failure) {
      throw this.failure;
    }
    // Hands out coordinates in order, then repeats the last one
    this.last = this.queue.shift() ?? this.last;
    return makeReading(this.last);
  }
}

export class StubAddressProvider implements AddressProvider {
  calls = 0;

  constructor(
    private readonly result: Address | Error = TEST_ADDRESS,
    private readonly delayMs = 0
  ) {}

  async reverseGeocode(): Promise<Address> {
    this.calls++;
    if (this.delayMs > 0) {
      await delay(this.delayMs);
    }
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

export type WeatherBehaviour =
  | { kind: 'resolve'; weather: WeatherSnapshot; delayMs?: number }
  | { kind: 'reject'; error: Error }
  // Settles only when aborted
  | { kind: 'hang' }
  // Resolves after delayMs whatever happens to the signal
  | { kind: 'late'; weather: WeatherSnapshot; delayMs: number };

export class StubWeatherProvider implements WeatherProvider {
  calls = 0;
  signals: AbortSignal[] = [];

  constructor(
    private readonly behaviour: WeatherBehaviour = { kind: 'resolve', weather: TEST_WEATHER },
    readonly isMock = false
  ) {}

  async currentWeather(_coordinate: Coordinate, signal?: AbortSignal): Promise<WeatherSnapshot> {
    this.calls++;
    if (signal) {
      this.signals.push(signal);
    }

    switch (this.behaviour.kind) {
      case 'resolve':
        if (this.behaviour.delayMs) {
          await delay(this.behaviour.delayMs, signal);
        }
        return this.behaviour.weather;
      case 'reject':
        throw this.behaviour.error;
      case 'hang':
        return new Promise<WeatherSnapshot>((_, reject) => {
          const abortSignal = signal;
          if (abortSignal) {
            abortSignal.addEventListener('abort', () => reject(abortSignal.reason), { once: true });
          }
        });
      case 'late':
        await delay(this.behaviour.delayMs);
        return this.behaviour.weather;
    }
  }
}

export class StubPOIProvider implements POIProvider {
  calls = 0;
  keywords: (readonly string[])[] = [];

  constructor(private readonly result: POIItem[] | Error = TEST_POIS) {}

  async search(_coordinate: Coordinate, keywords: readonly string[]): Promise<POIItem[]> {
    this.calls++;
    this.keywords.push(keywords);
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}
