import type {
  Address,
  Coordinate,
  LocationReading,
  POIItem,
  WeatherSnapshot,
} from './CameraContext';

/**
 * Narrow async contracts for the external collaborators.
 * Real and mock adapters under src/sources implement these,
 * so the orchestrator can be built with any mix of them.
 */

export interface LocationProvider {
  /**
   * Resolve the device's current reading.
   * The provider owns the deadline; the orchestrator only passes it on.
   * Rejects with LocationUnavailableError, PermissionDeniedError or LocationTimeoutError.
   */
  currentReading(deadlineMs: number): Promise<LocationReading>;
}

export interface AddressProvider {
  /** Rejects with NoResultError or ProviderError */
  reverseGeocode(coordinate: Coordinate): Promise<Address>;
}

export interface WeatherProvider {
  /** True for simulated weather; surfaced as `usingMockWeather` */
  readonly isMock?: boolean;

  /**
   * Rejects with ProviderError or UnauthorizedError.
   * Implementations should stop work once `signal` aborts.
   */
  currentWeather(coordinate: Coordinate, signal?: AbortSignal): Promise<WeatherSnapshot>;
}

export interface POIProvider {
  /** Should resolve to an empty list rather than reject */
  search(coordinate: Coordinate, keywords: readonly string[]): Promise<POIItem[]>;
}
