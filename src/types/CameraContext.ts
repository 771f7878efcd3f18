/**
 * Core types for camera location context
 * Provider agnostic: every adapter maps its own payloads into these shapes
 */

export type Scene = 'work' | 'travel';

export type LocationMode = 'fast' | 'accurate';

export type AltitudeUnit = 'meters' | 'feet';

export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

export interface LocationReading {
  readonly coordinate: Coordinate;
  readonly altitude: number; // meters
  readonly horizontalAccuracy: number; // meters
  readonly verticalAccuracy: number; // meters
  readonly timestamp: Date;
  readonly speed?: number; // m/s
  readonly course?: number; // degrees
}

export interface Address {
  readonly formattedAddress: string;
  readonly country?: string;
  readonly countryCode?: string;
  readonly administrativeArea?: string;
  readonly subAdministrativeArea?: string;
  readonly locality?: string;
  readonly subLocality?: string;
  readonly thoroughfare?: string;
  readonly subThoroughfare?: string;
  readonly postalCode?: string;
  readonly areasOfInterest?: readonly string[];
  readonly name?: string;
}

export interface WeatherSnapshot {
  readonly condition: string;
  readonly temperature: number; // °C
  readonly humidity: number; // 0-100
  readonly iconName: string;
  /** Legal attribution page, passed through for display */
  readonly attributionUrl?: string;
  readonly attributionLogoUrl?: string;
}

export interface POIItem {
  readonly id: string;
  readonly name: string;
  readonly category: string;
  readonly distance: number; // meters from the reference location
  readonly coordinate?: Coordinate;
}

export interface NearbyPlace {
  readonly id: string;
  readonly name: string;
  readonly category: string;
  readonly distanceString: string;
}

export interface ContextDisplay {
  readonly title: string;
  readonly subtitle: string;
  readonly weatherString: string;
  readonly timeString: string;
  readonly altitudeString: string;
  readonly coordinateString: string;
  /** raw.poiList in the same order, with display distances */
  readonly nearby: readonly NearbyPlace[];
}

export interface ContextRaw {
  readonly reading: LocationReading;
  readonly address?: Address;
  readonly poiList: readonly POIItem[];
  readonly timestamp: Date;
  readonly weather?: WeatherSnapshot;
}

export interface ContextFlags {
  readonly fromCache: boolean;
  readonly usingMockWeather: boolean;
  readonly weatherTimedOut: boolean;
  readonly scene: Scene;
  readonly mode: LocationMode;
}

export interface CameraContext {
  readonly display: ContextDisplay;
  readonly raw: ContextRaw;
  readonly flags: ContextFlags;
}

export interface CacheStatus {
  hasEntry: boolean;
  lastTimestamp: Date | null;
}
