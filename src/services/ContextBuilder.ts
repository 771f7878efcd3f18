import type {
  Address,
  AltitudeUnit,
  CameraContext,
  LocationMode,
  LocationReading,
  NearbyPlace,
  POIItem,
  Scene,
  WeatherSnapshot,
} from '../types/CameraContext';
import {
  formatAltitude,
  formatCoordinate,
  formatDistance,
  formatTimestamp,
  formatWeather,
} from '../utils/formatters';

/**
 * Context Builder
 *
 * Pure assembly of raw source outputs into the three-part camera context.
 * No I/O and no clock reads: same input, same output.
 */

export interface BuildContextInput {
  reading: LocationReading;
  address?: Address;
  weather?: WeatherSnapshot;
  poiList: readonly POIItem[];
  capturedAt: Date;
  weatherTimedOut: boolean;
  scene: Scene;
  mode: LocationMode;
  usingMockWeather: boolean;
  altitudeUnit?: AltitudeUnit;
}

const nonEmpty = (value: string | undefined): value is string =>
  value !== undefined && value.trim().length > 0;

/**
 * Title precedence:
 * "locality subLocality" > locality > administrativeArea > formattedAddress > coordinates
 */
export function buildTitle(address: Address | undefined, reading: LocationReading): string {
  if (address) {
    const { locality, subLocality, administrativeArea, formattedAddress } = address;

    if (nonEmpty(locality) && nonEmpty(subLocality)) {
      return `${locality} ${subLocality}`;
    }
    if (nonEmpty(locality)) return locality;
    if (nonEmpty(administrativeArea)) return administrativeArea;
    if (nonEmpty(formattedAddress)) return formattedAddress;
  }

  return formatCoordinate(reading.coordinate);
}

/**
 * Subtitle precedence:
 * first area of interest > thoroughfare > address name > nearest POI > ""
 */
export function buildSubtitle(address: Address | undefined, poiList: readonly POIItem[]): string {
  const candidates = [
    address?.areasOfInterest?.[0],
    address?.thoroughfare,
    address?.name,
    poiList[0]?.name,
  ];

  return candidates.find(nonEmpty) ?? '';
}

export function toNearbyPlace(poi: POIItem): NearbyPlace {
  return {
    id: poi.id,
    name: poi.name,
    category: poi.category,
    distanceString: formatDistance(poi.distance),
  };
}

export function buildContext(input: BuildContextInput): CameraContext {
  const { reading, address, weather, poiList, capturedAt } = input;

  return {
    display: {
      title: buildTitle(address, reading),
      subtitle: buildSubtitle(address, poiList),
      weatherString: formatWeather(weather),
      timeString: formatTimestamp(capturedAt),
      altitudeString: formatAltitude(reading.altitude, input.altitudeUnit ?? 'meters'),
      coordinateString: formatCoordinate(reading.coordinate),
      nearby: poiList.map(toNearbyPlace),
    },
    raw: {
      reading,
      address,
      poiList,
      timestamp: capturedAt,
      weather,
    },
    flags: {
      fromCache: false,
      usingMockWeather: input.usingMockWeather,
      weatherTimedOut: input.weatherTimedOut,
      scene: input.scene,
      mode: input.mode,
    },
  };
}

/**
 * Copy of a cached context stamped with a new capture instant.
 * Everything other than the timestamp, time string and fromCache flag
 * is carried over as-is; the source context is not modified.
 */
export function withRefreshedTimestamp(context: CameraContext, now: Date): CameraContext {
  return {
    display: { ...context.display, timeString: formatTimestamp(now) },
    raw: { ...context.raw, timestamp: now },
    flags: { ...context.flags, fromCache: true },
  };
}
