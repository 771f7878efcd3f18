import type { Coordinate } from '../types/CameraContext';

const EARTH_RADIUS_METERS = 6371000;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Great-circle distance between two points using the Haversine formula.
 * Unrounded: the cache compares the result against a strict threshold.
 * @returns Distance in meters
 */
export function haversineDistanceMeters(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(lat1)) *
      Math.cos(toRadians(lat2)) *
      Math.sin(dLon / 2) *
      Math.sin(dLon / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_METERS * c;
}

export function distanceBetween(from: Coordinate, to: Coordinate): number {
  return haversineDistanceMeters(from.latitude, from.longitude, to.latitude, to.longitude);
}

/**
 * Milliseconds from `from` to `to`; negative if `to` is earlier
 */
export function elapsedMs(from: Date, to: Date): number {
  return to.getTime() - from.getTime();
}

export function isValidCoordinate(coordinate: Coordinate): boolean {
  const { latitude, longitude } = coordinate;
  return (
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    Math.abs(latitude) <= 90 &&
    Math.abs(longitude) <= 180
  );
}
