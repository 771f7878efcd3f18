import { ALTITUDE_UNIT_SYMBOLS, EMPTY_WEATHER_STRING, FEET_PER_METER } from '../constants';
import type { AltitudeUnit, Coordinate, WeatherSnapshot } from '../types/CameraContext';

/**
 * Display string helpers for the context builder.
 * All pure; output format is part of the public contract.
 */

/**
 * "39.9042°N, 116.4074°E"
 */
export function formatCoordinate(coordinate: Coordinate): string {
  const latDirection = coordinate.latitude >= 0 ? 'N' : 'S';
  const lonDirection = coordinate.longitude >= 0 ? 'E' : 'W';
  return `${Math.abs(coordinate.latitude).toFixed(4)}°${latDirection}, ${Math.abs(coordinate.longitude).toFixed(4)}°${lonDirection}`;
}

export function convertAltitude(meters: number, unit: AltitudeUnit): number {
  return unit === 'feet' ? meters * FEET_PER_METER : meters;
}

/**
 * "50.0 m" / "164.0 ft"
 */
export function formatAltitude(meters: number, unit: AltitudeUnit = 'meters'): string {
  return `${convertAltitude(meters, unit).toFixed(1)} ${ALTITUDE_UNIT_SYMBOLS[unit]}`;
}

/**
 * "350m" below a kilometre, "1.2km" from 1000 m up
 */
export function formatDistance(meters: number): string {
  if (meters < 1000) {
    return `${Math.trunc(meters)}m`;
  }
  return `${(meters / 1000).toFixed(1)}km`;
}

/**
 * "Sunny 25°C", or the fixed placeholder when there is no snapshot
 */
export function formatWeather(weather: WeatherSnapshot | undefined): string {
  if (!weather) {
    return EMPTY_WEATHER_STRING;
  }
  return `${weather.condition} ${Math.trunc(weather.temperature)}°C`;
}

const pad = (value: number, length = 2): string => String(value).padStart(length, '0');

/**
 * Local time as "yyyy-MM-dd HH:mm:ss.SSS"
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`
  );
}
