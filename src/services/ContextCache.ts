import { CACHE_DISTANCE_THRESHOLD_METERS, CACHE_TIME_THRESHOLD_MS } from '../constants';
import type { CacheStatus, CameraContext, Coordinate, LocationReading } from '../types/CameraContext';
import { distanceBetween, elapsedMs } from '../utils/geoUtils';
import { createLogger } from '../utils/logger';
import { withRefreshedTimestamp } from './ContextBuilder';

export interface ReuseThresholds {
  distanceMeters: number;
  timeMs: number;
}

export const DEFAULT_REUSE_THRESHOLDS: ReuseThresholds = {
  distanceMeters: CACHE_DISTANCE_THRESHOLD_METERS,
  timeMs: CACHE_TIME_THRESHOLD_MS,
};

/**
 * Strict on both bounds: exactly 20 m or exactly 120 s is a miss
 */
export function isWithinReuseWindow(
  distanceMeters: number,
  elapsed: number,
  thresholds: ReuseThresholds = DEFAULT_REUSE_THRESHOLDS
): boolean {
  return distanceMeters < thresholds.distanceMeters && elapsed < thresholds.timeMs;
}

interface CacheEntry {
  reading: LocationReading;
  context: CameraContext;
}

/**
 * Single-slot context cache
 *
 * Holds the last produced context and the reading it was produced for.
 * Every method is synchronous, so each one runs to completion on the
 * event loop before any other caller can touch the slot; that is the
 * lock. Nothing here awaits.
 *
 * Entries never expire on their own - the time threshold is applied
 * when reading.
 */
export class ContextCache {
  private entry: CacheEntry | null = null;
  private readonly thresholds: ReuseThresholds;
  private readonly logger = createLogger({ component: 'ContextCache' });

  constructor(thresholds: ReuseThresholds = DEFAULT_REUSE_THRESHOLDS) {
    this.thresholds = thresholds;
  }

  /**
   * Reusable copy of the cached context for `coordinate`, or null on a miss.
   * The copy carries `now` as its timestamp and `fromCache: true`.
   */
  get(coordinate: Coordinate, now: Date = new Date()): CameraContext | null {
    const entry = this.entry;
    if (!entry) {
      return null;
    }

    const distance = distanceBetween(coordinate, entry.reading.coordinate);
    const elapsed = elapsedMs(entry.context.raw.timestamp, now);

    this.logger.debug({
      distance: Number(distance.toFixed(1)),
      elapsedMs: elapsed,
    }, 'Cache check');

    if (!isWithinReuseWindow(distance, elapsed, this.thresholds)) {
      return null;
    }

    return withRefreshedTimestamp(entry.context, now);
  }

  put(reading: LocationReading, context: CameraContext): void {
    this.entry = { reading, context };
  }

  clear(): void {
    this.entry = null;
  }

  status(): CacheStatus {
    return {
      hasEntry: this.entry !== null,
      lastTimestamp: this.entry?.context.raw.timestamp ?? null,
    };
  }
}
