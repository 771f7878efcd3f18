import type { LocationReading } from '../types/CameraContext';
import type { LocationProvider } from '../types/providers';
import {
  LocationTimeoutError,
  LocationUnavailableError,
  PermissionDeniedError,
} from '../utils/errors';
import { elapsedMs, isValidCoordinate } from '../utils/geoUtils';
import { createLogger } from '../utils/logger';

/**
 * Location fed from outside the process.
 *
 * A client (the camera app) posts fixes to the API, which hands them to
 * pushReading(). currentReading() answers from the latest fix when it is
 * fresh enough, otherwise it waits for the next push until the deadline.
 */

// ===== Types =====

export type LocationPermission = 'granted' | 'denied' | 'restricted';

export interface PushedLocation {
  latitude: number;
  longitude: number;
  altitude?: number;
  horizontalAccuracy?: number;
  verticalAccuracy?: number;
  speed?: number;
  course?: number;
  /** Fix time; defaults to receipt time */
  timestamp?: Date;
}

export interface PushLocationProviderOptions {
  /** A stored fix older than this is not returned (default 30s) */
  maxReadingAgeMs?: number;
  now?: () => Date;
}

interface Waiter {
  resolve: (reading: LocationReading) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export const DEFAULT_MAX_READING_AGE_MS = 30_000;

/**
 * A fix stamped ahead of its receipt (device clock skew) is stamped at receipt
 */
export function toLocationReading(input: PushedLocation, receivedAt: Date): LocationReading {
  const timestamp =
    input.timestamp && input.timestamp.getTime() <= receivedAt.getTime() ? input.timestamp : receivedAt;

  return {
    coordinate: { latitude: input.latitude, longitude: input.longitude },
    altitude: input.altitude ?? 0,
    horizontalAccuracy: input.horizontalAccuracy ?? -1,
    verticalAccuracy: input.verticalAccuracy ?? -1,
    timestamp,
    speed: input.speed,
    course: input.course,
  };
}

// ===== Provider =====

export class PushLocationProvider implements LocationProvider {
  private readonly logger = createLogger({ component: 'PushLocationProvider' });
  private readonly maxReadingAgeMs: number;
  private readonly now: () => Date;
  private latest: LocationReading | null = null;
  private permission: LocationPermission = 'granted';
  private readonly waiters = new Set<Waiter>();

  constructor(options: PushLocationProviderOptions = {}) {
    this.maxReadingAgeMs = options.maxReadingAgeMs ?? DEFAULT_MAX_READING_AGE_MS;
    this.now = options.now ?? (() => new Date());
  }

  // A future-dated fix has negative age and never counts as current
  private isCurrent(reading: LocationReading): boolean {
    const age = elapsedMs(reading.timestamp, this.now());
    return age >= 0 && age <= this.maxReadingAgeMs;
  }

  currentReading(deadlineMs: number): Promise<LocationReading> {
    if (this.permission !== 'granted') {
      return Promise.reject(new PermissionDeniedError(this.permission));
    }

    const latest = this.latest;
    if (latest && this.isCurrent(latest)) {
      return Promise.resolve(latest);
    }

    this.logger.debug({ deadlineMs, hasStale: latest !== null }, 'Waiting for next location push');

    return new Promise<LocationReading>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.waiters.delete(waiter);
          reject(new LocationTimeoutError(deadlineMs));
        }, deadlineMs),
      };
      this.waiters.add(waiter);
    });
  }

  pushLocation(input: PushedLocation): LocationReading {
    const reading = toLocationReading(input, this.now());
    this.pushReading(reading);
    return reading;
  }

  pushReading(reading: LocationReading): void {
    if (!isValidCoordinate(reading.coordinate)) {
      throw new LocationUnavailableError('Pushed location has invalid coordinates.');
    }

    this.latest = reading;
    this.logger.debug({
      latitude: reading.coordinate.latitude,
      longitude: reading.coordinate.longitude,
      waiting: this.waiters.size,
    }, 'Location pushed');

    this.settleWaiters((waiter) => waiter.resolve(reading));
  }

  setPermission(permission: LocationPermission): void {
    this.permission = permission;
    this.logger.info({ permission }, 'Location permission changed');

    if (permission !== 'granted') {
      this.latest = null;
      this.settleWaiters((waiter) => waiter.reject(new PermissionDeniedError(permission)));
    }
  }

  getPermission(): LocationPermission {
    return this.permission;
  }

  latestReading(): LocationReading | null {
    return this.latest;
  }

  /**
   * Reject anything still waiting; used on shutdown
   */
  close(): void {
    this.settleWaiters((waiter) => waiter.reject(new LocationUnavailableError('Location feed closed.')));
  }

  private settleWaiters(settle: (waiter: Waiter) => void): void {
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      settle(waiter);
    }
  }
}
