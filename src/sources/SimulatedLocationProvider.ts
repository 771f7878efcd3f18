import type { Coordinate, LocationReading } from '../types/CameraContext';
import type { LocationProvider } from '../types/providers';
import { LocationTimeoutError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { delay } from '../utils/timeout';

export interface SimulatedLocationProviderOptions {
  coordinate: Coordinate;
  altitude?: number;
  /** Max random offset in degrees applied to each reading */
  jitterDegrees?: number;
  /** Time to first fix (default 200ms) */
  delayMs?: number;
  horizontalAccuracy?: number;
  random?: () => number;
  now?: () => Date;
}

/**
 * Fixed-position location for development and demos
 */
export class SimulatedLocationProvider implements LocationProvider {
  private readonly logger = createLogger({ component: 'SimulatedLocationProvider' });
  private readonly coordinate: Coordinate;
  private readonly altitude: number;
  private readonly jitterDegrees: number;
  private readonly delayMs: number;
  private readonly horizontalAccuracy: number;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(options: SimulatedLocationProviderOptions) {
    this.coordinate = options.coordinate;
    this.altitude = options.altitude ?? 0;
    this.jitterDegrees = options.jitterDegrees ?? 0;
    this.delayMs = options.delayMs ?? 200;
    this.horizontalAccuracy = options.horizontalAccuracy ?? 5;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  async currentReading(deadlineMs: number): Promise<LocationReading> {
    if (this.delayMs >= deadlineMs) {
      await delay(deadlineMs);
      throw new LocationTimeoutError(deadlineMs);
    }

    await delay(this.delayMs);

    const reading: LocationReading = {
      coordinate: {
        latitude: this.coordinate.latitude + this.offset(),
        longitude: this.coordinate.longitude + this.offset(),
      },
      altitude: this.altitude,
      horizontalAccuracy: this.horizontalAccuracy,
      verticalAccuracy: this.horizontalAccuracy,
      timestamp: this.now(),
    };

    this.logger.debug({ coordinate: reading.coordinate }, 'Simulated reading');
    return reading;
  }

  private offset(): number {
    if (this.jitterDegrees === 0) {
      return 0;
    }
    return (this.random() * 2 - 1) * this.jitterDegrees;
  }
}
