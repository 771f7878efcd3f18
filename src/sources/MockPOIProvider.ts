import type { Coordinate, POIItem } from '../types/CameraContext';
import type { POIProvider } from '../types/providers';
import { createLogger } from '../utils/logger';
import { delay } from '../utils/timeout';

/**
 * Fixed POI lists keyed off the scene keywords.
 * Stands in for a real search backend in development and demos.
 */

export interface MockPOIProviderOptions {
  delayRangeMs?: [number, number];
  random?: () => number;
}

const WORK_POIS: readonly POIItem[] = [
  { id: 'mock-work-1', name: 'Riverside Office Park', category: 'Office Building', distance: 50 },
  { id: 'mock-work-2', name: 'Tech Park Tower A', category: 'Business Center', distance: 120 },
  { id: 'mock-work-3', name: 'Innovation Hub', category: 'Co-working Space', distance: 200 },
  { id: 'mock-work-4', name: 'City Center Mall', category: 'Shopping', distance: 350 },
];

const TRAVEL_POIS: readonly POIItem[] = [
  { id: 'mock-travel-1', name: 'Forbidden City', category: 'Historic Site', distance: 500 },
  { id: 'mock-travel-2', name: 'Tiananmen Square', category: 'Landmark', distance: 800 },
  { id: 'mock-travel-3', name: 'Wangfujing Street', category: 'Shopping District', distance: 1200 },
  { id: 'mock-travel-4', name: 'Old Town Duck Restaurant', category: 'Restaurant', distance: 300 },
  { id: 'mock-travel-5', name: 'Temple of Heaven', category: 'Tourist Attraction', distance: 2500 },
];

const WORK_KEYWORDS = new Set(['office', 'business']);

export class MockPOIProvider implements POIProvider {
  private readonly logger = createLogger({ component: 'MockPOIProvider' });
  private readonly delayRangeMs: [number, number];
  private readonly random: () => number;

  constructor(options: MockPOIProviderOptions = {}) {
    this.delayRangeMs = options.delayRangeMs ?? [500, 2000];
    this.random = options.random ?? Math.random;
  }

  async search(_coordinate: Coordinate, keywords: readonly string[]): Promise<POIItem[]> {
    const [min, max] = this.delayRangeMs;
    const latency = Math.round(min + this.random() * (max - min));
    this.logger.debug({ latency, keywords }, 'Mock POI request started');

    await delay(latency);

    const items = keywords.some((keyword) => WORK_KEYWORDS.has(keyword)) ? WORK_POIS : TRAVEL_POIS;

    this.logger.debug({ count: items.length }, 'Mock POI request completed');
    return [...items];
  }
}
