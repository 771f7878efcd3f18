import axios, { type AxiosInstance } from 'axios';
import type { Coordinate, POIItem } from '../types/CameraContext';
import type { POIProvider } from '../types/providers';
import { errorMessage } from '../utils/errors';
import { distanceBetween } from '../utils/geoUtils';
import { createLogger } from '../utils/logger';

/**
 * Nearby points of interest from the OpenStreetMap Overpass API
 * https://wiki.openstreetmap.org/wiki/Overpass_API
 */

// =============================================================================
// Types
// =============================================================================

interface OverpassElement {
  type: 'node' | 'way' | 'relation';
  id: number;
  lat?: number;
  lon?: number;
  center?: { lat: number; lon: number };
  tags?: Record<string, string>;
}

interface OverpassResponse {
  elements?: OverpassElement[];
}

export interface OverpassPOIProviderOptions {
  baseUrl?: string;
  /** Search radius in meters */
  radius?: number;
  maxResults?: number;
  timeoutMs?: number;
  http?: AxiosInstance;
}

export const DEFAULT_OVERPASS_URL = 'https://overpass-api.de/api/interpreter';

/**
 * Scene keyword -> Overpass tag filter
 */
export const KEYWORD_TAG_FILTERS: Record<string, string> = {
  office: '["office"]',
  building: '["building"="office"]',
  company: '["office"="company"]',
  business: '["amenity"="coworking_space"]',
  scenic: '["tourism"="viewpoint"]',
  landmark: '["historic"]',
  restaurant: '["amenity"="restaurant"]',
  attraction: '["tourism"="attraction"]',
  hotel: '["tourism"="hotel"]',
};

// Tag keys checked, in order, for a category label
const CATEGORY_KEYS = ['tourism', 'historic', 'amenity', 'office', 'building', 'shop'];

export function buildOverpassQuery(
  coordinate: Coordinate,
  keywords: readonly string[],
  radius: number,
  maxResults: number
): string | null {
  const filters = [...new Set(keywords.map((keyword) => KEYWORD_TAG_FILTERS[keyword]).filter(Boolean))];
  if (filters.length === 0) {
    return null;
  }

  const around = `(around:${radius},${coordinate.latitude},${coordinate.longitude})`;
  const statements = filters.map((filter) => `  nwr${around}${filter}["name"];`).join('\n');

  return `[out:json][timeout:10];\n(\n${statements}\n);\nout center ${maxResults * 3};`;
}

function humanize(value: string): string {
  const spaced = value.replace(/_/g, ' ').trim();
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

function categoryFor(tags: Record<string, string>): string {
  for (const key of CATEGORY_KEYS) {
    const value = tags[key];
    if (value && value !== 'yes') {
      return humanize(value);
    }
    if (value === 'yes') {
      return humanize(key);
    }
  }
  return 'Place';
}

// =============================================================================
// Overpass Provider
// =============================================================================

export class OverpassPOIProvider implements POIProvider {
  private readonly logger = createLogger({ component: 'OverpassPOIProvider' });
  private readonly baseUrl: string;
  private readonly radius: number;
  private readonly maxResults: number;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;

  constructor(options: OverpassPOIProviderOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_OVERPASS_URL;
    this.radius = options.radius ?? 500;
    this.maxResults = options.maxResults ?? 20;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.http = options.http ?? axios.create();
  }

  /**
   * Never rejects: any failure is logged and yields an empty list
   */
  async search(coordinate: Coordinate, keywords: readonly string[]): Promise<POIItem[]> {
    const query = buildOverpassQuery(coordinate, keywords, this.radius, this.maxResults);
    if (!query) {
      this.logger.debug({ keywords }, 'No tag filters for keywords');
      return [];
    }

    try {
      const response = await this.http.post<OverpassResponse>(
        this.baseUrl,
        `data=${encodeURIComponent(query)}`,
        {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          timeout: this.timeoutMs,
        }
      );

      const items = this.transformElements(response.data?.elements ?? [], coordinate);
      this.logger.debug({ count: items.length }, 'POI search completed');
      return items;
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Error searching POI');
      return [];
    }
  }

  private transformElements(elements: OverpassElement[], origin: Coordinate): POIItem[] {
    const seen = new Set<string>();
    const items: POIItem[] = [];

    for (const element of elements) {
      const name = element.tags?.name?.trim();
      const latitude = element.lat ?? element.center?.lat;
      const longitude = element.lon ?? element.center?.lon;

      if (!name || latitude === undefined || longitude === undefined) {
        continue;
      }

      const id = `${element.type}/${element.id}`;
      if (seen.has(id)) {
        continue;
      }
      seen.add(id);

      const coordinate = { latitude, longitude };
      items.push({
        id,
        name,
        category: categoryFor(element.tags ?? {}),
        distance: Math.round(distanceBetween(origin, coordinate)),
        coordinate,
      });
    }

    return items
      .sort((a, b) => a.distance - b.distance)
      .slice(0, this.maxResults);
  }
}
