import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Entry } from 'node-geocoder';
import {
  GeocoderAddressProvider,
  geocodeCacheKey,
  toAddress,
  type RegionalEntry,
  type ReverseGeocoder,
} from '../GeocoderAddressProvider';
import { buildTitle } from '../../services/ContextBuilder';
import type { LocationReading } from '../../types/CameraContext';
import { NoResultError, ProviderError } from '../../utils/errors';

const BEIJING = { latitude: 39.9042, longitude: 116.4074 };
const SHANGHAI = { latitude: 31.2304, longitude: 121.4737 };

const reading: LocationReading = {
  coordinate: BEIJING,
  altitude: 50,
  horizontalAccuracy: 5,
  verticalAccuracy: 3,
  timestamp: new Date(2024, 2, 15, 10, 30, 0, 0),
};

const mockEntry: Entry = {
  formattedAddress: '1 Jianguo Road, Chaoyang, Beijing, 100022, China',
  latitude: 39.9042,
  longitude: 116.4074,
  city: 'Beijing',
  streetName: 'Jianguo Road',
  streetNumber: '1',
  country: 'China',
  countryCode: 'CN',
  zipcode: '100022',
  administrativeLevels: {
    level1long: 'Beijing',
    level2long: 'Chaoyang District',
  },
  extra: {
    neighborhood: 'Chaoyang',
    establishment: 'Test Plaza',
  },
};

// Shape of node-geocoder's openstreetmap formatter
const osmEntry: RegionalEntry = {
  formattedAddress: 'Jianguo Road, Chaoyang, Beijing, 100022, China',
  latitude: 39.9042,
  longitude: 116.4074,
  city: 'Beijing',
  state: 'Beijing',
  neighbourhood: 'Chaoyang',
  streetName: 'Jianguo Road',
  streetNumber: '',
  country: 'China',
  countryCode: 'CN',
  zipcode: '100022',
  provider: 'openstreetmap',
};

// Shape of node-geocoder's mapbox formatter
const mapboxEntry: RegionalEntry = {
  formattedAddress: 'Test Street 5, 10115 Berlin, Germany',
  latitude: 52.532,
  longitude: 13.384,
  city: 'Berlin',
  state: 'Berlin',
  neighbourhood: 'Mitte',
  streetName: 'Test Street',
  streetNumber: '5',
  country: 'Germany',
  countryCode: 'DE',
  zipcode: '10115',
  provider: 'mapbox',
};

function fakeGeocoder(result: Entry[] | Error) {
  const reverse = vi.fn<ReverseGeocoder['reverse']>(async () => {
    if (result instanceof Error) {
      throw result;
    }
    return result;
  });
  return { geocoder: { reverse }, reverse };
}

describe('GeocoderAddressProvider', () => {
  describe('toAddress', () => {
    it('should map every populated field', () => {
      expect(toAddress(mockEntry)).toEqual({
        formattedAddress: '1 Jianguo Road, Chaoyang, Beijing, 100022, China',
        country: 'China',
        countryCode: 'CN',
        administrativeArea: 'Beijing',
        subAdministrativeArea: 'Chaoyang District',
        locality: 'Beijing',
        subLocality: 'Chaoyang',
        thoroughfare: 'Jianguo Road',
        subThoroughfare: '1',
        postalCode: '100022',
        areasOfInterest: ['Test Plaza'],
        name: 'Test Plaza',
      });
    });

    it('should compose a formatted address when the provider gives none', () => {
      const address = toAddress({
        streetName: 'Main Street',
        streetNumber: '12',
        city: 'Springfield',
        country: 'Testland',
      });

      expect(address.formattedAddress).toBe('12, Main Street, Springfield, Testland');
      expect(address.name).toBe('12 Main Street');
      expect(address.areasOfInterest).toBeUndefined();
    });

    it('should read state and neighbourhood from an OpenStreetMap entry', () => {
      const address = toAddress(osmEntry);

      expect(address.administrativeArea).toBe('Beijing');
      expect(address.subLocality).toBe('Chaoyang');
      expect(address.subThoroughfare).toBeUndefined();
      expect(address.name).toBeUndefined();
      expect(buildTitle(address, reading)).toBe('Beijing Chaoyang');
    });

    it('should fall back to the state for a rural OpenStreetMap entry', () => {
      const address = toAddress({
        formattedAddress: 'County Road 7, Hebei, China',
        state: 'Hebei',
        neighbourhood: '',
        streetName: 'County Road 7',
        country: 'China',
        provider: 'openstreetmap',
      });

      expect(address.locality).toBeUndefined();
      expect(address.subLocality).toBeUndefined();
      expect(buildTitle(address, reading)).toBe('Hebei');
    });

    it('should map a Mapbox entry', () => {
      expect(toAddress(mapboxEntry)).toEqual({
        formattedAddress: 'Test Street 5, 10115 Berlin, Germany',
        country: 'Germany',
        countryCode: 'DE',
        administrativeArea: 'Berlin',
        subAdministrativeArea: undefined,
        locality: 'Berlin',
        subLocality: 'Mitte',
        thoroughfare: 'Test Street',
        subThoroughfare: '5',
        postalCode: '10115',
        areasOfInterest: undefined,
        name: '5 Test Street',
      });
    });

    it('should prefer Google administrative levels over the state', () => {
      const address = toAddress({ ...mockEntry, state: 'Other State', neighbourhood: 'Other Neighbourhood' });

      expect(address.administrativeArea).toBe('Beijing');
      expect(address.subLocality).toBe('Chaoyang');
    });

    it('should drop blank values', () => {
      const address = toAddress({ formattedAddress: 'Somewhere', city: '  ', streetName: '' });

      expect(address.locality).toBeUndefined();
      expect(address.thoroughfare).toBeUndefined();
      expect(address.name).toBeUndefined();
    });
  });

  describe('reverseGeocode', () => {
    it('should resolve the first entry', async () => {
      const { geocoder, reverse } = fakeGeocoder([mockEntry, { city: 'Elsewhere' }]);
      const provider = new GeocoderAddressProvider({ geocoder });

      const address = await provider.reverseGeocode(BEIJING);

      expect(reverse).toHaveBeenCalledWith({ lat: 39.9042, lon: 116.4074 });
      expect(address.locality).toBe('Beijing');
      expect(address.subLocality).toBe('Chaoyang');
    });

    it('should throw NoResultError for an empty result', async () => {
      const { geocoder } = fakeGeocoder([]);
      const provider = new GeocoderAddressProvider({ geocoder });

      await expect(provider.reverseGeocode(BEIJING)).rejects.toBeInstanceOf(NoResultError);
    });

    it('should wrap geocoder failures in ProviderError', async () => {
      const cause = new Error('ETIMEDOUT');
      const { geocoder } = fakeGeocoder(cause);
      const provider = new GeocoderAddressProvider({ geocoder });

      const error = await provider.reverseGeocode(BEIJING).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error instanceof ProviderError && error.message).toBe('Reverse geocoding failed: ETIMEDOUT');
      expect(error instanceof ProviderError && error.cause).toBe(cause);
    });
  });

  describe('caching and rate limiting', () => {
    const start = new Date(2024, 2, 15, 10, 30, 0, 0);

    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(start);
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should round the cache key to five decimals', () => {
      expect(geocodeCacheKey({ latitude: 39.904201, longitude: 116.407401 })).toBe('39.90420,116.40740');
    });

    it('should answer a repeat lookup from the cache', async () => {
      const { geocoder, reverse } = fakeGeocoder([mockEntry]);
      const provider = new GeocoderAddressProvider({ geocoder });

      const first = await provider.reverseGeocode(BEIJING);
      const second = await provider.reverseGeocode({ latitude: 39.904201, longitude: 116.407401 });

      expect(reverse).toHaveBeenCalledTimes(1);
      expect(second).toBe(first);
    });

    it('should look up again once the cache entry expires', async () => {
      const { geocoder, reverse } = fakeGeocoder([mockEntry]);
      const provider = new GeocoderAddressProvider({ geocoder, cacheTTL: 60000 });

      await provider.reverseGeocode(BEIJING);
      vi.advanceTimersByTime(59999);
      await provider.reverseGeocode(BEIJING);
      expect(reverse).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(1);
      await provider.reverseGeocode(BEIJING);
      expect(reverse).toHaveBeenCalledTimes(2);
    });

    it('should share one request between concurrent lookups of the same place', async () => {
      const { geocoder, reverse } = fakeGeocoder([mockEntry]);
      const provider = new GeocoderAddressProvider({ geocoder });

      const [first, second] = await Promise.all([
        provider.reverseGeocode(BEIJING),
        provider.reverseGeocode(BEIJING),
      ]);

      expect(reverse).toHaveBeenCalledTimes(1);
      expect(second).toBe(first);
    });

    it('should space requests for different places by the rate limit', async () => {
      const calledAt: number[] = [];
      const reverse = vi.fn<ReverseGeocoder['reverse']>(async () => {
        calledAt.push(Date.now());
        return [mockEntry];
      });
      const provider = new GeocoderAddressProvider({ geocoder: { reverse } });

      const lookups = Promise.all([provider.reverseGeocode(BEIJING), provider.reverseGeocode(SHANGHAI)]);
      await vi.advanceTimersByTimeAsync(1099);
      expect(reverse).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1);
      await lookups;

      expect(calledAt).toEqual([start.getTime(), start.getTime() + 1100]);
      expect(reverse).toHaveBeenLastCalledWith({ lat: 31.2304, lon: 121.4737 });
    });

    it('should not cache a failed lookup', async () => {
      const reverse = vi
        .fn<ReverseGeocoder['reverse']>()
        .mockRejectedValueOnce(new Error('ETIMEDOUT'))
        .mockResolvedValueOnce([osmEntry]);
      const provider = new GeocoderAddressProvider({ geocoder: { reverse }, rateLimitDelay: 500 });

      await expect(provider.reverseGeocode(BEIJING)).rejects.toBeInstanceOf(ProviderError);

      const retry = provider.reverseGeocode(BEIJING);
      await vi.advanceTimersByTimeAsync(500);

      await expect(retry).resolves.toMatchObject({ administrativeArea: 'Beijing', subLocality: 'Chaoyang' });
      expect(reverse).toHaveBeenCalledTimes(2);
    });
  });
});
