import { describe, it, expect } from 'vitest';
import {
  convertAltitude,
  formatAltitude,
  formatCoordinate,
  formatDistance,
  formatTimestamp,
  formatWeather,
} from '../formatters';

describe('formatters', () => {
  describe('formatCoordinate', () => {
    it('should use N and E for non-negative values', () => {
      expect(formatCoordinate({ latitude: 39.9042, longitude: 116.4074 })).toBe('39.9042°N, 116.4074°E');
      expect(formatCoordinate({ latitude: 0, longitude: 0 })).toBe('0.0000°N, 0.0000°E');
    });

    it('should use S and W with absolute values for negative values', () => {
      expect(formatCoordinate({ latitude: -33.8688, longitude: -70.6693 })).toBe('33.8688°S, 70.6693°W');
    });

    it('should round to 4 decimals', () => {
      expect(formatCoordinate({ latitude: 12.345678, longitude: 98.76543 })).toBe('12.3457°N, 98.7654°E');
    });
  });

  describe('formatDistance', () => {
    it('should show whole metres below a kilometre', () => {
      expect(formatDistance(0)).toBe('0m');
      expect(formatDistance(350)).toBe('350m');
      expect(formatDistance(999)).toBe('999m');
      expect(formatDistance(999.9)).toBe('999m');
    });

    it('should switch to kilometres at exactly 1000 m', () => {
      expect(formatDistance(1000)).toBe('1.0km');
      expect(formatDistance(1200)).toBe('1.2km');
      expect(formatDistance(2500)).toBe('2.5km');
    });
  });

  describe('formatAltitude', () => {
    it('should format meters with one decimal', () => {
      expect(formatAltitude(50)).toBe('50.0 m');
      expect(formatAltitude(-3.25)).toBe('-3.3 m');
    });

    it('should convert to feet', () => {
      expect(convertAltitude(100, 'feet')).toBeCloseTo(328.084, 3);
      expect(formatAltitude(100, 'feet')).toBe('328.1 ft');
    });
  });

  describe('formatWeather', () => {
    it('should truncate the temperature to an integer', () => {
      expect(formatWeather({ condition: 'Sunny', temperature: 25.9, humidity: 40, iconName: 'sun' })).toBe('Sunny 25°C');
      expect(formatWeather({ condition: 'Snow', temperature: -2.5, humidity: 80, iconName: 'snow' })).toBe('Snow -2°C');
    });

    it('should return the placeholder without a snapshot', () => {
      expect(formatWeather(undefined)).toBe('-- 0°C');
    });
  });

  describe('formatTimestamp', () => {
    it('should format local time with milliseconds', () => {
      expect(formatTimestamp(new Date(2024, 2, 5, 9, 7, 3, 45))).toBe('2024-03-05 09:07:03.045');
    });

    it('should distinguish instants half a second apart', () => {
      const first = new Date(2024, 2, 5, 9, 7, 3, 0);
      const second = new Date(first.getTime() + 500);
      expect(formatTimestamp(first)).not.toBe(formatTimestamp(second));
    });
  });
});
