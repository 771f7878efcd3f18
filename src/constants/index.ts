import type { AltitudeUnit, LocationMode, Scene } from '../types/CameraContext';

// Cache reuse window - the only two tuning knobs of the orchestrator
export const CACHE_DISTANCE_THRESHOLD_METERS = 20;
export const CACHE_TIME_THRESHOLD_MS = 120_000;

// Weather never gets more than this, whatever the mode
export const WEATHER_TIMEOUT_MS = 3_000;

export const LOCATION_DEADLINE_MS: Record<LocationMode, number> = {
  fast: 5_000,
  accurate: 15_000,
};

export const EMPTY_WEATHER_STRING = '-- 0°C';

export const SCENES = ['work', 'travel'] as const satisfies readonly Scene[];
export const LOCATION_MODES = ['fast', 'accurate'] as const satisfies readonly LocationMode[];

export const SCENE_POI_KEYWORDS: Record<Scene, readonly string[]> = {
  work: ['office', 'building', 'company', 'business'],
  travel: ['scenic', 'landmark', 'restaurant', 'attraction', 'hotel'],
};

export const SCENE_DEFAULT_MODE: Record<Scene, LocationMode> = {
  work: 'fast',
  travel: 'accurate',
};

export const SCENE_DISPLAY_NAMES: Record<Scene, string> = {
  work: 'Work Mode',
  travel: 'Travel Mode',
};

export const MODE_DISPLAY_NAMES: Record<LocationMode, string> = {
  fast: 'Fast',
  accurate: 'Accurate',
};

export const ALTITUDE_UNIT_SYMBOLS: Record<AltitudeUnit, string> = {
  meters: 'm',
  feet: 'ft',
};

export const FEET_PER_METER = 3.28084;
