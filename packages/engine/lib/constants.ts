/**
 * Engine constants.
 * Durations are in milliseconds, distances in meters, angles in degrees.
 */

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

export const TIME = { SECOND, MINUTE, HOUR, DAY } as const;

export const CONFIG = {
  // Geometry
  COORDINATE_EPSILON: 1e-9,
  // Reference zone used by map renderers for the world tile
  TILE_SIZE: 256,
  MAX_MERCATOR_LAT: 85.05112878,

  // Wave
  MIN_SPEED: 0, // exclusive, m/s
  MAX_SPEED: 20, // exclusive, m/s
  WARMING_DURATION: 2.5 * MINUTE,
  WARN_BEFORE_HIT: 30 * SECOND,
  MAX_FRONT_BANDS: 720,

  // Event lifecycle
  SOON_DELAY: 30 * DAY,
  OBSERVE_DELAY: 2 * HOUR,

  // Viewport
  PADDING_MAX_RATIO: 0.49, // padding never exceeds this share of the event span
  CHANGE_THRESHOLD: 0.1, // relative change treated as significant
  BOUNDS_SIMILARITY_TOLERANCE: 0.001,
} as const;
