export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

/**
 * Shared Environment Resolution
 * ------------------------------------------------------------------
 * Unifies how the engine and the simulator read their settings.
 * Every lookup follows the same order: explicit override, WAVE_* variable, NODE_ENV default.
 */

export function getLogLevel(overrideValue?: string | null): LogLevel {
  // 1. Explicit Override (from CLI flag)
  if (overrideValue && isLogLevel(overrideValue)) {
    return overrideValue;
  }

  // 2. Environment Variable Override
  const envLevel = typeof process !== 'undefined' ? process.env?.WAVE_LOG_LEVEL : undefined;
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }

  // 3. NODE_ENV Fallback
  const nodeEnv = typeof process !== 'undefined' ? process.env?.NODE_ENV : 'production';
  if (nodeEnv === 'development') return 'debug';
  if (nodeEnv === 'test') return 'silent';
  return 'info';
}

export interface EngineSettings {
  // Previous snapshot older than this forces a full re-split
  recomposeAfterMs: number;
  // Latitude step of the earth-adapted wave front
  frontBandDegrees: number;
  // Reported viewport half-extents above this are treated as uninitialized
  maxValidHalfExtent: number;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  recomposeAfterMs: 60_000,
  frontBandDegrees: 0.25,
  maxValidHalfExtent: 30,
};

const ENV_KEYS: Record<keyof EngineSettings, string> = {
  recomposeAfterMs: 'WAVE_RECOMPOSE_AFTER_MS',
  frontBandDegrees: 'WAVE_FRONT_BAND_DEGREES',
  maxValidHalfExtent: 'WAVE_MAX_VIEWPORT_HALF_EXTENT',
};

const readPositiveNumber = (key: string, fallback: number): number => {
  const raw = typeof process !== 'undefined' ? process.env?.[key] : undefined;
  if (!raw) return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    console.warn(`[Env] Ignoring ${key}="${raw}", expected a positive number. Using ${fallback}.`);
    return fallback;
  }
  return parsed;
};

/**
 * Resolves the engine tunables.
 * Overrides win over the environment, the environment wins over the defaults.
 */
export function getEngineSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  return {
    recomposeAfterMs: overrides.recomposeAfterMs
      ?? readPositiveNumber(ENV_KEYS.recomposeAfterMs, DEFAULT_ENGINE_SETTINGS.recomposeAfterMs),
    frontBandDegrees: overrides.frontBandDegrees
      ?? readPositiveNumber(ENV_KEYS.frontBandDegrees, DEFAULT_ENGINE_SETTINGS.frontBandDegrees),
    maxValidHalfExtent: overrides.maxValidHalfExtent
      ?? readPositiveNumber(ENV_KEYS.maxValidHalfExtent, DEFAULT_ENGINE_SETTINGS.maxValidHalfExtent),
  };
}
