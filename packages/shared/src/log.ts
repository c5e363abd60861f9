import { getLogLevel, type LogLevel } from './env';

/**
 * Tagged console logger.
 * Output looks like "[WaveEngine] message", matching the rest of the codebase.
 */

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function createLogger(tag: string, level?: LogLevel): Logger {
  // Resolved lazily so tests can stub WAVE_LOG_LEVEL after import
  const enabled = (target: Exclude<LogLevel, 'silent'>) =>
    SEVERITY[target] >= SEVERITY[level ?? getLogLevel()];

  const prefix = `[${tag}]`;

  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
