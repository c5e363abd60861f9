/**
 * Injectable time source.
 * Engines never read Date.now() directly, so tests and playback can drive time.
 */

export interface Clock {
  now: () => number; // epoch ms
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export interface ManualClock extends Clock {
  set: (time: number) => void;
  advance: (ms: number) => void;
}

export function createManualClock(start: number): ManualClock {
  let current = start;
  return {
    now: () => current,
    set: (time) => { current = time; },
    advance: (ms) => { current += ms; },
  };
}

/**
 * Accelerated clock: simulated time starts at `startAt` and runs `speed` times faster than `source`.
 */
export function createSimulatedClock(startAt: number, speed: number, source: Clock = systemClock): Clock {
  const origin = source.now();
  return {
    now: () => startAt + (source.now() - origin) * speed,
  };
}
