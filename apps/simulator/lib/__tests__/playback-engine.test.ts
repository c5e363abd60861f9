import { describe, it, expect, afterEach, vi } from 'vitest';
import { createManualClock, createSimulatedClock, getWaveStartTime } from '@wavefront/engine';
import type { EventState, WaveEvent } from '@wavefront/shared';
import { runPlayback } from '../playback-engine';

const T0 = Date.UTC(2026, 6, 4, 19);

// ~1.1 km square on the equator, crossed in under two minutes
const EVENT: WaveEvent = {
  id: 'test-square',
  startsAt: T0,
  timeZone: 'UTC',
  area: [[
    { lat: 0, lng: 0 },
    { lat: 0, lng: 0.01 },
    { lat: 0.01, lng: 0.01 },
    { lat: 0.01, lng: 0 },
    { lat: 0, lng: 0 },
  ]],
  wave: { kind: 'linear', speed: 10, direction: 'EAST' },
};

const START = getWaveStartTime(EVENT) + 1000;

describe('runPlayback', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('follows the event until it is done', async () => {
    const clock = createManualClock(START);
    const states: EventState[] = [];

    const summary = await runPlayback({
      event: EVENT,
      position: { lat: 0.005, lng: 0.005 },
      clock,
      speed: 1,
      maxTicks: 10_000,
      onState: state => states.push(state),
      sleep: async ms => clock.advance(ms),
    });

    expect(summary.finalState.status).toBe('done');
    expect(summary.finalState.progression).toBe(100);
    expect(summary.finalState.userHasBeenHit).toBe(true);
    expect(summary.issues).toEqual([]);
    expect(summary.ticks).toBe(states.length);

    expect(states.some(state => state.userIsGoingToBeHit)).toBe(true);
    expect(states.every((state, i) => i === 0 || state.timestamp > states[i - 1].timestamp)).toBe(true);
  });

  it('stops after the tick budget', async () => {
    const clock = createManualClock(START);

    const summary = await runPlayback({
      event: EVENT,
      position: { lat: 0.005, lng: 0.005 },
      clock,
      speed: 1,
      maxTicks: 3,
      sleep: async ms => clock.advance(ms),
    });

    // Two waits of 500 ms while running
    expect(summary.ticks).toBe(3);
    expect(summary.finalState.status).toBe('running');
    expect(summary.finalState.timestamp).toBe(START + 1000);
  });

  it('waits on real timers scaled by the playback speed', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const clock = createSimulatedClock(START, 100);

    const playback = runPlayback({ event: EVENT, position: null, clock, speed: 100, maxTicks: 5 });
    await vi.runAllTimersAsync();
    const summary = await playback;

    // 5 ms of real time per 500 ms observation step
    expect(summary.ticks).toBe(5);
    expect(summary.finalState.timestamp).toBe(START + 2000);
  });

  it('rejects a non-positive speed', async () => {
    await expect(runPlayback({
      event: EVENT,
      position: null,
      clock: createManualClock(START),
      speed: 0,
      maxTicks: 1,
    })).rejects.toThrow('Playback speed must be positive, got 0');
  });
});
