import {
  computeEventState,
  getObservationInterval,
  getWaveNumbers,
  getWaveStartTime,
  validateState,
  validateStateTransition,
  WaveProgressionCalculator,
  type Clock,
} from '@wavefront/engine';
import {
  createLogger,
  type EngineSettings,
  type EventState,
  type Position,
  type StateValidationIssue,
  type WaveEvent,
} from '@wavefront/shared';

/**
 * lib/playback-engine.ts
 * Event Playback
 * ------------------------------------------------------------------
 * Observes an event the way a client would: compute the state, re-split the area,
 * then wait for the cadence given by the schedule engine.
 * The clock may run faster than real time; waits are scaled by `speed`.
 */

const log = createLogger('Simulator');

export interface PlaybackOptions {
  event: WaveEvent;
  position: Position | null;
  clock: Clock;
  speed: number; // simulated ms per real ms
  maxTicks: number;
  settings?: Partial<EngineSettings>;
  onState?: (state: EventState) => void;
  sleep?: (ms: number) => Promise<void>;
}

export interface PlaybackSummary {
  ticks: number;
  finalState: EventState;
  issues: StateValidationIssue[];
}

const wait = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

const formatTime = (time: number) => new Date(time).toISOString();

export async function runPlayback(options: PlaybackOptions): Promise<PlaybackSummary> {
  const { event, position, clock, speed, maxTicks, onState, sleep = wait } = options;
  if (!(speed > 0)) throw new Error(`Playback speed must be positive, got ${speed}`);
  if (!(maxTicks >= 1)) throw new Error(`At least one tick is required, got ${maxTicks}`);

  const calculator = new WaveProgressionCalculator(event.area, event.wave, getWaveStartTime(event), {
    clock,
    settings: options.settings,
  });

  const numbers = getWaveNumbers(calculator, event.timeZone);
  log.info(`${event.id}: ${event.wave.kind} wave at ${numbers.speed}, ${numbers.startTime} -> ${numbers.endTime} (${numbers.totalTime}, ${numbers.timeZone})`);

  const issues: StateValidationIssue[] = [];
  let previous: EventState | null = null;
  let hitReported = false;
  let ticks = 0;

  for (;;) {
    ticks++;
    const now = clock.now();
    const state = computeEventState({ event, calculator, position, now });

    // 1. Consistency
    const found = [...validateState(state), ...validateStateTransition(previous, state)];
    found.forEach(issue => log.warn(`${issue.severity} ${issue.field}: ${issue.issue}`));
    issues.push(...found);

    // 2. Geometry
    const snapshot = calculator.getWavePolygons();
    if (snapshot) {
      log.debug(`${snapshot.mode}: ${snapshot.traversed.length} traversed / ${snapshot.remaining.length} remaining`);
    }

    log.info(`${formatTime(now)} ${state.status} ${state.progression.toFixed(1)}%${position ? ` hit in ${Math.round(state.timeBeforeHit / 1000)}s` : ''}`);
    onState?.(state);
    previous = state;

    if (state.status === 'done' || ticks >= maxTicks) {
      return { ticks, finalState: state, issues };
    }

    // 3. Cadence
    const timeBeforeHit = Number.isFinite(state.timeBeforeHit) ? state.timeBeforeHit : null;
    let interval = getObservationInterval({ now, startsAt: event.startsAt, status: state.status, timeBeforeHit });
    if (!Number.isFinite(interval)) {
      if (!hitReported) log.info('Observer has been hit, following the wave until it ends');
      hitReported = true;
      interval = getObservationInterval({ now, startsAt: event.startsAt, status: state.status, timeBeforeHit: null });
    }

    await sleep(interval / speed);
  }
}
