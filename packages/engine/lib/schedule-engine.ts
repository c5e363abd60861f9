import type { EventState, EventStatus, Position, StateValidationIssue, WaveEvent } from '@wavefront/shared';
import { CONFIG, TIME } from './constants';
import type { WaveProgressionCalculator } from './wave-engine';

/**
 * lib/schedule-engine.ts
 * Event Lifecycle & Observation Cadence
 * ------------------------------------------------------------------
 * The event starts with a warming period; the wave itself starts once warming is over.
 * Observers poll coarsely while the event is far away and finely around the hit.
 */

// --- Timeline ---

export const getWaveStartTime = (event: Pick<WaveEvent, 'startsAt'>): number =>
  event.startsAt + CONFIG.WARMING_DURATION;

export function getEventStatus(startsAt: number, endsAt: number, now: number): EventStatus {
  if (now >= endsAt) return 'done';
  if (now >= startsAt) return 'running';
  return startsAt - now <= CONFIG.SOON_DELAY ? 'soon' : 'next';
}

export const isNearTime = (startsAt: number, now: number): boolean =>
  startsAt - now <= CONFIG.OBSERVE_DELAY;

/**
 * Continuous observation only makes sense while running, or shortly before.
 */
export const shouldObserve = (status: EventStatus, startsAt: number, now: number): boolean =>
  status === 'running' || (status === 'soon' && isNearTime(startsAt, now));

// --- Cadence ---

export interface ObservationInput {
  now: number;
  startsAt: number;
  status: EventStatus;
  timeBeforeHit: number | null;
}

/**
 * Delay before the next poll, in ms. Infinity means this observer can stop.
 */
export function getObservationInterval({ now, startsAt, status, timeBeforeHit }: ObservationInput): number {
  const timeBeforeEvent = startsAt - now;

  // 1. Far from the event
  if (timeBeforeEvent > TIME.HOUR + 5 * TIME.MINUTE) return TIME.HOUR;
  if (timeBeforeEvent > 5 * TIME.MINUTE + 30 * TIME.SECOND) return 5 * TIME.MINUTE;
  if (timeBeforeEvent > 35 * TIME.SECOND) return TIME.SECOND;

  // 2. Around the hit
  if (timeBeforeHit !== null) {
    if (timeBeforeHit < 0) return Infinity;
    if (timeBeforeHit < TIME.SECOND) return 50;
    if (timeBeforeHit < 5 * TIME.SECOND) return 200;
  }

  // 3. Starting or running
  if (status === 'running' || timeBeforeEvent <= 0) return 500;

  return 30 * TIME.SECOND;
}

// --- State ---

export interface EventStateInput {
  event: Pick<WaveEvent, 'startsAt'>;
  calculator: WaveProgressionCalculator;
  position: Position | null;
  now: number;
}

export function computeEventState({ event, calculator, position, now }: EventStateInput): EventState {
  const status = getEventStatus(event.startsAt, calculator.getWaveEndTime(), now);
  const progression = calculator.getProgression();

  const userIsInArea = position !== null && calculator.isPositionInArea(position);
  const timeBeforeHit = calculator.timeBeforeUserHit(position) ?? Infinity;
  const userHasBeenHit = calculator.hasUserBeenHit(position);

  // Warned shortly before the hit
  const goingToBeHit = userIsInArea && timeBeforeHit > 0 && timeBeforeHit <= CONFIG.WARN_BEFORE_HIT;
  const userIsGoingToBeHit = goingToBeHit && !userHasBeenHit;

  const warmingStarted = userIsInArea && timeBeforeHit > 0 && timeBeforeHit <= CONFIG.WARMING_DURATION;

  return {
    progression,
    status,
    isUserWarmingInProgress: warmingStarted && !userIsGoingToBeHit && !userHasBeenHit,
    isStartWarmingInProgress: now > event.startsAt && now < getWaveStartTime(event),
    userIsGoingToBeHit,
    userHasBeenHit,
    userPositionRatio: calculator.userPositionRatio(position) ?? 0,
    timeBeforeHit,
    hitDateTime: calculator.userHitDateTime(position),
    userIsInArea,
    timestamp: now,
  };
}

export function validateState(state: EventState): StateValidationIssue[] {
  const issues: StateValidationIssue[] = [];
  const { progression, status } = state;

  if (!Number.isFinite(progression) || progression < 0 || progression > 100) {
    issues.push({
      field: 'progression',
      issue: `Progression ${progression} is out of bounds (should be 0-100)`,
      severity: 'WARNING',
    });
  }

  if (status === 'done' && progression < 100) {
    issues.push({
      field: 'status',
      issue: `Status is done but progression is ${progression} (should be 100)`,
      severity: 'WARNING',
    });
  }

  if (status === 'running' && progression <= 0) {
    issues.push({
      field: 'status',
      issue: `Status is running but progression is ${progression} (should be > 0)`,
      severity: 'WARNING',
    });
  }

  if (state.userIsGoingToBeHit && state.userHasBeenHit) {
    issues.push({
      field: 'userState',
      issue: "User cannot be both 'going to be hit' and 'has been hit' simultaneously",
      severity: 'ERROR',
    });
  }

  if (state.userIsGoingToBeHit && !state.userIsInArea) {
    issues.push({
      field: 'userState',
      issue: "User is 'going to be hit' but not in area",
      severity: 'WARNING',
    });
  }

  return issues;
}

const STATUS_ORDER: Record<EventStatus, number> = { next: 0, soon: 1, running: 2, done: 3 };

export function validateStateTransition(previous: EventState | null, next: EventState): StateValidationIssue[] {
  if (!previous) return [];
  const issues: StateValidationIssue[] = [];

  if (next.progression < previous.progression && next.status !== 'done') {
    issues.push({
      field: 'progression',
      issue: `Progression went backwards: ${previous.progression} -> ${next.progression} (status: ${next.status})`,
      severity: 'WARNING',
    });
  }

  if (STATUS_ORDER[next.status] < STATUS_ORDER[previous.status]) {
    issues.push({
      field: 'status',
      issue: `Invalid backward transition from ${previous.status} to ${next.status}`,
      severity: 'WARNING',
    });
  }

  if (previous.userHasBeenHit && !next.userHasBeenHit) {
    issues.push({
      field: 'userHasBeenHit',
      issue: "User cannot transition from 'has been hit' to 'not hit'",
      severity: 'ERROR',
    });
  }

  return issues;
}
