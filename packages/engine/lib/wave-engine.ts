import {
  createLogger,
  getEngineSettings,
  type Area,
  type BoundingBox,
  type EngineSettings,
  type Position,
  type SnapshotMode,
  type WaveKind,
  type WavePhase,
  type WaveSnapshot,
} from '@wavefront/shared';
import type { Clock } from './clock';
import type { Cut } from './cut-engine';
import { createWaveModel, type Partition, type WaveModel } from './front-engine';
import { boundsCenter, nearestLongitude } from './geo-engine';
import { isPositionInArea, polygonsBbox } from './polygon-engine';

/**
 * lib/wave-engine.ts
 * Wave Progression Calculator
 * ------------------------------------------------------------------
 * Owns the wave parameters (kind, speed, start time) for one area and answers:
 * progression, front position, traversed / remaining split, and hit timing.
 *
 * Time comes from the injected clock. The only state kept between calls is the
 * previous snapshot, used to re-split incrementally (ADD) instead of from scratch (RECOMPOSE).
 */

const log = createLogger('WaveEngine');

export interface SnapshotModeOptions {
  recomposeAfterMs: number;
}

/**
 * Chooses between re-splitting only what remained (ADD) and a full split (RECOMPOSE).
 */
export function decideSnapshotMode(
  previous: WaveSnapshot | null,
  now: number,
  frontIds: string[],
  options: SnapshotModeOptions
): SnapshotMode {
  // 1. Nothing to build on
  if (!previous) return 'RECOMPOSE';

  // 2. Clock went backwards: the previous split is ahead of the wave
  if (previous.timestamp > now) return 'RECOMPOSE';

  // 3. Stale state
  if (now - previous.timestamp > options.recomposeAfterMs) return 'RECOMPOSE';

  // 4. Different front topology
  if (previous.frontIds.length !== frontIds.length) return 'RECOMPOSE';

  return 'ADD';
}

export interface WaveCalculatorOptions {
  clock: Clock;
  settings?: Partial<EngineSettings>;
}

export class WaveProgressionCalculator {
  private readonly model: WaveModel;
  private readonly clock: Clock;
  private readonly settings: EngineSettings;

  private area: Area;
  private bounds: BoundingBox | null;
  private cachedDurationMs: number | null = null;
  private lastSnapshot: WaveSnapshot | null = null;

  constructor(area: Area, wave: WaveKind, private readonly waveStartsAt: number, options: WaveCalculatorOptions) {
    this.model = createWaveModel(wave);
    this.clock = options.clock;
    this.settings = getEngineSettings(options.settings);
    this.area = area;
    this.bounds = polygonsBbox(area);

    if (!this.bounds) log.warn('Wave created on an empty area, every query will be neutral');
  }

  get kind(): WaveKind['kind'] {
    return this.model.kind;
  }

  get speed(): number {
    return this.model.speed;
  }

  get startsAt(): number {
    return this.waveStartsAt;
  }

  getBounds(): BoundingBox | null {
    return this.bounds;
  }

  getArea(): Area {
    return this.area;
  }

  /**
   * Replaces the area. Cached duration and the previous snapshot are dropped.
   */
  setArea(area: Area): void {
    this.area = area;
    this.bounds = polygonsBbox(area);
    this.cachedDurationMs = null;
    this.lastSnapshot = null;
  }

  private elapsed(): number {
    return this.clock.now() - this.waveStartsAt;
  }

  /**
   * Total time for the wave to cross the area, in ms. 0 for an empty area.
   */
  getWaveDuration(): number {
    if (this.cachedDurationMs !== null) return this.cachedDurationMs;
    if (!this.bounds) return 0;

    const duration = this.model.durationMs(this.bounds);
    this.cachedDurationMs = Number.isFinite(duration) ? duration : 0;
    return this.cachedDurationMs;
  }

  getWaveEndTime(): number {
    return this.waveStartsAt + this.getWaveDuration();
  }

  getPhase(): WavePhase {
    const elapsed = this.elapsed();
    if (elapsed < 0 || !this.bounds) return 'NotStarted';
    return elapsed >= this.getWaveDuration() ? 'Completed' : 'InProgress';
  }

  /**
   * Progression in percent, clamped to [0, 100]. 0 for an empty area.
   */
  getProgression(): number {
    const elapsed = this.elapsed();
    if (elapsed <= 0 || !this.bounds) return 0;

    const total = this.getWaveDuration();
    if (total <= 0) return 100;
    return Math.min(elapsed / total, 1) * 100;
  }

  /**
   * Front longitude at a latitude. With several fronts, the one closest to referenceLng.
   * Null for an empty area.
   */
  closestWaveLongitude(referenceLat: number, referenceLng?: number): number | null {
    if (!this.bounds) return null;

    const fronts = this.model.frontLongitudes(this.bounds, referenceLat, this.elapsed());
    if (referenceLng === undefined) return fronts[fronts.length - 1];

    const distanceTo = (lng: number) => Math.abs(nearestLongitude(referenceLng, lng) - lng);
    return fronts.reduce((best, lng) => (distanceTo(lng) < distanceTo(best) ? lng : best));
  }

  /**
   * Current front cuts (one per front).
   */
  getFronts(): Cut[] {
    if (!this.bounds) return [];
    return this.model.fronts(this.bounds, this.elapsed(), this.settings.frontBandDegrees);
  }

  /**
   * Splits the area at the current fronts, reusing the previous snapshot when possible.
   * Null when the wave has not started or the area is empty.
   */
  getWavePolygons(): WaveSnapshot | null {
    const fronts = this.getFronts();
    const mode = decideSnapshotMode(
      this.lastSnapshot,
      this.clock.now(),
      fronts.map(front => front.id),
      this.settings
    );

    const snapshot = this.computeWavePolygons(this.lastSnapshot, mode, fronts);
    if (snapshot) this.lastSnapshot = snapshot;
    return snapshot;
  }

  /**
   * Same as getWavePolygons but with an explicit previous snapshot and mode.
   * Does not touch the stored snapshot.
   */
  computeWavePolygons(previous: WaveSnapshot | null, mode: SnapshotMode, fronts: Cut[] = this.getFronts()): WaveSnapshot | null {
    if (this.area.length === 0 || !this.bounds) return null;
    if (this.elapsed() < 0) return null;

    const timestamp = this.clock.now();
    const frontIds = fronts.map(front => front.id);

    let partition: Partition;
    let addedTraversed: Area | undefined;
    let appliedMode: SnapshotMode = mode;

    if (mode === 'ADD' && previous) {
      const step = this.model.partition(previous.remaining, fronts);
      partition = {
        traversed: previous.traversed.concat(step.traversed),
        remaining: step.remaining,
      };
      addedTraversed = step.traversed;
    } else {
      partition = this.model.partition(this.area, fronts);
      appliedMode = 'RECOMPOSE';
    }

    if (partition.traversed.length === 0 && partition.remaining.length === 0) {
      log.debug('Split produced no polygons');
      return null;
    }

    const snapshot: WaveSnapshot = {
      timestamp,
      traversed: partition.traversed,
      remaining: partition.remaining,
      mode: appliedMode,
      frontIds,
    };
    if (addedTraversed && addedTraversed.length > 0) snapshot.addedTraversed = addedTraversed;
    return snapshot;
  }

  getLastSnapshot(): WaveSnapshot | null {
    return this.lastSnapshot;
  }

  /**
   * Containment against the longitude copy of the position nearest the area,
   * so areas crossing the antimeridian match normalized positions.
   */
  isPositionInArea(position: Position): boolean {
    if (!this.bounds) return false;

    const lng = nearestLongitude(position.lng, boundsCenter(this.bounds).lng);
    return isPositionInArea(this.area, { lat: position.lat, lng });
  }

  /**
   * Signed ms until the front reaches the position: positive ahead of the wave,
   * zero or negative once passed. Null without a position or area.
   */
  timeBeforeUserHit(position: Position | null): number | null {
    if (!position || !this.bounds) return null;

    const elapsed = this.elapsed();
    const meters = this.model.signedDistance(this.bounds, position, elapsed);
    const untilStart = Math.max(-elapsed, 0);

    const time = untilStart + (meters / this.model.speed) * 1000;
    return Number.isFinite(time) ? time : null;
  }

  /**
   * True once the front has passed a position lying inside the area.
   */
  hasUserBeenHit(position: Position | null): boolean {
    if (!position || !this.isPositionInArea(position)) return false;

    const time = this.timeBeforeUserHit(position);
    return time !== null && time <= 0;
  }

  userHitDateTime(position: Position | null): number | null {
    const time = this.timeBeforeUserHit(position);
    return time === null ? null : this.clock.now() + time;
  }

  /**
   * Where the position sits along the direction of travel, 0 (start edge) to 1 (finish edge).
   */
  userPositionRatio(position: Position | null): number | null {
    if (!position || !this.bounds) return null;
    return this.model.positionRatio(this.bounds, position);
  }
}

// --- Display Numbers ---

export interface WaveNumbers {
  timeZone: string;
  speed: string;
  startTime: string;
  endTime: string;
  totalTime: string;
  progression: string;
}

export const formatDuration = (ms: number): string => {
  const totalMinutes = Math.round(ms / 60_000);
  if (totalMinutes < 1) return `${Math.round(ms / 1000)} s`;
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return hours > 0 ? `${hours}h ${String(minutes).padStart(2, '0')}min` : `${minutes} min`;
};

const formatClockTime = (time: number, timeZone: string): string =>
  new Intl.DateTimeFormat('en-GB', { timeZone, hour: '2-digit', minute: '2-digit', hour12: false }).format(time);

/**
 * Literal figures for display. A field that cannot be computed reads "error".
 */
export function getWaveNumbers(calculator: WaveProgressionCalculator, timeZone: string): WaveNumbers {
  const safe = (label: string, compute: () => string): string => {
    try {
      return compute();
    } catch (error) {
      log.warn(`Cannot compute ${label}:`, error);
      return 'error';
    }
  };

  return {
    timeZone,
    speed: safe('speed', () => `${calculator.speed.toFixed(1)} m/s`),
    startTime: safe('start time', () => formatClockTime(calculator.startsAt, timeZone)),
    endTime: safe('end time', () => formatClockTime(calculator.getWaveEndTime(), timeZone)),
    totalTime: safe('total time', () => formatDuration(calculator.getWaveDuration())),
    progression: safe('progression', () => `${calculator.getProgression().toFixed(1)}%`),
  };
}
