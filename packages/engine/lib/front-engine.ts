import type { Area, BoundingBox, Position, WaveDirection, WaveKind } from '@wavefront/shared';
import { CONFIG } from './constants';
import { composedCut, fromLongitude, type Cut } from './cut-engine';
import { boundsCenter, eastWestDistance, latitudeOfWidestPart, nearestLongitude, unwrapBounds } from './geo-engine';
import { splitArea } from './split-engine';

/**
 * lib/front-engine.ts
 * Wave Kinds
 * ------------------------------------------------------------------
 * Each wave kind answers the same questions: how long it lasts, where its front(s) sit,
 * which side of the fronts is traversed, and how far a position is from being hit.
 *
 * - linear: one earth-adapted front, sweeping west -> east (or back).
 *   At every latitude it has travelled speed * elapsed meters along the parallel.
 * - deep:   one meridian front moving at a constant angular rate,
 *   calibrated on the widest latitude.
 * - split:  two earth-adapted fronts leaving the central meridian in opposite directions.
 */

export interface Partition {
  traversed: Area;
  remaining: Area;
}

export interface WaveModel {
  kind: WaveKind['kind'];
  speed: number;
  durationMs: (bounds: BoundingBox) => number;
  frontLongitudes: (bounds: BoundingBox, lat: number, elapsedMs: number) => number[];
  fronts: (bounds: BoundingBox, elapsedMs: number, bandDegrees: number) => Cut[];
  partition: (area: Area, fronts: Cut[]) => Partition;
  // Meters still to travel before the front reaches the position; <= 0 once passed
  signedDistance: (bounds: BoundingBox, position: Position, elapsedMs: number) => number;
  // 0 at the starting edge, 1 at the finishing edge
  positionRatio: (bounds: BoundingBox, position: Position) => number;
}

const clamp01 = (value: number) => Math.min(Math.max(value, 0), 1);

/**
 * Share of a span covered after travelling `meters` over a ground distance `full`.
 * A span with no ground length (poles) is crossed instantly.
 */
const coveredRatio = (meters: number, full: number): number => {
  if (full <= 0) return meters > 0 ? 1 : 0;
  return clamp01(meters / full);
};

const travelled = (speed: number, elapsedMs: number) => speed * Math.max(elapsedMs, 0) / 1000;

/**
 * Latitudes sampled by an earth-adapted front, south to north, both bounds included.
 */
export function frontLatitudes(bounds: BoundingBox, bandDegrees: number): number[] {
  const height = bounds.north - bounds.south;
  if (height <= 0) return [bounds.south];

  const bands = Math.min(Math.max(Math.ceil(height / bandDegrees), 1), CONFIG.MAX_FRONT_BANDS);
  return Array.from({ length: bands + 1 }, (_, i) => bounds.south + (height * i) / bands);
}

/**
 * Front longitude of a one-way sweep at a latitude (linear kind).
 */
export function sweepLongitude(bounds: BoundingBox, lat: number, meters: number, direction: WaveDirection): number {
  const { west, east } = unwrapBounds(bounds);
  const delta = coveredRatio(meters, eastWestDistance(west, east, lat)) * (east - west);
  return direction === 'EAST' ? west + delta : east - delta;
}

const sideOfTravel = (direction: WaveDirection, partition: { left: Area; right: Area }): Partition =>
  direction === 'EAST'
    ? { traversed: partition.left, remaining: partition.right }
    : { traversed: partition.right, remaining: partition.left };

// Longitude of the position expressed in the box's own (unwrapped) frame
const localLongitude = (bounds: BoundingBox, position: Position) =>
  nearestLongitude(position.lng, boundsCenter(bounds).lng);

function linearModel(speed: number, direction: WaveDirection): WaveModel {
  const spanDistance = (bounds: BoundingBox, lat: number) => {
    const { west, east } = unwrapBounds(bounds);
    return eastWestDistance(west, east, lat);
  };

  return {
    kind: 'linear',
    speed,
    durationMs: (bounds) => (spanDistance(bounds, latitudeOfWidestPart(bounds)) / speed) * 1000,
    frontLongitudes: (bounds, lat, elapsedMs) => [sweepLongitude(bounds, lat, travelled(speed, elapsedMs), direction)],
    fronts: (bounds, elapsedMs, bandDegrees) => {
      const meters = travelled(speed, elapsedMs);
      return [composedCut(frontLatitudes(bounds, bandDegrees).map(lat => ({
        lat,
        lng: sweepLongitude(bounds, lat, meters, direction),
      })))];
    },
    partition: (area, [front]) => sideOfTravel(direction, splitArea(area, front)),
    signedDistance: (bounds, position, elapsedMs) => {
      const { west, east } = unwrapBounds(bounds);
      const front = sweepLongitude(bounds, position.lat, travelled(speed, elapsedMs), direction);
      const lng = localLongitude(bounds, position);
      const ahead = direction === 'EAST' ? lng - front : front - lng;
      const span = east - west;
      return span > 0 ? (ahead / span) * spanDistance(bounds, position.lat) : 0;
    },
    positionRatio: (bounds, position) => {
      const { west, east } = unwrapBounds(bounds);
      const lng = localLongitude(bounds, position);
      const span = east - west;
      if (span <= 0) return 0;
      return clamp01(direction === 'EAST' ? (lng - west) / span : (east - lng) / span);
    },
  };
}

function deepModel(speed: number, direction: WaveDirection): WaveModel {
  const widestDistance = (bounds: BoundingBox) => {
    const { west, east } = unwrapBounds(bounds);
    return eastWestDistance(west, east, latitudeOfWidestPart(bounds));
  };

  const frontAt = (bounds: BoundingBox, elapsedMs: number) => {
    const { west, east } = unwrapBounds(bounds);
    const delta = coveredRatio(travelled(speed, elapsedMs), widestDistance(bounds)) * (east - west);
    return direction === 'EAST' ? west + delta : east - delta;
  };

  const linear = linearModel(speed, direction);

  return {
    kind: 'deep',
    speed,
    durationMs: (bounds) => (widestDistance(bounds) / speed) * 1000,
    frontLongitudes: (bounds, _lat, elapsedMs) => [frontAt(bounds, elapsedMs)],
    fronts: (bounds, elapsedMs) => [fromLongitude(frontAt(bounds, elapsedMs))],
    partition: linear.partition,
    signedDistance: (bounds, position, elapsedMs) => {
      const { west, east } = unwrapBounds(bounds);
      const front = frontAt(bounds, elapsedMs);
      const lng = localLongitude(bounds, position);
      const ahead = direction === 'EAST' ? lng - front : front - lng;
      const span = east - west;
      return span > 0 ? (ahead / span) * widestDistance(bounds) : 0;
    },
    positionRatio: linear.positionRatio,
  };
}

function splitModel(speed: number): WaveModel {
  const halfSpan = (bounds: BoundingBox) => {
    const { west, east } = unwrapBounds(bounds);
    return (east - west) / 2;
  };

  // Ground distance from the central meridian to either edge
  const halfDistance = (bounds: BoundingBox, lat: number) => {
    const { west } = unwrapBounds(bounds);
    return eastWestDistance(west, west + halfSpan(bounds), lat);
  };

  const offsetAt = (bounds: BoundingBox, lat: number, meters: number) =>
    coveredRatio(meters, halfDistance(bounds, lat)) * halfSpan(bounds);

  return {
    kind: 'split',
    speed,
    durationMs: (bounds) => (halfDistance(bounds, latitudeOfWidestPart(bounds)) / speed) * 1000,
    frontLongitudes: (bounds, lat, elapsedMs) => {
      const center = boundsCenter(bounds).lng;
      const offset = offsetAt(bounds, lat, travelled(speed, elapsedMs));
      return [center - offset, center + offset];
    },
    fronts: (bounds, elapsedMs, bandDegrees) => {
      const center = boundsCenter(bounds).lng;
      const meters = travelled(speed, elapsedMs);
      const lats = frontLatitudes(bounds, bandDegrees);
      return [
        composedCut(lats.map(lat => ({ lat, lng: center - offsetAt(bounds, lat, meters) }))),
        composedCut(lats.map(lat => ({ lat, lng: center + offsetAt(bounds, lat, meters) }))),
      ];
    },
    partition: (area, [westFront, eastFront]) => {
      const outer = splitArea(area, westFront);
      const inner = splitArea(outer.right, eastFront);
      return {
        traversed: inner.left,
        remaining: outer.left.concat(inner.right),
      };
    },
    signedDistance: (bounds, position, elapsedMs) => {
      const span = halfSpan(bounds);
      if (span <= 0) return 0;
      const fromCenter = Math.abs(localLongitude(bounds, position) - boundsCenter(bounds).lng);
      const offset = offsetAt(bounds, position.lat, travelled(speed, elapsedMs));
      return ((fromCenter - offset) / span) * halfDistance(bounds, position.lat);
    },
    positionRatio: (bounds, position) => {
      const span = halfSpan(bounds);
      if (span <= 0) return 0;
      return clamp01(Math.abs(localLongitude(bounds, position) - boundsCenter(bounds).lng) / span);
    },
  };
}

/**
 * Dispatches on the tagged wave kind.
 */
export function createWaveModel(wave: WaveKind): WaveModel {
  switch (wave.kind) {
    case 'linear':
      return linearModel(wave.speed, wave.direction);
    case 'deep':
      return deepModel(wave.speed, wave.direction);
    case 'split':
      return splitModel(wave.speed);
  }
}
