import * as turf from '@turf/turf';
import type { Area, BoundingBox, CutPosition, Polygon, Position } from '@wavefront/shared';
import { CONFIG } from './constants';
import { getBoundsForPositions } from './geo-engine';

/**
 * lib/polygon-engine.ts
 * Ring Primitives
 * ------------------------------------------------------------------
 * Polygons are closed rings of positions (first == last).
 * Vertices produced by a cut carry the cut identity (see CutPosition).
 */

const EPSILON = CONFIG.COORDINATE_EPSILON;

export const isCutPosition = (position: Position): position is CutPosition =>
  'cutId' in position;

/**
 * Coordinate equality. Two cut vertices are only equal when they come from the same cut.
 */
export function samePosition(a: Position, b: Position): boolean {
  if (Math.abs(a.lat - b.lat) > EPSILON || Math.abs(a.lng - b.lng) > EPSILON) return false;
  if (isCutPosition(a) && isCutPosition(b)) return a.cutId === b.cutId;
  return true;
}

const sameCoordinates = (a: Position, b: Position): boolean =>
  Math.abs(a.lat - b.lat) <= EPSILON && Math.abs(a.lng - b.lng) <= EPSILON;

/**
 * Ring without its closing vertex.
 */
export function openRing(polygon: Polygon): Position[] {
  if (polygon.length > 1 && sameCoordinates(polygon[0], polygon[polygon.length - 1])) {
    return polygon.slice(0, -1);
  }
  return polygon.slice();
}

export function closeRing(ring: Position[]): Polygon {
  if (ring.length === 0) return [];
  if (ring.length > 1 && sameCoordinates(ring[0], ring[ring.length - 1])) return ring.slice();
  return [...ring, ring[0]];
}

/**
 * Drops vertices that repeat their predecessor, including across the ring seam.
 * Works on open rings.
 */
export function removeConsecutiveDuplicates(ring: Position[]): Position[] {
  const result: Position[] = [];
  for (const position of ring) {
    const last = result[result.length - 1];
    if (last && sameCoordinates(last, position)) continue;
    result.push(position);
  }
  while (result.length > 1 && sameCoordinates(result[0], result[result.length - 1])) {
    result.pop();
  }
  return result;
}

export const distinctVertexCount = (polygon: Polygon): number =>
  removeConsecutiveDuplicates(openRing(polygon)).length;

export const isDegenerate = (polygon: Polygon): boolean => distinctVertexCount(polygon) < 3;

/**
 * Ray casting point-in-polygon.
 * A position sitting on a vertex counts as inside.
 */
export function containsPosition(polygon: Polygon, position: Position): boolean {
  const ring = openRing(polygon);
  if (ring.length < 3) return false;

  if (ring.some(vertex => sameCoordinates(vertex, position))) return true;

  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const a = ring[i];
    const b = ring[j];
    if ((a.lat > position.lat) !== (b.lat > position.lat)) {
      const crossingLng = (b.lng - a.lng) * (position.lat - a.lat) / (b.lat - a.lat) + a.lng;
      if (position.lng < crossingLng) inside = !inside;
    }
  }
  return inside;
}

export const isPositionInArea = (area: Area, position: Position): boolean =>
  area.some(polygon => containsPosition(polygon, position));

/**
 * Bounding box folded over every polygon of an area.
 */
export function polygonsBbox(area: Area): BoundingBox | null {
  return getBoundsForPositions(area.flat());
}

/**
 * Signed shoelace area in square degrees (lng as x, lat as y).
 * Exactly additive across a split, used to check that pieces add back up.
 */
export function planarArea(polygon: Polygon): number {
  const ring = openRing(polygon);
  let sum = 0;
  for (let i = 0; i < ring.length; i++) {
    const a = ring[i];
    const b = ring[(i + 1) % ring.length];
    sum += a.lng * b.lat - b.lng * a.lat;
  }
  return sum / 2;
}

export const areaPlanarSize = (area: Area): number =>
  area.reduce((total, polygon) => total + Math.abs(planarArea(polygon)), 0);

/**
 * Geodesic area in square meters.
 */
export function ringArea(polygon: Polygon): number {
  if (isDegenerate(polygon)) return 0;
  const ring = closeRing(removeConsecutiveDuplicates(openRing(polygon)));
  return turf.area(turf.polygon([ring.map(p => [p.lng, p.lat])]));
}

export const areaSize = (area: Area): number =>
  area.reduce((total, polygon) => total + ringArea(polygon), 0);
