import type { BoundingBox, CutPosition, Position } from '@wavefront/shared';
import { CONFIG } from './constants';
import { isCutPosition } from './polygon-engine';

/**
 * lib/cut-engine.ts
 * Dividing Lines
 * ------------------------------------------------------------------
 * A cut is either a meridian (straight) or a polyline sorted south -> north (composed).
 * A composed cut is a function of latitude: between its positions the longitude is
 * interpolated, beyond its ends it stays constant up to the poles.
 */

export type Cut =
  | { kind: 'straight'; id: string; lng: number }
  | { kind: 'composed'; id: string; positions: Position[] };

export type Side = 'west' | 'east' | 'on';

const EPSILON = CONFIG.COORDINATE_EPSILON;

// FNV-1a, enough to give equal cuts equal ids
const hashString = (value: string): string => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0).toString(36);
};

export const fromLongitude = (lng: number): Cut => ({
  kind: 'straight',
  id: `lng:${lng}`,
  lng,
});

/**
 * Builds a composed cut. Positions are sorted by latitude; a repeated latitude keeps its first position.
 */
export function composedCut(positions: Position[]): Cut {
  const sorted = positions
    .map(({ lat, lng }) => ({ lat, lng }))
    .sort((a, b) => a.lat - b.lat)
    .filter((p, i, all) => i === 0 || p.lat !== all[i - 1].lat);

  if (sorted.length === 0) return fromLongitude(0);
  if (sorted.every(p => p.lng === sorted[0].lng)) return fromLongitude(sorted[0].lng);

  const signature = sorted.map(p => `${p.lat},${p.lng}`).join(';');
  return { kind: 'composed', id: `arc:${hashString(signature)}`, positions: sorted };
}

/**
 * Longitude of the cut at a latitude.
 */
export function lngAt(cut: Cut, lat: number): number {
  if (cut.kind === 'straight') return cut.lng;

  const { positions } = cut;
  const first = positions[0];
  const last = positions[positions.length - 1];
  if (lat <= first.lat) return first.lng;
  if (lat >= last.lat) return last.lng;

  // Binary search for the segment holding lat
  let lo = 0;
  let hi = positions.length - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (positions[mid].lat <= lat) lo = mid;
    else hi = mid;
  }

  const a = positions[lo];
  const b = positions[hi];
  const ratio = (lat - a.lat) / (b.lat - a.lat);
  return a.lng + ratio * (b.lng - a.lng);
}

/**
 * Signed longitude offset of a position from the cut (negative = west).
 */
export const offsetFromCut = (cut: Cut, position: Position): number =>
  position.lng - lngAt(cut, position.lat);

export function sideOf(cut: Cut, position: Position): Side {
  if (isCutPosition(position) && position.cutId === cut.id) return 'on';

  const offset = offsetFromCut(cut, position);
  if (Math.abs(offset) <= EPSILON) return 'on';
  return offset < 0 ? 'west' : 'east';
}

/**
 * Every point where the segment a -> b crosses the cut, ordered from a to b.
 * Endpoints lying on the cut are not reported; the caller already sees them as 'on'.
 */
export function intersectSegment(cut: Cut, a: Position, b: Position): CutPosition[] {
  // Along the segment lat is linear in t, so offset(t) is piecewise linear,
  // with breakpoints where lat passes a cut vertex.
  const samples: number[] = [0];
  if (cut.kind === 'composed' && a.lat !== b.lat) {
    const breakpoints = cut.positions
      .map(p => (p.lat - a.lat) / (b.lat - a.lat))
      .filter(t => t > 0 && t < 1)
      .sort((x, y) => x - y);
    samples.push(...breakpoints);
  }
  samples.push(1);

  const at = (t: number): Position => ({
    lat: a.lat + t * (b.lat - a.lat),
    lng: a.lng + t * (b.lng - a.lng),
  });
  const offsets = samples.map(t => offsetFromCut(cut, at(t)));

  const [west, east] = offsetFromCut(cut, a) <= 0 ? [a, b] : [b, a];
  const toCutPosition = (t: number): CutPosition => {
    const lat = a.lat + t * (b.lat - a.lat);
    return { lat, lng: lngAt(cut, lat), cutId: cut.id, cutLeft: west, cutRight: east };
  };

  const result: CutPosition[] = [];
  for (let i = 0; i < samples.length - 1; i++) {
    const o1 = offsets[i];
    const o2 = offsets[i + 1];

    // Interior breakpoint exactly on the cut
    if (i > 0 && o1 === 0) {
      result.push(toCutPosition(samples[i]));
      continue;
    }
    if (o1 * o2 < 0) {
      const t = samples[i] + (samples[i + 1] - samples[i]) * (o1 / (o1 - o2));
      result.push(toCutPosition(t));
    }
  }
  return result;
}

/**
 * Cut vertices strictly between two latitudes, ordered from fromLat towards toLat.
 */
export function positionsBetween(cut: Cut, fromLat: number, toLat: number, cutLeft: Position, cutRight: Position): CutPosition[] {
  if (cut.kind === 'straight') return [];

  const low = Math.min(fromLat, toLat);
  const high = Math.max(fromLat, toLat);
  const inside = cut.positions.filter(p => p.lat > low + EPSILON && p.lat < high - EPSILON);
  if (fromLat > toLat) inside.reverse();

  return inside.map(p => ({ lat: p.lat, lng: p.lng, cutId: cut.id, cutLeft, cutRight }));
}

export function cutBounds(cut: Cut): BoundingBox {
  if (cut.kind === 'straight') {
    return { north: 90, south: -90, east: cut.lng, west: cut.lng };
  }
  const lngs = cut.positions.map(p => p.lng);
  return {
    north: cut.positions[cut.positions.length - 1].lat,
    south: cut.positions[0].lat,
    east: Math.max(...lngs),
    west: Math.min(...lngs),
  };
}

/**
 * Rejects chaotic polylines: a wave front may bend, not zig-zag.
 */
export function isValidArc(positions: Position[]): boolean {
  if (positions.length <= 2) return true;

  const sorted = positions.slice().sort((a, b) => a.lat - b.lat);
  const signs: number[] = [];
  for (let i = 1; i < sorted.length; i++) {
    signs.push(Math.sign(sorted[i].lng - sorted[i - 1].lng));
  }

  const changes = signs.filter((s, i) => i > 0 && s !== signs[i - 1]).length;
  const distinctSigns = new Set(signs).size;
  const nonZero = signs.filter(s => s !== 0);
  const nonZeroChanges = nonZero.filter((s, i) => i > 0 && s !== nonZero[i - 1]).length;

  return changes <= 5 && distinctSigns <= 3 && nonZeroChanges <= 3;
}
