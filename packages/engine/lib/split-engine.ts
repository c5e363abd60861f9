import { createLogger, type Polygon, type Position } from '@wavefront/shared';
import { CONFIG } from './constants';
import { cutBounds, intersectSegment, lngAt, positionsBetween, sideOf, type Cut, type Side } from './cut-engine';
import { getBoundsForPositions } from './geo-engine';
import {
  closeRing,
  containsPosition,
  isCutPosition,
  openRing,
  removeConsecutiveDuplicates,
} from './polygon-engine';

/**
 * lib/split-engine.ts
 * Polygon Splitter
 * ------------------------------------------------------------------
 * Splits a ring along a cut into the pieces lying west (left) and east (right) of it.
 *
 * 1. Every vertex is classified west / east / on.
 * 2. Each edge crossing the cut gets an interpolated cut vertex, tagged with the cut id.
 * 3. Per side, the ring is cut into chains of vertices (side or on) in original order.
 * 4. Chains are linked along the cut through the polygon interior into closed rings.
 *
 * Original winding is kept; a vertex on the cut belongs to both sides.
 */

const log = createLogger('Split');
const EPSILON = CONFIG.COORDINATE_EPSILON;

export interface SplitResult {
  left: Polygon[];
  right: Polygon[];
}

interface ClassifiedVertex {
  position: Position;
  side: Side;
}

const EMPTY: SplitResult = { left: [], right: [] };

export function splitPolygon(polygon: Polygon, cut: Cut): SplitResult {
  const ring = removeConsecutiveDuplicates(openRing(polygon));
  const bounds = getBoundsForPositions(ring);
  if (ring.length < 3 || !bounds) {
    log.debug(`Skipping degenerate ring (${ring.length} distinct vertices)`);
    return EMPTY;
  }

  // 1. Quick reject: whole ring beside the cut's extent
  const extent = cutBounds(cut);
  if (bounds.west > extent.east + EPSILON) return { left: [], right: [polygon] };
  if (bounds.east < extent.west - EPSILON) return { left: [polygon], right: [] };

  // 2. Classification with inserted crossings
  const vertices: ClassifiedVertex[] = [];
  for (let i = 0; i < ring.length; i++) {
    const a = ring[i];
    const b = ring[(i + 1) % ring.length];
    const sideA = sideOf(cut, a);
    vertices.push({ position: a, side: sideA });

    if (sideA !== 'on' && sideOf(cut, b) !== 'on') {
      intersectSegment(cut, a, b).forEach(position => vertices.push({ position, side: 'on' }));
    }
  }

  const hasWest = vertices.some(v => v.side === 'west');
  const hasEast = vertices.some(v => v.side === 'east');

  // 3. Zero-crossing cases
  if (!hasWest && !hasEast) return EMPTY; // Collapsed onto the cut
  if (!hasEast) return { left: [polygon], right: [] };
  if (!hasWest) return { left: [], right: [polygon] };

  const source = closeRing(ring);
  return {
    left: buildSide(vertices, 'west', cut, source),
    right: buildSide(vertices, 'east', cut, source),
  };
}

/**
 * Splits every polygon and concatenates the sides.
 */
export function splitArea(area: Polygon[], cut: Cut): SplitResult {
  return area.reduce<SplitResult>((acc, polygon) => {
    const { left, right } = splitPolygon(polygon, cut);
    return { left: acc.left.concat(left), right: acc.right.concat(right) };
  }, { left: [], right: [] });
}

function buildSide(vertices: ClassifiedVertex[], side: Exclude<Side, 'on'>, cut: Cut, source: Polygon): Polygon[] {
  const other: Side = side === 'west' ? 'east' : 'west';

  // Start on a vertex of the other side so no chain wraps around the seam
  const start = vertices.findIndex(v => v.side === other);
  const rotated = [...vertices.slice(start), ...vertices.slice(0, start)];

  const chains: ClassifiedVertex[][] = [];
  let current: ClassifiedVertex[] = [];
  for (const vertex of rotated) {
    if (vertex.side === other) {
      if (current.length > 0) chains.push(current);
      current = [];
      continue;
    }
    current.push(vertex);
  }
  if (current.length > 0) chains.push(current);

  // Chains made only of cut vertices just touch this side
  const kept = chains
    .filter(chain => chain.some(v => v.side === side))
    .map(chain => chain.map(v => v.position));
  if (kept.length === 0) return [];

  const successors = linkChains(kept, cut, source);

  const polygons: Polygon[] = [];
  const visited = new Set<number>();
  kept.forEach((_, first) => {
    if (visited.has(first)) return;

    const ring: Position[] = [];
    let index = first;
    while (!visited.has(index)) {
      visited.add(index);
      const chain = kept[index];
      ring.push(...chain);

      const next = successors[index];
      const end = chain[chain.length - 1];
      const nextStart = kept[next][0];
      const cutLeft = isCutPosition(end) ? end.cutLeft : end;
      const cutRight = isCutPosition(end) ? end.cutRight : end;
      ring.push(...positionsBetween(cut, end.lat, nextStart.lat, cutLeft, cutRight));
      index = next;
    }

    const cleaned = removeConsecutiveDuplicates(ring);
    if (cleaned.length >= 3) polygons.push(closeRing(cleaned));
  });

  return polygons;
}

interface Anchor {
  index: number;
  kind: 'start' | 'end';
  lat: number;
}

/**
 * For each chain, the chain whose start is reached by walking the cut from its end
 * through the inside of the source polygon.
 * Crossings are ordered by latitude along the cut; the link goes to an adjacent crossing.
 */
function linkChains(chains: Position[][], cut: Cut, source: Polygon): number[] {
  const anchors: Anchor[] = chains
    .flatMap((chain, index): Anchor[] => [
      { index, kind: 'start', lat: chain[0].lat },
      { index, kind: 'end', lat: chain[chain.length - 1].lat },
    ])
    .sort((a, b) => a.lat - b.lat);

  const used = new Set<number>();

  const throughInterior = (fromLat: number, toLat: number): boolean => {
    if (Math.abs(fromLat - toLat) <= EPSILON) return true;
    const midLat = (fromLat + toLat) / 2;
    return containsPosition(source, { lat: midLat, lng: lngAt(cut, midLat) });
  };

  return chains.map((chain, index) => {
    const endLat = chain[chain.length - 1].lat;
    const at = anchors.findIndex(a => a.index === index && a.kind === 'end');

    // First free start in each direction, skipping anchors stacked on the same point
    const neighbours: Anchor[] = [];
    for (const step of [-1, 1]) {
      for (let k = at + step; k >= 0 && k < anchors.length; k += step) {
        const anchor = anchors[k];
        if (anchor.kind === 'start' && !used.has(anchor.index)) {
          neighbours.push(anchor);
          break;
        }
        if (Math.abs(anchor.lat - endLat) > EPSILON) break;
      }
    }

    const byDistance = (a: Anchor, b: Anchor) => Math.abs(a.lat - endLat) - Math.abs(b.lat - endLat);

    let linked: Anchor | undefined = neighbours
      .filter(anchor => throughInterior(endLat, anchor.lat))
      .sort(byDistance)[0];

    if (!linked) {
      // Degenerate touch configurations fall back to the nearest free start
      log.debug('No interior link found, using nearest chain');
      linked = anchors.filter(a => a.kind === 'start' && !used.has(a.index)).sort(byDistance)[0];
    }

    const chosen = linked ? linked.index : index;
    used.add(chosen);
    return chosen;
  });
}
