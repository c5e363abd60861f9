import * as turf from '@turf/turf';
import type { BoundingBox, Position } from '@wavefront/shared';

/**
 * Geo Engine: Core spatial calculations
 * Independent of any renderer, strictly pure functions.
 */

/**
 * Returns the box with east >= west, shifting east by 360 when the box wraps the antimeridian.
 */
export function unwrapBounds(bounds: BoundingBox): BoundingBox {
    if (bounds.west <= bounds.east) return bounds;
    return { ...bounds, east: bounds.east + 360 };
}

export const boundsWidth = (bounds: BoundingBox): number => {
    const { west, east } = unwrapBounds(bounds);
    return east - west;
};

export const boundsHeight = (bounds: BoundingBox): number => bounds.north - bounds.south;

export const boundsCenter = (bounds: BoundingBox): Position => {
    const { west, east, north, south } = unwrapBounds(bounds);
    return { lat: (north + south) / 2, lng: (west + east) / 2 };
};

/**
 * Latitude where the box is widest on the ground.
 * 0 if the box straddles the equator, otherwise the bound closer to it.
 */
export function latitudeOfWidestPart(bounds: BoundingBox): number {
    if (bounds.south <= 0 && bounds.north >= 0) return 0;
    return bounds.south > 0 ? bounds.south : bounds.north;
}

/**
 * Checks if a position is inside the given bounds
 * supporting infinite longitude wrapping (Nearest Neighbor Projection).
 */
export function isPositionInBounds(position: Position, bounds: BoundingBox): boolean {
    const { west, east, north, south } = unwrapBounds(bounds);

    // 1. Latitude Check
    if (position.lat > north || position.lat < south) return false;

    // 2. Global View Optimization
    const lngSpan = east - west;
    if (lngSpan >= 360) return true;

    // 3. Projection Logic
    const centerLng = (west + east) / 2;
    const offset = Math.round((centerLng - position.lng) / 360);
    const projectedLng = position.lng + (offset * 360);

    return projectedLng >= west && projectedLng <= east;
}

/**
 * Calculates the bounding box of a list of positions.
 * Returns null if no positions are provided.
 */
export function getBoundsForPositions(positions: Position[]): BoundingBox | null {
    if (positions.length === 0) return null;

    let minLat = Infinity;
    let maxLat = -Infinity;
    let minLng = Infinity;
    let maxLng = -Infinity;

    positions.forEach(p => {
        if (p.lat < minLat) minLat = p.lat;
        if (p.lat > maxLat) maxLat = p.lat;
        if (p.lng < minLng) minLng = p.lng;
        if (p.lng > maxLng) maxLng = p.lng;
    });

    return { north: maxLat, south: minLat, east: maxLng, west: minLng };
}

// Haversine legs longer than this lose track of the parallel, longer spans are chained
const MAX_HAVERSINE_LEG = 90;

/**
 * Ground distance in meters between two longitudes along a parallel.
 * Uses haversine, so the span shrinks with cos(latitude) and reaches 0 at the poles.
 */
export function eastWestDistance(fromLng: number, toLng: number, lat: number): number {
    const span = Math.abs(toLng - fromLng);
    if (span === 0) return 0;

    const legs = Math.ceil(span / MAX_HAVERSINE_LEG);
    const legSpan = span / legs;

    const leg = turf.distance(
        turf.point([0, lat]),
        turf.point([legSpan, lat]),
        { units: 'meters' }
    );
    return leg * legs;
}


/**
 * Shifts a longitude by whole turns so it lands nearest to a reference longitude.
 */
export function nearestLongitude(lng: number, referenceLng: number): number {
    const offset = Math.round((referenceLng - lng) / 360);
    return lng + (offset * 360);
}
