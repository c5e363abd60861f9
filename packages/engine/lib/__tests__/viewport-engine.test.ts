import { describe, it, expect } from 'vitest';
import type { BoundingBox } from '@wavefront/shared';
import {
  boundsAreSimilar,
  clampCameraToArea,
  clampCenter,
  computeViewportConstraints,
  fitCenter,
  hasSignificantPaddingChange,
  hasSignificantResize,
  latToY,
  nearestValidPoint,
  projectedSize,
  ViewportConstrainer,
  visibleBounds,
  yToLat,
  zoomForBounds,
} from '../viewport-engine';

const EVENT: BoundingBox = { north: 10, south: -10, east: 40, west: 0 };
const SETTINGS = { maxValidHalfExtent: 30 };

describe('Mercator Projection', () => {
  it('maps latitudes to normalized y', () => {
    expect(latToY(0)).toBe(0.5);
    expect(latToY(90)).toBeCloseTo(0, 6);
    expect(yToLat(latToY(45))).toBeCloseTo(45, 9);
  });

  it('shows the whole world at zoom 0 on one tile', () => {
    const world = visibleBounds({ lat: 0, lng: 0 }, 0, { width: 256, height: 256 });
    expect(world.east).toBe(180);
    expect(world.west).toBe(-180);
    expect(world.north).toBeCloseTo(85.0511, 3);
  });
});

describe('TightFit', () => {
  const screen = { width: 800, height: 600 };

  it('fits the whole event box at minimum zoom', () => {
    const constraints = computeViewportConstraints(EVENT, screen, 'tight', null, SETTINGS);
    const { zoomForWidth, zoomForHeight } = zoomForBounds(EVENT, screen);

    expect(constraints.neutral).toBe(false);
    expect(constraints.minZoom).toBe(Math.min(zoomForWidth, zoomForHeight));

    const visible = visibleBounds(fitCenter(EVENT), constraints.minZoom, screen);
    // Width governs: touches east and west, overflows north and south
    expect(visible.west).toBeCloseTo(0, 9);
    expect(visible.east).toBeCloseTo(40, 9);
    expect(visible.north).toBeGreaterThan(10);
    expect(visible.south).toBeLessThan(-10);
  });
});

describe('AspectFit', () => {
  // 2.84:1 event on a 0.62 portrait screen
  const wide: BoundingBox = { north: 5, south: -5, east: 28.4, west: 0 };
  const portrait = { width: 620, height: 1000 };

  it('lets the constraining dimension fill the screen', () => {
    const constraints = computeViewportConstraints(wide, portrait, 'aspect', null, SETTINGS);
    const { zoomForWidth, zoomForHeight } = zoomForBounds(wide, portrait);

    expect(constraints.minZoom).toBe(zoomForHeight);
    expect(constraints.minZoom).toBe(Math.max(zoomForWidth, zoomForHeight));

    const visible = visibleBounds(fitCenter(wide), constraints.minZoom, portrait);
    expect(visible.north).toBeCloseTo(5, 6);
    expect(visible.south).toBeCloseTo(-5, 6);

    // Only part of the width fits
    const widthFraction = (visible.east - visible.west) / 28.4;
    expect(widthFraction).toBeGreaterThan(0.2);
    expect(widthFraction).toBeLessThan(0.25);
  });

  it('narrows the constrained bounds to the screen aspect', () => {
    const constraints = computeViewportConstraints(wide, portrait, 'aspect', null, SETTINGS);
    const visible = visibleBounds(fitCenter(wide), constraints.minZoom, portrait);
    const { height } = projectedSize(wide);

    expect(constraints.constrainedBounds.east - constraints.constrainedBounds.west)
      .toBeCloseTo(height * 0.62 * 360, 9);
    expect(constraints.constrainedBounds.east - constraints.constrainedBounds.west)
      .toBeCloseTo(visible.east - visible.west, 9);
    expect(constraints.constrainedBounds.north).toBe(5);
  });

  it('uses the width when the event is taller than the screen', () => {
    const tall: BoundingBox = { north: 20, south: -20, east: 10, west: 0 };
    const landscape = { width: 1000, height: 500 };
    const constraints = computeViewportConstraints(tall, landscape, 'aspect', null, SETTINGS);

    expect(constraints.minZoom).toBe(zoomForBounds(tall, landscape).zoomForWidth);
    expect(constraints.constrainedBounds.north).toBeGreaterThan(0);
    expect(constraints.constrainedBounds.north).toBeLessThan(20);
    expect(constraints.constrainedBounds.west).toBe(0);
    expect(constraints.constrainedBounds.east).toBe(10);
  });
});

describe('Center Bounds', () => {
  const screen = { width: 800, height: 600 };

  it('shrinks the event box by half the viewport', () => {
    const viewport = { north: 6, south: -2, east: 25, west: 15 };
    const constraints = computeViewportConstraints(EVENT, screen, 'tight', viewport, SETTINGS);

    expect(constraints.padding).toEqual({ lat: 4, lng: 5 });
    expect(constraints.centerBounds).toEqual({ north: 6, south: -6, east: 35, west: 5 });
  });

  it('ignores uninitialized viewports', () => {
    // 45 degree half-extent: the renderer has not measured itself yet
    const viewport = { north: 45, south: -45, east: 65, west: -25 };
    const constraints = computeViewportConstraints(EVENT, screen, 'tight', viewport, SETTINGS);

    expect(constraints.padding).toEqual({ lat: 0, lng: 0 });
    expect(constraints.centerBounds).toEqual(EVENT);
  });

  it('never inverts the center bounds', () => {
    const viewport = { north: 5, south: -5, east: 70, west: 20 };
    const { centerBounds, padding } = computeViewportConstraints(EVENT, screen, 'tight', viewport, SETTINGS);

    expect(padding.lng).toBeCloseTo(19.6, 9);
    expect(centerBounds.west).toBeCloseTo(19.6, 9);
    expect(centerBounds.east).toBeCloseTo(20.4, 9);
    expect(centerBounds.west).toBeLessThan(centerBounds.east);
  });

  it('returns neutral constraints on degenerate input', () => {
    const zeroScreen = computeViewportConstraints(EVENT, { width: 0, height: 600 }, 'tight', null, SETTINGS);
    expect(zeroScreen.neutral).toBe(true);
    expect(zeroScreen.minZoom).toBe(0);
    expect(zeroScreen.centerBounds).toEqual({ north: 85.05112878, south: -85.05112878, east: 180, west: -180 });

    const flat = computeViewportConstraints({ north: 10, south: -10, east: 5, west: 5 }, screen, 'aspect', null, SETTINGS);
    expect(flat.neutral).toBe(true);
  });
});

describe('Clamping', () => {
  it('leaves valid centers untouched', () => {
    const center = { lat: 0, lng: 20 };
    expect(clampCenter(center, EVENT)).toBe(center);
  });

  it('clamps each axis on its own', () => {
    expect(clampCenter({ lat: 0, lng: 50 }, EVENT)).toEqual({ lat: 0, lng: 40 });
    expect(clampCenter({ lat: 20, lng: -5 }, EVENT)).toEqual({ lat: 10, lng: 0 });
    expect(nearestValidPoint({ lat: -30, lng: 20 }, EVENT)).toEqual({ lat: -10, lng: 20 });
  });

  it('clamps across the antimeridian', () => {
    const pacific = { north: 10, south: -10, east: -170, west: 170 };
    const inside = { lat: 0, lng: 175 };
    expect(clampCenter(inside, pacific)).toBe(inside);
    expect(clampCenter({ lat: 0, lng: -160 }, pacific)).toEqual({ lat: 0, lng: 190 });
  });

  it('keeps a whole viewport inside the area', () => {
    expect(clampCameraToArea({ north: 5, south: -5, east: 10, west: 0 }, EVENT)).toEqual({ lat: 0, lng: 5 });
    expect(clampCameraToArea({ north: 15, south: 5, east: 45, west: 35 }, EVENT)).toEqual({ lat: 5, lng: 35 });
    // Larger than the area: centered
    expect(clampCameraToArea({ north: 30, south: -30, east: 100, west: -60 }, EVENT)).toEqual({ lat: 0, lng: 20 });
  });
});

describe('Change Detection', () => {
  it('ignores small resizes', () => {
    expect(hasSignificantResize(null, { width: 1000, height: 800 })).toBe(true);
    expect(hasSignificantResize({ width: 1000, height: 800 }, { width: 1050, height: 800 })).toBe(false);
    expect(hasSignificantResize({ width: 1000, height: 800 }, { width: 1200, height: 800 })).toBe(true);
    expect(hasSignificantResize({ width: 1000, height: 800 }, { width: 1000, height: 900 })).toBe(true);
  });

  it('ignores small padding changes', () => {
    expect(hasSignificantPaddingChange({ lat: 1, lng: 1 }, { lat: 1.05, lng: 1 })).toBe(false);
    expect(hasSignificantPaddingChange({ lat: 1, lng: 1 }, { lat: 1.2, lng: 1 })).toBe(true);
    expect(hasSignificantPaddingChange({ lat: 0, lng: 0 }, { lat: 0, lng: 0 })).toBe(false);
    expect(hasSignificantPaddingChange({ lat: 0, lng: 0 }, { lat: 1, lng: 0 })).toBe(true);
  });

  it('compares bounds with a tolerance', () => {
    expect(boundsAreSimilar(EVENT, { ...EVENT, north: 10.0005 })).toBe(true);
    expect(boundsAreSimilar(EVENT, { ...EVENT, north: 10.01 })).toBe(false);
  });
});

describe('ViewportConstrainer', () => {
  it('stays neutral until the screen is known', () => {
    const constrainer = new ViewportConstrainer(EVENT, 'tight', SETTINGS);
    expect(constrainer.getConstraints().neutral).toBe(true);

    constrainer.onCameraIdle({ north: 6, south: -2, east: 25, west: 15 });
    expect(constrainer.getConstraints().neutral).toBe(true);
  });

  it('recomputes on significant resizes only', () => {
    const constrainer = new ViewportConstrainer(EVENT, 'tight', SETTINGS);
    const screen = { width: 800, height: 600 };

    expect(constrainer.onResize(screen)).toBe(true);
    expect(constrainer.getConstraints().minZoom)
      .toBe(computeViewportConstraints(EVENT, screen, 'tight', null, SETTINGS).minZoom);

    expect(constrainer.onResize({ width: 820, height: 600 })).toBe(false);
  });

  it('follows the viewport padding and clamps centers', () => {
    const constrainer = new ViewportConstrainer(EVENT, 'tight', SETTINGS);
    constrainer.onResize({ width: 800, height: 600 });

    const constraints = constrainer.onCameraIdle({ north: 6, south: -2, east: 25, west: 15 });
    expect(constraints.centerBounds).toEqual({ north: 6, south: -6, east: 35, west: 5 });
    expect(constrainer.clamp({ lat: 0, lng: 0 })).toEqual({ lat: 0, lng: 5 });
  });
});
