import {
  createLogger,
  getEngineSettings,
  type BoundingBox,
  type EngineSettings,
  type FitMode,
  type Position,
  type ScreenSize,
  type ViewportConstraints,
  type ViewportPadding,
} from '@wavefront/shared';
import { CONFIG } from './constants';
import { boundsCenter, boundsHeight, boundsWidth, isPositionInBounds, nearestLongitude, unwrapBounds } from './geo-engine';

/**
 * lib/viewport-engine.ts
 * Viewport Constraint Engine
 * ------------------------------------------------------------------
 * Keeps the camera inside the event area.
 * Zoom levels follow the Web Mercator tile pyramid used by map renderers:
 * at zoom z the world is TILE_SIZE * 2^z pixels wide.
 *
 * - tight:  the whole event box fits on screen at minimum zoom.
 * - aspect: the constraining dimension fills the screen, the other one overflows and pans.
 */

const log = createLogger('Viewport');

const MAX_LAT = CONFIG.MAX_MERCATOR_LAT;
const WORLD_BOUNDS: BoundingBox = { north: MAX_LAT, south: -MAX_LAT, east: 180, west: -180 };
const ZERO_PADDING: ViewportPadding = { lat: 0, lng: 0 };

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max);

// --- Projection ---

/**
 * Normalized Mercator y: 0 at the northern edge of the world, 1 at the southern edge.
 */
export function latToY(lat: number): number {
  const sin = Math.sin((clamp(lat, -MAX_LAT, MAX_LAT) * Math.PI) / 180);
  return 0.5 - Math.log((1 + sin) / (1 - sin)) / (4 * Math.PI);
}

export function yToLat(y: number): number {
  return (360 / Math.PI) * Math.atan(Math.exp((0.5 - y) * 2 * Math.PI)) - 90;
}

/**
 * Box size as a share of the world (width in turns, height in Mercator y).
 */
export function projectedSize(bounds: BoundingBox): { width: number; height: number } {
  return {
    width: boundsWidth(bounds) / 360,
    height: latToY(bounds.south) - latToY(bounds.north),
  };
}

/**
 * Zoom levels at which the box exactly fills the screen width / height.
 */
export function zoomForBounds(bounds: BoundingBox, screen: ScreenSize): { zoomForWidth: number; zoomForHeight: number } {
  const { width, height } = projectedSize(bounds);
  return {
    zoomForWidth: Math.log2(screen.width / (width * CONFIG.TILE_SIZE)),
    zoomForHeight: Math.log2(screen.height / (height * CONFIG.TILE_SIZE)),
  };
}

/**
 * Visual center of a box: midpoint in projected space, not in degrees.
 */
export function fitCenter(bounds: BoundingBox): Position {
  const y = (latToY(bounds.north) + latToY(bounds.south)) / 2;
  return { lat: yToLat(y), lng: boundsCenter(bounds).lng };
}

/**
 * Region shown by a camera at a center and zoom.
 */
export function visibleBounds(center: Position, zoom: number, screen: ScreenSize): BoundingBox {
  const world = CONFIG.TILE_SIZE * Math.pow(2, zoom);
  const halfLng = (screen.width / 2 / world) * 360;
  const y = latToY(center.lat);
  const halfY = screen.height / 2 / world;

  return {
    north: yToLat(y - halfY),
    south: yToLat(y + halfY),
    east: center.lng + halfLng,
    west: center.lng - halfLng,
  };
}

// --- Constraints ---

/**
 * Half of the current viewport, used as padding for the camera center.
 * Uninitialized viewports (absurdly large) give zero padding.
 */
export function viewportPadding(eventBounds: BoundingBox, viewport: BoundingBox | null, maxValidHalfExtent: number): ViewportPadding {
  if (!viewport) return ZERO_PADDING;

  const halfLat = boundsHeight(viewport) / 2;
  const halfLng = boundsWidth(viewport) / 2;

  if (!Number.isFinite(halfLat) || !Number.isFinite(halfLng) || halfLat < 0 || halfLng < 0) {
    log.debug('Ignoring malformed viewport');
    return ZERO_PADDING;
  }
  if (halfLat > maxValidHalfExtent || halfLng > maxValidHalfExtent) {
    log.debug(`Viewport half-extent ${halfLat.toFixed(1)}x${halfLng.toFixed(1)} looks uninitialized, using zero padding`);
    return ZERO_PADDING;
  }

  // Never let the padding invert the bounds
  return {
    lat: Math.min(halfLat, boundsHeight(eventBounds) * CONFIG.PADDING_MAX_RATIO),
    lng: Math.min(halfLng, boundsWidth(eventBounds) * CONFIG.PADDING_MAX_RATIO),
  };
}

export function shrinkBounds(bounds: BoundingBox, padding: ViewportPadding): BoundingBox {
  const { north, south, east, west } = unwrapBounds(bounds);
  return {
    north: north - padding.lat,
    south: south + padding.lat,
    east: east - padding.lng,
    west: west + padding.lng,
  };
}

const neutralConstraints = (eventBounds: BoundingBox): ViewportConstraints => ({
  minZoom: 0,
  centerBounds: WORLD_BOUNDS,
  padding: ZERO_PADDING,
  constrainedBounds: eventBounds,
  neutral: true,
});

/**
 * Minimum zoom and allowed camera centers for an event box on a screen.
 */
export function computeViewportConstraints(
  eventBounds: BoundingBox,
  screen: ScreenSize,
  mode: FitMode,
  currentViewport: BoundingBox | null,
  settings: Partial<EngineSettings> = {}
): ViewportConstraints {
  const { maxValidHalfExtent } = getEngineSettings(settings);
  const projected = projectedSize(eventBounds);

  // 1. Degenerate input
  const dimensions = [screen.width, screen.height, projected.width, projected.height];
  if (dimensions.some(d => !Number.isFinite(d) || d <= 0)) {
    log.debug('Zero or negative dimensions, returning neutral constraints');
    return neutralConstraints(eventBounds);
  }

  // 2. Minimum zoom
  const { zoomForWidth, zoomForHeight } = zoomForBounds(eventBounds, screen);
  const eventAspect = projected.width / projected.height;
  const screenAspect = screen.width / screen.height;

  let minZoom: number;
  let constrainedBounds: BoundingBox;

  if (mode === 'tight') {
    minZoom = Math.min(zoomForWidth, zoomForHeight);
    constrainedBounds = eventBounds;
  } else if (eventAspect > screenAspect) {
    // Wider than the screen: height governs, width is narrowed to height * screenAspect
    minZoom = zoomForHeight;
    const center = boundsCenter(eventBounds);
    const halfLng = (projected.height * screenAspect * 360) / 2;
    constrainedBounds = { ...eventBounds, west: center.lng - halfLng, east: center.lng + halfLng };
  } else {
    // Taller than the screen: width governs
    minZoom = zoomForWidth;
    const y = latToY(fitCenter(eventBounds).lat);
    const halfY = projected.width / screenAspect / 2;
    constrainedBounds = { ...unwrapBounds(eventBounds), north: yToLat(y - halfY), south: yToLat(y + halfY) };
  }

  // 3. Center bounds
  const padding = viewportPadding(eventBounds, currentViewport, maxValidHalfExtent);

  return {
    minZoom,
    centerBounds: shrinkBounds(eventBounds, padding),
    padding,
    constrainedBounds,
    neutral: false,
  };
}

// --- Clamping ---

/**
 * Nearest allowed camera center. Each axis clamps on its own, so corners stick on both.
 */
export function clampCenter(proposed: Position, bounds: BoundingBox): Position {
  if (isPositionInBounds(proposed, bounds)) return proposed;

  const { north, south, east, west } = unwrapBounds(bounds);
  const lng = nearestLongitude(proposed.lng, (west + east) / 2);

  return {
    lat: clamp(proposed.lat, south, north),
    lng: clamp(lng, west, east),
  };
}

export const nearestValidPoint = clampCenter;

/**
 * Camera center keeping a whole viewport inside the area.
 * A viewport larger than the area on an axis is centered on it instead.
 */
export function clampCameraToArea(viewport: BoundingBox, area: BoundingBox): Position {
  const view = unwrapBounds(viewport);
  const target = unwrapBounds(area);
  const center = boundsCenter(view);
  const areaCenter = boundsCenter(target);

  const halfLat = boundsHeight(view) / 2;
  const halfLng = boundsWidth(view) / 2;

  const lat = halfLat * 2 >= boundsHeight(target)
    ? areaCenter.lat
    : clamp(center.lat, target.south + halfLat, target.north - halfLat);

  const lng = halfLng * 2 >= boundsWidth(target)
    ? areaCenter.lng
    : clamp(nearestLongitude(center.lng, areaCenter.lng), target.west + halfLng, target.east - halfLng);

  return { lat, lng };
}

// --- Change Detection ---

const relativeChange = (previous: number, next: number): number => {
  if (previous === 0) return next === 0 ? 0 : Infinity;
  return Math.abs(next - previous) / Math.abs(previous);
};

/**
 * Screen jitter below the threshold is ignored to avoid recompute loops.
 */
export function hasSignificantResize(previous: ScreenSize | null, next: ScreenSize): boolean {
  if (!previous) return true;
  return relativeChange(previous.width, next.width) > CONFIG.CHANGE_THRESHOLD
    || relativeChange(previous.height, next.height) > CONFIG.CHANGE_THRESHOLD;
}

export function hasSignificantPaddingChange(previous: ViewportPadding, next: ViewportPadding): boolean {
  return relativeChange(previous.lat, next.lat) > CONFIG.CHANGE_THRESHOLD
    || relativeChange(previous.lng, next.lng) > CONFIG.CHANGE_THRESHOLD;
}

export function boundsAreSimilar(a: BoundingBox, b: BoundingBox, tolerance: number = CONFIG.BOUNDS_SIMILARITY_TOLERANCE): boolean {
  return Math.abs(a.north - b.north) < tolerance
    && Math.abs(a.south - b.south) < tolerance
    && Math.abs(a.east - b.east) < tolerance
    && Math.abs(a.west - b.west) < tolerance;
}

/**
 * Stateful wrapper fed by renderer callbacks (camera idle, resize).
 */
export class ViewportConstrainer {
  private screen: ScreenSize | null = null;
  private viewport: BoundingBox | null = null;
  private constraints: ViewportConstraints;
  private readonly settings: Partial<EngineSettings>;

  constructor(private readonly eventBounds: BoundingBox, private readonly mode: FitMode, settings: Partial<EngineSettings> = {}) {
    this.settings = settings;
    this.constraints = neutralConstraints(eventBounds);
  }

  getConstraints(): ViewportConstraints {
    return this.constraints;
  }

  /**
   * Returns true when the resize was significant and constraints were recomputed.
   */
  onResize(screen: ScreenSize): boolean {
    if (!hasSignificantResize(this.screen, screen)) return false;
    this.screen = screen;
    this.recompute();
    return true;
  }

  /**
   * Recomputes only when the padding moved enough to matter.
   */
  onCameraIdle(viewport: BoundingBox): ViewportConstraints {
    const { maxValidHalfExtent } = getEngineSettings(this.settings);
    const previous = this.constraints.padding;
    const next = viewportPadding(this.eventBounds, viewport, maxValidHalfExtent);

    this.viewport = viewport;
    if (this.constraints.neutral || hasSignificantPaddingChange(previous, next)) this.recompute();
    return this.constraints;
  }

  clamp(center: Position): Position {
    return clampCenter(center, this.constraints.centerBounds);
  }

  private recompute(): void {
    this.constraints = this.screen
      ? computeViewportConstraints(this.eventBounds, this.screen, this.mode, this.viewport, this.settings)
      : neutralConstraints(this.eventBounds);
  }
}
