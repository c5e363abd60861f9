/**
 * src/types.ts
 *
 * CANONICAL DATA SCHEMA
 * ------------------------------------------------------------------
 * Shared shapes for the wave engine and its consumers.
 *
 * Relationship:
 * - Produced by the engine ('@wavefront/engine').
 * - Event definitions are validated by the Runtime Validation Layer ('lib/schemas.ts').
 */

// --- Spatial System ---

export interface Position {
  lat: number; // -90..90
  lng: number; // Raw, never normalized (areas may span the antimeridian)
}

/**
 * A vertex produced by a cut.
 * Carries the identity of the cut line plus the two original vertices
 * of the edge it was interpolated on (west side / east side).
 */
export interface CutPosition extends Position {
  cutId: string;
  cutLeft: Position;
  cutRight: Position;
}

// Closed ring: first == last
export type Polygon = Position[];

export type Area = Polygon[];

/**
 * Same shape as map viewport bounds.
 * south <= north always holds; west > east means the box wraps the antimeridian.
 */
export interface BoundingBox {
  north: number;
  south: number;
  east: number;
  west: number;
}

// --- Wave System ---

export type WaveDirection = 'EAST' | 'WEST';

export type WaveKind =
  | { kind: 'linear'; speed: number; direction: WaveDirection }
  | { kind: 'deep'; speed: number; direction: WaveDirection }
  | { kind: 'split'; speed: number };

export type SnapshotMode = 'ADD' | 'RECOMPOSE';

export interface WaveSnapshot {
  timestamp: number; // epoch ms
  traversed: Area;
  remaining: Area;
  // Only set in ADD mode, the pieces crossed since the previous snapshot
  addedTraversed?: Area;
  mode: SnapshotMode;
  // Ids of the front cuts used, one per front
  frontIds: string[];
}

export type WavePhase = 'NotStarted' | 'InProgress' | 'Completed';

// --- Event System ---

export type EventStatus = 'next' | 'soon' | 'running' | 'done';

export interface WaveEvent {
  id: string;
  startsAt: number; // epoch ms, event start (warming starts here)
  timeZone: string;
  area: Area;
  wave: WaveKind;
}

export interface EventState {
  progression: number;
  status: EventStatus;
  isUserWarmingInProgress: boolean;
  isStartWarmingInProgress: boolean;
  userIsGoingToBeHit: boolean;
  userHasBeenHit: boolean;
  userPositionRatio: number;
  timeBeforeHit: number; // ms, Infinity when unknown
  hitDateTime: number | null; // epoch ms
  userIsInArea: boolean;
  timestamp: number;
}

export interface StateValidationIssue {
  field: string;
  issue: string;
  severity: 'WARNING' | 'ERROR';
}

// --- Map State & Viewport ---

export interface ScreenSize {
  width: number; // px
  height: number; // px
}

export type FitMode = 'tight' | 'aspect';

export interface ViewportPadding {
  lat: number;
  lng: number;
}

export interface ViewportConstraints {
  minZoom: number;
  centerBounds: BoundingBox;
  padding: ViewportPadding;
  // Event box narrowed to the constraining dimension (AspectFit), else the box itself
  constrainedBounds: BoundingBox;
  neutral: boolean;
}
