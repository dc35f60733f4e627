/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Core types shared by every facade-match package.
 *
 * All lengths are millimeters in the host model's world frame. Normalized
 * positions are unitless fractions of a facade side's own extent.
 */

// ============================================================================
// Geometry
// ============================================================================

/** Axis-aligned bounding box in millimeters */
export interface BoundingBox {
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
  zmin: number;
  zmax: number;
}

/** Element as handed over by the host collaborator. `bbox` may be missing. */
export interface ElementInput {
  id: number;
  bbox?: BoundingBox | null;
}

/** Element whose bounding box is known */
export interface LocatedElement {
  readonly id: number;
  readonly bbox: BoundingBox;
}

/** Building footprint in plan (min/max X and Y) */
export interface FacadeBounds {
  xmin: number;
  xmax: number;
  ymin: number;
  ymax: number;
}

/** Raw host model snapshot for one run */
export interface FacadeModelInput {
  panels: ElementInput[];
  doors?: ElementInput[];
  windows?: ElementInput[];
}

// ============================================================================
// Sides and floors
// ============================================================================

/**
 * Facade side in plan view.
 * A = min-X edge, B = min-Y edge, C = max-X edge, D = max-Y edge.
 */
export type Side = 'A' | 'B' | 'C' | 'D';

/** All sides in reporting order */
export const SIDES: readonly Side[] = ['A', 'B', 'C', 'D'];

/** Sentinel for a detection batch that belongs to no exterior side */
export const NO_SIDE = 'NO-SIDE';

export type ClassifiedSide = Side | typeof NO_SIDE;

export type Floor = 1 | 2;

/**
 * Floor membership of a classified element. `both` and `unknown` only occur
 * for panels under the stud-based floor strategy.
 */
export type FloorAssignment = 'floor1' | 'floor2' | 'both' | 'unknown';

// ============================================================================
// Elements and detections
// ============================================================================

/** Element type vocabulary shared with the detector */
export type ElementType = 'wall_panels' | 'door' | 'window';

export const ELEMENT_TYPES = ['wall_panels', 'door', 'window'] as const satisfies readonly ElementType[];

/** Element placed on a side with its side-local position */
export interface NormalizedElement {
  type: ElementType;
  /** Element id (panels, windows) or door unit id */
  id: number;
  side: Side;
  floor: FloorAssignment;
  xmin: number;
  xmax: number;
  /** Center relative to the side extent; not clamped */
  position: number;
  /** 1..N along the side, ordered by position */
  tag: number;
}

/** JSON-compatible value */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** External 2D detection */
export interface Detection {
  /** Detector-assigned id, passed through unchanged */
  id: JsonValue;
  label: string;
  /** `null` when the detector did not report a floor */
  floor: Floor | null;
  /** Normalized horizontal image position */
  x: number;
  /** Normalized vertical image position, when reported */
  y?: number;
}

/** Outcome for one detection; always produced */
export interface MatchRecord {
  detectionId: JsonValue;
  label: string;
  elementId: number | null;
  tag: number | null;
  distance: number | null;
  /** Present only when `elementId` is null */
  reason?: string;
}
