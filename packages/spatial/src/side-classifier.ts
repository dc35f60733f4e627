/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { FacadeBounds, Side } from '@facade-match/data';

export interface SideClassifierOptions {
  /**
   * Max distance (mm) to the nearest edge. Points further away are
   * unclassified (`null`). `null` keeps the total nearest-side mapping.
   */
  edgeTolerance: number | null;
}

export interface EdgeDistances {
  A: number;
  B: number;
  C: number;
  D: number;
}

/** Tie-break priority: left, right, bottom, top */
const SIDE_PRIORITY: readonly Side[] = ['A', 'C', 'B', 'D'];

/** Absolute distances from a plan point to each footprint edge */
export function edgeDistances(x: number, y: number, bounds: FacadeBounds): EdgeDistances {
  return {
    A: Math.abs(x - bounds.xmin),
    B: Math.abs(y - bounds.ymin),
    C: Math.abs(x - bounds.xmax),
    D: Math.abs(y - bounds.ymax),
  };
}

/**
 * Nearest facade side for a plan point.
 *
 * Equal distances resolve in the fixed order A, C, B, D. Without an edge
 * tolerance the mapping is total; with one, points further than the
 * tolerance from every edge return `null`.
 */
export function classifySide(x: number, y: number, bounds: FacadeBounds): Side;
export function classifySide(
  x: number,
  y: number,
  bounds: FacadeBounds,
  options: SideClassifierOptions,
): Side | null;
export function classifySide(
  x: number,
  y: number,
  bounds: FacadeBounds,
  options?: SideClassifierOptions,
): Side | null {
  const distances = edgeDistances(x, y, bounds);

  let best: Side = SIDE_PRIORITY[0];
  for (let i = 1; i < SIDE_PRIORITY.length; i++) {
    const side = SIDE_PRIORITY[i];
    if (distances[side] < distances[best]) {
      best = side;
    }
  }

  const tolerance = options?.edgeTolerance ?? null;
  if (tolerance !== null && distances[best] > tolerance) {
    return null;
  }
  return best;
}
