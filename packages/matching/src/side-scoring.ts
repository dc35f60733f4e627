/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import {
  NO_SIDE,
  SIDES,
  type ClassifiedSide,
  type Detection,
  type ElementType,
  type FacadeConfig,
  type NormalizedElement,
  type Side,
} from '@facade-match/data';
import { resolveLabel } from './labels.js';

export interface SideScoreResult {
  /** Winning side, or NO-SIDE below the confidence threshold */
  classifiedSide: ClassifiedSide;
  /** Best side score (also reported when the result is NO-SIDE) */
  score: number;
  scores: Record<Side, number>;
}

/**
 * Presence-based side scoring.
 *
 * Each detection adds its type weight to every side holding at least one
 * element of that type; how many such elements a side has does not matter.
 * Detections with unknown labels add nothing. Ties go to the first side in
 * A, B, C, D order. An empty batch is NO-SIDE with score 0.
 */
export function scoreSides(
  detections: readonly Detection[],
  elements: readonly NormalizedElement[],
  matching: FacadeConfig['matching'],
): SideScoreResult {
  const scores: Record<Side, number> = { A: 0, B: 0, C: 0, D: 0 };
  if (detections.length === 0) {
    return { classifiedSide: NO_SIDE, score: 0, scores };
  }

  const present = new Map<Side, Set<ElementType>>(SIDES.map(side => [side, new Set<ElementType>()]));
  for (const e of elements) {
    present.get(e.side)?.add(e.type);
  }

  for (const detection of detections) {
    const type = resolveLabel(detection.label, matching.labelAliases);
    if (type === undefined) continue;
    const weight = matching.sideWeights[type];
    for (const side of SIDES) {
      if (present.get(side)?.has(type)) {
        scores[side] += weight;
      }
    }
  }

  let best: Side = SIDES[0];
  for (const side of SIDES) {
    if (scores[side] > scores[best]) best = side;
  }
  const score = scores[best];

  return {
    classifiedSide: score < matching.confidenceThreshold ? NO_SIDE : best,
    score,
    scores,
  };
}
