/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import {
  InsufficientDataError,
  type BoundingBox,
  type LocatedElement,
  type ZStatistic,
} from '@facade-match/data';
import { AABBUtils } from './aabb.js';

export type FloorKey = 'floor1' | 'floor2';

/** Per-element vertical statistic: box center or box bottom */
export function zStatistic(bbox: BoundingBox, statistic: ZStatistic): number {
  return statistic === 'center' ? AABBUtils.centerZ(bbox) : bbox.zmin;
}

/**
 * Z threshold separating the two floors.
 *
 * Median of the chosen statistic over all panels. For an even count this is
 * the upper of the two middle values (`sorted[n >> 1]`), so the split is
 * always an actual panel value.
 *
 * @throws InsufficientDataError when no panel is given
 */
export function computeFloorSplit(
  panels: readonly LocatedElement[],
  statistic: ZStatistic = 'bottom',
): number {
  const values = panels.map(p => zStatistic(p.bbox, statistic));
  if (values.length === 0) {
    throw new InsufficientDataError();
  }
  values.sort((a, b) => a - b);
  return values[values.length >> 1];
}

/** floor1 when strictly below the split, floor2 otherwise */
export function classifyFloor(value: number, split: number): FloorKey {
  return value < split ? 'floor1' : 'floor2';
}
