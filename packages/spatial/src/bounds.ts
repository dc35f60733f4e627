/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import {
  NoGeometryError,
  type BoundsStrategy,
  type FacadeBounds,
  type LocatedElement,
} from '@facade-match/data';
import { AABBUtils } from './aabb.js';

/**
 * Building footprint from panel geometry.
 *
 * - `extents`: min/max over every panel's raw X and Y extremes
 * - `midpoints`: min/max over panel footprint centers, which keeps the
 *   footprint on the panels' centerlines
 *
 * @throws NoGeometryError when `panels` is empty
 */
export function computeFacadeBounds(
  panels: readonly LocatedElement[],
  strategy: BoundsStrategy = 'extents',
): FacadeBounds {
  if (panels.length === 0) {
    throw new NoGeometryError();
  }

  let xmin = Infinity;
  let xmax = -Infinity;
  let ymin = Infinity;
  let ymax = -Infinity;

  for (const { bbox } of panels) {
    const lowX = strategy === 'extents' ? bbox.xmin : AABBUtils.centerX(bbox);
    const highX = strategy === 'extents' ? bbox.xmax : lowX;
    const lowY = strategy === 'extents' ? bbox.ymin : AABBUtils.centerY(bbox);
    const highY = strategy === 'extents' ? bbox.ymax : lowY;

    if (lowX < xmin) xmin = lowX;
    if (highX > xmax) xmax = highX;
    if (lowY < ymin) ymin = lowY;
    if (highY > ymax) ymax = highY;
  }

  return { xmin, xmax, ymin, ymax };
}
