/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { BoundingBox } from '@facade-match/data';

/**
 * Bounding box helpers
 */
export const AABBUtils = {
  centerX(box: BoundingBox): number {
    return (box.xmin + box.xmax) / 2;
  },

  centerY(box: BoundingBox): number {
    return (box.ymin + box.ymax) / 2;
  },

  centerZ(box: BoundingBox): number {
    return (box.zmin + box.zmax) / 2;
  },

  width(box: BoundingBox): number {
    return box.xmax - box.xmin;
  },

  depth(box: BoundingBox): number {
    return box.ymax - box.ymin;
  },

  height(box: BoundingBox): number {
    return box.zmax - box.zmin;
  },

  /** Whether a plan point lies inside the box footprint (edges included) */
  containsXY(box: BoundingBox, x: number, y: number): boolean {
    return x >= box.xmin && x <= box.xmax && y >= box.ymin && y <= box.ymax;
  },

  /** Smallest box enclosing all given boxes; `null` for an empty list */
  union(boxes: readonly BoundingBox[]): BoundingBox | null {
    if (boxes.length === 0) return null;
    const result: BoundingBox = { ...boxes[0] };
    for (let i = 1; i < boxes.length; i++) {
      const b = boxes[i];
      if (b.xmin < result.xmin) result.xmin = b.xmin;
      if (b.xmax > result.xmax) result.xmax = b.xmax;
      if (b.ymin < result.ymin) result.ymin = b.ymin;
      if (b.ymax > result.ymax) result.ymax = b.ymax;
      if (b.zmin < result.zmin) result.zmin = b.zmin;
      if (b.zmax > result.zmax) result.zmax = b.zmax;
    }
    return result;
  },
};
