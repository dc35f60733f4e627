/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @facade-match/spatial - Footprint, floor split and side classification
 */

export { AABBUtils } from './aabb.js';
export { computeFacadeBounds } from './bounds.js';
export { computeFloorSplit, classifyFloor, zStatistic } from './floor-split.js';
export type { FloorKey } from './floor-split.js';
export { classifySide, edgeDistances } from './side-classifier.js';
export type { SideClassifierOptions, EdgeDistances } from './side-classifier.js';
