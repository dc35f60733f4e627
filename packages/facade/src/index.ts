/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @facade-match/facade - Side summary and side-local positions of a facade model
 */

export type {
  PlacedElement,
  PanelLists,
  FloorLists,
  SideSummary,
  SideSummaryMap,
  SideSummaryResult,
  UnclassifiedEntry,
  SideExtent,
  SideExtentMap,
  SideFingerprint,
  FacadeAnalysis,
} from './types.js';

export { placePanels, placeDoors, placeWindows } from './placement.js';
export type { PlacementContext } from './placement.js';
export { groupPanels } from './panel-groups.js';
export { buildSideSummary } from './side-summary.js';
export {
  computeSideExtents,
  normalizePosition,
  buildNormalizedElements,
  compareAlongSide,
} from './side-normalizer.js';
export { buildSideFingerprint } from './fingerprint.js';
export { analyzeFacade } from './pipeline.js';
export type { AnalyzeOptions } from './pipeline.js';
