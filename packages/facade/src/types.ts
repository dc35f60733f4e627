/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type {
  BoundingBox,
  ElementType,
  FacadeBounds,
  FacadeConfig,
  FacadeWarning,
  FloorAssignment,
  NormalizedElement,
  RunMetrics,
  Side,
} from '@facade-match/data';
import type { DoorUnit } from '@facade-match/framing';

/** Panel, door unit or window after side and floor classification */
export interface PlacedElement {
  type: ElementType;
  /** Host element id, door unit id, or panel group id */
  id: number;
  /** Extent used for side normalization */
  bbox: BoundingBox;
  /** `null` only when an edge tolerance is configured and exceeded */
  side: Side | null;
  floor: FloorAssignment;
  /** Host element ids behind this entry */
  memberIds: number[];
}

export interface PanelLists {
  all: number[];
  floor1: number[];
  floor2: number[];
  both: number[];
  unknown: number[];
}

export interface FloorLists {
  all: number[];
  floor1: number[];
  floor2: number[];
}

/** Members of one facade side */
export interface SideSummary {
  side: Side;
  panels: PanelLists;
  windows: FloorLists;
  doors: FloorLists;
}

export type SideSummaryMap = Record<Side, SideSummary>;

export interface UnclassifiedEntry {
  type: ElementType;
  id: number;
}

export interface SideSummaryResult {
  sides: SideSummaryMap;
  /** Elements beyond the edge tolerance; always empty in nearest-side mode */
  unclassified: UnclassifiedEntry[];
}

/** Local horizontal extent of one side, from its own panels */
export interface SideExtent {
  side: Side;
  min: number;
  max: number;
  /** `max - min`; 0 for a side without panels */
  width: number;
  panelCount: number;
}

export type SideExtentMap = Record<Side, SideExtent>;

/** Per-side composition, ordered left to right */
export interface SideFingerprint {
  side: Side;
  counts: Record<ElementType, number>;
  sequence: ElementType[];
}

/** Everything derived from one model snapshot */
export interface FacadeAnalysis {
  config: FacadeConfig;
  bounds: FacadeBounds;
  floorSplitZ: number;
  doors: DoorUnit[];
  placed: PlacedElement[];
  summary: SideSummaryResult;
  extents: SideExtentMap;
  elements: NormalizedElement[];
  warnings: readonly FacadeWarning[];
  metrics: Readonly<RunMetrics>;
}
