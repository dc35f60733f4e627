/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * JSON record shapes read by downstream consumers. Field names are part of
 * the file format and stay snake_case.
 */

import type { ClassifiedSide, ElementType, Floor, JsonValue, Side, WarningCode } from '@facade-match/data';
import type { DoorUnit } from '@facade-match/framing';

export interface SideSummaryRecord {
  panels: number[];
  panels_floor1: number[];
  panels_floor2: number[];
  panels_both: number[];
  panels_unknown: number[];
  windows: number[];
  windows_floor1: number[];
  windows_floor2: number[];
  door: number[];
  door_floor1: number[];
  door_floor2: number[];
}

/** Floor as written to files: a storey number, or the panel-only states */
export type ExportFloor = Floor | 'both' | 'unknown';

export interface BimExportElement {
  tag: number;
  type: ElementType;
  id: number;
  floor: ExportFloor;
  xmin: number;
  xmax: number;
  position: number;
}

export interface BimExportSide {
  width_mm: number;
  element_count: number;
  elements: BimExportElement[];
}

export interface BimExport {
  side_widths: Record<Side, number>;
  sides: Record<Side, BimExportSide>;
}

export interface DoorOutputRecord {
  door: number;
  kind: DoorUnit['kind'];
  stud_left: number | null;
  stud_right: number | null;
  header: number | null;
  /** Door element id, individual mode only */
  element?: number;
  width_mm: number;
  height_mm: number;
}

export interface MatchEntry {
  /** Detection id as given by the detector */
  yolo_id: JsonValue;
  label: string;
  bim_id: number | null;
  bim_tag: number | null;
  distance: number | null;
  note?: string;
}

export interface WarningRecord {
  code: WarningCode;
  component: string;
  message: string;
  element_id?: number;
}

export interface MatchReport {
  classified_side: ClassifiedSide;
  side_score: number;
  side_scores: Record<Side, number>;
  matches: MatchEntry[];
  warnings: WarningRecord[];
  /** ISO 8601 */
  timestamp?: string;
}

export interface SideSequences {
  summary: { doors: number; windows: number; panels: number };
  sides: Record<Side, ElementType[]>;
}

export interface DiagnosticsReport {
  metrics: Record<string, number>;
  unclassified: Array<{ type: ElementType; id: number }>;
  warnings: WarningRecord[];
}
