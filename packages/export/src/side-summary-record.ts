/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Side } from '@facade-match/data';
import type { SideSummary, SideSummaryMap } from '@facade-match/facade';
import type { SideSummaryRecord } from './types.js';

function toRecord({ panels, windows, doors }: SideSummary): SideSummaryRecord {
  return {
    panels: [...panels.all],
    panels_floor1: [...panels.floor1],
    panels_floor2: [...panels.floor2],
    panels_both: [...panels.both],
    panels_unknown: [...panels.unknown],
    windows: [...windows.all],
    windows_floor1: [...windows.floor1],
    windows_floor2: [...windows.floor2],
    door: [...doors.all],
    door_floor1: [...doors.floor1],
    door_floor2: [...doors.floor2],
  };
}

/** Side summary in the `side_summary.json` layout */
export function toSideSummaryRecord(summary: SideSummaryMap): Record<Side, SideSummaryRecord> {
  return {
    A: toRecord(summary.A),
    B: toRecord(summary.B),
    C: toRecord(summary.C),
    D: toRecord(summary.D),
  };
}
