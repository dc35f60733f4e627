/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { SIDES, type Diagnostics, type Side } from '@facade-match/data';
import type { FloorLists, PlacedElement, SideSummary, SideSummaryMap, SideSummaryResult } from './types.js';

const COMPONENT = 'SideSummary';

function emptyFloorLists(): FloorLists {
  return { all: [], floor1: [], floor2: [] };
}

function emptySummary(side: Side): SideSummary {
  return {
    side,
    panels: { all: [], floor1: [], floor2: [], both: [], unknown: [] },
    windows: emptyFloorLists(),
    doors: emptyFloorLists(),
  };
}

/**
 * Record every placed element into its side's lists.
 *
 * Each element lands in exactly one side and, within it, exactly one floor
 * list. Elements without a side (edge tolerance exceeded) are collected in
 * `unclassified` and reported.
 */
export function buildSideSummary(
  placed: readonly PlacedElement[],
  diagnostics: Diagnostics,
): SideSummaryResult {
  const sides: SideSummaryMap = {
    A: emptySummary('A'),
    B: emptySummary('B'),
    C: emptySummary('C'),
    D: emptySummary('D'),
  };
  const unclassified: SideSummaryResult['unclassified'] = [];

  for (const element of placed) {
    if (element.side === null) {
      unclassified.push({ type: element.type, id: element.id });
      diagnostics.warn(
        COMPONENT,
        'SIDE_UNCLASSIFIED',
        `${element.type} ${element.id} is beyond the edge tolerance`,
        element.id,
      );
      diagnostics.count('unclassifiedElements');
      continue;
    }

    const summary = sides[element.side];
    switch (element.type) {
      case 'wall_panels':
        summary.panels.all.push(element.id);
        summary.panels[element.floor].push(element.id);
        break;
      case 'window':
      case 'door': {
        const lists = element.type === 'window' ? summary.windows : summary.doors;
        lists.all.push(element.id);
        if (element.floor === 'floor1' || element.floor === 'floor2') {
          lists[element.floor].push(element.id);
        }
        break;
      }
    }
  }

  const log = diagnostics.logger(COMPONENT);
  for (const side of SIDES) {
    const { panels, windows, doors } = sides[side];
    log.info(
      `Side ${side}: ${panels.all.length} panels (floor1=${panels.floor1.length}, floor2=${panels.floor2.length}), ` +
        `${windows.all.length} windows, ${doors.all.length} doors`,
    );
  }

  return { sides, unclassified };
}
