/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Structured model export
 *
 * Per side: local width, element count, and the elements in tag order with
 * their side-local positions. This is the document detections are matched
 * against.
 */

import { floorNumber, type FloorAssignment, type NormalizedElement, type Side } from '@facade-match/data';
import type { FacadeAnalysis } from '@facade-match/facade';
import type { BimExport, BimExportElement, BimExportSide, ExportFloor } from './types.js';

function exportFloor(floor: FloorAssignment): ExportFloor {
  return floorNumber(floor) ?? (floor === 'both' ? 'both' : 'unknown');
}

function toElement(e: NormalizedElement): BimExportElement {
  return {
    tag: e.tag,
    type: e.type,
    id: e.id,
    floor: exportFloor(e.floor),
    xmin: e.xmin,
    xmax: e.xmax,
    position: e.position,
  };
}

function toSide(side: Side, analysis: Pick<FacadeAnalysis, 'extents' | 'elements'>): BimExportSide {
  const elements = analysis.elements
    .filter(e => e.side === side)
    .sort((a, b) => a.tag - b.tag)
    .map(toElement);
  return {
    width_mm: analysis.extents[side].width,
    element_count: elements.length,
    elements,
  };
}

export function toBimExport(analysis: Pick<FacadeAnalysis, 'extents' | 'elements'>): BimExport {
  const { extents } = analysis;
  return {
    side_widths: {
      A: extents.A.width,
      B: extents.B.width,
      C: extents.C.width,
      D: extents.D.width,
    },
    sides: {
      A: toSide('A', analysis),
      B: toSide('B', analysis),
      C: toSide('C', analysis),
      D: toSide('D', analysis),
    },
  };
}
