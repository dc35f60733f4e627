/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Side-local horizontal coordinates.
 *
 * Each side gets its own extent from the panels assigned to it, so a
 * detector's normalized image X can be compared with a model element
 * without knowing the image scale.
 */

import {
  ELEMENT_TYPES,
  SIDES,
  type Diagnostics,
  type NormalizedElement,
  type Side,
} from '@facade-match/data';
import type { PlacedElement, SideExtent, SideExtentMap } from './types.js';

const COMPONENT = 'SideNormalizer';

function extentOf(side: Side, panels: readonly PlacedElement[]): SideExtent {
  let min = Infinity;
  let max = -Infinity;
  let panelCount = 0;
  for (const p of panels) {
    if (p.side !== side || p.type !== 'wall_panels') continue;
    panelCount++;
    if (p.bbox.xmin < min) min = p.bbox.xmin;
    if (p.bbox.xmax > max) max = p.bbox.xmax;
  }
  if (panelCount === 0) {
    return { side, min: 0, max: 0, width: 0, panelCount };
  }
  return { side, min, max, width: max - min, panelCount };
}

/**
 * Extent of every side from world X of its own panels.
 * Sides without panels get a zero extent and an EMPTY_SIDE warning.
 */
export function computeSideExtents(
  panels: readonly PlacedElement[],
  diagnostics: Diagnostics,
): SideExtentMap {
  const extents: SideExtentMap = {
    A: extentOf('A', panels),
    B: extentOf('B', panels),
    C: extentOf('C', panels),
    D: extentOf('D', panels),
  };
  for (const side of SIDES) {
    if (extents[side].panelCount === 0) {
      diagnostics.warn(COMPONENT, 'EMPTY_SIDE', `Side ${side} has no panels, positions default to 0`);
    }
  }
  return extents;
}

/**
 * Center of `[xmin, xmax]` as a fraction of the side extent.
 *
 * Values outside [0, 1] are kept (e.g. a door frame overhanging the panels).
 * A zero-width side yields 0.
 */
export function normalizePosition(xmin: number, xmax: number, extent: SideExtent): number {
  if (extent.width === 0) return 0;
  return ((xmin + xmax) / 2 - extent.min) / extent.width;
}

/**
 * One normalized element per placed element that has a side.
 *
 * Output order is input order. Tags number the elements of each side
 * 1..N by position; equal positions fall back to type order
 * (panels, doors, windows), then id.
 */
export function buildNormalizedElements(
  placed: readonly PlacedElement[],
  extents: SideExtentMap,
): NormalizedElement[] {
  const elements: NormalizedElement[] = [];
  for (const p of placed) {
    if (p.side === null) continue;
    elements.push({
      type: p.type,
      id: p.id,
      side: p.side,
      floor: p.floor,
      xmin: p.bbox.xmin,
      xmax: p.bbox.xmax,
      position: normalizePosition(p.bbox.xmin, p.bbox.xmax, extents[p.side]),
      tag: 0,
    });
  }

  for (const side of SIDES) {
    elements
      .filter(e => e.side === side)
      .sort(compareAlongSide)
      .forEach((e, index) => {
        e.tag = index + 1;
      });
  }

  return elements;
}

/** Left-to-right order used for tags and sequences */
export function compareAlongSide(a: NormalizedElement, b: NormalizedElement): number {
  return (
    a.position - b.position ||
    ELEMENT_TYPES.indexOf(a.type) - ELEMENT_TYPES.indexOf(b.type) ||
    a.id - b.id
  );
}
