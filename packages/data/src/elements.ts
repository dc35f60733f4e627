/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Diagnostics } from './diagnostics.js';
import type { ElementInput, Floor, FloorAssignment, LocatedElement } from './types.js';

/**
 * Keep elements that carry a bounding box.
 * Each dropped element is recorded as a MISSING_BBOX warning.
 */
export function locateElements(
  inputs: readonly ElementInput[],
  component: string,
  diagnostics: Diagnostics,
): LocatedElement[] {
  const located: LocatedElement[] = [];
  for (const input of inputs) {
    if (!input.bbox) {
      diagnostics.warn(component, 'MISSING_BBOX', `Element ${input.id} has no bounding box, skipped`, input.id);
      diagnostics.count('skippedElements');
      continue;
    }
    located.push({ id: input.id, bbox: input.bbox });
  }
  return located;
}

/** Whether an element's floor assignment admits the given floor */
export function floorAccepts(assignment: FloorAssignment, floor: Floor): boolean {
  switch (assignment) {
    case 'floor1':
      return floor === 1;
    case 'floor2':
      return floor === 2;
    case 'both':
      return true;
    case 'unknown':
      return false;
  }
}

/** Numeric floor for a single-floor assignment, `null` otherwise */
export function floorNumber(assignment: FloorAssignment): Floor | null {
  if (assignment === 'floor1') return 1;
  if (assignment === 'floor2') return 2;
  return null;
}
