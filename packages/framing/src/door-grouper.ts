/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import {
  InsufficientStudsError,
  type BoundingBox,
  type Diagnostics,
  type FacadeConfig,
  type LocatedElement,
  type ZStatistic,
} from '@facade-match/data';
import { AABBUtils, zStatistic } from '@facade-match/spatial';
import { assignHeaders } from './header-assignment.js';
import { createPairingStrategy } from './pairing.js';
import { splitStudsAndHeaders } from './stud-splitter.js';
import type { DoorUnit, SingleDoor } from './types.js';

const COMPONENT = 'DoorGrouper';

/**
 * Compose door-family elements into door units.
 *
 * `composite` mode: split by height, pair studs with the configured
 * strategy, then assign headers greedily. `individual` mode keeps every
 * element as its own door.
 *
 * @throws InsufficientStudsError when door elements exist but fewer than two are studs
 */
export function groupDoorComponents(
  elements: readonly LocatedElement[],
  doors: FacadeConfig['doors'],
  diagnostics: Diagnostics,
): DoorUnit[] {
  const log = diagnostics.logger(COMPONENT);

  if (elements.length === 0) {
    diagnostics.warn(COMPONENT, 'NO_DOOR_ELEMENTS', 'No door elements supplied, no openings built');
    return [];
  }

  if (doors.mode === 'individual') {
    const singles = elements.map((element, index) => buildSingleDoor(index + 1, element));
    diagnostics.count('openings', singles.length);
    log.info(`Created ${singles.length} individual doors`, { operation: 'group' });
    return singles;
  }

  const { studs, headers } = splitStudsAndHeaders(elements, doors.studHeightThreshold, diagnostics);
  if (studs.length < 2) {
    throw new InsufficientStudsError(studs.length);
  }
  if (headers.length === 0) {
    diagnostics.warn(COMPONENT, 'NO_HEADERS', 'No headers found, openings are built from studs only');
  }

  const strategy = createPairingStrategy(doors);
  const pairs = strategy.pair(studs, diagnostics);
  const openings = assignHeaders(pairs, headers, diagnostics);

  diagnostics.count('openings', openings.length);
  log.info(`Created ${openings.length} openings from ${studs.length} studs (${strategy.name} pairing)`, {
    operation: 'group',
  });
  return openings;
}

function buildSingleDoor(id: number, element: LocatedElement): SingleDoor {
  return {
    kind: 'single',
    id,
    element,
    widthMm: AABBUtils.width(element.bbox),
    heightMm: AABBUtils.height(element.bbox),
    center: { x: AABBUtils.centerX(element.bbox), y: AABBUtils.centerY(element.bbox) },
  };
}

/** Elements that make up a door unit, header last */
export function doorUnitMembers(unit: DoorUnit): LocatedElement[] {
  if (unit.kind === 'single') return [unit.element];
  return unit.header.kind === 'matched'
    ? [unit.left, unit.right, unit.header.member]
    : [unit.left, unit.right];
}

/** Union of the unit's member boxes */
export function doorUnitBounds(unit: DoorUnit): BoundingBox {
  const members = doorUnitMembers(unit);
  return AABBUtils.union(members.map(m => m.bbox)) ?? members[0].bbox;
}

/**
 * Vertical statistic of a door unit, comparable with the floor split:
 * mean member center for `center`, lowest member bottom for `bottom`.
 */
export function doorUnitZStatistic(unit: DoorUnit, statistic: ZStatistic): number {
  const members = doorUnitMembers(unit);
  if (statistic === 'bottom') {
    return Math.min(...members.map(m => m.bbox.zmin));
  }
  let sum = 0;
  for (const m of members) sum += zStatistic(m.bbox, 'center');
  return sum / members.length;
}
