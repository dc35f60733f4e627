/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @facade-match/framing - Door framing members to door openings
 *
 * @example
 * ```ts
 * import { groupDoorComponents } from '@facade-match/framing';
 * import { Diagnostics, resolveConfig } from '@facade-match/data';
 *
 * const diagnostics = new Diagnostics();
 * const doors = groupDoorComponents(doorElements, resolveConfig().doors, diagnostics);
 * // doors[0].kind === 'opening', doors[0].header.kind === 'matched' | 'absent'
 * ```
 */

export type {
  StudPair,
  DoorHeader,
  DoorOpening,
  SingleDoor,
  DoorUnit,
  FramingSplit,
  PairingStrategy,
  PlanPoint,
} from './types.js';

export { splitStudsAndHeaders } from './stud-splitter.js';
export { SequentialPairing, RowPairing, createPairingStrategy } from './pairing.js';
export { assignHeaders, buildOpening } from './header-assignment.js';
export {
  groupDoorComponents,
  doorUnitMembers,
  doorUnitBounds,
  doorUnitZStatistic,
} from './door-grouper.js';
