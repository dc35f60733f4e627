/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Door framing types.
 *
 * Raw door-family elements are either studs (tall jambs) or headers (short
 * members across the top). Two studs and, when one is available, a header
 * form a {@link DoorOpening}.
 */

import type { Diagnostics, LocatedElement } from '@facade-match/data';

/** Two studs of one opening; `left` has the smaller center X */
export interface StudPair {
  left: LocatedElement;
  right: LocatedElement;
}

/** Header slot of an opening. An opening never carries a default header. */
export type DoorHeader =
  | { kind: 'matched'; member: LocatedElement; zDistance: number }
  | { kind: 'absent' };

export interface PlanPoint {
  x: number;
  y: number;
}

/** Composite door: left stud + right stud + header slot */
export interface DoorOpening {
  kind: 'opening';
  /** 1..N in pairing order */
  id: number;
  left: LocatedElement;
  right: LocatedElement;
  header: DoorHeader;
  /** Distance between the stud centers */
  widthMm: number;
  heightMm: number;
  /** Average of the two stud footprint centers */
  center: PlanPoint;
}

/** Door element taken as a whole, without stud/header grouping */
export interface SingleDoor {
  kind: 'single';
  /** 1..N in input order */
  id: number;
  element: LocatedElement;
  widthMm: number;
  heightMm: number;
  center: PlanPoint;
}

export type DoorUnit = DoorOpening | SingleDoor;

/** Studs and headers after the height split */
export interface FramingSplit {
  studs: LocatedElement[];
  headers: LocatedElement[];
}

/**
 * Turns studs into pairs. Implementations must warn about, not drop or
 * force, studs they cannot pair.
 */
export interface PairingStrategy {
  readonly name: string;
  pair(studs: readonly LocatedElement[], diagnostics: Diagnostics): StudPair[];
}
