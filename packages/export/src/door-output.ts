/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { DoorUnit } from '@facade-match/framing';
import type { DoorOutputRecord } from './types.js';

/** Door units in the `door_output.json` layout; absent headers are `null` */
export function toDoorOutput(doors: readonly DoorUnit[]): DoorOutputRecord[] {
  return doors.map((unit): DoorOutputRecord => {
    if (unit.kind === 'single') {
      return {
        door: unit.id,
        kind: unit.kind,
        stud_left: null,
        stud_right: null,
        header: null,
        element: unit.element.id,
        width_mm: unit.widthMm,
        height_mm: unit.heightMm,
      };
    }
    return {
      door: unit.id,
      kind: unit.kind,
      stud_left: unit.left.id,
      stud_right: unit.right.id,
      header: unit.header.kind === 'matched' ? unit.header.member.id : null,
      width_mm: unit.widthMm,
      height_mm: unit.heightMm,
    };
  });
}
