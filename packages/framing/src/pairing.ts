/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import {
  StudTopologyError,
  type Diagnostics,
  type FacadeConfig,
  type LocatedElement,
} from '@facade-match/data';
import { AABBUtils } from '@facade-match/spatial';
import type { PairingStrategy, StudPair } from './types.js';

const COMPONENT = 'DoorGrouper';

function byCenterX(a: LocatedElement, b: LocatedElement): number {
  return AABBUtils.centerX(a.bbox) - AABBUtils.centerX(b.bbox);
}

/** Order two studs left/right; on equal X the first stays left */
function orderPair(a: LocatedElement, b: LocatedElement): StudPair {
  return byCenterX(b, a) < 0 ? { left: b, right: a } : { left: a, right: b };
}

/**
 * Walk studs sorted by (center Z, center X). Adjacent studs within the
 * same-floor tolerance form a pair; a stud with no partner is skipped with
 * an UNPAIRED_STUD warning.
 */
export class SequentialPairing implements PairingStrategy {
  readonly name = 'sequential';

  constructor(private readonly sameFloorTolerance: number) {}

  pair(studs: readonly LocatedElement[], diagnostics: Diagnostics): StudPair[] {
    const sorted = [...studs].sort(
      (a, b) => AABBUtils.centerZ(a.bbox) - AABBUtils.centerZ(b.bbox) || byCenterX(a, b),
    );

    const pairs: StudPair[] = [];
    let i = 0;
    while (i < sorted.length) {
      const first = sorted[i];
      const second = i + 1 < sorted.length ? sorted[i + 1] : undefined;

      if (second) {
        const dz = Math.abs(AABBUtils.centerZ(first.bbox) - AABBUtils.centerZ(second.bbox));
        if (dz < this.sameFloorTolerance) {
          pairs.push(orderPair(first, second));
          i += 2;
          continue;
        }
      }

      diagnostics.warn(COMPONENT, 'UNPAIRED_STUD', `Stud ${first.id} has no pair on the same floor, skipping`, first.id);
      diagnostics.count('unpairedStuds');
      i += 1;
    }

    return pairs;
  }
}

/**
 * Fixed topology: exactly `rowCount` rows of two studs (e.g. one door per
 * floor on a two-storey model). Studs are cut into rows by center Z and
 * ordered by center X within each row.
 */
export class RowPairing implements PairingStrategy {
  readonly name = 'rows';

  constructor(private readonly rowCount: number) {}

  pair(studs: readonly LocatedElement[]): StudPair[] {
    const expected = this.rowCount * 2;
    if (studs.length !== expected) {
      throw new StudTopologyError(expected, studs.length);
    }

    const sorted = [...studs].sort((a, b) => AABBUtils.centerZ(a.bbox) - AABBUtils.centerZ(b.bbox));
    const pairs: StudPair[] = [];
    for (let row = 0; row < this.rowCount; row++) {
      pairs.push(orderPair(sorted[row * 2], sorted[row * 2 + 1]));
    }
    return pairs;
  }
}

export function createPairingStrategy(doors: FacadeConfig['doors']): PairingStrategy {
  switch (doors.pairing) {
    case 'sequential':
      return new SequentialPairing(doors.sameFloorTolerance);
    case 'rows':
      return new RowPairing(doors.rowCount);
  }
}
