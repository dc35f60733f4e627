/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Diagnostics, LocatedElement } from '@facade-match/data';
import { AABBUtils } from '@facade-match/spatial';
import type { DoorHeader, DoorOpening, StudPair } from './types.js';

const COMPONENT = 'DoorGrouper';

/**
 * Greedy one-to-one header assignment.
 *
 * Headers live in an arena indexed by position with a parallel `used`
 * marker. Pairs are served in pairing order; each takes the unused header
 * whose center Z is closest to the lower of its two stud tops (first index
 * wins on equal distance). No header is ever assigned twice.
 */
export function assignHeaders(
  pairs: readonly StudPair[],
  headers: readonly LocatedElement[],
  diagnostics: Diagnostics,
): DoorOpening[] {
  const used = new Array<boolean>(headers.length).fill(false);
  const openings: DoorOpening[] = [];

  for (let p = 0; p < pairs.length; p++) {
    const { left, right } = pairs[p];
    const id = p + 1;
    const studTop = Math.min(left.bbox.zmax, right.bbox.zmax);

    let bestIndex = -1;
    let bestDistance = Infinity;
    for (let h = 0; h < headers.length; h++) {
      if (used[h]) continue;
      const distance = Math.abs(AABBUtils.centerZ(headers[h].bbox) - studTop);
      if (distance < bestDistance) {
        bestDistance = distance;
        bestIndex = h;
      }
    }

    let header: DoorHeader;
    if (bestIndex >= 0) {
      used[bestIndex] = true;
      header = { kind: 'matched', member: headers[bestIndex], zDistance: bestDistance };
    } else {
      header = { kind: 'absent' };
      diagnostics.warn(COMPONENT, 'HEADER_UNAVAILABLE', `No header left for door ${id}`);
      diagnostics.count('openingsWithoutHeader');
    }

    openings.push(buildOpening(id, left, right, header));
  }

  return openings;
}

/**
 * Width is the distance between stud centers. Height runs from the lowest
 * stud bottom to the header bottom, or is the taller stud's height when the
 * opening has no header.
 */
export function buildOpening(
  id: number,
  left: LocatedElement,
  right: LocatedElement,
  header: DoorHeader,
): DoorOpening {
  const leftX = AABBUtils.centerX(left.bbox);
  const rightX = AABBUtils.centerX(right.bbox);

  const heightMm = header.kind === 'matched'
    ? Math.abs(header.member.bbox.zmin - Math.min(left.bbox.zmin, right.bbox.zmin))
    : Math.max(AABBUtils.height(left.bbox), AABBUtils.height(right.bbox));

  return {
    kind: 'opening',
    id,
    left,
    right,
    header,
    widthMm: Math.abs(rightX - leftX),
    heightMm,
    center: {
      x: (leftX + rightX) / 2,
      y: (AABBUtils.centerY(left.bbox) + AABBUtils.centerY(right.bbox)) / 2,
    },
  };
}
