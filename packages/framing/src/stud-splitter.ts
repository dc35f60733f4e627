/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Diagnostics, LocatedElement } from '@facade-match/data';
import { AABBUtils } from '@facade-match/spatial';
import type { FramingSplit } from './types.js';

const COMPONENT = 'DoorGrouper';

/**
 * Split door-family elements by height.
 *
 * Height strictly above `studHeightThreshold` makes a stud; everything else
 * is a header. The threshold depends on model scale, so callers pass it in.
 */
export function splitStudsAndHeaders(
  members: readonly LocatedElement[],
  studHeightThreshold: number,
  diagnostics: Diagnostics,
): FramingSplit {
  const log = diagnostics.logger(COMPONENT);
  const studs: LocatedElement[] = [];
  const headers: LocatedElement[] = [];

  for (const member of members) {
    const height = AABBUtils.height(member.bbox);
    if (height > studHeightThreshold) {
      studs.push(member);
      log.debug(`stud H=${height.toFixed(1)}mm`, undefined, { elementId: member.id });
    } else {
      headers.push(member);
      log.debug(`header H=${height.toFixed(1)}mm`, undefined, { elementId: member.id });
    }
  }

  diagnostics.count('studs', studs.length);
  diagnostics.count('headers', headers.length);
  log.info(`Found ${studs.length} studs, ${headers.length} headers`, { operation: 'split' });

  return { studs, headers };
}
