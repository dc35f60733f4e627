/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { NormalizedElement, Side } from '@facade-match/data';
import type { SideFingerprint } from './types.js';

function fingerprintOf(side: Side, elements: readonly NormalizedElement[]): SideFingerprint {
  const ordered = elements.filter(e => e.side === side).sort((a, b) => a.tag - b.tag);
  const counts = { wall_panels: 0, door: 0, window: 0 };
  for (const e of ordered) counts[e.type]++;
  return { side, counts, sequence: ordered.map(e => e.type) };
}

/**
 * Composition of each side: element counts and the left-to-right type
 * sequence (by tag).
 */
export function buildSideFingerprint(elements: readonly NormalizedElement[]): Record<Side, SideFingerprint> {
  return {
    A: fingerprintOf('A', elements),
    B: fingerprintOf('B', elements),
    C: fingerprintOf('C', elements),
    D: fingerprintOf('D', elements),
  };
}
