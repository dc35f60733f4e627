/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { SIDES } from '@facade-match/data';
import { buildSideFingerprint, type FacadeAnalysis } from '@facade-match/facade';
import type { SideSequences } from './types.js';

/** Left-to-right element types per side, plus model-wide totals */
export function toSideSequences(analysis: Pick<FacadeAnalysis, 'elements' | 'summary'>): SideSequences {
  const fingerprint = buildSideFingerprint(analysis.elements);

  let doors = 0;
  let windows = 0;
  let panels = 0;
  for (const side of SIDES) {
    const summary = analysis.summary.sides[side];
    doors += summary.doors.all.length;
    windows += summary.windows.all.length;
    panels += summary.panels.all.length;
  }

  return {
    summary: { doors, windows, panels },
    sides: {
      A: fingerprint.A.sequence,
      B: fingerprint.B.sequence,
      C: fingerprint.C.sequence,
      D: fingerprint.D.sequence,
    },
  };
}
