/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { SIDES, type Diagnostics, type FloorAssignment } from '@facade-match/data';
import { AABBUtils } from '@facade-match/spatial';
import type { PlacedElement } from './types.js';

const COMPONENT = 'PanelGroups';

const FLOOR_ORDER: readonly FloorAssignment[] = ['floor1', 'floor2', 'both', 'unknown'];

/**
 * Aggregate panel sub-components into one composite panel per side and floor.
 *
 * Groups are numbered 1..N in side order (A-D), then floor order. Each group
 * spans the union of its members. Groups whose size differs from
 * `expectedComponents` are kept but reported. Panels without a side are
 * passed through unchanged.
 */
export function groupPanels(
  panels: readonly PlacedElement[],
  expectedComponents: number,
  diagnostics: Diagnostics,
): PlacedElement[] {
  const groups: PlacedElement[] = [];
  let nextId = 1;

  for (const side of SIDES) {
    for (const floor of FLOOR_ORDER) {
      const members = panels.filter(p => p.side === side && p.floor === floor);
      if (members.length === 0) continue;

      if (members.length !== expectedComponents) {
        diagnostics.warn(
          COMPONENT,
          'PANEL_GROUP_SIZE',
          `Side ${side} ${floor} has ${members.length} panel components (expected ${expectedComponents})`,
        );
      }

      const bbox = AABBUtils.union(members.map(m => m.bbox)) ?? members[0].bbox;
      groups.push({
        type: 'wall_panels',
        id: nextId++,
        bbox,
        side,
        floor,
        memberIds: members.flatMap(m => m.memberIds),
      });
    }
  }

  const loose = panels.filter(p => p.side === null);
  diagnostics.logger(COMPONENT).info(`Created ${groups.length} panel groups`, { operation: 'group' });
  return [...groups, ...loose];
}
