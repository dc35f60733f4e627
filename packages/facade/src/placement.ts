/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Side and floor placement of panels, door units and windows.
 */

import type {
  Diagnostics,
  FacadeBounds,
  FacadeConfig,
  FloorAssignment,
  LocatedElement,
  Side,
} from '@facade-match/data';
import {
  doorUnitBounds,
  doorUnitMembers,
  doorUnitZStatistic,
  type DoorUnit,
} from '@facade-match/framing';
import { AABBUtils, classifyFloor, classifySide, zStatistic } from '@facade-match/spatial';
import type { PlacedElement } from './types.js';

const COMPONENT = 'SideSummary';

export interface PlacementContext {
  bounds: FacadeBounds;
  floorSplitZ: number;
  config: FacadeConfig;
  diagnostics: Diagnostics;
}

function sideOf(x: number, y: number, ctx: PlacementContext): Side | null {
  return classifySide(x, y, ctx.bounds, { edgeTolerance: ctx.config.sides.edgeTolerance });
}

/**
 * Place panels by footprint center. Floors follow `floors.panelStrategy`:
 * the median split, or the studs standing inside each panel footprint.
 */
export function placePanels(
  panels: readonly LocatedElement[],
  doors: readonly DoorUnit[],
  ctx: PlacementContext,
): PlacedElement[] {
  const { statistic, panelStrategy } = ctx.config.floors;
  const studFloor = panelStrategy === 'studs' ? createStudFloorClassifier(doors, ctx) : null;

  return panels.map((panel): PlacedElement => {
    const floor: FloorAssignment = studFloor
      ? studFloor(panel)
      : classifyFloor(zStatistic(panel.bbox, statistic), ctx.floorSplitZ);
    return {
      type: 'wall_panels',
      id: panel.id,
      bbox: panel.bbox,
      side: sideOf(AABBUtils.centerX(panel.bbox), AABBUtils.centerY(panel.bbox), ctx),
      floor,
      memberIds: [panel.id],
    };
  });
}

/** Place door units by their center (midpoint of the two stud centers) */
export function placeDoors(doors: readonly DoorUnit[], ctx: PlacementContext): PlacedElement[] {
  const { statistic } = ctx.config.floors;
  return doors.map((unit): PlacedElement => ({
    type: 'door',
    id: unit.id,
    bbox: doorUnitBounds(unit),
    side: sideOf(unit.center.x, unit.center.y, ctx),
    floor: classifyFloor(doorUnitZStatistic(unit, statistic), ctx.floorSplitZ),
    memberIds: doorUnitMembers(unit).map(m => m.id),
  }));
}

/** Place windows by footprint center; floor per `windows.floorMode` */
export function placeWindows(windows: readonly LocatedElement[], ctx: PlacementContext): PlacedElement[] {
  const { statistic } = ctx.config.floors;
  const classify = ctx.config.windows.floorMode === 'classify';
  return windows.map((win): PlacedElement => ({
    type: 'window',
    id: win.id,
    bbox: win.bbox,
    side: sideOf(AABBUtils.centerX(win.bbox), AABBUtils.centerY(win.bbox), ctx),
    floor: classify ? classifyFloor(zStatistic(win.bbox, statistic), ctx.floorSplitZ) : 'floor1',
    memberIds: [win.id],
  }));
}

/**
 * Stud-based panel floors.
 *
 * Studs are split into a lower and an upper row by the floor split; each
 * row's reference height is the mean stud center Z. A stud whose footprint
 * center lies inside the panel footprint votes for the nearer row. Votes
 * for both rows give `both`, no votes give `unknown`.
 */
function createStudFloorClassifier(
  doors: readonly DoorUnit[],
  ctx: PlacementContext,
): (panel: LocatedElement) => FloorAssignment {
  const studs = doors.flatMap(unit => (unit.kind === 'opening' ? [unit.left, unit.right] : [unit.element]));
  const lower: number[] = [];
  const upper: number[] = [];
  for (const s of studs) {
    const z = AABBUtils.centerZ(s.bbox);
    if (classifyFloor(zStatistic(s.bbox, ctx.config.floors.statistic), ctx.floorSplitZ) === 'floor1') {
      lower.push(z);
    } else {
      upper.push(z);
    }
  }
  const lowerZ = mean(lower);
  const upperZ = mean(upper);
  ctx.diagnostics.logger(COMPONENT).debug('Stud row heights', { lowerZ, upperZ });

  return panel => {
    let floor1 = false;
    let floor2 = false;
    for (const s of studs) {
      if (!AABBUtils.containsXY(panel.bbox, AABBUtils.centerX(s.bbox), AABBUtils.centerY(s.bbox))) continue;
      const z = AABBUtils.centerZ(s.bbox);
      if (upperZ === null || (lowerZ !== null && Math.abs(z - lowerZ) < Math.abs(z - upperZ))) {
        floor1 = true;
      } else {
        floor2 = true;
      }
    }
    if (floor1 && floor2) return 'both';
    if (floor1) return 'floor1';
    if (floor2) return 'floor2';
    return 'unknown';
  };
}

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}
