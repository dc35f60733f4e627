/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Facade analysis pipeline
 *
 * One linear pass per model snapshot:
 * bounds → floor split → door grouping → placement → side summary →
 * side extents → normalized elements. Fatal conditions throw before any
 * result is returned; everything recoverable ends up in `warnings`.
 */

import {
  Diagnostics,
  locateElements,
  resolveConfig,
  type FacadeConfigInput,
  type FacadeModelInput,
} from '@facade-match/data';
import { groupDoorComponents } from '@facade-match/framing';
import { computeFacadeBounds, computeFloorSplit } from '@facade-match/spatial';
import { groupPanels } from './panel-groups.js';
import { placeDoors, placePanels, placeWindows, type PlacementContext } from './placement.js';
import { buildNormalizedElements, computeSideExtents } from './side-normalizer.js';
import { buildSideSummary } from './side-summary.js';
import type { FacadeAnalysis } from './types.js';

export interface AnalyzeOptions {
  /** Echo warnings through the component loggers as they are raised (default: true) */
  echoWarnings?: boolean;
  /** Accumulator to use instead of a fresh one */
  diagnostics?: Diagnostics;
}

/**
 * Analyze one model snapshot.
 *
 * @throws NoGeometryError when no panel carries a bounding box
 * @throws InsufficientStudsError when door elements exist but fewer than two studs
 * @throws StudTopologyError when row pairing does not fit the stud count
 * @throws ConfigError when the configuration is invalid
 */
export function analyzeFacade(
  model: FacadeModelInput,
  configInput: FacadeConfigInput = {},
  options: AnalyzeOptions = {},
): FacadeAnalysis {
  const config = resolveConfig(configInput);
  const diagnostics = options.diagnostics ?? new Diagnostics(options.echoWarnings ?? true);
  const log = diagnostics.logger('Pipeline');

  const panels = locateElements(model.panels, 'Bounds', diagnostics);
  const bounds = computeFacadeBounds(panels, config.bounds.strategy);
  const floorSplitZ = computeFloorSplit(panels, config.floors.statistic);
  log.info(
    `Bounds x=[${bounds.xmin}, ${bounds.xmax}] y=[${bounds.ymin}, ${bounds.ymax}], floor split z=${floorSplitZ}`,
  );

  const doorElements = locateElements(model.doors ?? [], 'DoorGrouper', diagnostics);
  const doors = groupDoorComponents(doorElements, config.doors, diagnostics);
  const windows = locateElements(model.windows ?? [], 'SideSummary', diagnostics);

  const ctx: PlacementContext = { bounds, floorSplitZ, config, diagnostics };
  let placedPanels = placePanels(panels, doors, ctx);
  if (config.panels.mode === 'aggregate') {
    placedPanels = groupPanels(placedPanels, config.panels.expectedComponents, diagnostics);
  }
  const placed = [...placedPanels, ...placeDoors(doors, ctx), ...placeWindows(windows, ctx)];

  const summary = buildSideSummary(placed, diagnostics);
  const extents = computeSideExtents(placedPanels, diagnostics);
  const elements = buildNormalizedElements(placed, extents);

  log.info(`Analysis complete: ${elements.length} elements, ${diagnostics.warnings.length} warnings`);

  return {
    config,
    bounds,
    floorSplitZ,
    doors,
    placed,
    summary,
    extents,
    elements,
    // Copies: a shared accumulator keeps growing after this returns
    warnings: [...diagnostics.warnings],
    metrics: { ...diagnostics.metrics },
  };
}
