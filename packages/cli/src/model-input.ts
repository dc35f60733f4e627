/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Validation of the JSON documents the CLI reads: the model snapshot
 * exported from the host application and the optional config file.
 */

import { z } from 'zod';
import { ELEMENT_TYPES, parseWith, type FacadeConfigInput, type FacadeModelInput } from '@facade-match/data';

const finite = z.number().finite();

// ============================================================================
// Model snapshot
// ============================================================================

const BoundingBoxSchema = z.object({
  xmin: finite,
  xmax: finite,
  ymin: finite,
  ymax: finite,
  zmin: finite,
  zmax: finite,
});

const ElementSchema = z.object({
  id: z.number().int(),
  bbox: BoundingBoxSchema.nullish(),
});

const ModelSnapshotSchema = z.object({
  panels: z.array(ElementSchema),
  doors: z.array(ElementSchema).optional(),
  windows: z.array(ElementSchema).optional(),
});

/**
 * Validate `{ panels, doors?, windows? }` where each entry is
 * `{ id, bbox: {xmin, xmax, ymin, ymax, zmin, zmax} | null }` in millimeters.
 *
 * @throws InputParseError with the path of the first offending value
 */
export function parseModelSnapshot(raw: unknown): FacadeModelInput {
  return parseWith(ModelSnapshotSchema, raw);
}

// ============================================================================
// Config file
// ============================================================================

const ElementTypeSchema = z.enum(ELEMENT_TYPES);

const ConfigFileSchema = z
  .object({
    bounds: z.object({ strategy: z.enum(['extents', 'midpoints']) }).partial(),
    floors: z
      .object({
        statistic: z.enum(['center', 'bottom']),
        panelStrategy: z.enum(['split', 'studs']),
      })
      .partial(),
    sides: z.object({ edgeTolerance: finite.nullable() }).partial(),
    doors: z
      .object({
        mode: z.enum(['composite', 'individual']),
        studHeightThreshold: finite,
        sameFloorTolerance: finite,
        pairing: z.enum(['sequential', 'rows']),
        rowCount: finite,
      })
      .partial(),
    panels: z
      .object({
        mode: z.enum(['individual', 'aggregate']),
        expectedComponents: finite,
      })
      .partial(),
    windows: z.object({ floorMode: z.enum(['classify', 'default']) }).partial(),
    matching: z
      .object({
        sideWeights: z.object({ door: finite, window: finite, wall_panels: finite }).partial().strict(),
        confidenceThreshold: finite,
        labelAliases: z.record(ElementTypeSchema),
      })
      .partial(),
  })
  .partial()
  .strict();

/**
 * Validate a partial configuration document. Only the keys present are
 * returned; defaults and range checks are left to `resolveConfig`.
 */
export function parseConfigFile(raw: unknown): FacadeConfigInput {
  return parseWith(ConfigFileSchema, raw);
}
