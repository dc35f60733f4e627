/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Detection batch parsing
 *
 * Accepts the detector's JSON list:
 * `[{ "id": ..., "label": "door", "floor": 1, "center_xy_norm": [x, y] }]`
 */

import { z } from 'zod';
import { JsonValueSchema, parseWith, type Detection } from '@facade-match/data';

const FloorSchema = z.union([z.literal(1), z.literal(2)], {
  errorMap: () => ({ message: 'Expected floor 1, 2 or null' }),
});

const DetectionSchema = z
  .object({
    id: JsonValueSchema.optional(),
    label: z.string(),
    floor: FloorSchema.nullish(),
    center_xy_norm: z.array(z.number().finite()).min(1, 'Expected [x, y] normalized coordinates'),
  })
  .transform(({ id, label, floor, center_xy_norm: [x, y] }): Detection => {
    const detection: Detection = { id: id ?? null, label, floor: floor ?? null, x };
    if (y !== undefined) detection.y = y;
    return detection;
  });

const DetectionListSchema = z.array(DetectionSchema);

/**
 * Validate a raw detection list. Ids are passed through as given.
 *
 * @throws InputParseError with the JSON path of the first offending value
 */
export function parseDetections(raw: unknown): Detection[] {
  return parseWith(DetectionListSchema, raw);
}
