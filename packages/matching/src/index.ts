/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @facade-match/matching - Side classification and matching of 2D detections
 *
 * @example
 * ```ts
 * import { analyzeFacade } from '@facade-match/facade';
 * import { correlate, parseDetections } from '@facade-match/matching';
 *
 * const analysis = analyzeFacade(model);
 * const result = correlate(analysis, parseDetections(json));
 * // result.classifiedSide === 'B', result.records[0].elementId === 1
 * ```
 */

export { parseDetections } from './detections.js';
export { resolveLabel } from './labels.js';
export { scoreSides } from './side-scoring.js';
export type { SideScoreResult } from './side-scoring.js';
export {
  matchDetections,
  NON_EXTERIOR_REASON,
  NO_CANDIDATES_REASON,
} from './matcher.js';
export { correlate } from './correlate.js';
export type { CorrelationResult } from './correlate.js';
