/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import {
  NO_SIDE,
  floorAccepts,
  type ClassifiedSide,
  type Detection,
  type Diagnostics,
  type ElementType,
  type FacadeConfig,
  type JsonValue,
  type MatchRecord,
  type NormalizedElement,
} from '@facade-match/data';
import { resolveLabel } from './labels.js';

const COMPONENT = 'Matcher';

export const NON_EXTERIOR_REASON = 'non-exterior / unclassifiable detection set';
export const NO_CANDIDATES_REASON = 'no candidates for type/side/floor';

/** Fixed candidate order: panels, doors, windows, each in input order */
const TYPE_ORDER: Record<ElementType, number> = { wall_panels: 0, door: 1, window: 2 };

function describeId(id: JsonValue): string {
  return typeof id === 'string' ? id : JSON.stringify(id);
}

function unmatched(detection: Detection, reason: string): MatchRecord {
  return {
    detectionId: detection.id,
    label: detection.label,
    elementId: null,
    tag: null,
    distance: null,
    reason,
  };
}

/**
 * Match each detection to the nearest element by normalized position.
 *
 * Candidates share the classified side, the detection's element type and
 * floor. The smallest |position - x| wins; on equal distances the first
 * candidate is kept. Every detection yields exactly one record, in input order.
 */
export function matchDetections(
  classifiedSide: ClassifiedSide,
  elements: readonly NormalizedElement[],
  detections: readonly Detection[],
  matching: FacadeConfig['matching'],
  diagnostics: Diagnostics,
): MatchRecord[] {
  const log = diagnostics.logger(COMPONENT);

  if (classifiedSide === NO_SIDE) {
    if (detections.length > 0) {
      diagnostics.warn(COMPONENT, 'NON_EXTERIOR', 'Detection set is not attributable to an exterior side');
    }
    diagnostics.count('unmatchedDetections', detections.length);
    return detections.map(d => unmatched(d, NON_EXTERIOR_REASON));
  }

  const onSide = elements
    .filter(e => e.side === classifiedSide)
    .sort((a, b) => TYPE_ORDER[a.type] - TYPE_ORDER[b.type]);

  const records = detections.map((detection): MatchRecord => {
    const type = resolveLabel(detection.label, matching.labelAliases);
    if (type === undefined) {
      diagnostics.warn(
        COMPONENT,
        'UNSUPPORTED_LABEL',
        `No element type for label "${detection.label}" (detection ${describeId(detection.id)})`,
      );
      diagnostics.count('unmatchedDetections');
      return unmatched(detection, NO_CANDIDATES_REASON);
    }

    const { floor } = detection;
    const candidates = floor === null ? [] : onSide.filter(e => e.type === type && floorAccepts(e.floor, floor));
    if (candidates.length === 0) {
      diagnostics.warn(
        COMPONENT,
        'NO_CANDIDATES',
        `No ${type} on side ${classifiedSide} floor ${floor ?? '?'} for detection ${describeId(detection.id)}`,
      );
      diagnostics.count('unmatchedDetections');
      return unmatched(detection, NO_CANDIDATES_REASON);
    }

    let best = candidates[0];
    let bestDistance = Math.abs(best.position - detection.x);
    for (let i = 1; i < candidates.length; i++) {
      const distance = Math.abs(candidates[i].position - detection.x);
      if (distance < bestDistance) {
        best = candidates[i];
        bestDistance = distance;
      }
    }

    log.debug(`Detection ${describeId(detection.id)} -> ${best.type} ${best.id} (d=${bestDistance.toFixed(3)})`);
    return {
      detectionId: detection.id,
      label: detection.label,
      elementId: best.id,
      tag: best.tag,
      distance: bestDistance,
    };
  });

  const matched = records.filter(r => r.elementId !== null).length;
  log.info(`Matched ${matched}/${records.length} detections on side ${classifiedSide}`, { operation: 'match' });
  return records;
}
