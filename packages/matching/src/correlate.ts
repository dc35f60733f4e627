/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import {
  Diagnostics,
  type ClassifiedSide,
  type Detection,
  type FacadeWarning,
  type MatchRecord,
  type Side,
} from '@facade-match/data';
import type { FacadeAnalysis } from '@facade-match/facade';
import { matchDetections } from './matcher.js';
import { scoreSides } from './side-scoring.js';

export interface CorrelationResult {
  classifiedSide: ClassifiedSide;
  score: number;
  scores: Record<Side, number>;
  /** One per detection, in input order */
  records: MatchRecord[];
  /** Warnings held by the accumulator once matching is done */
  warnings: readonly FacadeWarning[];
  executionTime: number;
}

/**
 * Score the sides for a detection batch and match it against the winner.
 */
export function correlate(
  analysis: FacadeAnalysis,
  detections: readonly Detection[],
  diagnostics: Diagnostics = new Diagnostics(),
): CorrelationResult {
  const startTime = performance.now();
  const { matching } = analysis.config;

  const { classifiedSide, score, scores } = scoreSides(detections, analysis.elements, matching);
  diagnostics
    .logger('SideScoring')
    .info(`Classified side ${classifiedSide} (score=${score.toFixed(3)})`, { operation: 'score' });

  const records = matchDetections(classifiedSide, analysis.elements, detections, matching, diagnostics);

  return {
    classifiedSide,
    score,
    scores,
    records,
    warnings: [...diagnostics.warnings],
    executionTime: performance.now() - startTime,
  };
}
