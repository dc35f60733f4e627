/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { FacadeWarning, MatchRecord } from '@facade-match/data';
import type { FacadeAnalysis } from '@facade-match/facade';
import type { CorrelationResult } from '@facade-match/matching';
import type { DiagnosticsReport, MatchEntry, MatchReport, WarningRecord } from './types.js';

export function toWarningRecords(warnings: readonly FacadeWarning[]): WarningRecord[] {
  return warnings.map(w => {
    const record: WarningRecord = { code: w.code, component: w.component, message: w.message };
    if (w.elementId !== undefined) record.element_id = w.elementId;
    return record;
  });
}

function toMatchEntry(record: MatchRecord): MatchEntry {
  const entry: MatchEntry = {
    yolo_id: record.detectionId,
    label: record.label,
    bim_id: record.elementId,
    bim_tag: record.tag,
    distance: record.distance,
  };
  if (record.reason !== undefined) entry.note = record.reason;
  return entry;
}

/**
 * Match results in the `yolo_bim_matches.json` layout.
 * `timestamp` is only written when `generatedAt` is given.
 */
export function toMatchReport(
  result: Pick<CorrelationResult, 'classifiedSide' | 'score' | 'scores' | 'records' | 'warnings'>,
  generatedAt?: Date,
): MatchReport {
  const report: MatchReport = {
    classified_side: result.classifiedSide,
    side_score: result.score,
    side_scores: { ...result.scores },
    matches: result.records.map(toMatchEntry),
    warnings: toWarningRecords(result.warnings),
  };
  if (generatedAt) report.timestamp = generatedAt.toISOString();
  return report;
}

/** Run metrics, unclassified elements and warnings of an analysis */
export function toDiagnosticsReport(
  analysis: Pick<FacadeAnalysis, 'metrics' | 'summary' | 'warnings'>,
): DiagnosticsReport {
  return {
    metrics: { ...analysis.metrics },
    unclassified: analysis.summary.unclassified.map(u => ({ type: u.type, id: u.id })),
    warnings: toWarningRecords(analysis.warnings),
  };
}
