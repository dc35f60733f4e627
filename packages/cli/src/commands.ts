/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { Diagnostics, type ClassifiedSide, type FacadeConfigInput } from '@facade-match/data';
import {
  toBimExport,
  toDiagnosticsReport,
  toDoorOutput,
  toMatchReport,
  toSideSequences,
  toSideSummaryRecord,
} from '@facade-match/export';
import { analyzeFacade, type FacadeAnalysis } from '@facade-match/facade';
import { correlate, parseDetections } from '@facade-match/matching';
import { readJson, writeJson } from './io.js';
import { parseConfigFile, parseModelSnapshot } from './model-input.js';

export interface RunOptions {
  configPath?: string;
  outputDir: string;
}

export interface AnalyzeSummary {
  files: string[];
  warnings: number;
}

export interface MatchSummary extends AnalyzeSummary {
  classifiedSide: ClassifiedSide;
  matched: number;
  total: number;
}

function loadConfig(path: string | undefined): FacadeConfigInput {
  return path === undefined ? {} : parseConfigFile(readJson(path));
}

function writeAnalysis(analysis: FacadeAnalysis, outputDir: string): string[] {
  return [
    writeJson(outputDir, 'side_summary.json', toSideSummaryRecord(analysis.summary.sides)),
    writeJson(outputDir, 'bim_export.json', toBimExport(analysis)),
    writeJson(outputDir, 'door_output.json', toDoorOutput(analysis.doors)),
    writeJson(outputDir, 'side_sequences.json', toSideSequences(analysis)),
    writeJson(outputDir, 'diagnostics.json', toDiagnosticsReport(analysis)),
  ];
}

/** `analyze`: model snapshot → analysis documents */
export function runAnalyze(modelPath: string, options: RunOptions): AnalyzeSummary {
  const model = parseModelSnapshot(readJson(modelPath));
  const analysis = analyzeFacade(model, loadConfig(options.configPath));
  return { files: writeAnalysis(analysis, options.outputDir), warnings: analysis.warnings.length };
}

/** `match`: analysis documents plus the detection match report */
export function runMatch(modelPath: string, detectionsPath: string, options: RunOptions): MatchSummary {
  const model = parseModelSnapshot(readJson(modelPath));
  const detections = parseDetections(readJson(detectionsPath));

  const diagnostics = new Diagnostics();
  const analysis = analyzeFacade(model, loadConfig(options.configPath), { diagnostics });
  const result = correlate(analysis, detections, diagnostics);

  // diagnostics.json covers analysis and matching
  const files = writeAnalysis(
    { ...analysis, warnings: diagnostics.warnings, metrics: diagnostics.metrics },
    options.outputDir,
  );
  files.push(writeJson(options.outputDir, 'yolo_bim_matches.json', toMatchReport(result, new Date())));

  return {
    files,
    warnings: diagnostics.warnings.length,
    classifiedSide: result.classifiedSide,
    matched: result.records.filter(r => r.elementId !== null).length,
    total: result.records.length,
  };
}
