/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { NoGeometryError } from '@facade-match/data';
import { runAnalyze, runMatch } from './commands.js';
import { readJson } from './io.js';

function box(xmin: number, xmax: number, ymin: number, ymax: number, zmin: number, zmax: number) {
  return { xmin, xmax, ymin, ymax, zmin, zmax };
}

const model = {
  panels: [
    { id: 101, bbox: box(0, 200, 0, 8000, 2700, 5400) },
    { id: 201, bbox: box(0, 5000, 0, 200, 0, 2700) },
    { id: 202, bbox: box(5000, 10000, 0, 200, 0, 2700) },
    { id: 203, bbox: box(0, 10000, 0, 200, 2700, 5400) },
  ],
  doors: [
    { id: 401, bbox: box(4580, 4620, 50, 150, 0, 2000) },
    { id: 402, bbox: box(5780, 5820, 50, 150, 0, 2000) },
    { id: 403, bbox: box(4600, 5800, 50, 150, 1950, 2050) },
  ],
};

describe('CLI commands', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'facade-match-'));
    writeFileSync(join(dir, 'model.json'), JSON.stringify(model));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write the analysis documents', () => {
    const out = join(dir, 'out');
    const summary = runAnalyze(join(dir, 'model.json'), { outputDir: out });

    expect(readdirSync(out).sort()).toEqual([
      'bim_export.json',
      'diagnostics.json',
      'door_output.json',
      'side_sequences.json',
      'side_summary.json',
    ]);
    expect(summary.files).toHaveLength(5);
    expect(summary.warnings).toBe(2);

    const doors: unknown = JSON.parse(readFileSync(join(out, 'door_output.json'), 'utf-8'));
    expect(doors).toEqual([
      { door: 1, kind: 'opening', stud_left: 401, stud_right: 402, header: 403, width_mm: 1200, height_mm: 1950 },
    ]);
  });

  it('should apply the config file', () => {
    writeFileSync(join(dir, 'config.json'), JSON.stringify({ doors: { mode: 'individual' } }));
    const out = join(dir, 'out');
    runAnalyze(join(dir, 'model.json'), { outputDir: out, configPath: join(dir, 'config.json') });
    const doors = readJson(join(out, 'door_output.json'));
    expect(Array.isArray(doors) && doors.length).toBe(3);
  });

  it('should write the match report', () => {
    writeFileSync(
      join(dir, 'detections.json'),
      JSON.stringify([{ id: 7, label: 'door', floor: 1, center_xy_norm: [0.5, 0.5] }]),
    );
    const out = join(dir, 'out');
    const summary = runMatch(join(dir, 'model.json'), join(dir, 'detections.json'), { outputDir: out });

    expect(summary.classifiedSide).toBe('B');
    expect(summary.matched).toBe(1);
    expect(summary.total).toBe(1);

    const report = readJson(join(out, 'yolo_bim_matches.json'));
    expect(report).toMatchObject({
      classified_side: 'B',
      side_score: 3,
      matches: [{ yolo_id: 7, label: 'door', bim_id: 1, bim_tag: 3 }],
    });
  });

  it('should include matching warnings in the diagnostics document', () => {
    writeFileSync(
      join(dir, 'detections.json'),
      JSON.stringify([
        { id: 7, label: 'door', floor: 1, center_xy_norm: [0.5, 0.5] },
        { id: 8, label: 'chimney', floor: 1, center_xy_norm: [0.2, 0.5] },
      ]),
    );
    const out = join(dir, 'out');
    const summary = runMatch(join(dir, 'model.json'), join(dir, 'detections.json'), { outputDir: out });

    const report: unknown = JSON.parse(readFileSync(join(out, 'diagnostics.json'), 'utf-8'));
    expect(report).toMatchObject({ metrics: { unmatchedDetections: 1 } });
    const warnings = typeof report === 'object' && report !== null && 'warnings' in report ? report.warnings : [];
    expect(Array.isArray(warnings) && warnings.length).toBe(summary.warnings);
    expect(warnings).toContainEqual({
      code: 'UNSUPPORTED_LABEL',
      component: 'Matcher',
      message: 'No element type for label "chimney" (detection 8)',
    });
  });

  it('should fail on a model without panel geometry', () => {
    writeFileSync(join(dir, 'empty.json'), JSON.stringify({ panels: [] }));
    expect(() => runAnalyze(join(dir, 'empty.json'), { outputDir: join(dir, 'out') })).toThrow(NoGeometryError);
  });

  it('should report malformed JSON with the file path', () => {
    writeFileSync(join(dir, 'broken.json'), '{ "panels": [');
    expect(() => runAnalyze(join(dir, 'broken.json'), { outputDir: join(dir, 'out') })).toThrow(
      /^Invalid JSON .* at .*broken\.json$/,
    );
  });
});
