/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import type { BoundingBox, FacadeModelInput, LocatedElement } from '@facade-match/data';
import { analyzeFacade } from '@facade-match/facade';
import { buildOpening, type DoorUnit } from '@facade-match/framing';
import { toBimExport } from './bim-export.js';
import { toDoorOutput } from './door-output.js';
import { toDiagnosticsReport, toMatchReport } from './match-report.js';
import { toSideSequences } from './sequences.js';
import { toSideSummaryRecord } from './side-summary-record.js';

function box(xmin: number, xmax: number, ymin: number, ymax: number, zmin: number, zmax: number): BoundingBox {
  return { xmin, xmax, ymin, ymax, zmin, zmax };
}

/** Side A upper panel, side B with two lower panels, one upper panel and a door */
const model: FacadeModelInput = {
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

const analysis = analyzeFacade(model, {}, { echoWarnings: false });

describe('toSideSummaryRecord', () => {
  it('should flatten side lists into snake_case keys', () => {
    const record = toSideSummaryRecord(analysis.summary.sides);
    expect(record.B).toEqual({
      panels: [201, 202, 203],
      panels_floor1: [201, 202],
      panels_floor2: [203],
      panels_both: [],
      panels_unknown: [],
      windows: [],
      windows_floor1: [],
      windows_floor2: [],
      door: [1],
      door_floor1: [1],
      door_floor2: [],
    });
    expect(record.A.panels_floor2).toEqual([101]);
  });
});

describe('toBimExport', () => {
  it('should list side elements in tag order', () => {
    const exported = toBimExport(analysis);
    expect(exported.side_widths).toEqual({ A: 200, B: 10000, C: 0, D: 0 });
    expect(exported.sides.B.width_mm).toBe(10000);
    expect(exported.sides.B.element_count).toBe(4);
    expect(exported.sides.B.elements).toEqual([
      { tag: 1, type: 'wall_panels', id: 201, floor: 1, xmin: 0, xmax: 5000, position: 0.25 },
      { tag: 2, type: 'wall_panels', id: 203, floor: 2, xmin: 0, xmax: 10000, position: 0.5 },
      { tag: 3, type: 'door', id: 1, floor: 1, xmin: 4580, xmax: 5820, position: 0.52 },
      { tag: 4, type: 'wall_panels', id: 202, floor: 1, xmin: 5000, xmax: 10000, position: 0.75 },
    ]);
    expect(exported.sides.C).toEqual({ width_mm: 0, element_count: 0, elements: [] });
  });

  it('should write panel-only floor states as strings', () => {
    const studs = analyzeFacade(model, { floors: { panelStrategy: 'studs' } }, { echoWarnings: false });
    const floors = toBimExport(studs).sides.A.elements.map(e => e.floor);
    expect(floors).toEqual(['unknown']);
  });
});

describe('toDoorOutput', () => {
  it('should write stud and header ids', () => {
    expect(toDoorOutput(analysis.doors)).toEqual([
      { door: 1, kind: 'opening', stud_left: 401, stud_right: 402, header: 403, width_mm: 1200, height_mm: 1950 },
    ]);
  });

  it('should write null for a missing header', () => {
    const left: LocatedElement = { id: 7, bbox: box(0, 40, 0, 100, 0, 2100) };
    const right: LocatedElement = { id: 8, bbox: box(900, 940, 0, 100, 0, 2000) };
    const doors: DoorUnit[] = [buildOpening(2, left, right, { kind: 'absent' })];
    expect(toDoorOutput(doors)).toEqual([
      { door: 2, kind: 'opening', stud_left: 7, stud_right: 8, header: null, width_mm: 900, height_mm: 2100 },
    ]);
  });

  it('should write the element id for individual doors', () => {
    const individual = analyzeFacade(model, { doors: { mode: 'individual' } }, { echoWarnings: false });
    const output = toDoorOutput(individual.doors);
    expect(output).toHaveLength(3);
    expect(output[0]).toEqual({
      door: 1,
      kind: 'single',
      stud_left: null,
      stud_right: null,
      header: null,
      element: 401,
      width_mm: 40,
      height_mm: 2000,
    });
  });
});

describe('toSideSequences', () => {
  it('should list types left to right with totals', () => {
    expect(toSideSequences(analysis)).toEqual({
      summary: { doors: 1, windows: 0, panels: 4 },
      sides: {
        A: ['wall_panels'],
        B: ['wall_panels', 'wall_panels', 'door', 'wall_panels'],
        C: [],
        D: [],
      },
    });
  });
});

describe('toMatchReport', () => {
  const result = {
    classifiedSide: 'B' as const,
    score: 4,
    scores: { A: 1, B: 4, C: 3, D: 0 },
    records: [
      { detectionId: 'd1', label: 'door', elementId: 1, tag: 3, distance: 0.02 },
      {
        detectionId: 'w1',
        label: 'window',
        elementId: null,
        tag: null,
        distance: null,
        reason: 'no candidates for type/side/floor',
      },
    ],
    warnings: [{ code: 'NO_CANDIDATES' as const, component: 'Matcher', message: 'No window on side B floor 2' }],
  };

  it('should rename fields and carry the reason as a note', () => {
    const report = toMatchReport(result, new Date('2026-01-02T03:04:05.000Z'));
    expect(report).toEqual({
      classified_side: 'B',
      side_score: 4,
      side_scores: { A: 1, B: 4, C: 3, D: 0 },
      matches: [
        { yolo_id: 'd1', label: 'door', bim_id: 1, bim_tag: 3, distance: 0.02 },
        {
          yolo_id: 'w1',
          label: 'window',
          bim_id: null,
          bim_tag: null,
          distance: null,
          note: 'no candidates for type/side/floor',
        },
      ],
      warnings: [{ code: 'NO_CANDIDATES', component: 'Matcher', message: 'No window on side B floor 2' }],
      timestamp: '2026-01-02T03:04:05.000Z',
    });
  });

  it('should omit the timestamp unless given', () => {
    expect(Object.keys(toMatchReport(result))).not.toContain('timestamp');
  });
});

describe('toDiagnosticsReport', () => {
  it('should report metrics and warnings', () => {
    const report = toDiagnosticsReport(analysis);
    expect(report.metrics.openings).toBe(1);
    expect(report.unclassified).toEqual([]);
    expect(report.warnings.map(w => w.code)).toEqual(['EMPTY_SIDE', 'EMPTY_SIDE']);
  });
});
