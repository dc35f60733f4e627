/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { InsufficientDataError, NoGeometryError, type LocatedElement } from '@facade-match/data';
import { AABBUtils } from './aabb.js';
import { computeFacadeBounds } from './bounds.js';
import { classifyFloor, computeFloorSplit, zStatistic } from './floor-split.js';
import { classifySide, edgeDistances } from './side-classifier.js';

function panel(id: number, xmin: number, xmax: number, ymin: number, ymax: number, zmin = 0, zmax = 2400): LocatedElement {
  return { id, bbox: { xmin, xmax, ymin, ymax, zmin, zmax } };
}

describe('AABBUtils', () => {
  const box = { xmin: 0, xmax: 1200, ymin: -50, ymax: 50, zmin: 0, zmax: 2000 };

  it('should compute centers and sizes', () => {
    expect(AABBUtils.centerX(box)).toBe(600);
    expect(AABBUtils.centerY(box)).toBe(0);
    expect(AABBUtils.centerZ(box)).toBe(1000);
    expect(AABBUtils.width(box)).toBe(1200);
    expect(AABBUtils.depth(box)).toBe(100);
    expect(AABBUtils.height(box)).toBe(2000);
  });

  it('should union boxes', () => {
    const other = { xmin: -10, xmax: 100, ymin: 0, ymax: 80, zmin: 2000, zmax: 2200 };
    expect(AABBUtils.union([box, other])).toEqual({
      xmin: -10, xmax: 1200, ymin: -50, ymax: 80, zmin: 0, zmax: 2200,
    });
    expect(AABBUtils.union([])).toBeNull();
  });

  it('should test footprint containment including edges', () => {
    expect(AABBUtils.containsXY(box, 1200, 50)).toBe(true);
    expect(AABBUtils.containsXY(box, 1201, 0)).toBe(false);
  });
});

describe('computeFacadeBounds', () => {
  const panels = [
    panel(1, 0, 4000, 0, 100),
    panel(2, 9900, 10000, 0, 8000),
    panel(3, 2000, 6000, 7900, 8000),
  ];

  it('should use raw extents by default', () => {
    expect(computeFacadeBounds(panels)).toEqual({ xmin: 0, xmax: 10000, ymin: 0, ymax: 8000 });
  });

  it('should use footprint centers with the midpoints strategy', () => {
    expect(computeFacadeBounds(panels, 'midpoints')).toEqual({
      xmin: 2000, xmax: 9950, ymin: 50, ymax: 7950,
    });
  });

  it('should throw NoGeometryError for an empty panel list', () => {
    expect(() => computeFacadeBounds([])).toThrow(NoGeometryError);
  });

  it('should keep min <= max for a single panel', () => {
    const bounds = computeFacadeBounds([panel(1, 5, 5, 7, 7)], 'midpoints');
    expect(bounds).toEqual({ xmin: 5, xmax: 5, ymin: 7, ymax: 7 });
  });
});

describe('computeFloorSplit', () => {
  const panels = [
    panel(1, 0, 1, 0, 1, 0, 2400),
    panel(2, 0, 1, 0, 1, 2700, 5100),
    panel(3, 0, 1, 0, 1, 0, 2400),
    panel(4, 0, 1, 0, 1, 2700, 5100),
  ];

  it('should take the upper median of panel bottoms for an even count', () => {
    // bottoms sorted: 0, 0, 2700, 2700 -> index 2
    expect(computeFloorSplit(panels, 'bottom')).toBe(2700);
  });

  it('should take the upper median of panel centers', () => {
    // centers sorted: 1200, 1200, 3900, 3900 -> index 2
    expect(computeFloorSplit(panels, 'center')).toBe(3900);
  });

  it('should take the middle value for an odd count', () => {
    expect(computeFloorSplit(panels.slice(0, 3), 'bottom')).toBe(0);
  });

  it('should stay within the range of the input statistics', () => {
    const mixed = [panel(1, 0, 1, 0, 1, 300, 900), panel(2, 0, 1, 0, 1, -200, 100), panel(3, 0, 1, 0, 1, 50, 80)];
    const split = computeFloorSplit(mixed, 'center');
    expect(split).toBeGreaterThanOrEqual(-50);
    expect(split).toBeLessThanOrEqual(600);
  });

  it('should throw InsufficientDataError without panels', () => {
    expect(() => computeFloorSplit([])).toThrow(InsufficientDataError);
  });
});

describe('classifyFloor', () => {
  it('should be floor1 strictly below the split', () => {
    expect(classifyFloor(2699, 2700)).toBe('floor1');
    expect(classifyFloor(2700, 2700)).toBe('floor2');
  });

  it('should read the configured statistic', () => {
    const bbox = { xmin: 0, xmax: 1, ymin: 0, ymax: 1, zmin: 100, zmax: 300 };
    expect(zStatistic(bbox, 'bottom')).toBe(100);
    expect(zStatistic(bbox, 'center')).toBe(200);
  });
});

describe('classifySide', () => {
  const bounds = { xmin: 0, xmax: 10000, ymin: 0, ymax: 8000 };

  it('should assign a point near the min-X edge to A', () => {
    expect(classifySide(50, 4000, bounds)).toBe('A');
  });

  it('should assign each edge to its side', () => {
    expect(classifySide(9950, 4000, bounds)).toBe('C');
    expect(classifySide(5000, 30, bounds)).toBe('B');
    expect(classifySide(5000, 7990, bounds)).toBe('D');
  });

  it('should break a four-way tie as A', () => {
    expect(classifySide(50, 50, { xmin: 0, xmax: 100, ymin: 0, ymax: 100 })).toBe('A');
  });

  it('should prefer C over B on a tie', () => {
    expect(classifySide(90, 10, { xmin: 0, xmax: 100, ymin: 0, ymax: 100 })).toBe('C');
  });

  it('should prefer B over D on a tie', () => {
    expect(classifySide(50, 20, { xmin: 0, xmax: 100, ymin: 0, ymax: 40 })).toBe('B');
  });

  it('should classify points outside the footprint to the nearest edge', () => {
    expect(classifySide(-500, 4000, bounds)).toBe('A');
  });

  it('should return null beyond the edge tolerance', () => {
    expect(classifySide(5000, 4000, bounds, { edgeTolerance: 200 })).toBeNull();
    expect(classifySide(150, 4000, bounds, { edgeTolerance: 200 })).toBe('A');
  });

  it('should behave totally with a null tolerance', () => {
    expect(classifySide(5000, 4000, bounds, { edgeTolerance: null })).toBe('B');
  });

  it('should report all four edge distances', () => {
    expect(edgeDistances(50, 4000, bounds)).toEqual({ A: 50, B: 4000, C: 9950, D: 4000 });
  });
});
