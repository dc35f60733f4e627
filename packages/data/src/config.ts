/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Run configuration.
 *
 * Every stage receives the resolved {@link FacadeConfig} explicitly. Where
 * models disagree on which geometric rule applies (bounds from extents or
 * midpoints, floor split by center or bottom Z, ...) the choice is a named
 * strategy here rather than a hard-coded guess.
 */

import { ConfigError } from './errors.js';
import type { ElementType } from './types.js';

export type BoundsStrategy = 'extents' | 'midpoints';
export type ZStatistic = 'center' | 'bottom';
export type PanelFloorStrategy = 'split' | 'studs';
export type DoorMode = 'composite' | 'individual';
export type PairingMode = 'sequential' | 'rows';
export type PanelMode = 'individual' | 'aggregate';
export type WindowFloorMode = 'classify' | 'default';

export interface FacadeConfig {
  bounds: {
    strategy: BoundsStrategy;
  };
  floors: {
    /** Per-element Z statistic used for the split and for classification */
    statistic: ZStatistic;
    panelStrategy: PanelFloorStrategy;
  };
  sides: {
    /** `null` = nearest side always wins; otherwise max edge distance in mm */
    edgeTolerance: number | null;
  };
  doors: {
    mode: DoorMode;
    /** Height strictly above this (mm) makes a stud */
    studHeightThreshold: number;
    /** Adjacent studs whose center Z differ by less than this (mm) pair up */
    sameFloorTolerance: number;
    pairing: PairingMode;
    /** Rows of two studs expected by the `rows` pairing */
    rowCount: number;
  };
  panels: {
    mode: PanelMode;
    /** Aggregate mode warns when a side/floor group has a different size */
    expectedComponents: number;
  };
  windows: {
    floorMode: WindowFloorMode;
  };
  matching: {
    sideWeights: Record<ElementType, number>;
    /** Winning side score below this yields NO-SIDE */
    confidenceThreshold: number;
    /** Detector label → element type */
    labelAliases: Record<string, ElementType>;
  };
}

export type FacadeConfigInput = {
  [K in Exclude<keyof FacadeConfig, 'matching'>]?: Partial<FacadeConfig[K]>;
} & {
  matching?: Partial<Omit<FacadeConfig['matching'], 'sideWeights'>> & {
    sideWeights?: Partial<FacadeConfig['matching']['sideWeights']>;
  };
};

export const DEFAULT_LABEL_ALIASES: Readonly<Record<string, ElementType>> = {
  door: 'door',
  window: 'window',
  windows: 'window',
  wall_panels: 'wall_panels',
  'wall-panels': 'wall_panels',
  panel: 'wall_panels',
};

export const DEFAULT_CONFIG: FacadeConfig = {
  bounds: { strategy: 'extents' },
  floors: { statistic: 'bottom', panelStrategy: 'split' },
  sides: { edgeTolerance: null },
  doors: {
    mode: 'composite',
    studHeightThreshold: 500,
    sameFloorTolerance: 1000,
    pairing: 'sequential',
    rowCount: 2,
  },
  panels: { mode: 'individual', expectedComponents: 4 },
  windows: { floorMode: 'classify' },
  matching: {
    sideWeights: { door: 3, window: 2, wall_panels: 1 },
    confidenceThreshold: 0.5,
    labelAliases: { ...DEFAULT_LABEL_ALIASES },
  },
};

/**
 * Merge a partial configuration over {@link DEFAULT_CONFIG} and validate it.
 *
 * @throws ConfigError naming the first offending key
 */
export function resolveConfig(input: FacadeConfigInput = {}): FacadeConfig {
  const config: FacadeConfig = {
    bounds: { ...DEFAULT_CONFIG.bounds, ...input.bounds },
    floors: { ...DEFAULT_CONFIG.floors, ...input.floors },
    sides: { ...DEFAULT_CONFIG.sides, ...input.sides },
    doors: { ...DEFAULT_CONFIG.doors, ...input.doors },
    panels: { ...DEFAULT_CONFIG.panels, ...input.panels },
    windows: { ...DEFAULT_CONFIG.windows, ...input.windows },
    matching: {
      ...DEFAULT_CONFIG.matching,
      ...input.matching,
      sideWeights: { ...DEFAULT_CONFIG.matching.sideWeights, ...input.matching?.sideWeights },
      labelAliases: normalizeAliases({ ...DEFAULT_CONFIG.matching.labelAliases, ...input.matching?.labelAliases }),
    },
  };
  validateConfig(config);
  return config;
}

/** Alias keys are matched case-insensitively against detector labels */
function normalizeAliases(aliases: Record<string, ElementType>): Record<string, ElementType> {
  return Object.fromEntries(Object.entries(aliases).map(([label, type]) => [label.trim().toLowerCase(), type]));
}

function validateConfig(config: FacadeConfig): void {
  expectOneOf('bounds.strategy', config.bounds.strategy, ['extents', 'midpoints']);
  expectOneOf('floors.statistic', config.floors.statistic, ['center', 'bottom']);
  expectOneOf('floors.panelStrategy', config.floors.panelStrategy, ['split', 'studs']);
  expectOneOf('doors.mode', config.doors.mode, ['composite', 'individual']);
  expectOneOf('doors.pairing', config.doors.pairing, ['sequential', 'rows']);
  expectOneOf('panels.mode', config.panels.mode, ['individual', 'aggregate']);
  expectOneOf('windows.floorMode', config.windows.floorMode, ['classify', 'default']);

  if (config.sides.edgeTolerance !== null) {
    expectNonNegative('sides.edgeTolerance', config.sides.edgeTolerance);
  }
  expectPositive('doors.studHeightThreshold', config.doors.studHeightThreshold);
  expectPositive('doors.sameFloorTolerance', config.doors.sameFloorTolerance);
  expectPositive('panels.expectedComponents', config.panels.expectedComponents);
  if (!Number.isInteger(config.doors.rowCount) || config.doors.rowCount < 1) {
    throw new ConfigError('doors.rowCount', 'must be a positive integer');
  }

  for (const [type, weight] of Object.entries(config.matching.sideWeights)) {
    expectNonNegative(`matching.sideWeights.${type}`, weight);
  }
  expectNonNegative('matching.confidenceThreshold', config.matching.confidenceThreshold);
  for (const [label, type] of Object.entries(config.matching.labelAliases)) {
    expectOneOf(`matching.labelAliases.${label}`, type, ['wall_panels', 'door', 'window']);
  }
}

function expectOneOf(key: string, value: unknown, allowed: readonly string[]): void {
  if (typeof value !== 'string' || !allowed.includes(value)) {
    throw new ConfigError(key, `expected one of ${allowed.join(', ')}, got ${String(value)}`);
  }
}

function expectPositive(key: string, value: unknown): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(key, `expected a positive number, got ${String(value)}`);
  }
}

function expectNonNegative(key: string, value: unknown): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(key, `expected a non-negative number, got ${String(value)}`);
  }
}
