/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @facade-match/data - Shared types, configuration, errors and logging
 */

export type {
  BoundingBox,
  ElementInput,
  LocatedElement,
  FacadeBounds,
  FacadeModelInput,
  Side,
  ClassifiedSide,
  Floor,
  FloorAssignment,
  ElementType,
  NormalizedElement,
  Detection,
  MatchRecord,
  JsonValue,
} from './types.js';
export { SIDES, NO_SIDE, ELEMENT_TYPES } from './types.js';

export type {
  FacadeConfig,
  FacadeConfigInput,
  BoundsStrategy,
  ZStatistic,
  PanelFloorStrategy,
  DoorMode,
  PairingMode,
  PanelMode,
  WindowFloorMode,
} from './config.js';
export { DEFAULT_CONFIG, DEFAULT_LABEL_ALIASES, resolveConfig } from './config.js';

export {
  FacadeError,
  NoGeometryError,
  InsufficientDataError,
  InsufficientStudsError,
  StudTopologyError,
  ConfigError,
  InputParseError,
} from './errors.js';
export type { FacadeErrorCode } from './errors.js';

export { Diagnostics } from './diagnostics.js';
export type { FacadeWarning, WarningCode, MetricName, RunMetrics } from './diagnostics.js';

export { JsonValueSchema, formatIssuePath, parseWith } from './validation.js';

export { locateElements, floorAccepts, floorNumber } from './elements.js';

export { createLogger } from './logger.js';
export type { Logger, LogLevel, LogContext } from './logger.js';
