/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { createLogger, type Logger } from './logger.js';

export type WarningCode =
  | 'MISSING_BBOX'
  | 'NO_DOOR_ELEMENTS'
  | 'NO_HEADERS'
  | 'UNPAIRED_STUD'
  | 'HEADER_UNAVAILABLE'
  | 'SIDE_UNCLASSIFIED'
  | 'PANEL_GROUP_SIZE'
  | 'EMPTY_SIDE'
  | 'NO_CANDIDATES'
  | 'UNSUPPORTED_LABEL'
  | 'NON_EXTERIOR';

/** Recoverable condition attached to a run's output */
export interface FacadeWarning {
  code: WarningCode;
  /** Component that raised it (e.g. 'DoorGrouper') */
  component: string;
  message: string;
  elementId?: number;
}

export type MetricName =
  | 'skippedElements'
  | 'studs'
  | 'headers'
  | 'openings'
  | 'unpairedStuds'
  | 'openingsWithoutHeader'
  | 'unclassifiedElements'
  | 'unmatchedDetections';

export type RunMetrics = Record<MetricName, number>;

function emptyMetrics(): RunMetrics {
  return {
    skippedElements: 0,
    studs: 0,
    headers: 0,
    openings: 0,
    unpairedStuds: 0,
    openingsWithoutHeader: 0,
    unclassifiedElements: 0,
    unmatchedDetections: 0,
  };
}

/**
 * Per-run accumulator for warnings and counters.
 *
 * One instance is created per invocation and handed to each stage, so
 * nothing carries over between runs.
 */
export class Diagnostics {
  private readonly warningList: FacadeWarning[] = [];
  private readonly counters: RunMetrics = emptyMetrics();
  private readonly loggers = new Map<string, Logger>();

  constructor(private readonly echo = true) {}

  /** Record a warning and forward it to the component logger */
  warn(component: string, code: WarningCode, message: string, elementId?: number): void {
    const warning: FacadeWarning = { code, component, message };
    if (elementId !== undefined) warning.elementId = elementId;
    this.warningList.push(warning);

    if (this.echo) {
      this.logger(component).warn(message, { elementId, operation: code });
    }
  }

  count(metric: MetricName, by = 1): void {
    this.counters[metric] += by;
  }

  get warnings(): readonly FacadeWarning[] {
    return this.warningList;
  }

  get metrics(): Readonly<RunMetrics> {
    return this.counters;
  }

  /** Warnings with the given code */
  byCode(code: WarningCode): FacadeWarning[] {
    return this.warningList.filter(w => w.code === code);
  }

  logger(component: string): Logger {
    let log = this.loggers.get(component);
    if (!log) {
      log = createLogger(component);
      this.loggers.set(component, log);
    }
    return log;
  }
}
