/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @facade-match/export - JSON documents for downstream consumers
 */

export type {
  SideSummaryRecord,
  ExportFloor,
  BimExportElement,
  BimExportSide,
  BimExport,
  DoorOutputRecord,
  MatchEntry,
  WarningRecord,
  MatchReport,
  SideSequences,
  DiagnosticsReport,
} from './types.js';

export { toSideSummaryRecord } from './side-summary-record.js';
export { toBimExport } from './bim-export.js';
export { toDoorOutput } from './door-output.js';
export { toMatchReport, toWarningRecords, toDiagnosticsReport } from './match-report.js';
export { toSideSequences } from './sequences.js';
