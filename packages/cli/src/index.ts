/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @facade-match/cli - File-based entry points behind the `facade-match` command
 */

export { parseModelSnapshot, parseConfigFile } from './model-input.js';
export { readJson, writeJson } from './io.js';
export { runAnalyze, runMatch } from './commands.js';
export type { RunOptions, AnalyzeSummary, MatchSummary } from './commands.js';
