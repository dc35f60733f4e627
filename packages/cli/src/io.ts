/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { InputParseError } from '@facade-match/data';

/** Read and parse a JSON file; syntax errors name the file */
export function readJson(path: string): unknown {
  const text = readFileSync(path, 'utf-8');
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new InputParseError(`Invalid JSON (${detail})`, path);
  }
}

/** Write `data` as indented JSON to `<dir>/<name>`, creating `dir` as needed */
export function writeJson(dir: string, name: string, data: unknown): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, name);
  writeFileSync(path, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  return path;
}
