/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { z } from 'zod';
import { InputParseError } from './errors.js';
import type { JsonValue } from './types.js';

/** Any JSON value, e.g. an id the detector chose */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

/** `['panels', 0, 'bbox']` → `panels[0].bbox`; the document root is `$` */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let formatted = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      formatted += `[${segment}]`;
    } else {
      formatted += formatted === '' ? segment : `.${segment}`;
    }
  }
  return formatted === '' ? '$' : formatted;
}

/**
 * Validate `raw` against `schema`.
 *
 * @throws InputParseError for the first issue, with its path
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new InputParseError(issue.message, formatIssuePath(issue.path));
  }
  return result.data;
}
