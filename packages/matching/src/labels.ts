/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { ElementType } from '@facade-match/data';

/**
 * Map a detector label onto the model element vocabulary.
 * Lookup is case-insensitive; unknown labels yield `undefined`.
 */
export function resolveLabel(
  label: string,
  aliases: Readonly<Record<string, ElementType>>,
): ElementType | undefined {
  const key = label.trim().toLowerCase();
  return Object.hasOwn(aliases, key) ? aliases[key] : undefined;
}
