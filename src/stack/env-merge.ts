// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Environment override merging. Stored entries keep their position; an
 * override replaces the value of a stored name, and names the server has
 * never seen are appended once, in the order they first appear.
 */

import type { StackEnvVar } from "./types";

/**
 * Merge overrides into a stored environment list.
 * Empty override names are ignored; for a repeated name the last value wins.
 *
 * @example
 * mergeEnvOverrides(
 *   [{ name: "A", value: "1" }, { name: "B", value: "2" }],
 *   [{ name: "B", value: "9" }, { name: "C", value: "3" }]
 * ) // [A=1, B=9, C=3]
 */
export const mergeEnvOverrides = (
  existing: readonly StackEnvVar[],
  overrides: readonly StackEnvVar[]
): readonly StackEnvVar[] => {
  // Map preserves insertion order, so keys are in first-seen order.
  const overrideValues = new Map<string, string>();
  for (const { name, value } of overrides) {
    if (name !== "") {
      overrideValues.set(name, value);
    }
  }
  if (overrideValues.size === 0) {
    return existing;
  }

  const seen = new Set<string>();
  const merged = existing.map((entry): StackEnvVar => {
    seen.add(entry.name);
    const replacement = overrideValues.get(entry.name);
    return replacement === undefined ? entry : { name: entry.name, value: replacement };
  });

  const appended = Array.from(overrideValues)
    .filter(([name]) => !seen.has(name))
    .map(([name, value]): StackEnvVar => ({ name, value }));

  return [...merged, ...appended];
};

/** Non-empty names in order of appearance, without repeats. */
export const uniqueEnvNames = (env: readonly StackEnvVar[]): readonly string[] => [
  ...new Set(env.map((e) => e.name).filter((name) => name !== "")),
];
