// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { mergeEnvOverrides, uniqueEnvNames } from "../../src/stack/env-merge";
import type { StackEnvVar } from "../../src/stack/types";

const env = (...pairs: [string, string][]): StackEnvVar[] =>
  pairs.map(([name, value]) => ({ name, value }));

describe("mergeEnvOverrides", () => {
  test("no overrides returns the stored list itself", () => {
    const existing = env(["A", "1"], ["B", "2"]);

    expect(mergeEnvOverrides(existing, [])).toBe(existing);
  });

  test("overrides with only empty names change nothing", () => {
    const existing = env(["A", "1"]);

    expect(mergeEnvOverrides(existing, env(["", "x"]))).toBe(existing);
  });

  test("replaces stored values in place and appends new names", () => {
    expect(mergeEnvOverrides(env(["A", "1"], ["B", "2"]), env(["B", "9"], ["C", "3"]))).toEqual(
      env(["A", "1"], ["B", "9"], ["C", "3"])
    );
  });

  test("last value wins for a repeated override, at its first-seen position", () => {
    expect(
      mergeEnvOverrides(env(["A", "1"]), env(["C", "1"], ["D", "4"], ["C", "2"]))
    ).toEqual(env(["A", "1"], ["C", "2"], ["D", "4"]));
  });

  test("never drops stored entries, including blank ones", () => {
    const existing = env(["A", "1"], ["", "orphan"], ["B", "2"]);

    const merged = mergeEnvOverrides(existing, env(["Z", "26"]));

    expect(merged).toEqual(env(["A", "1"], ["", "orphan"], ["B", "2"], ["Z", "26"]));
    expect(merged).toHaveLength(existing.length + 1);
  });

  test("ignores empty override names among real ones", () => {
    expect(mergeEnvOverrides(env(["A", "1"]), env(["", "x"], ["A", "5"]))).toEqual(env(["A", "5"]));
  });

  test("does not modify its inputs", () => {
    const existing = env(["A", "1"]);
    const overrides = env(["A", "2"]);

    mergeEnvOverrides(existing, overrides);

    expect(existing).toEqual(env(["A", "1"]));
    expect(overrides).toEqual(env(["A", "2"]));
  });
});

describe("uniqueEnvNames", () => {
  test("skips blanks and repeats, keeping first-seen order", () => {
    expect(uniqueEnvNames(env(["B", "1"], ["", "x"], ["A", "2"], ["B", "3"]))).toEqual(["B", "A"]);
  });

  test("is empty for an empty list", () => {
    expect(uniqueEnvNames([])).toEqual([]);
  });
});
