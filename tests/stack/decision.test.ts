// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Either, Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  fallbackUnlessUsable,
  fallbackWhenClassified,
  mapSuccess,
  probe,
} from "../../src/stack/decision";

describe("fallbackUnlessUsable", () => {
  const policy = fallbackUnlessUsable<readonly number[], string>((xs) => xs.length > 0);

  test("usable success is returned", () => {
    expect(policy(Either.right([1]))).toEqual({ _tag: "Success", value: [1] });
  });

  test("unusable success falls back without a cause", () => {
    expect(policy(Either.right([]))).toEqual({ _tag: "Fallback", cause: Option.none() });
  });

  test("every failure falls back with its cause", () => {
    expect(policy(Either.left("boom"))).toEqual({ _tag: "Fallback", cause: Option.some("boom") });
  });
});

describe("fallbackWhenClassified", () => {
  const policy = fallbackWhenClassified<number, string>((e) => e === "not found");

  test("success is returned", () => {
    expect(policy(Either.right(3))).toEqual({ _tag: "Success", value: 3 });
  });

  test("classified failures fall back", () => {
    expect(policy(Either.left("not found"))).toEqual({
      _tag: "Fallback",
      cause: Option.some("not found"),
    });
  });

  test("other failures are terminal", () => {
    expect(policy(Either.left("forbidden"))).toEqual({ _tag: "Terminal", cause: "forbidden" });
  });
});

describe("probe", () => {
  test("turns a failed attempt into an outcome without failing", async () => {
    const attempt: Effect.Effect<number, string> = Effect.fail("forbidden");
    const outcome = await Effect.runPromise(
      probe(attempt, fallbackWhenClassified<number, string>(() => false))
    );

    expect(outcome).toEqual({ _tag: "Terminal", cause: "forbidden" });
  });
});

describe("mapSuccess", () => {
  test("maps only successful outcomes", () => {
    const double = mapSuccess((n: number) => n * 2);

    expect(double({ _tag: "Success", value: 4 })).toEqual({ _tag: "Success", value: 8 });
    expect(double<string>({ _tag: "Terminal", cause: "x" })).toEqual({
      _tag: "Terminal",
      cause: "x",
    });
  });
});
