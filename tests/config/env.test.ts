// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Exit, Option, Redacted } from "effect";
import { describe, expect, test } from "vitest";
import {
  EnvConfigSpec,
  type TestConfigOverrides,
  createTestConfigProvider,
} from "../../src/config/env";

const readEnv = (overrides: TestConfigOverrides = {}) =>
  Effect.withConfigProvider(EnvConfigSpec, createTestConfigProvider(overrides));

describe("EnvConfigSpec", () => {
  test("optional fields are None when unset", async () => {
    const env = await Effect.runPromise(readEnv());

    expect(env.home).toBe("/home/testuser");
    expect(Option.isNone(env.xdgConfigHome)).toBe(true);
    expect(Option.isNone(env.serverUrl)).toBe(true);
    expect(Option.isNone(env.token)).toBe(true);
    expect(Option.isNone(env.skipTlsVerify)).toBe(true);
    expect(Option.isNone(env.readOnly)).toBe(true);
    expect(Option.isNone(env.logging.level)).toBe(true);
    expect(env.debug).toBe(false);
  });

  test("reads prefixed variables", async () => {
    const env = await Effect.runPromise(
      readEnv({
        serverUrl: "stacks.example.test",
        token: "test-secret",
        skipTlsVerify: "true",
        readOnly: "false",
        logLevel: "warn",
        logFormat: "json",
        debug: "true",
      })
    );

    expect(env.serverUrl).toEqual(Option.some("stacks.example.test"));
    expect(Option.map(env.token, Redacted.value)).toEqual(Option.some("test-secret"));
    expect(env.skipTlsVerify).toEqual(Option.some(true));
    expect(env.readOnly).toEqual(Option.some(false));
    expect(env.logging.level).toEqual(Option.some("warn"));
    expect(env.logging.format).toEqual(Option.some("json"));
    expect(env.debug).toBe(true);
  });

  test("rejects an unknown log level", async () => {
    const exit = await Effect.runPromiseExit(readEnv({ logLevel: "loud" }));

    expect(Exit.isFailure(exit)).toBe(true);
  });
});
