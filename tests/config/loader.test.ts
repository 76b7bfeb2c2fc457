// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, Option, Redacted } from "effect";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { defaultConfigPaths, loadFileConfig, loadTomlFile } from "../../src/config/loader";
import { defaultFileConfig } from "../../src/config/schema";
import { ErrorCode } from "../../src/lib/errors";
import { runTest } from "../helpers/layers";

let dir: string;
let validPath: string;
let brokenPath: string;
let invalidPath: string;

const VALID_TOML = `
readOnly = true

[server]
url = "stacks.example.test"
token = "test-secret"
skipTlsVerify = true

[edge]
fallbackMarkers = ["edge only"]

[logging]
level = "warn"
format = "json"
`;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "stackbridge-config-"));
  validPath = join(dir, "valid.toml");
  brokenPath = join(dir, "broken.toml");
  invalidPath = join(dir, "invalid.toml");
  await writeFile(validPath, VALID_TOML);
  await writeFile(brokenPath, "readOnly = \n");
  await writeFile(invalidPath, '[logging]\nlevel = "loud"\n');
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("loadTomlFile", () => {
  test("parses every section", async () => {
    const config = await runTest(loadTomlFile(validPath));

    expect(config.readOnly).toBe(true);
    expect(config.server.url).toBe("stacks.example.test");
    expect(Option.map(Option.fromNullable(config.server.token), Redacted.value)).toEqual(
      Option.some("test-secret")
    );
    expect(config.server.skipTlsVerify).toBe(true);
    expect(config.edge.fallbackMarkers).toEqual(["edge only"]);
    expect(config.logging).toEqual({ level: "warn", format: "json" });
  });

  test("reports a missing file", async () => {
    const missing = join(dir, "missing.toml");
    const error = await runTest(Effect.flip(loadTomlFile(missing)));

    expect(error.code).toBe(ErrorCode.CONFIG_NOT_FOUND);
    expect(error.message).toBe(`Configuration file not found: ${missing}`);
    expect(error.path).toBe(missing);
  });

  test("reports TOML syntax errors with the path", async () => {
    const error = await runTest(Effect.flip(loadTomlFile(brokenPath)));

    expect(error.code).toBe(ErrorCode.CONFIG_PARSE_ERROR);
    expect(error.message.startsWith(`Failed to parse TOML in ${brokenPath}: `)).toBe(true);
  });

  test("reports schema violations with the path", async () => {
    const error = await runTest(Effect.flip(loadTomlFile(invalidPath)));

    expect(error.code).toBe(ErrorCode.CONFIG_VALIDATION_ERROR);
    expect(error.message.startsWith(`Configuration validation failed for ${invalidPath}:\n`)).toBe(
      true
    );
  });
});

describe("loadFileConfig", () => {
  test("an explicit path must exist", async () => {
    const missing = join(dir, "nope.toml");
    const error = await runTest(Effect.flip(loadFileConfig(Option.some(missing), [validPath])));

    expect(error.code).toBe(ErrorCode.CONFIG_NOT_FOUND);
  });

  test("loads the first existing search path", async () => {
    const config = await runTest(
      loadFileConfig(Option.none(), [join(dir, "absent.toml"), validPath])
    );

    expect(config.logging.level).toBe("warn");
  });

  test("uses defaults when no search path exists", async () => {
    const config = await runTest(loadFileConfig(Option.none(), [join(dir, "absent.toml")]));

    expect(config).toEqual(defaultFileConfig);
  });

  test("an invalid default file still fails", async () => {
    const error = await runTest(Effect.flip(loadFileConfig(Option.none(), [invalidPath])));

    expect(error.code).toBe(ErrorCode.CONFIG_VALIDATION_ERROR);
  });
});

describe("defaultConfigPaths", () => {
  test("falls back to ~/.config without XDG_CONFIG_HOME", () => {
    expect(defaultConfigPaths("/home/u", Option.none())).toEqual([
      "/home/u/.config/stackbridge/stackbridge.toml",
      "./stackbridge.toml",
    ]);
  });

  test("prefers XDG_CONFIG_HOME", () => {
    expect(defaultConfigPaths("/home/u", Option.some("/xdg"))).toEqual([
      "/xdg/stackbridge/stackbridge.toml",
      "./stackbridge.toml",
    ]);
  });
});
