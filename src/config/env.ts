// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Config definitions for environment-based configuration.
 *
 * All exports are pure Config<A> values; nothing is read until a Config is
 * yielded at the CLI boundary. Optional fields come back as Option so the
 * resolver can tell "unset" apart from "set to the default".
 */

import { Config, ConfigProvider, type Option, type Redacted } from "effect";
import type { LogFormat, LogLevel } from "./field-values";

// ============================================================================
// Type Definitions (Pure Data)
// ============================================================================

/**
 * Environment configuration shape.
 */
export interface EnvConfig {
  readonly home: string;
  readonly xdgConfigHome: Option.Option<string>;
  readonly serverUrl: Option.Option<string>;
  readonly token: Option.Option<Redacted.Redacted<string>>;
  readonly skipTlsVerify: Option.Option<boolean>;
  readonly readOnly: Option.Option<boolean>;
  readonly logging: {
    readonly level: Option.Option<LogLevel>;
    readonly format: Option.Option<LogFormat>;
  };
  readonly debug: boolean;
}

// ============================================================================
// Primitive Configs (Building Blocks)
// ============================================================================

export const HomeConfig: Config.Config<string> = Config.string("HOME").pipe(
  Config.withDefault("/root")
);

export const XdgConfigHomeConfig: Config.Config<Option.Option<string>> = Config.option(
  Config.string("XDG_CONFIG_HOME")
);

/** Base URL of the orchestration server, with or without scheme. */
export const ServerUrlConfig: Config.Config<Option.Option<string>> = Config.nested(
  Config.option(Config.string("SERVER_URL")),
  "STACKBRIDGE"
);

/** API key sent as X-API-Key; redacted so it never reaches a log line. */
export const TokenConfig: Config.Config<Option.Option<Redacted.Redacted<string>>> = Config.nested(
  Config.option(Config.redacted("TOKEN")),
  "STACKBRIDGE"
);

export const SkipTlsVerifyConfig: Config.Config<Option.Option<boolean>> = Config.nested(
  Config.option(Config.boolean("SKIP_TLS_VERIFY")),
  "STACKBRIDGE"
);

export const ReadOnlyConfig: Config.Config<Option.Option<boolean>> = Config.nested(
  Config.option(Config.boolean("READ_ONLY")),
  "STACKBRIDGE"
);

export const LogLevelOptionConfig: Config.Config<Option.Option<LogLevel>> = Config.nested(
  Config.option(Config.literal("debug", "info", "warn", "error")("LOG_LEVEL")),
  "STACKBRIDGE"
);

export const LogFormatOptionConfig: Config.Config<Option.Option<LogFormat>> = Config.nested(
  Config.option(Config.literal("pretty", "json")("LOG_FORMAT")),
  "STACKBRIDGE"
);

/**
 * Debug mode flag. When true, forces log level to debug.
 */
export const DebugModeConfig: Config.Config<boolean> = Config.nested(
  Config.boolean("DEBUG").pipe(Config.withDefault(false)),
  "STACKBRIDGE"
);

// ============================================================================
// Composite Config (Pure Transformation)
// ============================================================================

export const EnvConfigSpec: Config.Config<EnvConfig> = Config.all([
  HomeConfig,
  XdgConfigHomeConfig,
  ServerUrlConfig,
  TokenConfig,
  SkipTlsVerifyConfig,
  ReadOnlyConfig,
  LogLevelOptionConfig,
  LogFormatOptionConfig,
  DebugModeConfig,
]).pipe(
  Config.map(
    ([home, xdgConfigHome, serverUrl, token, skipTlsVerify, readOnly, level, format, debug]) => ({
      home,
      xdgConfigHome,
      serverUrl,
      token,
      skipTlsVerify,
      readOnly,
      logging: { level, format },
      debug,
    })
  )
);

// ============================================================================
// Test Utilities (Pure Functions)
// ============================================================================

const envVarNames = {
  home: "HOME",
  serverUrl: "STACKBRIDGE_SERVER_URL",
  token: "STACKBRIDGE_TOKEN",
  skipTlsVerify: "STACKBRIDGE_SKIP_TLS_VERIFY",
  readOnly: "STACKBRIDGE_READ_ONLY",
  logLevel: "STACKBRIDGE_LOG_LEVEL",
  logFormat: "STACKBRIDGE_LOG_FORMAT",
  debug: "STACKBRIDGE_DEBUG",
} as const;

const overrideKeys: ReadonlyArray<keyof typeof envVarNames> = [
  "home",
  "serverUrl",
  "token",
  "skipTlsVerify",
  "readOnly",
  "logLevel",
  "logFormat",
  "debug",
];

/**
 * Test config override options using camelCase keys.
 */
export type TestConfigOverrides = {
  readonly [K in keyof typeof envVarNames]?: string;
};

/**
 * Create a ConfigProvider for testing. Only HOME is set unless overridden,
 * so every optional field resolves to None by default.
 *
 * @example
 * ```typescript
 * const provider = createTestConfigProvider({ serverUrl: "stacks.example.test" });
 * const env = await Effect.runPromise(Effect.withConfigProvider(EnvConfigSpec, provider));
 * ```
 */
export const createTestConfigProvider = (
  overrides: TestConfigOverrides = {}
): ConfigProvider.ConfigProvider => {
  const values = new Map<string, string>([[envVarNames.home, "/home/testuser"]]);
  for (const key of overrideKeys) {
    const value = overrides[key];
    if (value !== undefined) {
      values.set(envVarNames[key], value);
    }
  }
  return ConfigProvider.fromMap(values, { pathDelim: "_" });
};
