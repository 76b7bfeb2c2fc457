// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Merges CLI flags, environment and stackbridge.toml into the settings
 * the rest of the program runs with.
 */

import type { FileSystem } from "@effect/platform";
import { Effect, Option, pipe } from "effect";
import { ConfigError, ErrorCode } from "../lib/errors";
import type { StackSettingsData } from "../stack/context";
import { type EnvConfig, EnvConfigSpec } from "./env";
import type { LogFormat, LogLevel } from "./field-values";
import { defaultConfigPaths, loadFileConfig } from "./loader";
import { resolve, resolveOptional } from "./resolve";
import type { FileConfig } from "./schema";

/** Values given on the command line; None means "not given". */
export interface CliOverrides {
  readonly configPath: Option.Option<string>;
  readonly serverUrl: Option.Option<string>;
  readonly skipTlsVerify: Option.Option<boolean>;
  readonly readOnly: Option.Option<boolean>;
  readonly logLevel: Option.Option<LogLevel>;
  readonly logFormat: Option.Option<LogFormat>;
  readonly verbose: boolean;
}

export interface ResolvedSettings {
  readonly stack: StackSettingsData;
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
}

export const resolveSettings = (
  cli: CliOverrides,
  env: EnvConfig,
  file: FileConfig
): ResolvedSettings => {
  const baseUrl = resolveOptional({
    cli: cli.serverUrl,
    env: env.serverUrl,
    file: Option.fromNullable(file.server.url),
  });
  const token = resolveOptional({
    cli: Option.none(),
    env: env.token,
    file: Option.fromNullable(file.server.token),
  });
  const skipTlsVerify = resolve({
    cli: cli.skipTlsVerify,
    env: env.skipTlsVerify,
    file: file.server.skipTlsVerify,
  });

  const logLevel: LogLevel =
    cli.verbose || env.debug
      ? "debug"
      : resolve({ cli: cli.logLevel, env: env.logging.level, file: file.logging.level });

  return {
    stack: {
      connection: pipe(
        Option.all({ baseUrl, token }),
        Option.map((c) => ({ ...c, skipTlsVerify }))
      ),
      fallbackMarkers: file.edge.fallbackMarkers,
      readOnly: resolve({ cli: cli.readOnly, env: env.readOnly, file: file.readOnly }),
    },
    logLevel,
    logFormat: resolve({ cli: cli.logFormat, env: env.logging.format, file: file.logging.format }),
  };
};

/** Read the environment and the config file, then resolve. */
export const loadSettings = (
  cli: CliOverrides
): Effect.Effect<ResolvedSettings, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const env = yield* pipe(
      EnvConfigSpec,
      Effect.mapError(
        (e) =>
          new ConfigError({
            code: ErrorCode.CONFIG_VALIDATION_ERROR,
            message: `Invalid environment configuration: ${String(e)}`,
          })
      )
    );
    const file = yield* loadFileConfig(
      cli.configPath,
      defaultConfigPaths(env.home, env.xdgConfigHome)
    );
    return resolveSettings(cli, env, file);
  });
