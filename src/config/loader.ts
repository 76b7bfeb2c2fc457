// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * TOML configuration loading with fail-fast validation. Files are parsed
 * and validated in a single pass; syntax errors and schema violations are
 * reported with the file path. Without an explicit path the default
 * locations are searched and a missing file means defaults, but an
 * explicit path must exist.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Either, Option, ParseResult, Schema, pipe } from "effect";
import { parse as parseToml } from "smol-toml";
import { ConfigError, ErrorCode, causeOf, errorMessage } from "../lib/errors";
import { type FileConfig, defaultFileConfig, fileConfigSchema } from "./schema";

export const CONFIG_FILE_NAME = "stackbridge.toml";

const validate = (data: unknown, filePath: string): Effect.Effect<FileConfig, ConfigError> =>
  Either.match(Schema.decodeUnknownEither(fileConfigSchema)(data), {
    onLeft: (error): Effect.Effect<FileConfig, ConfigError> =>
      Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_VALIDATION_ERROR,
          message: `Configuration validation failed for ${filePath}:\n${ParseResult.TreeFormatter.formatErrorSync(error)}`,
          path: filePath,
        })
      ),
    onRight: (config): Effect.Effect<FileConfig, ConfigError> => Effect.succeed(config),
  });

export const loadTomlFile = (
  filePath: string
): Effect.Effect<FileConfig, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    yield* pipe(
      fs.exists(filePath),
      Effect.orElseSucceed(() => false),
      Effect.filterOrFail(
        (exists): exists is true => exists,
        () =>
          new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Configuration file not found: ${filePath}`,
            path: filePath,
          })
      )
    );

    const content = yield* pipe(
      fs.readFileString(filePath),
      Effect.mapError(
        (e) =>
          new ConfigError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to read ${filePath}: ${e.message}`,
            path: filePath,
            ...causeOf(e),
          })
      )
    );

    const parsed = yield* Effect.try({
      try: (): unknown => parseToml(content),
      catch: (e): ConfigError =>
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Failed to parse TOML in ${filePath}: ${errorMessage(e)}`,
          path: filePath,
          ...causeOf(e),
        }),
    });

    return yield* validate(parsed, filePath);
  });

/** Default search order, most specific first. */
export const defaultConfigPaths = (
  home: string,
  xdgConfigHome: Option.Option<string>
): readonly string[] => [
  `${Option.getOrElse(xdgConfigHome, () => `${home}/.config`)}/stackbridge/${CONFIG_FILE_NAME}`,
  `./${CONFIG_FILE_NAME}`,
];

/**
 * Load the first existing default file, or defaults when none exists.
 * A default file that exists but is invalid still fails.
 */
export const loadFileConfig = (
  configPath: Option.Option<string>,
  searchPaths: readonly string[]
): Effect.Effect<FileConfig, ConfigError, FileSystem.FileSystem> =>
  Option.match(configPath, {
    onSome: (path): Effect.Effect<FileConfig, ConfigError, FileSystem.FileSystem> =>
      loadTomlFile(path),
    onNone: (): Effect.Effect<FileConfig, ConfigError, FileSystem.FileSystem> =>
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const found = yield* Effect.findFirst(searchPaths, (p) =>
          pipe(
            fs.exists(p),
            Effect.orElseSucceed(() => false)
          )
        );
        return yield* Option.match(found, {
          onNone: (): Effect.Effect<FileConfig, never> => Effect.succeed(defaultFileConfig),
          onSome: (p): Effect.Effect<FileConfig, ConfigError, FileSystem.FileSystem> =>
            loadTomlFile(p),
        });
      }),
  });
