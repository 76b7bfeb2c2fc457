// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Input validation shared by the write commands. Everything here fails with
 * GeneralError before any remote call is made.
 */

import { FileSystem } from "@effect/platform";
import { Effect, pipe } from "effect";
import { ConfigError, ErrorCode, GeneralError, causeOf } from "../../lib/errors";
import type { StackEnvVar } from "../../stack/types";

const invalidArgs = (message: string): GeneralError =>
  new GeneralError({ code: ErrorCode.INVALID_ARGS, message });

/**
 * Parse `NAME=VALUE` pairs. The value may be empty or contain `=`; the name
 * may not be empty.
 *
 * @example parseEnvOverrides(["A=1", "B=x=y"]) // [A=1, B=x=y]
 */
export const parseEnvOverrides = (
  raw: readonly string[]
): Effect.Effect<readonly StackEnvVar[], GeneralError> =>
  Effect.forEach(raw, (entry): Effect.Effect<StackEnvVar, GeneralError> => {
    const eq = entry.indexOf("=");
    if (eq === -1) {
      return Effect.fail(invalidArgs(`Invalid env override "${entry}": expected NAME=VALUE`));
    }
    const name = entry.slice(0, eq).trim();
    if (name === "") {
      return Effect.fail(invalidArgs(`Invalid env override "${entry}": name must not be empty`));
    }
    return Effect.succeed({ name, value: entry.slice(eq + 1) });
  });

const POSITIVE_INTEGER = /^[1-9]\d*$/;

export const parseGroupIds = (
  raw: readonly string[]
): Effect.Effect<readonly number[], GeneralError> =>
  Effect.forEach(raw, (entry): Effect.Effect<number, GeneralError> =>
    POSITIVE_INTEGER.test(entry.trim())
      ? Effect.succeed(Number.parseInt(entry.trim(), 10))
      : Effect.fail(invalidArgs(`Invalid environment group ID "${entry}": expected a positive integer`))
  );

/** Write commands are refused in read-only mode. */
export const requireWritable = (
  readOnly: boolean,
  command: string
): Effect.Effect<void, GeneralError> =>
  readOnly
    ? Effect.fail(
        new GeneralError({
          code: ErrorCode.READ_ONLY_MODE,
          message: `${command} is not allowed in read-only mode`,
        })
      )
    : Effect.void;

export const readStackFile = (
  path: string
): Effect.Effect<string, ConfigError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* pipe(
      fs.readFileString(path),
      Effect.mapError(
        (e) =>
          new ConfigError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to read stack file ${path}: ${e.message}`,
            path,
            ...causeOf(e),
          })
      )
    );
  });
