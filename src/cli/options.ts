// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Centralized CLI option definitions, shared so every command spells them
 * the same way.
 */

import { Args as A, Options as O } from "@effect/cli";
import { Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel } from "../config/field-values";
import { LOG_FORMAT_VALUES, LOG_LEVEL_VALUES } from "../config/field-values";
import type { CliOverrides } from "../config/settings";

// Shared positional arguments

export const stackIdArg: A.Args<number> = A.integer({ name: "id" }).pipe(
  A.withDescription("Stack identifier")
);

export const stackNameArg: A.Args<string> = A.text({ name: "name" }).pipe(
  A.withDescription("Name of the new stack")
);

// Global options (spread into every command)

export const globalOptions: {
  readonly verbose: O.Options<boolean>;
  readonly logLevel: O.Options<Option.Option<LogLevel>>;
  readonly format: O.Options<Option.Option<LogFormat>>;
  readonly json: O.Options<boolean>;
  readonly config: O.Options<Option.Option<string>>;
  readonly serverUrl: O.Options<Option.Option<string>>;
  readonly insecure: O.Options<boolean>;
  readonly readOnly: O.Options<boolean>;
} = {
  verbose: O.boolean("verbose").pipe(
    O.withAlias("v"),
    O.withDescription("Verbose output (debug logging)")
  ),
  logLevel: O.choice("log-level", LOG_LEVEL_VALUES).pipe(
    O.withDescription("Set log level"),
    O.optional
  ),
  format: O.choice("format", LOG_FORMAT_VALUES).pipe(
    O.withDescription("Output format"),
    O.optional
  ),
  json: O.boolean("json").pipe(O.withDescription("Shorthand for --format json")),
  config: O.text("config").pipe(
    O.withAlias("c"),
    O.withDescription("Path to stackbridge.toml"),
    O.optional
  ),
  serverUrl: O.text("server-url").pipe(
    O.withDescription("Orchestration server URL (https:// is assumed without a scheme)"),
    O.optional
  ),
  insecure: O.boolean("insecure").pipe(
    O.withDescription("Skip TLS certificate verification")
  ),
  readOnly: O.boolean("read-only").pipe(
    O.withDescription("Refuse commands that create or modify stacks")
  ),
};

// Per-command options

export const fileOption: O.Options<string> = O.text("file").pipe(
  O.withAlias("f"),
  O.withDescription("Path to the compose file")
);

export const groupOption: O.Options<readonly string[]> = O.text("group").pipe(
  O.withAlias("g"),
  O.withDescription("Environment group ID (repeatable)"),
  O.repeated
);

export const envOption: O.Options<readonly string[]> = O.text("env").pipe(
  O.withAlias("e"),
  O.withDescription("Environment override NAME=VALUE (repeatable)"),
  O.repeated
);

// Type definitions

export interface GlobalOptions {
  readonly verbose: boolean;
  readonly logLevel: Option.Option<LogLevel>;
  readonly format: Option.Option<LogFormat>;
  readonly json: boolean;
  readonly config: Option.Option<string>;
  readonly serverUrl: Option.Option<string>;
  readonly insecure: boolean;
  readonly readOnly: boolean;
}

/** --json takes precedence as shorthand for --format=json. */
export const effectiveFormat = (globals: GlobalOptions): Option.Option<LogFormat> =>
  pipe(
    Match.value(globals.json),
    Match.when(true, (): Option.Option<LogFormat> => Option.some("json")),
    Match.when(false, (): Option.Option<LogFormat> => globals.format),
    Match.exhaustive
  );

/** An unset boolean flag defers to the environment and the file. */
const flagOverride = (set: boolean): Option.Option<boolean> =>
  set ? Option.some(true) : Option.none();

export const toCliOverrides = (globals: GlobalOptions): CliOverrides => ({
  configPath: globals.config,
  serverUrl: globals.serverUrl,
  skipTlsVerify: flagOverride(globals.insecure),
  readOnly: flagOverride(globals.readOnly),
  logLevel: globals.logLevel,
  logFormat: effectiveFormat(globals),
  verbose: globals.verbose,
});
