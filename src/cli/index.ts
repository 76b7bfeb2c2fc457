// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes settings resolution,
 * layer construction and error display so each command stays focused on
 * its own logic.
 */

import { Command } from "@effect/cli";
import type { FileSystem } from "@effect/platform";
import type { NodeContext } from "@effect/platform-node";
import { Effect, Match, Option, pipe } from "effect";
import type { LogFormat } from "../config/field-values";
import { type ResolvedSettings, loadSettings } from "../config/settings";
import { StackbridgeLoggerLive, detectColor } from "../lib/effect-logger";
import { type ErrorCodeValue, type StackbridgeError, ErrorCode } from "../lib/errors";
import { VERSION } from "../lib/version";
import type { StackService } from "../stack/service";
import { executeCreate } from "./commands/create";
import { executeEnvNames } from "./commands/env-names";
import { executeFile } from "./commands/file";
import { executeList } from "./commands/list";
import { executeUpdate } from "./commands/update";
import {
  type GlobalOptions,
  effectiveFormat,
  envOption,
  fileOption,
  globalOptions,
  groupOption,
  stackIdArg,
  stackNameArg,
  toCliOverrides,
} from "./options";
import { createStackLayer } from "./runtime";

// Error display

const isStackbridgeError = (err: unknown): err is StackbridgeError =>
  typeof err === "object" && err !== null && "_tag" in err && "code" in err && "message" in err;

/** Sync because it runs on the exit path. */
export const formatError = (
  err: { readonly message: string; readonly code: ErrorCodeValue },
  format: LogFormat,
  useColor: boolean
): string =>
  pipe(
    Match.value(format),
    Match.when("json", () => JSON.stringify({ error: err.message, code: err.code })),
    Match.when("pretty", () => `${useColor ? "\x1b[31m✗\x1b[0m" : "✗"} ${err.message}`),
    Match.exhaustive
  );

const displayError = (err: unknown, format: LogFormat): void => {
  if (!isStackbridgeError(err)) {
    return;
  }
  const stream = format === "json" ? process.stdout : process.stderr;
  stream.write(`${formatError(err, format, detectColor())}\n`);
};

// Command runner

const runCommand = (
  globals: GlobalOptions,
  commandName: string,
  handler: (
    settings: ResolvedSettings
  ) => Effect.Effect<void, StackbridgeError, StackService | FileSystem.FileSystem>
): Effect.Effect<void, StackbridgeError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const settings = yield* pipe(
      loadSettings(toCliOverrides(globals)),
      Effect.tapError((err) =>
        Effect.sync(() =>
          displayError(
            err,
            Option.getOrElse(effectiveFormat(globals), (): LogFormat => "pretty")
          )
        )
      )
    );
    yield* pipe(
      handler(settings),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => Effect.sync(() => displayError(err, settings.logFormat))),
      Effect.provide(createStackLayer(settings.stack)),
      Effect.provide(StackbridgeLoggerLive({ level: settings.logLevel, format: settings.logFormat }))
    );
  });

// Subcommand definitions

const listCmd = Command.make("list", { ...globalOptions }, (args) =>
  runCommand(args, "list", () => executeList())
).pipe(Command.withDescription("List all stacks, regular and edge"));

const fileCmd = Command.make("file", { ...globalOptions, id: stackIdArg }, (args) =>
  runCommand(args, "file", () => executeFile({ id: args.id }))
).pipe(Command.withDescription("Print the compose file of a stack"));

const envNamesCmd = Command.make("env-names", { ...globalOptions, id: stackIdArg }, (args) =>
  runCommand(args, "env-names", () => executeEnvNames({ id: args.id }))
).pipe(Command.withDescription("List environment variable names of a regular stack"));

const createCmd = Command.make(
  "create",
  { ...globalOptions, name: stackNameArg, file: fileOption, group: groupOption },
  (args) =>
    runCommand(args, "create", (settings) =>
      executeCreate({
        name: args.name,
        filePath: args.file,
        groups: args.group,
        readOnly: settings.stack.readOnly,
      })
    )
).pipe(Command.withDescription("Create an edge stack for the given environment groups"));

const updateCmd = Command.make(
  "update",
  { ...globalOptions, id: stackIdArg, file: fileOption, group: groupOption, env: envOption },
  (args) =>
    runCommand(args, "update", (settings) =>
      executeUpdate({
        id: args.id,
        filePath: args.file,
        groups: args.group,
        env: args.env,
        readOnly: settings.stack.readOnly,
      })
    )
).pipe(Command.withDescription("Update a stack's compose file, groups and env overrides"));

// Root command

const stackbridge = Command.make("stackbridge").pipe(
  Command.withDescription("Manage regular and edge stacks through one interface"),
  Command.withSubcommands([listCmd, fileCmd, envNamesCmd, createCmd, updateCmd])
);

export const cli: (
  args: readonly string[]
) => Effect.Effect<void, unknown, NodeContext.NodeContext> = Command.run(stackbridge, {
  name: "stackbridge",
  version: VERSION,
});

/** Exit code for a failure value; anything without a code is a general error. */
export const exitCodeOf = (err: unknown): ErrorCodeValue =>
  isStackbridgeError(err) ? err.code : ErrorCode.GENERAL_ERROR;
