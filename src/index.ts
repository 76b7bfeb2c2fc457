#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * stackbridge - one stack interface over regular and edge stacks.
 *
 * Main entry point for the CLI application.
 * This is the "imperative shell" - the only place where the Effect runtime is executed.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Option } from "effect";
import { cli, exitCodeOf } from "./cli/index";
import { toExitCode } from "./lib/errors";

export const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => 1,
        onSome: (err): number => toExitCode(exitCodeOf(err)),
      }),
  });

/** Typed failures were already displayed by the command runner; only defects remain. */
const logUnexpected = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => {
          if (!Cause.isInterruptedOnly(cause)) {
            process.stderr.write(`Unexpected error:\n${Cause.pretty(cause)}\n`);
          }
        },
        onSome: (): void => undefined,
      }),
  });

async function main(): Promise<never> {
  const exit = await Effect.runPromiseExit(
    cli(process.argv).pipe(Effect.provide(NodeContext.layer))
  );
  logUnexpected(exit);
  process.exit(exitCodeFromExit(exit));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    process.stderr.write(`Unexpected error: ${String(err)}\n`);
    process.exit(1);
  });
}
