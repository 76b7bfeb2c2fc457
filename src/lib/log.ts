// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Command progress and results. Progress goes through the Effect logger
 * with style annotations; results are written to stdout as-is so they can
 * be piped.
 */

import { Effect, Ref } from "effect";
import { StyleKeys } from "./effect-logger";

export const logSuccess = (message: string): Effect.Effect<void> =>
  Effect.log(message).pipe(Effect.annotateLogs(StyleKeys.style, "success"));

const logStep = (current: number, total: number, message: string): Effect.Effect<void> =>
  Effect.log(message).pipe(
    Effect.annotateLogs({
      [StyleKeys.style]: "step",
      [StyleKeys.stepNumber]: String(current),
      [StyleKeys.stepTotal]: String(total),
    })
  );

export const writeOutput = (text: string): Effect.Effect<void> =>
  Effect.sync(() => {
    process.stdout.write(`${text}\n`);
  });

export const writeJson = (value: unknown, indent?: number): Effect.Effect<void> =>
  writeOutput(JSON.stringify(value, null, indent));

/** Numbered steps of one command, e.g. `[1/2] → Reading compose.yml`. */
export interface Steps {
  /** Log the next step label, then run the step. */
  readonly run: <A, E, R>(label: string, step: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R>;
}

export const makeSteps = (total: number): Effect.Effect<Steps> =>
  Effect.map(
    Ref.make(0),
    (counter): Steps => ({
      run: (label, step) =>
        Ref.updateAndGet(counter, (n) => n + 1).pipe(
          Effect.flatMap((current) => logStep(current, total, label)),
          Effect.zipRight(step)
        ),
    })
  );
