// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Environment variable names of a regular stack. Values are never printed.
 */

import { Effect } from "effect";
import type { StackServiceError } from "../../lib/errors";
import { writeJson } from "../../lib/log";
import { StackService } from "../../stack/service";

export interface EnvNamesOptions {
  readonly id: number;
}

export const executeEnvNames = (
  options: EnvNamesOptions
): Effect.Effect<void, StackServiceError, StackService> =>
  Effect.gen(function* () {
    const service = yield* StackService;
    const names = yield* service.getStackEnvNames(options.id);
    yield* writeJson(names);
  });
