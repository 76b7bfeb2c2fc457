// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Update a stack's compose file and environment groups, optionally
 * overriding environment variables (regular stacks only).
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { ConfigError, GeneralError, StackServiceError } from "../../lib/errors";
import { logSuccess, makeSteps } from "../../lib/log";
import { StackService } from "../../stack/service";
import { parseEnvOverrides, parseGroupIds, readStackFile, requireWritable } from "./utils";

export interface UpdateOptions {
  readonly id: number;
  readonly filePath: string;
  readonly groups: readonly string[];
  readonly env: readonly string[];
  readonly readOnly: boolean;
}

export const executeUpdate = (
  options: UpdateOptions
): Effect.Effect<
  void,
  GeneralError | ConfigError | StackServiceError,
  StackService | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    yield* requireWritable(options.readOnly, "update");
    const groupIds = yield* parseGroupIds(options.groups);
    const overrides = yield* parseEnvOverrides(options.env);
    const service = yield* StackService;
    const steps = yield* makeSteps(2);

    const file = yield* steps.run(`Reading ${options.filePath}`, readStackFile(options.filePath));
    yield* steps.run(
      `Updating stack ${options.id}`,
      service.updateStack(options.id, file, groupIds, overrides)
    );

    yield* logSuccess("Stack updated successfully");
  });
