// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Create a stack. New stacks are always edge stacks, deployed to the given
 * environment groups.
 */

import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import type { ConfigError, GeneralError, StackServiceError } from "../../lib/errors";
import { logSuccess, makeSteps } from "../../lib/log";
import { StackService } from "../../stack/service";
import { parseGroupIds, readStackFile, requireWritable } from "./utils";

export interface CreateOptions {
  readonly name: string;
  readonly filePath: string;
  readonly groups: readonly string[];
  readonly readOnly: boolean;
}

export const executeCreate = (
  options: CreateOptions
): Effect.Effect<
  void,
  GeneralError | ConfigError | StackServiceError,
  StackService | FileSystem.FileSystem
> =>
  Effect.gen(function* () {
    yield* requireWritable(options.readOnly, "create");
    const groupIds = yield* parseGroupIds(options.groups);
    const service = yield* StackService;
    const steps = yield* makeSteps(2);

    const file = yield* steps.run(`Reading ${options.filePath}`, readStackFile(options.filePath));
    const id = yield* steps.run(
      `Creating stack ${options.name}`,
      service.createStack(options.name, file, groupIds)
    );

    yield* logSuccess(`Stack created successfully with ID: ${id}`);
  });
