// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect } from "effect";
import type { StackServiceError } from "../../lib/errors";
import { writeOutput } from "../../lib/log";
import { StackService } from "../../stack/service";

export interface FileOptions {
  readonly id: number;
}

/** Print a stack's compose file as stored on the server. */
export const executeFile = (
  options: FileOptions
): Effect.Effect<void, StackServiceError, StackService> =>
  Effect.gen(function* () {
    const service = yield* StackService;
    const content = yield* service.getStackFile(options.id);
    yield* writeOutput(content);
  });
