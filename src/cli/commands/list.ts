// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * List every stack, regular or edge, as a JSON array.
 */

import { Effect } from "effect";
import type { StackServiceError } from "../../lib/errors";
import { writeJson } from "../../lib/log";
import { StackService } from "../../stack/service";

export const executeList = (): Effect.Effect<void, StackServiceError, StackService> =>
  Effect.gen(function* () {
    const service = yield* StackService;
    const stacks = yield* service.getStacks;
    yield* Effect.logDebug(`Found ${stacks.length} stacks`);
    yield* writeJson(stacks, 2);
  });
