// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Stack module exports.
 */

// Types
export type { EdgeStack, RegularStack, Stack, StackEnvVar } from "./types";
export { formatCreatedAt, fromEdgeStack, fromRegularStack } from "./types";

// Settings
export type { ServerConnection, StackSettingsData } from "./context";
export { StackSettings, makeStackSettingsLayer } from "./context";

// Env handling
export type { EnvEncoding } from "./env-codec";
export { decodeStackEnv, parseStackEnv, selectEnvEncoding } from "./env-codec";
export { mergeEnvOverrides, uniqueEnvNames } from "./env-merge";

// Fallback decisions
export { matchesEdgeMarker, shouldFallback } from "./fallback";
export type { ProbeOutcome, ProbePolicy } from "./decision";
export { fallbackUnlessUsable, fallbackWhenClassified, probe } from "./decision";

// Facade
export type { StackServiceShape } from "./service";
export { StackService, StackServiceLive } from "./service";
