// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Stack records as the two server surfaces return them, and the unified
 * view handed to callers.
 */

import { Schema } from "effect";

/** Unified view. `environmentGroupIds` is always present, possibly empty. */
export interface Stack {
  readonly id: number;
  readonly name: string;
  readonly createdAt: string;
  readonly environmentGroupIds: readonly number[];
}

export interface StackEnvVar {
  readonly name: string;
  readonly value: string;
}

/** Latest second a JavaScript Date can represent. */
export const MAX_EPOCH_SECONDS = 8_640_000_000_000;

/** Creation time in epoch seconds, 0 when the server omits it. */
export const EpochSecondsSchema = Schema.Number.pipe(
  Schema.int(),
  Schema.between(0, MAX_EPOCH_SECONDS)
);

export const RegularStackSchema = Schema.Struct({
  Id: Schema.Number,
  Name: Schema.String,
  Type: Schema.optionalWith(Schema.Number, { default: () => 0 }),
  EndpointId: Schema.optionalWith(Schema.Number, { default: () => 0 }),
  CreationDate: Schema.optionalWith(EpochSecondsSchema, { default: () => 0 }),
  Status: Schema.optionalWith(Schema.Number, { default: () => 0 }),
});

export type RegularStack = typeof RegularStackSchema.Type;

/** Edge record as surfaced by the edge primitives. */
export interface EdgeStack {
  readonly id: number;
  readonly name: string;
  readonly creationDate: number;
  readonly edgeGroups?: readonly number[] | undefined;
}

/** Epoch seconds to RFC3339 in UTC, second precision. */
export const formatCreatedAt = (epochSeconds: number): string =>
  new Date(epochSeconds * 1000).toISOString().replace(/\.\d{3}Z$/, "Z");

export const fromRegularStack = (stack: RegularStack): Stack => ({
  id: stack.Id,
  name: stack.Name,
  createdAt: formatCreatedAt(stack.CreationDate),
  environmentGroupIds: [],
});

export const fromEdgeStack = (stack: EdgeStack): Stack => ({
  id: stack.id,
  name: stack.name,
  createdAt: formatCreatedAt(stack.creationDate),
  environmentGroupIds: stack.edgeGroups ? [...stack.edgeGroups] : [],
});
