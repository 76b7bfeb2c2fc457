// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Regular-stack REST calls.
 */

import type { HttpClient } from "@effect/platform";
import { Effect, Schema, pipe } from "effect";
import type { ParseError, StatusError, TransportError } from "../lib/errors";
import type { ServerConnection } from "../stack/context";
import { parseStackEnv } from "../stack/env-codec";
import { type RegularStack, RegularStackSchema, type StackEnvVar } from "../stack/types";
import { decodeJson, getJson, send } from "./transport";

type RestError = TransportError | StatusError | ParseError;

const StackFileSchema = Schema.Struct({
  StackFileContent: Schema.optionalWith(Schema.String, { default: () => "" }),
});

const StackDetailsSchema = Schema.Struct({
  EndpointId: Schema.Number,
  Env: Schema.optional(Schema.Unknown),
});

export interface RegularStackDetails {
  readonly endpointId: number;
  readonly env: readonly StackEnvVar[];
}

export const listRegularStacks = (
  connection: ServerConnection
): Effect.Effect<readonly RegularStack[], RestError, HttpClient.HttpClient> =>
  getJson(connection, "/api/stacks", Schema.NullOr(Schema.Array(RegularStackSchema))).pipe(
    Effect.map((stacks) => stacks ?? [])
  );

export const getRegularStackFile = (
  connection: ServerConnection,
  id: number
): Effect.Effect<string, RestError, HttpClient.HttpClient> =>
  getJson(connection, `/api/stacks/${id}/file`, StackFileSchema).pipe(
    Effect.map((file) => file.StackFileContent)
  );

export const getRegularStackDetails = (
  connection: ServerConnection,
  id: number
): Effect.Effect<RegularStackDetails, RestError, HttpClient.HttpClient> =>
  pipe(
    send(connection, { method: "GET", path: `/api/stacks/${id}` }),
    Effect.flatMap((body) => decodeJson(StackDetailsSchema, body)),
    Effect.flatMap((details) =>
      Effect.map(parseStackEnv(details.Env), (env) => ({ endpointId: details.EndpointId, env }))
    )
  );

export const updateRegularStack = (
  connection: ServerConnection,
  id: number,
  endpointId: number,
  file: string,
  env: readonly StackEnvVar[]
): Effect.Effect<void, TransportError | StatusError, HttpClient.HttpClient> =>
  send(connection, {
    method: "PUT",
    path: `/api/stacks/${id}`,
    urlParams: { endpointId: String(endpointId) },
    body: {
      StackFileContent: file,
      Prune: false,
      PullImage: false,
      Env: env.map(({ name, value }) => ({ name, value })),
    },
  }).pipe(Effect.asVoid);
