// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Edge-stack primitives over the server's edge_stacks endpoints.
 * Edge stacks are addressed by edge group, not endpoint, and carry no
 * environment list.
 */

import type { HttpClient } from "@effect/platform";
import { Effect, Schema } from "effect";
import type { ParseError, StatusError, TransportError } from "../lib/errors";
import type { ServerConnection } from "../stack/context";
import { type EdgeStack, EpochSecondsSchema } from "../stack/types";
import { decodeJson, getJson, send } from "./transport";

type RestError = TransportError | StatusError | ParseError;

/** Compose deployment; the server's other kind (kubernetes) is not used here. */
const DEPLOYMENT_TYPE_COMPOSE = 0;

const EdgeStackRecordSchema = Schema.Struct({
  Id: Schema.Number,
  Name: Schema.String,
  CreationDate: Schema.optionalWith(EpochSecondsSchema, { default: () => 0 }),
  EdgeGroups: Schema.optional(Schema.NullOr(Schema.Array(Schema.Number))),
});

const StackFileSchema = Schema.Struct({
  StackFileContent: Schema.optionalWith(Schema.String, { default: () => "" }),
});

const CreatedSchema = Schema.Struct({ Id: Schema.Number });

export const listEdgeStacks = (
  connection: ServerConnection
): Effect.Effect<readonly EdgeStack[], RestError, HttpClient.HttpClient> =>
  getJson(connection, "/api/edge_stacks", Schema.NullOr(Schema.Array(EdgeStackRecordSchema))).pipe(
    Effect.map((records) =>
      (records ?? []).map(
        (r): EdgeStack => ({
          id: r.Id,
          name: r.Name,
          creationDate: r.CreationDate,
          edgeGroups: r.EdgeGroups ?? undefined,
        })
      )
    )
  );

export const getEdgeStackFile = (
  connection: ServerConnection,
  id: number
): Effect.Effect<string, RestError, HttpClient.HttpClient> =>
  getJson(connection, `/api/edge_stacks/${id}/file`, StackFileSchema).pipe(
    Effect.map((file) => file.StackFileContent)
  );

export const createEdgeStack = (
  connection: ServerConnection,
  name: string,
  file: string,
  groupIds: readonly number[]
): Effect.Effect<number, RestError, HttpClient.HttpClient> =>
  send(connection, {
    method: "POST",
    path: "/api/edge_stacks/create/string",
    body: {
      name,
      stackFileContent: file,
      edgeGroups: groupIds,
      deploymentType: DEPLOYMENT_TYPE_COMPOSE,
    },
  }).pipe(
    Effect.flatMap((body) => decodeJson(CreatedSchema, body)),
    Effect.map((created) => created.Id)
  );

export const updateEdgeStack = (
  connection: ServerConnection,
  id: number,
  file: string,
  groupIds: readonly number[]
): Effect.Effect<void, TransportError | StatusError, HttpClient.HttpClient> =>
  send(connection, {
    method: "PUT",
    path: `/api/edge_stacks/${id}`,
    body: {
      stackFileContent: file,
      edgeGroups: groupIds,
      deploymentType: DEPLOYMENT_TYPE_COMPOSE,
      updateVersion: true,
    },
  }).pipe(Effect.asVoid);
