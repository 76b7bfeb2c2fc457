// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * EdgeStacks service: the four edge primitives the facade may fall back to.
 * Failures are reported as EdgeStackError whatever went wrong underneath.
 */

import { HttpClient } from "@effect/platform";
import { Context, Effect, Layer, Option, pipe } from "effect";
import { EdgeStackError, ErrorCode, type RemoteError } from "../../lib/errors";
import { type ServerConnection, StackSettings } from "../../stack/context";
import type { EdgeStack } from "../../stack/types";
import { createEdgeStack, getEdgeStackFile, listEdgeStacks, updateEdgeStack } from "../edge";
import { notConfigured } from "./regular-stacks";

export interface EdgeStacksService {
  readonly list: Effect.Effect<readonly EdgeStack[], EdgeStackError>;
  readonly getFile: (id: number) => Effect.Effect<string, EdgeStackError>;
  readonly create: (
    name: string,
    file: string,
    groupIds: readonly number[]
  ) => Effect.Effect<number, EdgeStackError>;
  readonly update: (
    id: number,
    file: string,
    groupIds: readonly number[]
  ) => Effect.Effect<void, EdgeStackError>;
}

export interface EdgeStacks {
  readonly _tag: "EdgeStacks";
}

export const EdgeStacks: Context.Tag<EdgeStacks, EdgeStacksService> = Context.GenericTag<
  EdgeStacks,
  EdgeStacksService
>("stackbridge/EdgeStacks");

const toEdgeError = (error: RemoteError): EdgeStackError =>
  new EdgeStackError({
    code: ErrorCode.EDGE_STACK_FAILED,
    message: error.message,
    cause: error,
  });

export const EdgeStacksLive: Layer.Layer<EdgeStacks, never, StackSettings | HttpClient.HttpClient> =
  Layer.effect(
    EdgeStacks,
    Effect.gen(function* () {
      const settings = yield* StackSettings;
      const client = yield* HttpClient.HttpClient;

      const withConnection = <A>(
        run: (connection: ServerConnection) => Effect.Effect<A, RemoteError, HttpClient.HttpClient>
      ): Effect.Effect<A, EdgeStackError> =>
        pipe(
          settings.connection,
          Option.match({
            onNone: (): Effect.Effect<A, RemoteError> =>
              Effect.fail(notConfigured("edge stack calls")),
            onSome: (connection): Effect.Effect<A, RemoteError> =>
              Effect.provideService(run(connection), HttpClient.HttpClient, client),
          }),
          Effect.mapError(toEdgeError)
        );

      return {
        list: withConnection(listEdgeStacks),
        getFile: (id) => withConnection((c) => getEdgeStackFile(c, id)),
        create: (name, file, groupIds) =>
          withConnection((c) => createEdgeStack(c, name, file, groupIds)),
        update: (id, file, groupIds) => withConnection((c) => updateEdgeStack(c, id, file, groupIds)),
      };
    })
  );
