// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * RegularStacks service using Context.Tag pattern.
 * Binds the regular-stack REST calls to the resolved server connection.
 */

import { HttpClient } from "@effect/platform";
import { Context, Effect, Layer, Option, pipe } from "effect";
import { ConfigError, ErrorCode, type RemoteError } from "../../lib/errors";
import { type ServerConnection, StackSettings } from "../../stack/context";
import type { RegularStack, StackEnvVar } from "../../stack/types";
import {
  type RegularStackDetails,
  getRegularStackDetails,
  getRegularStackFile,
  listRegularStacks,
  updateRegularStack,
} from "../regular";

export interface RegularStacksService {
  /** Whether a server URL and token were both resolved. */
  readonly configured: boolean;
  readonly list: Effect.Effect<readonly RegularStack[], RemoteError>;
  readonly getFile: (id: number) => Effect.Effect<string, RemoteError>;
  readonly getDetails: (id: number) => Effect.Effect<RegularStackDetails, RemoteError>;
  readonly update: (
    id: number,
    endpointId: number,
    file: string,
    env: readonly StackEnvVar[]
  ) => Effect.Effect<void, RemoteError>;
}

export interface RegularStacks {
  readonly _tag: "RegularStacks";
}

export const RegularStacks: Context.Tag<RegularStacks, RegularStacksService> = Context.GenericTag<
  RegularStacks,
  RegularStacksService
>("stackbridge/RegularStacks");

export const notConfigured = (what: string): ConfigError =>
  new ConfigError({
    code: ErrorCode.SERVER_NOT_CONFIGURED,
    message: `${what} require server url and token`,
  });

/** Every call fails with ConfigError when no connection was resolved. */
export const RegularStacksLive: Layer.Layer<
  RegularStacks,
  never,
  StackSettings | HttpClient.HttpClient
> = Layer.effect(
  RegularStacks,
  Effect.gen(function* () {
    const settings = yield* StackSettings;
    const client = yield* HttpClient.HttpClient;

    const withConnection = <A>(
      run: (connection: ServerConnection) => Effect.Effect<A, RemoteError, HttpClient.HttpClient>
    ): Effect.Effect<A, RemoteError> =>
      pipe(
        settings.connection,
        Option.match({
          onNone: (): Effect.Effect<A, RemoteError> =>
            Effect.fail(notConfigured("regular stack calls")),
          onSome: (connection): Effect.Effect<A, RemoteError> =>
            Effect.provideService(run(connection), HttpClient.HttpClient, client),
        })
      );

    return {
      configured: Option.isSome(settings.connection),
      list: withConnection(listRegularStacks),
      getFile: (id) => withConnection((c) => getRegularStackFile(c, id)),
      getDetails: (id) => withConnection((c) => getRegularStackDetails(c, id)),
      update: (id, endpointId, file, env) =>
        withConnection((c) => updateRegularStack(c, id, endpointId, file, env)),
    };
  })
);
