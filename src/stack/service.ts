// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Dual-path stack facade. Callers see one kind of stack; underneath, the
 * regular REST path is probed first and the edge primitives are the single
 * fallback hop. Which failures fall back is decided by the policies in
 * decision.ts, never inline.
 */

import { Context, Effect, Layer, Option, pipe } from "effect";
import {
  ConfigError,
  DualPathError,
  type EdgeStackError,
  ErrorCode,
  type RemoteError,
  StackOperationError,
  type StackServiceError,
  UnsupportedError,
} from "../lib/errors";
import { EdgeStacks } from "../remote/services/edge-stacks";
import type { RegularStackDetails } from "../remote/regular";
import { RegularStacks } from "../remote/services/regular-stacks";
import { StackSettings } from "./context";
import {
  type ProbeOutcome,
  fallbackUnlessUsable,
  fallbackWhenClassified,
  mapSuccess,
  probe,
} from "./decision";
import { mergeEnvOverrides, uniqueEnvNames } from "./env-merge";
import { shouldFallback } from "./fallback";
import {
  type RegularStack,
  type Stack,
  type StackEnvVar,
  fromEdgeStack,
  fromRegularStack,
} from "./types";

export interface StackServiceShape {
  readonly getStacks: Effect.Effect<readonly Stack[], StackServiceError>;
  readonly getStackFile: (id: number) => Effect.Effect<string, StackServiceError>;
  readonly getStackEnvNames: (id: number) => Effect.Effect<readonly string[], StackServiceError>;
  readonly createStack: (
    name: string,
    file: string,
    environmentGroupIds: readonly number[]
  ) => Effect.Effect<number, StackServiceError>;
  /**
   * Regular stacks get the merged env written back. Edge stacks take the file
   * and group ids only. Without a server connection the call goes straight to
   * the edge primitive, which shares that connection and so fails with an
   * EdgeStackError under the live layers.
   */
  readonly updateStack: (
    id: number,
    file: string,
    environmentGroupIds: readonly number[],
    envOverrides: readonly StackEnvVar[]
  ) => Effect.Effect<void, StackServiceError>;
}

export interface StackService {
  readonly _tag: "StackService";
}

export const StackService: Context.Tag<StackService, StackServiceShape> = Context.GenericTag<
  StackService,
  StackServiceShape
>("stackbridge/StackService");

// ============================================================================
// Error construction
// ============================================================================

const operationFailed = (
  operation: string,
  context: string,
  cause: RemoteError | EdgeStackError
): StackOperationError =>
  new StackOperationError({
    code: ErrorCode.STACK_OPERATION_FAILED,
    message: `${context}: ${cause.message}`,
    operation,
    cause,
  });

const bothFailed = (
  context: string,
  edgeLabel: string,
  regular: RemoteError,
  edge: EdgeStackError
): DualPathError =>
  new DualPathError({
    code: ErrorCode.BOTH_PATHS_FAILED,
    message: `${context}: ${regular.message} (${edgeLabel} also failed: ${edge.message})`,
    regular,
    edge,
  });

interface FallbackMessages {
  /** Prefix when the regular path failed too. */
  readonly regular: string;
  /** Prefix when only the edge path failed. */
  readonly edge: string;
  readonly edgeLabel: string;
}

/** Regular cause present: both paths failed. Absent: only the edge path did. */
const edgeFailure =
  (operation: string, messages: FallbackMessages, regularCause: Option.Option<RemoteError>) =>
  (edge: EdgeStackError): StackServiceError =>
    Option.match(regularCause, {
      onNone: (): StackServiceError => operationFailed(operation, messages.edge, edge),
      onSome: (regular): StackServiceError =>
        bothFailed(messages.regular, messages.edgeLabel, regular, edge),
    });

const logFallback = (operation: string, stackId: Option.Option<number>): Effect.Effect<void> =>
  Effect.logDebug("regular stack path unusable, trying edge stack path").pipe(
    Effect.annotateLogs({
      operation,
      ...Option.match(stackId, {
        onNone: (): Record<string, never> => ({}),
        onSome: (id): { readonly stackId: number } => ({ stackId: id }),
      }),
    })
  );

/** Resolve a probe outcome, running the edge primitive on fallback. */
const resolveWithEdge = <A>(
  outcome: ProbeOutcome<A, RemoteError>,
  operation: string,
  stackId: Option.Option<number>,
  messages: FallbackMessages,
  edge: Effect.Effect<A, EdgeStackError>
): Effect.Effect<A, StackServiceError> => {
  switch (outcome._tag) {
    case "Success":
      return Effect.succeed(outcome.value);
    case "Terminal":
      return Effect.fail(operationFailed(operation, messages.regular, outcome.cause));
    case "Fallback":
      return pipe(
        logFallback(operation, stackId),
        Effect.zipRight(edge),
        Effect.mapError(edgeFailure(operation, messages, outcome.cause))
      );
  }
};

const ENV_OVERRIDES_UNSUPPORTED = "stack env overrides are not supported for edge stacks";

// ============================================================================
// Live implementation
// ============================================================================

export const StackServiceLive: Layer.Layer<
  StackService,
  never,
  RegularStacks | EdgeStacks | StackSettings
> = Layer.effect(
  StackService,
  Effect.gen(function* () {
    const regular = yield* RegularStacks;
    const edge = yield* EdgeStacks;
    const settings = yield* StackSettings;

    const classified = <A>() =>
      fallbackWhenClassified<A, RemoteError>((error) =>
        shouldFallback(error, settings.fallbackMarkers)
      );

    const getStacks: StackServiceShape["getStacks"] = Effect.gen(function* () {
      const outcome = yield* probe(
        regular.list,
        fallbackUnlessUsable<readonly RegularStack[], RemoteError>((stacks) => stacks.length > 0)
      ).pipe(
        Effect.map(mapSuccess((stacks: readonly RegularStack[]) => stacks.map(fromRegularStack)))
      );

      return yield* resolveWithEdge(
        outcome,
        "list",
        Option.none(),
        {
          regular: "failed to list regular stacks",
          edge: "failed to list edge stacks",
          edgeLabel: "edge stacks",
        },
        Effect.map(edge.list, (stacks) => stacks.map(fromEdgeStack))
      );
    });

    const getStackFile: StackServiceShape["getStackFile"] = (id) =>
      Effect.gen(function* () {
        const outcome = yield* probe(
          regular.getFile(id),
          fallbackUnlessUsable<string, RemoteError>((file) => file !== "")
        );
        return yield* resolveWithEdge(
          outcome,
          "file",
          Option.some(id),
          {
            regular: "failed to get regular stack file",
            edge: "failed to get edge stack file",
            edgeLabel: "edge stack",
          },
          Effect.suspend(() => edge.getFile(id))
        );
      });

    const getStackEnvNames: StackServiceShape["getStackEnvNames"] = (id) =>
      Effect.gen(function* () {
        if (!regular.configured) {
          return yield* Effect.fail(
            new ConfigError({
              code: ErrorCode.SERVER_NOT_CONFIGURED,
              message: "stack env names require server url and token",
            })
          );
        }

        const outcome = yield* probe(regular.getDetails(id), classified<RegularStackDetails>());
        switch (outcome._tag) {
          case "Success":
            return uniqueEnvNames(outcome.value.env);
          case "Fallback":
            yield* Effect.logDebug("stack resolved to an edge stack").pipe(
              Effect.annotateLogs({ operation: "env-names", stackId: id })
            );
            return yield* Effect.fail(
              new UnsupportedError({
                code: ErrorCode.STACK_UNSUPPORTED,
                message: "stack env names are not available for edge stacks",
              })
            );
          case "Terminal":
            return yield* Effect.fail(
              operationFailed("env-names", "failed to get stack details", outcome.cause)
            );
        }
      });

    const createStack: StackServiceShape["createStack"] = (name, file, environmentGroupIds) =>
      edge
        .create(name, file, environmentGroupIds)
        .pipe(Effect.mapError((e) => operationFailed("create", "failed to create edge stack", e)));

    const updateStack: StackServiceShape["updateStack"] = (
      id,
      file,
      environmentGroupIds,
      envOverrides
    ) => {
      const hasOverrides = envOverrides.length > 0;

      /** The single edge hop; env overrides have no edge equivalent. */
      const updateOnEdge = (
        regularCause: Option.Option<RemoteError>,
        regularContext: string
      ): Effect.Effect<void, StackServiceError> =>
        hasOverrides
          ? Effect.fail(
              new UnsupportedError({
                code: ErrorCode.STACK_UNSUPPORTED,
                message: ENV_OVERRIDES_UNSUPPORTED,
              })
            )
          : pipe(
              logFallback("update", Option.some(id)),
              Effect.zipRight(edge.update(id, file, environmentGroupIds)),
              Effect.mapError(
                edgeFailure(
                  "update",
                  {
                    regular: regularContext,
                    edge: "failed to update edge stack",
                    edgeLabel: "edge stack",
                  },
                  regularCause
                )
              )
            );

      if (!regular.configured) {
        return hasOverrides
          ? Effect.fail(
              new ConfigError({
                code: ErrorCode.SERVER_NOT_CONFIGURED,
                message: "stack env overrides require a server url and token",
              })
            )
          : updateOnEdge(Option.none(), "failed to update edge stack");
      }

      return Effect.gen(function* () {
        const details = yield* probe(regular.getDetails(id), classified<RegularStackDetails>());
        switch (details._tag) {
          case "Fallback":
            return yield* updateOnEdge(details.cause, "failed to get regular stack details");
          case "Terminal":
            return yield* Effect.fail(
              operationFailed("update", "failed to get regular stack details", details.cause)
            );
          case "Success":
            break;
        }

        const merged = mergeEnvOverrides(details.value.env, envOverrides);
        const written = yield* probe(
          regular.update(id, details.value.endpointId, file, merged),
          classified<void>()
        );
        switch (written._tag) {
          case "Success":
            return;
          case "Fallback":
            return yield* updateOnEdge(written.cause, "failed to update regular stack");
          case "Terminal":
            return yield* Effect.fail(
              operationFailed("update", "failed to update regular stack", written.cause)
            );
        }
      });
    };

    return { getStacks, getStackFile, getStackEnvNames, createStack, updateStack };
  })
);
