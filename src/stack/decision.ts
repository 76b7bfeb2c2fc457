// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Probe decision table. Every regular-stack attempt is reduced to one of
 * three outcomes, and each facade operation picks a policy instead of
 * nesting its own conditionals:
 *
 * | policy                 | success        | success, unusable | failure            |
 * |------------------------|----------------|-------------------|--------------------|
 * | fallbackUnlessUsable   | Success        | Fallback (None)   | Fallback (Some)    |
 * | fallbackWhenClassified | Success        | n/a               | Fallback, Terminal |
 */

import { Effect, Either, Option } from "effect";

export type ProbeOutcome<A, E> =
  | { readonly _tag: "Success"; readonly value: A }
  | { readonly _tag: "Fallback"; readonly cause: Option.Option<E> }
  | { readonly _tag: "Terminal"; readonly cause: E };

export const Success = <A, E = never>(value: A): ProbeOutcome<A, E> => ({
  _tag: "Success",
  value,
});

export const Fallback = <A, E>(cause: Option.Option<E>): ProbeOutcome<A, E> => ({
  _tag: "Fallback",
  cause,
});

export const Terminal = <A, E>(cause: E): ProbeOutcome<A, E> => ({ _tag: "Terminal", cause });

export type ProbePolicy<A, E> = (attempt: Either.Either<A, E>) => ProbeOutcome<A, E>;

/** List and get-file: any failure, or an empty answer, tries the edge path. */
export const fallbackUnlessUsable =
  <A, E>(isUsable: (value: A) => boolean): ProbePolicy<A, E> =>
  (attempt) =>
    Either.match(attempt, {
      onLeft: (error) => Fallback<A, E>(Option.some(error)),
      onRight: (value) => (isUsable(value) ? Success<A, E>(value) : Fallback<A, E>(Option.none())),
    });

/** Env names and update: only failures the classifier accepts fall back. */
export const fallbackWhenClassified =
  <A, E>(classify: (error: E) => boolean): ProbePolicy<A, E> =>
  (attempt) =>
    Either.match(attempt, {
      onLeft: (error) => (classify(error) ? Fallback<A, E>(Option.some(error)) : Terminal<A, E>(error)),
      onRight: (value) => Success<A, E>(value),
    });

/** Run one regular-stack attempt and classify it; never fails. */
export const probe = <A, E, R>(
  attempt: Effect.Effect<A, E, R>,
  policy: ProbePolicy<A, E>
): Effect.Effect<ProbeOutcome<A, E>, never, R> => Effect.map(Effect.either(attempt), policy);

/** Map the success value, leaving fallbacks and terminal failures untouched. */
export const mapSuccess =
  <A, B>(f: (value: A) => B) =>
  <E>(outcome: ProbeOutcome<A, E>): ProbeOutcome<B, E> => {
    switch (outcome._tag) {
      case "Success":
        return Success(f(outcome.value));
      case "Fallback":
        return outcome;
      case "Terminal":
        return outcome;
    }
  };
