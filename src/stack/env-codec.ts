// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Stack environment lists arrive in `[{ name, value }]` or `[{ Name, Value }]`
 * form, and a list may mix the two. Each entry is read in the encoding that
 * carries its data, so no stored variable is blanked on the way through.
 */

import { Data, Effect, Either, ParseResult, Schema, pipe } from "effect";
import { ErrorCode, ParseError } from "../lib/errors";
import type { StackEnvVar } from "./types";

const EntryField = Schema.optional(Schema.NullOr(Schema.String));

const EnvListShape = Schema.Array(
  Schema.Struct({ name: EntryField, value: EntryField, Name: EntryField, Value: EntryField })
);

type RawEntry = (typeof EnvListShape.Type)[number];

export type EnvEncoding = Data.TaggedEnum<{
  Primary: { readonly entries: readonly StackEnvVar[] };
  Alternate: { readonly entries: readonly StackEnvVar[] };
  Mixed: { readonly entries: readonly StackEnvVar[] };
}>;

export const EnvEncoding = Data.taggedEnum<EnvEncoding>();

type EntryEncoding = "Primary" | "Alternate";

interface ReadEntry {
  readonly encoding: EntryEncoding;
  readonly pair: StackEnvVar;
  readonly blank: boolean;
}

const text = (field: string | null | undefined): string => field ?? "";

const isBlank = (pair: StackEnvVar): boolean => pair.name === "" && pair.value === "";

const readEntry = (entry: RawEntry): ReadEntry => {
  const primary = { name: text(entry.name), value: text(entry.value) };
  const alternate = { name: text(entry.Name), value: text(entry.Value) };
  if (isBlank(primary) && !isBlank(alternate)) {
    return { encoding: "Alternate", pair: alternate, blank: false };
  }
  return { encoding: "Primary", pair: primary, blank: isBlank(primary) };
};

const toEncoding = (read: readonly ReadEntry[]): EnvEncoding => {
  const entries = read.map((r) => r.pair);
  const seen = new Set(read.filter((r) => !r.blank).map((r) => r.encoding));
  if (seen.size > 1) {
    return EnvEncoding.Mixed({ entries });
  }
  return seen.has("Alternate")
    ? EnvEncoding.Alternate({ entries })
    : EnvEncoding.Primary({ entries });
};

const toParseError = (error: ParseResult.ParseError): ParseError =>
  new ParseError({
    code: ErrorCode.RESPONSE_PARSE_FAILED,
    message: `failed to parse stack env: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
    cause: error,
  });

/** Pick the encoding a decoded env value was written in. */
export const selectEnvEncoding = (value: unknown): Either.Either<EnvEncoding, ParseError> =>
  value === null || value === undefined
    ? Either.right(EnvEncoding.Primary({ entries: [] }))
    : pipe(
        Schema.decodeUnknownEither(EnvListShape)(value),
        Either.map((entries) => toEncoding(entries.map(readEntry))),
        Either.mapLeft(toParseError)
      );

export const parseStackEnv = (value: unknown): Either.Either<readonly StackEnvVar[], ParseError> =>
  Either.map(selectEnvEncoding(value), (encoding) => encoding.entries);

/** Decode raw JSON text; empty text and `null` both mean no variables. */
export const decodeStackEnv = (raw: string): Effect.Effect<readonly StackEnvVar[], ParseError> =>
  raw.trim() === ""
    ? Effect.succeed([])
    : pipe(
        Schema.decodeUnknownEither(Schema.parseJson())(raw),
        Either.mapLeft(toParseError),
        Either.flatMap(parseStackEnv)
      );
