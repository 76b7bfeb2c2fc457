// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Effect Schemas for stackbridge.toml.
 * Single source of truth for configuration file structure and validation.
 */

import { Schema } from "effect";
import {
  EDGE_FALLBACK_MARKERS_DEFAULT,
  LOG_FORMAT_DEFAULT,
  LOG_FORMAT_VALUES,
  LOG_LEVEL_DEFAULT,
  LOG_LEVEL_VALUES,
} from "./field-values";

const nonEmptyMsg = (): string => "Must not be empty";

const NonEmptyString = Schema.String.pipe(
  Schema.filter((s): boolean => s.trim().length > 0, { message: nonEmptyMsg })
);

export const serverSectionSchema = Schema.Struct({
  url: Schema.optional(NonEmptyString),
  token: Schema.optional(Schema.Redacted(NonEmptyString)),
  skipTlsVerify: Schema.optionalWith(Schema.Boolean, { default: () => false }),
});

export const edgeSectionSchema = Schema.Struct({
  fallbackMarkers: Schema.optionalWith(Schema.Array(NonEmptyString), {
    default: () => EDGE_FALLBACK_MARKERS_DEFAULT,
  }),
});

export const loggingSectionSchema = Schema.Struct({
  level: Schema.optionalWith(Schema.Literal(...LOG_LEVEL_VALUES), {
    default: () => LOG_LEVEL_DEFAULT,
  }),
  format: Schema.optionalWith(Schema.Literal(...LOG_FORMAT_VALUES), {
    default: () => LOG_FORMAT_DEFAULT,
  }),
});

/**
 * Top-level schema for stackbridge.toml
 */
export const fileConfigSchema = Schema.Struct({
  readOnly: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  server: Schema.optionalWith(serverSectionSchema, {
    default: () => ({ skipTlsVerify: false }),
  }),
  edge: Schema.optionalWith(edgeSectionSchema, {
    default: () => ({ fallbackMarkers: EDGE_FALLBACK_MARKERS_DEFAULT }),
  }),
  logging: Schema.optionalWith(loggingSectionSchema, {
    default: () => ({ level: LOG_LEVEL_DEFAULT, format: LOG_FORMAT_DEFAULT }),
  }),
});

export type FileConfig = typeof fileConfigSchema.Type;

/** Configuration used when no file is found. */
export const defaultFileConfig: FileConfig = {
  readOnly: false,
  server: { skipTlsVerify: false },
  edge: { fallbackMarkers: EDGE_FALLBACK_MARKERS_DEFAULT },
  logging: { level: LOG_LEVEL_DEFAULT, format: LOG_FORMAT_DEFAULT },
};
