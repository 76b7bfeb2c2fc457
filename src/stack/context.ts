// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Resolved settings for the stack layer, built once at the CLI boundary
 * and passed in as a Layer. Nothing below reads process state.
 */

import { Context, Layer, type Option, type Redacted } from "effect";

/** Present only when both a server URL and a token were resolved. */
export interface ServerConnection {
  readonly baseUrl: string;
  readonly token: Redacted.Redacted<string>;
  readonly skipTlsVerify: boolean;
}

export interface StackSettingsData {
  readonly connection: Option.Option<ServerConnection>;
  readonly fallbackMarkers: readonly string[];
  readonly readOnly: boolean;
}

export interface StackSettings {
  readonly _tag: "StackSettings";
}

export const StackSettings: Context.Tag<StackSettings, StackSettingsData> = Context.GenericTag<
  StackSettings,
  StackSettingsData
>("stackbridge/StackSettings");

export const makeStackSettingsLayer = (settings: StackSettingsData): Layer.Layer<StackSettings> =>
  Layer.succeed(StackSettings, settings);
