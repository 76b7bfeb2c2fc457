// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

export const LOG_LEVEL_VALUES = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVEL_VALUES)[number];
export const LOG_LEVEL_DEFAULT: LogLevel = "info";

export const LOG_FORMAT_VALUES = ["pretty", "json"] as const;
export type LogFormat = (typeof LOG_FORMAT_VALUES)[number];
export const LOG_FORMAT_DEFAULT: LogFormat = "pretty";

/**
 * Substrings the server uses in free-text errors when an identifier belongs to
 * the edge subsystem. Versioned because the server gives no contract for them.
 */
export const EDGE_FALLBACK_MARKERS_V1: readonly string[] = ["edgestackupdate", "edge stack"];
export const EDGE_FALLBACK_MARKERS_DEFAULT: readonly string[] = EDGE_FALLBACK_MARKERS_V1;
