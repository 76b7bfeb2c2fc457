// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Decides whether a failed regular-stack call means the identifier belongs
 * to an edge stack. The server has no structured "wrong resource kind"
 * error, only a 404 or free-text hints, so the text matching lives in
 * `matchesEdgeMarker` and nowhere else.
 */

import { Array as Arr, Match, pipe } from "effect";
import { EDGE_FALLBACK_MARKERS_DEFAULT } from "../config/field-values";
import type { RemoteError } from "../lib/errors";

const NOT_FOUND = 404;

/** Case-insensitive substring match against the marker set. */
export const matchesEdgeMarker = (text: string, markers: readonly string[]): boolean => {
  const haystack = text.toLowerCase();
  return Arr.some(markers, (marker) => marker !== "" && haystack.includes(marker.toLowerCase()));
};

/**
 * Only errors produced at the transport boundary are inspected. Parse and
 * config errors are local and never fall back, whatever their text says.
 */
export const shouldFallback = (
  error: RemoteError,
  markers: readonly string[] = EDGE_FALLBACK_MARKERS_DEFAULT
): boolean =>
  pipe(
    Match.value(error),
    Match.tag(
      "StatusError",
      (e) =>
        e.status === NOT_FOUND ||
        matchesEdgeMarker(e.body, markers) ||
        matchesEdgeMarker(e.message, markers)
    ),
    Match.tag("TransportError", (e) => matchesEdgeMarker(e.message, markers)),
    Match.tag("ParseError", () => false),
    Match.tag("ConfigError", () => false),
    Match.exhaustive
  );
