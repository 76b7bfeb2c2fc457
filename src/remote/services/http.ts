// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * HttpClient layer for the orchestration server. TLS verification is fixed
 * here, when the layer is built, and connections are not kept alive.
 */

import type { HttpClient } from "@effect/platform";
import { NodeHttpClient } from "@effect/platform-node";
import { Layer } from "effect";

export const HttpTransportLive = (options: {
  readonly skipTlsVerify: boolean;
}): Layer.Layer<HttpClient.HttpClient> =>
  NodeHttpClient.layerWithoutAgent.pipe(
    Layer.provide(
      NodeHttpClient.makeAgentLayer({
        keepAlive: false,
        rejectUnauthorized: !options.skipTlsVerify,
      })
    )
  );
