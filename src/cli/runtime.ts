// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Per-command Layer wiring: resolved settings in, StackService out.
 */

import { Layer, Option } from "effect";
import { EdgeStacksLive } from "../remote/services/edge-stacks";
import { HttpTransportLive } from "../remote/services/http";
import { RegularStacksLive } from "../remote/services/regular-stacks";
import { type StackSettingsData, makeStackSettingsLayer } from "../stack/context";
import { type StackService, StackServiceLive } from "../stack/service";

export const createStackLayer = (settings: StackSettingsData): Layer.Layer<StackService> => {
  const settingsLayer = makeStackSettingsLayer(settings);
  const http = HttpTransportLive({
    skipTlsVerify: Option.match(settings.connection, {
      onNone: (): boolean => false,
      onSome: (c): boolean => c.skipTlsVerify,
    }),
  });
  const remote = Layer.merge(RegularStacksLive, EdgeStacksLive).pipe(
    Layer.provide(Layer.merge(settingsLayer, http))
  );
  return StackServiceLive.pipe(Layer.provide(Layer.merge(remote, settingsLayer)));
};
