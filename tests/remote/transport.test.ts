// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { HttpClient } from "@effect/platform";
import { Effect, Redacted, Schema } from "effect";
import { afterAll, afterEach, beforeAll, describe, expect, test } from "vitest";
import { ErrorCode } from "../../src/lib/errors";
import { HttpTransportLive } from "../../src/remote/services/http";
import {
  getJson,
  isAccepted,
  normalizeBaseUrl,
  send,
  statusMessage,
} from "../../src/remote/transport";
import type { ServerConnection } from "../../src/stack/context";
import { FakeStackServer } from "../helpers/fake-server";

const server = new FakeStackServer();
let connection: ServerConnection;

/** Run expecting failure and return the error. */
const run = <A, E>(effect: Effect.Effect<A, E, HttpClient.HttpClient>): Promise<E> =>
  Effect.runPromise(
    effect.pipe(Effect.flip, Effect.provide(HttpTransportLive({ skipTlsVerify: false })))
  );

const runOk = <A, E>(
  effect: Effect.Effect<A, E, HttpClient.HttpClient>
): Promise<A> =>
  Effect.runPromise(effect.pipe(Effect.provide(HttpTransportLive({ skipTlsVerify: false }))));

beforeAll(async () => {
  const baseUrl = await server.start();
  connection = { baseUrl: `${baseUrl}/`, token: Redacted.make("test-secret"), skipTlsVerify: false };
});

afterEach(() => {
  server.reset();
});

afterAll(async () => {
  await server.stop();
});

describe("normalizeBaseUrl", () => {
  test("adds https when no scheme is given", () => {
    expect(normalizeBaseUrl("stacks.example.test/")).toBe("https://stacks.example.test");
  });

  test("keeps an explicit http scheme", () => {
    expect(normalizeBaseUrl("http://x/")).toBe("http://x");
  });

  test("drops only one trailing slash", () => {
    expect(normalizeBaseUrl("https://x//")).toBe("https://x/");
  });
});

describe("isAccepted", () => {
  test("GET requires exactly 200", () => {
    expect(isAccepted("GET", 200)).toBe(true);
    expect(isAccepted("GET", 201)).toBe(false);
    expect(isAccepted("GET", 204)).toBe(false);
  });

  test("writes accept any 2xx", () => {
    expect(isAccepted("PUT", 204)).toBe(true);
    expect(isAccepted("POST", 201)).toBe(true);
    expect(isAccepted("PUT", 302)).toBe(false);
  });
});

describe("statusMessage", () => {
  test("includes the body when present", () => {
    expect(statusMessage(404, "not here")).toBe("api returned status 404: not here");
  });

  test("omits the separator for an empty body", () => {
    expect(statusMessage(500, "")).toBe("api returned status 500");
  });
});

describe("send", () => {
  test("sends the token as X-API-Key and returns the body", async () => {
    server.route("GET /api/stacks", { status: 200, body: "[]" });

    const body = await runOk(send(connection, { method: "GET", path: "/api/stacks" }));

    expect(body).toBe("[]");
    expect(server.requests).toHaveLength(1);
    expect(server.requests[0]?.apiKey).toBe("test-secret");
    expect(server.requests[0]?.path).toBe("/api/stacks");
  });

  test("rejects a GET answered with 201", async () => {
    server.route("GET /api/stacks", { status: 201, body: "created" });

    const error = await run(send(connection, { method: "GET", path: "/api/stacks" }));

    expect(error._tag).toBe("StatusError");
    if (error._tag === "StatusError") {
      expect(error.status).toBe(201);
      expect(error.code).toBe(ErrorCode.REQUEST_REJECTED);
      expect(error.message).toBe("api returned status 201: created");
    }
  });

  test("accepts a PUT answered with 204", async () => {
    server.route("PUT /api/stacks/3", { status: 204 });

    const body = await runOk(send(connection, { method: "PUT", path: "/api/stacks/3", body: {} }));

    expect(body).toBe("");
  });

  test("carries status and body of a rejected call", async () => {
    server.route("GET /api/stacks/9", { status: 404, body: "not here" });

    const error = await run(send(connection, { method: "GET", path: "/api/stacks/9" }));

    expect(error._tag).toBe("StatusError");
    if (error._tag === "StatusError") {
      expect(error.status).toBe(404);
      expect(error.body).toBe("not here");
      expect(error.message).toBe("api returned status 404: not here");
      expect(error.url).toBe(`${connection.baseUrl}api/stacks/9`);
    }
  });

  test("rejection without a body has no separator", async () => {
    server.route("GET /api/stacks", { status: 500 });

    const error = await run(send(connection, { method: "GET", path: "/api/stacks" }));

    expect(error.message).toBe("api returned status 500");
  });

  test("sends url params and a JSON body", async () => {
    server.route("PUT /api/stacks/4", { status: 200 });

    await runOk(
      send(connection, {
        method: "PUT",
        path: "/api/stacks/4",
        urlParams: { endpointId: "2" },
        body: { a: 1 },
      })
    );

    expect(server.requests[0]?.query).toBe("endpointId=2");
    expect(JSON.parse(server.requests[0]?.body ?? "")).toEqual({ a: 1 });
  });

  test("reports an unreachable server as a transport failure", async () => {
    const closed = new FakeStackServer();
    const url = await closed.start();
    await closed.stop();

    const error = await run(
      send({ ...connection, baseUrl: url }, { method: "GET", path: "/api/stacks" })
    );

    expect(error._tag).toBe("TransportError");
    expect(error.code).toBe(ErrorCode.TRANSPORT_FAILED);
    expect(error.message.startsWith("failed to make http request: ")).toBe(true);
  });
});

describe("getJson", () => {
  test("decodes an accepted body", async () => {
    server.route("GET /api/thing", { status: 200, body: { Id: 7 } });

    const value = await runOk(getJson(connection, "/api/thing", Schema.Struct({ Id: Schema.Number })));

    expect(value).toEqual({ Id: 7 });
  });

  test("reports a malformed body as a parse failure", async () => {
    server.route("GET /api/thing", { status: 200, body: "{not json" });

    const error = await run(getJson(connection, "/api/thing", Schema.Struct({ Id: Schema.Number })));

    expect(error._tag).toBe("ParseError");
    expect(error.code).toBe(ErrorCode.RESPONSE_PARSE_FAILED);
    expect(error.message.startsWith("failed to parse response json: ")).toBe(true);
  });
});
