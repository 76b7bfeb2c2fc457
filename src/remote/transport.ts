// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Authenticated REST calls against the orchestration server.
 *
 * One request per call. The body is always read to the end before any
 * decoding, so the connection is released whether the call succeeds, is
 * rejected, or returns JSON that does not decode. TLS policy and keep-alive
 * belong to the HttpClient layer (see services/http.ts).
 */

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Effect, ParseResult, Redacted, Schema, pipe } from "effect";
import { ErrorCode, ParseError, StatusError, TransportError, causeOf } from "../lib/errors";
import type { ServerConnection } from "../stack/context";

export type HttpMethod = "GET" | "PUT" | "POST";

export interface RestRequest {
  readonly method: HttpMethod;
  readonly path: string;
  readonly urlParams?: Readonly<Record<string, string>>;
  readonly body?: unknown;
}

const HAS_SCHEME = /^https?:\/\//;

/** Prefix `https://` when no scheme is given and drop one trailing slash. */
export const normalizeBaseUrl = (raw: string): string => {
  const withScheme = HAS_SCHEME.test(raw) ? raw : `https://${raw}`;
  return withScheme.endsWith("/") ? withScheme.slice(0, -1) : withScheme;
};

/** GET accepts exactly 200; writes accept any 2xx. */
export const isAccepted = (method: HttpMethod, status: number): boolean =>
  method === "GET" ? status === 200 : status >= 200 && status < 300;

export const statusMessage = (status: number, body: string): string =>
  body === "" ? `api returned status ${status}` : `api returned status ${status}: ${body}`;

const buildRequest = (
  connection: ServerConnection,
  request: RestRequest
): HttpClientRequest.HttpClientRequest => {
  const base = pipe(
    HttpClientRequest.make(request.method)(`${normalizeBaseUrl(connection.baseUrl)}${request.path}`),
    HttpClientRequest.setHeader("X-API-Key", Redacted.value(connection.token)),
    HttpClientRequest.setUrlParams(request.urlParams ?? {})
  );
  return request.body === undefined ? base : HttpClientRequest.bodyUnsafeJson(base, request.body);
};

/**
 * Send one request and return the accepted response body as text. The
 * response lives in its own scope, closed once the body has been read.
 */
export const send = (
  connection: ServerConnection,
  request: RestRequest
): Effect.Effect<string, TransportError | StatusError, HttpClient.HttpClient> =>
  Effect.gen(function* () {
    const client = yield* HttpClient.HttpClient;
    const httpRequest = buildRequest(connection, request);
    const url = httpRequest.url;

    const response = yield* pipe(
      client.execute(httpRequest),
      Effect.mapError(
        (e) =>
          new TransportError({
            code: ErrorCode.TRANSPORT_FAILED,
            message: `failed to make http request: ${e.message}`,
            url,
            ...causeOf(e),
          })
      )
    );

    if (!isAccepted(request.method, response.status)) {
      const body = yield* pipe(
        response.text,
        Effect.orElseSucceed(() => "")
      );
      return yield* Effect.fail(
        new StatusError({
          code: ErrorCode.REQUEST_REJECTED,
          message: statusMessage(response.status, body),
          url,
          status: response.status,
          body,
        })
      );
    }

    return yield* pipe(
      response.text,
      Effect.mapError(
        (e) =>
          new TransportError({
            code: ErrorCode.TRANSPORT_FAILED,
            message: `failed to read response body: ${e.message}`,
            url,
            ...causeOf(e),
          })
      )
    );
  }).pipe(Effect.scoped);

/** Decode an accepted JSON body. */
export const decodeJson = <A, I>(
  schema: Schema.Schema<A, I>,
  body: string
): Effect.Effect<A, ParseError> =>
  pipe(
    Schema.decodeUnknown(Schema.parseJson(schema))(body),
    Effect.mapError(
      (e) =>
        new ParseError({
          code: ErrorCode.RESPONSE_PARSE_FAILED,
          message: `failed to parse response json: ${ParseResult.TreeFormatter.formatErrorSync(e)}`,
          ...causeOf(e),
        })
    )
  );

export const getJson = <A, I>(
  connection: ServerConnection,
  path: string,
  schema: Schema.Schema<A, I>
): Effect.Effect<A, TransportError | StatusError | ParseError, HttpClient.HttpClient> =>
  Effect.flatMap(send(connection, { method: "GET", path }), (body) => decodeJson(schema, body));
