// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for stackbridge.
 * Every failure is a tagged error carrying a typed code that maps to an exit code.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_ARGS: 2;
  readonly READ_ONLY_MODE: 3;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;
  readonly SERVER_NOT_CONFIGURED: 13;
  readonly FILE_READ_FAILED: 14;

  // Remote (20-29)
  readonly TRANSPORT_FAILED: 20;
  readonly REQUEST_REJECTED: 21;
  readonly RESPONSE_PARSE_FAILED: 22;

  // Stack (30-39)
  readonly STACK_OPERATION_FAILED: 30;
  readonly STACK_UNSUPPORTED: 31;
  readonly EDGE_STACK_FAILED: 32;
  readonly BOTH_PATHS_FAILED: 33;
}

/**
 * Error codes for all stackbridge operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  // General (0-9)
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGS: 2,
  READ_ONLY_MODE: 3,

  // Config (10-19)
  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,
  SERVER_NOT_CONFIGURED: 13,
  FILE_READ_FAILED: 14,

  // Remote (20-29)
  TRANSPORT_FAILED: 20,
  REQUEST_REJECTED: 21,
  RESPONSE_PARSE_FAILED: 22,

  // Stack (30-39)
  STACK_OPERATION_FAILED: 30,
  STACK_UNSUPPORTED: 31,
  EDGE_STACK_FAILED: 32,
  BOTH_PATHS_FAILED: 33,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

type CodeOf<K extends keyof ErrorCodeMap> = ErrorCodeMap[K];

// ============================================================================
// Tagged errors
// ============================================================================

export class GeneralError extends Data.TaggedError("GeneralError")<{
  readonly code: CodeOf<"GENERAL_ERROR" | "INVALID_ARGS" | "READ_ONLY_MODE">;
  readonly message: string;
  readonly cause?: Error;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: CodeOf<
    | "CONFIG_NOT_FOUND"
    | "CONFIG_PARSE_ERROR"
    | "CONFIG_VALIDATION_ERROR"
    | "SERVER_NOT_CONFIGURED"
    | "FILE_READ_FAILED"
  >;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

/** Connection, DNS or TLS failure before any HTTP status was received. */
export class TransportError extends Data.TaggedError("TransportError")<{
  readonly code: CodeOf<"TRANSPORT_FAILED">;
  readonly message: string;
  readonly url: string;
  readonly cause?: Error;
}> {}

/** The server answered with a status outside the accepted range. */
export class StatusError extends Data.TaggedError("StatusError")<{
  readonly code: CodeOf<"REQUEST_REJECTED">;
  readonly message: string;
  readonly url: string;
  readonly status: number;
  readonly body: string;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly code: CodeOf<"RESPONSE_PARSE_FAILED">;
  readonly message: string;
  readonly cause?: Error;
}> {}

/** The resolved resource kind has no equivalent for the requested feature. */
export class UnsupportedError extends Data.TaggedError("UnsupportedError")<{
  readonly code: CodeOf<"STACK_UNSUPPORTED">;
  readonly message: string;
}> {}

/** Failure reported by one of the edge-stack primitives. */
export class EdgeStackError extends Data.TaggedError("EdgeStackError")<{
  readonly code: CodeOf<"EDGE_STACK_FAILED">;
  readonly message: string;
  readonly cause?: Error;
}> {}

/** A genuine (non-fallback) failure, wrapped with the operation that hit it. */
export class StackOperationError extends Data.TaggedError("StackOperationError")<{
  readonly code: CodeOf<"STACK_OPERATION_FAILED">;
  readonly message: string;
  readonly operation: string;
  readonly cause: RemoteError | EdgeStackError;
}> {}

/** Both the regular and the edge path were attempted and both failed. */
export class DualPathError extends Data.TaggedError("DualPathError")<{
  readonly code: CodeOf<"BOTH_PATHS_FAILED">;
  readonly message: string;
  readonly regular: RemoteError;
  readonly edge: EdgeStackError;
}> {}

// ============================================================================
// Error unions
// ============================================================================

/** Everything a regular-stack REST call can fail with. */
export type RemoteError = TransportError | StatusError | ParseError | ConfigError;

/** Everything the stack facade can fail with. */
export type StackServiceError =
  | ConfigError
  | UnsupportedError
  | StackOperationError
  | DualPathError;

export type StackbridgeError = GeneralError | StackServiceError | RemoteError | EdgeStackError;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};

/** Spreadable cause field, omitted when the caught value is not an Error. */
export const causeOf = (e: unknown): { readonly cause?: Error } =>
  e instanceof Error ? { cause: e } : {};
