// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Cause, Effect, HashMap, List, LogLevel, LogSpan, Logger } from "effect";
import { describe, expect, test } from "vitest";
import {
  type LogRecord,
  renderJson,
  renderPretty,
  toEffectLogLevel,
  toRecord,
} from "../../src/lib/effect-logger";
import { logSuccess, makeSteps } from "../../src/lib/log";

const record = (
  logLevel: LogLevel.LogLevel,
  message: string,
  entries: ReadonlyArray<readonly [string, unknown]> = [],
  spans: List.List<LogSpan.LogSpan> = List.empty(),
  date: Date = new Date(0)
): LogRecord =>
  toRecord({
    logLevel,
    message,
    annotations: HashMap.fromIterable<string, unknown>(entries),
    spans,
    cause: Cause.empty,
    date,
  });

describe("toEffectLogLevel", () => {
  test("maps warn to Warning", () => {
    expect(toEffectLogLevel("warn")).toBe(LogLevel.Warning);
    expect(toEffectLogLevel("debug")).toBe(LogLevel.Debug);
  });
});

describe("toRecord", () => {
  test("joins multi-part messages", () => {
    const r = toRecord({
      logLevel: LogLevel.Info,
      message: ["a", 1],
      annotations: HashMap.empty(),
      spans: List.empty(),
      cause: Cause.empty,
      date: new Date(0),
    });

    expect(r.message).toBe("a 1");
  });

  test("keeps style keys out of the fields", () => {
    const r = record(LogLevel.Info, "x", [
      ["logStyle", "step"],
      ["stepNumber", "1"],
      ["stepTotal", "2"],
      ["operation", "create"],
    ]);

    expect(r.fields).toEqual({ operation: "create" });
  });
});

describe("renderPretty", () => {
  test("pads the level label", () => {
    expect(renderPretty(record(LogLevel.Info, "hello"), false)).toBe("INFO  hello");
  });

  test("shows the operation and stack id", () => {
    const r = record(LogLevel.Debug, "trying edge stack path", [
      ["operation", "update"],
      ["stackId", 7],
    ]);

    expect(renderPretty(r, false)).toBe("DEBUG [update #7] trying edge stack path");
  });

  test("shows the operation alone when no stack is involved", () => {
    const r = record(LogLevel.Debug, "trying edge stack path", [["operation", "list"]]);

    expect(renderPretty(r, false)).toBe("DEBUG [list] trying edge stack path");
  });

  test("formats steps and success lines", () => {
    const step = record(LogLevel.Info, "Reading compose.yml", [
      ["logStyle", "step"],
      ["stepNumber", "1"],
      ["stepTotal", "2"],
    ]);
    const success = record(LogLevel.Info, "done", [["logStyle", "success"]]);

    expect(renderPretty(step, false)).toBe("[1/2] → Reading compose.yml");
    expect(renderPretty(success, false)).toBe("✓ done");
  });

  test("colours the level on a terminal", () => {
    expect(renderPretty(record(LogLevel.Error, "bad"), true)).toBe("\x1b[31mERROR\x1b[0m bad");
  });
});

describe("renderJson", () => {
  test("emits annotations and span timings", () => {
    const r = record(
      LogLevel.Warning,
      "regular stack path unusable",
      [
        ["operation", "update"],
        ["stackId", 7],
        ["logStyle", "step"],
      ],
      List.make(LogSpan.make("command-update", 0)),
      new Date(250)
    );

    expect(JSON.parse(renderJson(r))).toEqual({
      timestamp: "1970-01-01T00:00:00.250Z",
      level: "warn",
      message: "regular stack path unusable",
      operation: "update",
      stackId: 7,
      spans: { "command-update": 250 },
    });
  });

  test("omits spans when none are open", () => {
    expect(renderJson(record(LogLevel.Info, "hi"))).toBe(
      '{"timestamp":"1970-01-01T00:00:00.000Z","level":"info","message":"hi"}'
    );
  });
});

describe("log helpers", () => {
  const capture = async <A>(effect: Effect.Effect<A>): Promise<readonly string[]> => {
    const lines: string[] = [];
    const logger = Logger.make((options) => {
      lines.push(renderPretty(toRecord(options), false));
    });
    await Effect.runPromise(effect.pipe(Effect.provide(Logger.replace(Logger.defaultLogger, logger))));
    return lines;
  };

  test("steps are numbered in order and return their result", async () => {
    let result = 0;
    const lines = await capture(
      Effect.gen(function* () {
        const steps = yield* makeSteps(2);
        yield* steps.run("first", Effect.void);
        result = yield* steps.run("second", Effect.succeed(12));
        yield* logSuccess("done");
      })
    );

    expect(result).toBe(12);
    expect(lines).toEqual(["[1/2] → first", "[2/2] → second", "✓ done"]);
  });
});
