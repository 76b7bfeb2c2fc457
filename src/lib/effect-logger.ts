// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI logger. Each log call is first reduced to a LogRecord, then rendered
 * either for a terminal (level or step prefix, `[operation #stackId]`
 * context) or as one JSON object per line carrying every annotation and the
 * elapsed time of each open log span. ERROR and above go to stderr.
 */

import { Cause, HashMap, Layer, List, LogLevel, Logger, Match, Option, pipe } from "effect";
import type { LogFormat, LogLevel as StackbridgeLogLevel } from "../config/field-values";

/** Annotation keys read by the renderer; set through the helpers in log.ts. */
export const StyleKeys = {
  style: "logStyle",
  stepNumber: "stepNumber",
  stepTotal: "stepTotal",
} as const;

const STYLE_KEYS: ReadonlySet<string> = new Set(Object.values(StyleKeys));

export type LineStyle =
  | { readonly _tag: "Step"; readonly current: string; readonly total: string }
  | { readonly _tag: "Success" };

export interface SpanTiming {
  readonly label: string;
  readonly millis: number;
}

export interface LogRecord {
  readonly level: LogLevel.LogLevel;
  readonly message: string;
  readonly date: Date;
  readonly style: Option.Option<LineStyle>;
  /** `operation`, with `#stackId` when present. */
  readonly context: Option.Option<string>;
  /** Every annotation that is not a style key. */
  readonly fields: Readonly<Record<string, unknown>>;
  readonly spans: readonly SpanTiming[];
  readonly cause: Cause.Cause<unknown>;
}

export const toEffectLogLevel = (level: StackbridgeLogLevel): LogLevel.LogLevel =>
  pipe(
    Match.value(level),
    Match.when("debug", () => LogLevel.Debug),
    Match.when("info", () => LogLevel.Info),
    Match.when("warn", () => LogLevel.Warning),
    Match.when("error", () => LogLevel.Error),
    Match.exhaustive
  );

const annotation = (
  annotations: HashMap.HashMap<string, unknown>,
  key: string
): Option.Option<string> =>
  pipe(
    HashMap.get(annotations, key),
    Option.filter((v) => typeof v === "string" || typeof v === "number"),
    Option.map(String)
  );

const readStyle = (annotations: HashMap.HashMap<string, unknown>): Option.Option<LineStyle> =>
  pipe(
    annotation(annotations, StyleKeys.style),
    Option.flatMap((style): Option.Option<LineStyle> => {
      switch (style) {
        case "step":
          return Option.some({
            _tag: "Step",
            current: Option.getOrElse(annotation(annotations, StyleKeys.stepNumber), () => "?"),
            total: Option.getOrElse(annotation(annotations, StyleKeys.stepTotal), () => "?"),
          });
        case "success":
          return Option.some({ _tag: "Success" });
        default:
          return Option.none();
      }
    })
  );

const readContext = (annotations: HashMap.HashMap<string, unknown>): Option.Option<string> =>
  Option.map(annotation(annotations, "operation"), (operation) =>
    Option.match(annotation(annotations, "stackId"), {
      onNone: (): string => operation,
      onSome: (id): string => `${operation} #${id}`,
    })
  );

const messageText = (message: unknown): string =>
  Array.isArray(message) ? message.map(String).join(" ") : String(message);

export const toRecord = (options: {
  readonly logLevel: LogLevel.LogLevel;
  readonly message: unknown;
  readonly annotations: HashMap.HashMap<string, unknown>;
  readonly spans: List.List<{ readonly label: string; readonly startTime: number }>;
  readonly cause: Cause.Cause<unknown>;
  readonly date: Date;
}): LogRecord => ({
  level: options.logLevel,
  message: messageText(options.message),
  date: options.date,
  style: readStyle(options.annotations),
  context: readContext(options.annotations),
  fields: Object.fromEntries(
    Array.from(HashMap.toEntries(options.annotations)).filter(([k]) => !STYLE_KEYS.has(k))
  ),
  spans: List.toArray(options.spans).map((span) => ({
    label: span.label,
    millis: options.date.getTime() - span.startTime,
  })),
  cause: options.cause,
});

// Rendering

const SGR = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
} as const;

type Sgr = Exclude<keyof typeof SGR, "reset">;

const paint = (code: Sgr, text: string, useColor: boolean): string =>
  useColor ? `${SGR[code]}${text}${SGR.reset}` : text;

const levelColor = (level: LogLevel.LogLevel): Sgr =>
  pipe(
    Match.value(level._tag),
    Match.when("Debug", (): Sgr => "gray"),
    Match.when("Info", (): Sgr => "blue"),
    Match.when("Warning", (): Sgr => "yellow"),
    Match.orElse((): Sgr => "red")
  );

export const renderPretty = (record: LogRecord, useColor: boolean): string =>
  Option.match(record.style, {
    onSome: (style): string =>
      style._tag === "Step"
        ? `${paint("bold", `[${style.current}/${style.total}]`, useColor)} ${paint("cyan", "→", useColor)} ${record.message}`
        : `${paint("green", "✓", useColor)} ${record.message}`,
    onNone: (): string => {
      const level = paint(levelColor(record.level), record.level.label.padEnd(5), useColor);
      const context = Option.match(record.context, {
        onNone: (): string => "",
        onSome: (c): string => `${paint("cyan", `[${c}]`, useColor)} `,
      });
      const cause = Cause.isEmpty(record.cause) ? "" : `\n${Cause.pretty(record.cause)}`;
      return `${level} ${context}${record.message}${cause}`;
    },
  });

export const renderJson = (record: LogRecord): string =>
  JSON.stringify({
    timestamp: record.date.toISOString(),
    level: record.level.label.toLowerCase(),
    message: record.message,
    ...record.fields,
    ...(record.spans.length === 0
      ? {}
      : { spans: Object.fromEntries(record.spans.map((s) => [s.label, s.millis])) }),
    ...(Cause.isEmpty(record.cause) ? {} : { cause: Cause.pretty(record.cause) }),
  });

const StackbridgeLogger = (format: LogFormat, useColor: boolean): Logger.Logger<unknown, void> =>
  Logger.make((options) => {
    const record = toRecord(options);
    const line = format === "json" ? renderJson(record) : renderPretty(record, useColor);
    const stream = LogLevel.greaterThanEqual(record.level, LogLevel.Error)
      ? process.stderr
      : process.stdout;
    stream.write(`${line}\n`);
  });

/** Colour only on a TTY, and never when NO_COLOR is set. */
export const detectColor = (): boolean =>
  process.env["NO_COLOR"] === undefined && process.stdout.isTTY === true;

export const StackbridgeLoggerLive = (options: {
  readonly level: StackbridgeLogLevel;
  readonly format: LogFormat;
  readonly color?: boolean;
}): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(
      Logger.defaultLogger,
      StackbridgeLogger(options.format, options.color ?? detectColor())
    ),
    Logger.minimumLogLevel(toEffectLogLevel(options.level))
  );
