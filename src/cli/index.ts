// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * CLI entry point. The runCommand wrapper centralizes context resolution,
 * logger installation and error display so each command stays focused on
 * its logic.
 */

import { type CliApp, Command, ValidationError } from "@effect/cli";
import type { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Match, Option, pipe } from "effect";
import { DebugModeConfig, LogFormatOptionConfig, LogLevelOptionConfig } from "../config/env";
import {
  DEFAULT_LOG_SETTINGS,
  type LogFormat,
  type LogLevel,
  VERBOSE_LEVEL,
} from "../config/logging";
import { formatDiagnostic } from "../jail/diagnostic";
import type { ParseError } from "../jail/errors";
import { parseEffect } from "../jail/parser";
import type { Document } from "../jail/types";
import { JailconfLoggerLive, colorize, detectColor } from "../lib/effect-logger";
import { type AppError, ErrorCode, GeneralError } from "../lib/errors";
import { logFail, logSuccess, writeError, writeOutput } from "../lib/log";
import { plural } from "../lib/str";
import { JAILCONF_VERSION } from "../lib/version";
import { STDIN_ORIGIN, type SourceText, readSource } from "../system/fs";
import { type GlobalOptions, effectiveFormat, fileArg, globalOptions } from "./options";
import { renderDocument, renderParseErrorJson } from "./render";

/** Resolved runtime context for commands. CLI args > env vars > defaults. */
export interface CommandContext {
  readonly logLevel: LogLevel;
  readonly format: LogFormat;
}

export type CommandError = AppError | ParseError;

// Context resolution

export const resolveContext = (
  globals: GlobalOptions
): Effect.Effect<CommandContext, GeneralError> =>
  Effect.gen(function* () {
    const envLogLevel = yield* LogLevelOptionConfig;
    const envLogFormat = yield* LogFormatOptionConfig;
    const envDebug = yield* DebugModeConfig;

    const logLevel: LogLevel = pipe(
      Match.value(globals.verbose || envDebug),
      Match.when(true, (): LogLevel => VERBOSE_LEVEL),
      Match.when(
        false,
        (): LogLevel =>
          pipe(
            globals.logLevel,
            Option.orElse(() => envLogLevel),
            Option.getOrElse((): LogLevel => DEFAULT_LOG_SETTINGS.level)
          )
      ),
      Match.exhaustive
    );

    const format: LogFormat = pipe(
      effectiveFormat(globals),
      Option.orElse(() => envLogFormat),
      Option.getOrElse((): LogFormat => DEFAULT_LOG_SETTINGS.format)
    );

    return { logLevel, format };
  }).pipe(
    Effect.mapError(
      (e) =>
        new GeneralError({
          code: ErrorCode.INVALID_ARGS,
          message: `Invalid environment configuration: ${String(e)}`,
        })
    )
  );

// Error display

/** Sync because it runs on the way out. Parse errors are reported by the command itself. */
const displayError = (err: CommandError, format: LogFormat): void =>
  pipe(
    Match.value(err),
    Match.tag("ParseError", (): void => undefined),
    Match.orElse((appError): void =>
      pipe(
        Match.value(format),
        Match.when("json", (): void => {
          process.stdout.write(
            `${JSON.stringify({ error: appError.message, code: appError.code })}\n`
          );
        }),
        Match.when("pretty", (): void => {
          process.stderr.write(`${colorize("red", "✗", detectColor())} ${appError.message}\n`);
        }),
        Match.exhaustive
      )
    )
  );

// Command runner

const runCommand = (
  globals: GlobalOptions,
  commandName: string,
  handler: (ctx: CommandContext) => Effect.Effect<void, CommandError, FileSystem.FileSystem>
): Effect.Effect<void, CommandError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const ctx = yield* resolveContext(globals).pipe(
      Effect.tapError((err) => Effect.sync(() => displayError(err, DEFAULT_LOG_SETTINGS.format)))
    );
    yield* pipe(
      handler(ctx),
      Effect.withLogSpan(`command-${commandName}`),
      Effect.tapError((err) => Effect.sync(() => displayError(err, ctx.format))),
      Effect.provide(JailconfLoggerLive({ level: ctx.logLevel, format: ctx.format }))
    );
  });

// Shared steps

const reportParseError = (
  error: ParseError,
  source: SourceText,
  format: LogFormat
): Effect.Effect<void> =>
  pipe(
    Match.value(format),
    Match.when("json", () => writeOutput(renderParseErrorJson(error, source.origin))),
    Match.when("pretty", () => writeError(formatDiagnostic(error, source.text, source.origin))),
    Match.exhaustive
  );

/** Read and parse; on failure the diagnostic is printed before the error propagates. */
const loadDocument = (
  file: Option.Option<string>,
  ctx: CommandContext
): Effect.Effect<Document, CommandError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const source = yield* readSource(file);
    const doc = yield* parseEffect(source.text).pipe(
      Effect.tapError((error) => reportParseError(error, source, ctx.format))
    );
    yield* Effect.logDebug(
      `Parsed ${plural(doc.blocks.length, "block")}, ${plural(doc.globals.length, "global parameter")}`
    );
    return doc;
  }).pipe(Effect.annotateLogs("origin", Option.getOrElse(file, () => STDIN_ORIGIN)));

// Subcommand definitions

const parseCmd = Command.make("parse", { ...globalOptions, file: fileArg }, (args) =>
  runCommand(args, "parse", (ctx) =>
    Effect.gen(function* () {
      const doc = yield* loadDocument(args.file, ctx);
      yield* writeOutput(renderDocument(doc, ctx.format));
    })
  )
).pipe(Command.withDescription("Parse a jail.conf file and print its blocks and parameters"));

const checkCmd = Command.make("check", { ...globalOptions, file: fileArg }, (args) =>
  runCommand(args, "check", (ctx) =>
    Effect.gen(function* () {
      const doc = yield* loadDocument(args.file, ctx).pipe(
        Effect.tapErrorTag("ParseError", (error) =>
          logFail(`Syntax check failed: ${error.kind} at line ${error.position.line}`)
        )
      );
      yield* logSuccess(`${plural(doc.blocks.length, "jail")} defined, no errors`);
    })
  )
).pipe(Command.withDescription("Check a jail.conf file for syntax errors"));

// Root command

const jailconf = Command.make("jailconf").pipe(
  Command.withDescription("jail.conf parser and syntax checker"),
  Command.withSubcommands([parseCmd, checkCmd])
);

export const cli: (
  args: readonly string[]
) => Effect.Effect<void, unknown, CliApp.CliApp.Environment> = Command.run(jailconf, {
  name: "jailconf",
  version: JAILCONF_VERSION,
});

/**
 * Full program over `process.argv`. Argument errors are already reported by
 * @effect/cli; they are re-tagged here so they exit with INVALID_ARGS.
 */
export const program = (argv: readonly string[]): Effect.Effect<void, unknown> =>
  cli(argv).pipe(
    Effect.catchIf(ValidationError.isValidationError, () =>
      Effect.fail(
        new GeneralError({ code: ErrorCode.INVALID_ARGS, message: "Invalid command-line arguments" })
      )
    ),
    Effect.provide(NodeContext.layer)
  );
