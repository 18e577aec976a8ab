// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Loads the text to parse, from a named file or from standard input.
 * The parser itself never touches I/O.
 */

import type { Readable } from "node:stream";
import { FileSystem } from "@effect/platform";
import { NodeStream } from "@effect/platform-node";
import { Effect, Option, Stream } from "effect";
import { ConfigError, ErrorCode, SystemError, errorMessage } from "../lib/errors";

export interface SourceText {
  /** File path, or `<stdin>`; used as the prefix of diagnostics. */
  readonly origin: string;
  readonly text: string;
}

export const STDIN_ORIGIN = "<stdin>";

const readFailed = (origin: string, cause: unknown): SystemError =>
  new SystemError({
    code: ErrorCode.FILE_READ_FAILED,
    message: `Failed to read ${origin}: ${errorMessage(cause)}`,
    ...(cause instanceof Error ? { cause } : {}),
  });

export const readFileSource = (
  path: string
): Effect.Effect<SourceText, ConfigError | SystemError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const exists = yield* fs.exists(path).pipe(Effect.mapError((e) => readFailed(path, e)));
    if (!exists) {
      return yield* Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_NOT_FOUND,
          message: `File not found: ${path}`,
          path,
        })
      );
    }
    yield* Effect.logDebug(`Reading ${path}`);
    const text = yield* fs
      .readFileString(path, "utf-8")
      .pipe(Effect.mapError((e) => readFailed(path, e)));
    return { origin: path, text };
  });

export const readStreamSource = (
  input: () => Readable = (): Readable => process.stdin
): Effect.Effect<SourceText, SystemError> =>
  NodeStream.fromReadable<SystemError, Uint8Array>(input, (e) => readFailed(STDIN_ORIGIN, e)).pipe(
    Stream.decodeText("utf-8"),
    Stream.mkString,
    Effect.map((text) => ({ origin: STDIN_ORIGIN, text }))
  );

/** No path (or `-`) means standard input. */
export const readSource = (
  file: Option.Option<string>,
  stdin: () => Readable = (): Readable => process.stdin
): Effect.Effect<SourceText, ConfigError | SystemError, FileSystem.FileSystem> =>
  Option.match(
    Option.filter(file, (path) => path !== "-"),
    {
      onNone: (): Effect.Effect<SourceText, SystemError> => readStreamSource(stdin),
      onSome: (path): Effect.Effect<SourceText, ConfigError | SystemError, FileSystem.FileSystem> =>
        readFileSource(path),
    }
  );
