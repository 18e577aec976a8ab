// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Array as Arr, Option, pipe } from "effect";
import type { ParseError } from "./errors";

const sourceLine = (source: string, line: number): string =>
  pipe(
    Arr.get(source.split("\n"), line - 1),
    Option.map((text) => (text.endsWith("\r") ? text.slice(0, -1) : text)),
    Option.getOrElse(() => "")
  );

/**
 * Render a parse error against its source:
 *
 * ```
 * jail.conf:3:11: error: string literal is missing its closing quote [UnterminatedString]
 *  3 |     key = "abc;
 *    |           ^
 * ```
 *
 * Tabs before the column are kept so the caret lines up in a terminal.
 */
export const formatDiagnostic = (error: ParseError, source: string, origin = "<input>"): string => {
  const { line, column } = error.position;
  const text = sourceLine(source, line);
  const gutter = String(line);
  const indent = text.slice(0, column - 1).replace(/[^\t]/g, " ");
  return [
    `${origin}:${line}:${column}: error: ${error.message} [${error.kind}]`,
    ` ${gutter} | ${text}`,
    ` ${" ".repeat(gutter.length)} | ${indent}^`,
  ].join("\n");
};
