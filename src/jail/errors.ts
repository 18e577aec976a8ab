// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Data } from "effect";
import { ErrorCode } from "../lib/errors";

export const PARSE_ERROR_KINDS = [
  "UnterminatedString",
  "UnterminatedComment",
  "UnbalancedBlock",
  "MissingSemicolon",
  "InvalidKey",
  "InvalidBlockName",
  "UnexpectedToken",
] as const;

export type ParseErrorKind = (typeof PARSE_ERROR_KINDS)[number];

export interface SourcePosition {
  /** String index into the parsed text. */
  readonly offset: number;
  /** UTF-8 byte offset of the same point. */
  readonly byteOffset: number;
  /** 1-based. */
  readonly line: number;
  /** 1-based, counted in string indices from the start of the line. */
  readonly column: number;
}

/**
 * The single failure a parse can report. Parsing is all-or-nothing, so this
 * always describes the first unrecoverable point in the input.
 */
export class ParseError extends Data.TaggedError("ParseError")<{
  readonly code: typeof ErrorCode.CONFIG_PARSE_ERROR;
  readonly kind: ParseErrorKind;
  readonly message: string;
  readonly position: SourcePosition;
}> {}

export const locate = (source: string, offset: number): SourcePosition => {
  const clamped = Math.max(0, Math.min(offset, source.length));
  const before = source.slice(0, clamped);
  const lineStart = before.lastIndexOf("\n") + 1;
  const line = before.split("\n").length;
  return {
    offset: clamped,
    byteOffset: Buffer.byteLength(before, "utf8"),
    line,
    column: clamped - lineStart + 1,
  };
};

export const makeParseError = (
  source: string,
  offset: number,
  kind: ParseErrorKind,
  message: string
): ParseError =>
  new ParseError({
    code: ErrorCode.CONFIG_PARSE_ERROR,
    kind,
    message,
    position: locate(source, offset),
  });
