// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Lexical rules for jail.conf. Each rule looks at `source` from `offset` and
 * reports what it recognized together with the offset just past it. Rules
 * never look behind and hold no state between calls.
 */

import { Either, Option, pipe } from "effect";
import {
  isBlockNameChar,
  isIdentChar,
  isValueBreak,
  isWhitespace,
  isWordBreak,
} from "../lib/char";
import { all } from "../lib/str";
import { type ParseError, makeParseError } from "./errors";
import { type Comment, type CommentStyle, WILDCARD_BLOCK } from "./types";

export interface Scanned<A> {
  readonly value: A;
  /** Offset of the first character after the token. */
  readonly end: number;
}

export type Scan<A> = Either.Either<Scanned<A>, ParseError>;

// ============================================================================
// Trivia
// ============================================================================

const LINE_COMMENT_OPENERS: ReadonlyArray<readonly [opener: string, style: CommentStyle]> = [
  ["//", "cpp"],
  ["#", "shell"],
];

const lineComment = (source: string, offset: number): Option.Option<Scanned<Comment>> =>
  pipe(
    Option.fromNullable(
      LINE_COMMENT_OPENERS.find(([opener]) => source.startsWith(opener, offset))
    ),
    Option.map(([opener, style]) => {
      const newline = source.indexOf("\n", offset);
      const end = newline === -1 ? source.length : newline;
      const body = source.slice(offset + opener.length, end);
      return {
        value: { style, text: body.endsWith("\r") ? body.slice(0, -1) : body, offset },
        end,
      };
    })
  );

const blockComment = (source: string, offset: number): Option.Option<Scan<Comment>> => {
  if (!source.startsWith("/*", offset)) {
    return Option.none();
  }
  const close = source.indexOf("*/", offset + 2);
  return Option.some(
    close === -1
      ? Either.left(
          makeParseError(
            source,
            offset,
            "UnterminatedComment",
            'block comment is missing its closing "*/"'
          )
        )
      : Either.right({
          value: { style: "c", text: source.slice(offset + 2, close), offset },
          end: close + 2,
        })
  );
};

/**
 * Skip whitespace and comments. Comments are returned so the document can
 * keep them; they never reach the structural layer.
 */
export const skipTrivia = (source: string, offset: number): Scan<readonly Comment[]> => {
  const comments: Comment[] = [];
  let pos = offset;

  while (pos < source.length) {
    if (isWhitespace(source.charAt(pos))) {
      pos++;
      continue;
    }

    const block = blockComment(source, pos);
    if (Option.isSome(block)) {
      if (Either.isLeft(block.value)) {
        return Either.left(block.value.left);
      }
      comments.push(block.value.right.value);
      pos = block.value.right.end;
      continue;
    }

    const line = lineComment(source, pos);
    if (Option.isSome(line)) {
      comments.push(line.value.value);
      pos = line.value.end;
      continue;
    }

    break;
  }

  return Either.right({ value: comments, end: pos });
};

// ============================================================================
// Symbols
// ============================================================================

export type SymbolText = "=" | "+=" | ";" | "{" | "}";

/** Fixed literal match; `None` when the symbol is not at `offset`. */
export const symbol = (source: string, offset: number, text: SymbolText): Option.Option<number> =>
  source.startsWith(text, offset) ? Option.some(offset + text.length) : Option.none();

// ============================================================================
// Words and names
// ============================================================================

const startsComment = (source: string, offset: number): boolean =>
  source.startsWith("/*", offset) ||
  LINE_COMMENT_OPENERS.some(([opener]) => source.startsWith(opener, offset));

/**
 * Candidate key or block name: everything up to whitespace, a structural
 * symbol, a quote, `+=` or a comment opener. Validation happens in
 * `dottedKey`/`blockName` so a malformed name is reported as such instead of
 * as a stray character.
 */
export const word = (source: string, offset: number): Scanned<string> => {
  let pos = offset;
  while (
    pos < source.length &&
    !isWordBreak(source.charAt(pos)) &&
    !source.startsWith("+=", pos) &&
    !startsComment(source, pos)
  ) {
    pos++;
  }
  return { value: source.slice(offset, pos), end: pos };
};

/** One-or-more `[A-Za-z0-9_]`. */
export const identifier = (source: string, offset: number): Option.Option<Scanned<string>> => {
  let pos = offset;
  while (pos < source.length && isIdentChar(source.charAt(pos))) {
    pos++;
  }
  return pos > offset
    ? Option.some({ value: source.slice(offset, pos), end: pos })
    : Option.none();
};

interface KeyDefect {
  readonly index: number;
  readonly reason: string;
}

const keyDefect = (raw: string): Option.Option<KeyDefect> => {
  let pos = 0;
  for (;;) {
    const segment = identifier(raw, pos);
    if (Option.isNone(segment)) {
      const c = raw.charAt(pos);
      return Option.some({
        index: pos,
        reason: c === "" || c === "." ? "empty segment" : `illegal character ${JSON.stringify(c)}`,
      });
    }
    pos = segment.value.end;
    if (pos === raw.length) {
      return Option.none();
    }
    if (raw.charAt(pos) !== ".") {
      return Option.some({
        index: pos,
        reason: `illegal character ${JSON.stringify(raw.charAt(pos))}`,
      });
    }
    pos++;
  }
};

/**
 * Validate `raw` (found at `offset`) as a dotted key: identifiers joined by
 * single dots. The error points at the offending character.
 */
export const dottedKey = (
  source: string,
  offset: number,
  raw: string
): Either.Either<string, ParseError> =>
  Option.match(keyDefect(raw), {
    onNone: (): Either.Either<string, ParseError> => Either.right(raw),
    onSome: ({ index, reason }): Either.Either<string, ParseError> =>
      Either.left(
        makeParseError(
          source,
          offset + index,
          "InvalidKey",
          `invalid key ${JSON.stringify(raw)}: ${reason}`
        )
      ),
  });

export const MISSING_BLOCK_NAME = 'missing block name before "{"';

/** Block names are identifiers that may also contain `-`, or the wildcard `*`. */
export const blockName = (
  source: string,
  offset: number,
  raw: string
): Either.Either<string, ParseError> =>
  raw === WILDCARD_BLOCK || (raw.length > 0 && all(isBlockNameChar)(raw))
    ? Either.right(raw)
    : Either.left(
        makeParseError(
          source,
          offset,
          "InvalidBlockName",
          raw.length === 0 ? MISSING_BLOCK_NAME : `invalid block name ${JSON.stringify(raw)}`
        )
      );

// ============================================================================
// Values
// ============================================================================

/**
 * `"..."` with `\"` and `\\` escapes; other backslash sequences are kept
 * verbatim. A raw line break inside the quotes is an error, reported at the
 * opening quote.
 */
export const quotedString = (source: string, offset: number): Scan<string> => {
  let value = "";
  let pos = offset + 1;

  while (pos < source.length) {
    const c = source.charAt(pos);
    if (c === '"') {
      return Either.right({ value, end: pos + 1 });
    }
    if (c === "\n" || c === "\r") {
      break;
    }
    const next = source.charAt(pos + 1);
    if (c === "\\" && (next === '"' || next === "\\")) {
      value += next;
      pos += 2;
      continue;
    }
    value += c;
    pos++;
  }

  return Either.left(
    makeParseError(source, offset, "UnterminatedString", "string literal is missing its closing quote")
  );
};

/** Unquoted value: any run of characters other than whitespace, `;`, `{` and `}`. */
export const bareValue = (source: string, offset: number): Scanned<string> => {
  let pos = offset;
  while (pos < source.length && !isValueBreak(source.charAt(pos))) {
    pos++;
  }
  return { value: source.slice(offset, pos), end: pos };
};
