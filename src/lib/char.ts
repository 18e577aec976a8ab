// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Character predicates for the jail.conf lexer. Range comparisons avoid regex
 * overhead and compose with `all` for string-level checks.
 */

/** Predicate over a single character. */
export type CharPred = (c: string) => boolean;

export const isDigit: CharPred = (c) => c >= "0" && c <= "9";

export const isAlpha: CharPred = (c) => (c >= "a" && c <= "z") || (c >= "A" && c <= "Z");

export const isAlphaNum: CharPred = (c) => isAlpha(c) || isDigit(c);

export const isWhitespace: CharPred = (c) => c === " " || c === "\t" || c === "\n" || c === "\r";

export const isOneOf =
  (chars: string): CharPred =>
  (c): boolean =>
    c.length === 1 && chars.includes(c);

/** Key segments: `[A-Za-z0-9_]`. */
export const isIdentChar: CharPred = (c) => isAlphaNum(c) || c === "_";

/** Block names additionally allow `-` (`ioc-test-jail`). */
export const isBlockNameChar: CharPred = (c) => isIdentChar(c) || c === "-";

/** Characters that end an unquoted value. */
export const isValueBreak: CharPred = (c) => isWhitespace(c) || isOneOf(";{}")(c);

/** Characters that end a key or block-name word. `+=` is checked separately. */
export const isWordBreak: CharPred = (c) => isValueBreak(c) || isOneOf('="')(c);
