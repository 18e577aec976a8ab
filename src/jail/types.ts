// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Document model produced by the jail.conf parser. Everything here is
 * immutable output of a single `parse` call.
 */

import { Data, Match, pipe } from "effect";

/**
 * One `key <op> <value>? ;` statement. A tagged variant rather than three
 * unrelated types, so consumers match exhaustively on `_tag`:
 *
 * - `Presence`: `persist;`, a boolean flag with no value
 * - `Set`: `host.hostname = "www";`
 * - `Append`: `ip4.addr += "lo1|127.0.1.1/32";`, one value per statement;
 *   repeated statements are never merged
 */
export type Parameter = Data.TaggedEnum<{
  Presence: { readonly key: string };
  Set: { readonly key: string; readonly value: string };
  Append: { readonly key: string; readonly value: string };
}>;

export const Parameter = Data.taggedEnum<Parameter>();

export type ParameterOperator = Parameter["_tag"];

export const operatorOf = (param: Parameter): ParameterOperator => param._tag;

/** Presence carries no value; `""` on Set/Append is a real, empty value. */
export const valuesOf = (param: Parameter): readonly string[] =>
  pipe(
    Match.value(param),
    Match.tag("Presence", (): readonly string[] => []),
    Match.tag("Set", "Append", (p): readonly string[] => [p.value]),
    Match.exhaustive
  );

export const WILDCARD_BLOCK = "*";

export interface JailBlock {
  /** Jail name, or `*` for the default block. */
  readonly name: string;
  readonly parameters: readonly Parameter[];
}

export const isWildcard = (block: JailBlock): boolean => block.name === WILDCARD_BLOCK;

export type CommentStyle = "c" | "cpp" | "shell";

export interface Comment {
  readonly style: CommentStyle;
  /** Body without the delimiters. */
  readonly text: string;
  /** String index of the opening delimiter. */
  readonly offset: number;
}

export interface Document {
  readonly blocks: readonly JailBlock[];
  /** Parameters written outside any block, in source order. */
  readonly globals: readonly Parameter[];
  readonly comments: readonly Comment[];
}
