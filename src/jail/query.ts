// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Read-only traversal over a parsed document. The parser never merges
 * anything; helpers here that combine statements do so on the consumer's
 * side and leave the document untouched.
 */

import { Array as Arr, Match, Option, pipe } from "effect";
import { type Document, type JailBlock, type Parameter, WILDCARD_BLOCK } from "./types";

export const blockNames = (doc: Document): readonly string[] => doc.blocks.map((b) => b.name);

/** Every block with `name`, in source order. Repeated names are not merged. */
export const findBlocks = (doc: Document, name: string): readonly JailBlock[] =>
  Arr.filter(doc.blocks, (b) => b.name === name);

export const findBlock = (doc: Document, name: string): Option.Option<JailBlock> =>
  Arr.findFirst(doc.blocks, (b) => b.name === name);

export const defaultBlocks = (doc: Document): readonly JailBlock[] =>
  findBlocks(doc, WILDCARD_BLOCK);

export const parametersByKey = (
  params: readonly Parameter[],
  key: string
): readonly Parameter[] => Arr.filter(params, (p) => p.key === key);

export const hasFlag = (params: readonly Parameter[], key: string): boolean =>
  Arr.some(params, (p) => p._tag === "Presence" && p.key === key);

const NO_VALUES: readonly string[] = [];

const accumulate = (acc: readonly string[], param: Parameter): readonly string[] =>
  pipe(
    Match.value(param),
    Match.tag("Presence", (): readonly string[] => acc),
    Match.tag("Set", ({ value }): readonly string[] => [value]),
    Match.tag("Append", ({ value }): readonly string[] => [...acc, value]),
    Match.exhaustive
  );

/**
 * Fold the statements for `key` into the list a consumer would see:
 * `=` replaces what came before, `+=` appends, a bare flag adds nothing.
 * `None` when the key does not occur at all.
 */
export const collectValues = (
  params: readonly Parameter[],
  key: string
): Option.Option<readonly string[]> =>
  pipe(
    parametersByKey(params, key),
    Arr.match({
      onEmpty: (): Option.Option<readonly string[]> => Option.none(),
      onNonEmpty: (found): Option.Option<readonly string[]> =>
        Option.some(Arr.reduce(found, NO_VALUES, accumulate)),
    })
  );
