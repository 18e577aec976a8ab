// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Program output for `jailconf parse`. Pure string builders; the command
 * decides where the text goes.
 */

import { Match, pipe } from "effect";
import type { LogFormat } from "../config/logging";
import type { ParseError } from "../jail/errors";
import { type Document, type Parameter, operatorOf, valuesOf } from "../jail/types";
import { plural } from "../lib/str";

// Pretty listing

const parameterLine = (param: Parameter): string =>
  pipe(
    Match.value(param),
    Match.tag("Presence", ({ key }) => `  flag ${key}`),
    Match.tag("Set", ({ key, value }) => `  set ${key} ${JSON.stringify(value)}`),
    Match.tag("Append", ({ key, value }) => `  append ${key} ${JSON.stringify(value)}`),
    Match.exhaustive
  );

const section = (title: string, params: readonly Parameter[]): string =>
  [`${title} (${plural(params.length, "parameter")})`, ...params.map(parameterLine)].join("\n");

export const renderPretty = (doc: Document): string => {
  const sections = [
    ...(doc.globals.length > 0 ? [section("globals", doc.globals)] : []),
    ...doc.blocks.map((block) => section(`jail ${block.name}`, block.parameters)),
  ];
  return sections.length === 0 ? "no jail definitions" : sections.join("\n\n");
};

// JSON

const parameterJson = (
  param: Parameter
): { key: string; operator: string; values: readonly string[] } => ({
  key: param.key,
  operator: operatorOf(param),
  values: valuesOf(param),
});

export const toJson = (doc: Document): unknown => ({
  globals: doc.globals.map(parameterJson),
  blocks: doc.blocks.map((block) => ({
    name: block.name,
    parameters: block.parameters.map(parameterJson),
  })),
  comments: doc.comments,
});

export const renderJson = (doc: Document): string => JSON.stringify(toJson(doc), null, 2);

export const renderDocument = (doc: Document, format: LogFormat): string =>
  pipe(
    Match.value(format),
    Match.when("pretty", () => renderPretty(doc)),
    Match.when("json", () => renderJson(doc)),
    Match.exhaustive
  );

/** Machine-readable form of a parse failure for `--format json`. */
export const renderParseErrorJson = (error: ParseError, origin: string): string =>
  JSON.stringify({
    error: error.message,
    code: error.code,
    kind: error.kind,
    origin,
    line: error.position.line,
    column: error.position.column,
    offset: error.position.offset,
  });
