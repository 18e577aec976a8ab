// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * jail.conf parsing: text in, immutable `Document` or a positioned
 * `ParseError` out.
 */

export { formatDiagnostic } from "./diagnostic";
export {
  PARSE_ERROR_KINDS,
  ParseError,
  type ParseErrorKind,
  type SourcePosition,
  locate,
} from "./errors";
export { parse, parseEffect, parseOrThrow } from "./parser";
export {
  blockNames,
  collectValues,
  defaultBlocks,
  findBlock,
  findBlocks,
  hasFlag,
  parametersByKey,
} from "./query";
export {
  type Comment,
  type CommentStyle,
  type Document,
  type JailBlock,
  Parameter,
  type ParameterOperator,
  WILDCARD_BLOCK,
  isWildcard,
  operatorOf,
  valuesOf,
} from "./types";
