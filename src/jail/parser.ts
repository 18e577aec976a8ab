// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Structural grammar for jail.conf, composed directly over the lexical rules:
 *
 * ```
 * document   := ( block | parameter )*
 * block      := block_name '{' parameter* '}'
 * parameter  := dotted_key ( '+=' value | '=' value )? ';'
 * value      := quoted_string | bare_value
 * ```
 *
 * One left-to-right pass. The only lookahead is the token after a name
 * (`{` opens a block, anything else continues a parameter) and the operator
 * after a key (`+=`, then `=`, then nothing). The first error aborts the parse.
 */

import { Data, Effect, Either, Match, Option, identity, pipe } from "effect";
import { type ParseError, type ParseErrorKind, locate, makeParseError } from "./errors";
import {
  MISSING_BLOCK_NAME,
  type Scan,
  bareValue,
  blockName,
  dottedKey,
  quotedString,
  skipTrivia,
  symbol,
  word,
} from "./lexer";
import { type Comment, type Document, type JailBlock, Parameter } from "./types";

interface Context {
  readonly source: string;
  /** Filled as trivia is skipped; each stretch of input is skipped exactly once. */
  readonly comments: Comment[];
}

/** Where a statement sits. End of input means an unclosed block only inside one. */
type Scope = Data.TaggedEnum<{
  TopLevel: object;
  Block: { readonly name: string; readonly open: number };
}>;

const Scope = Data.taggedEnum<Scope>();

interface Token {
  readonly value: string;
  readonly start: number;
  readonly end: number;
}

// ============================================================================
// Helpers
// ============================================================================

const fail = (
  ctx: Context,
  offset: number,
  kind: ParseErrorKind,
  message: string
): Either.Either<never, ParseError> => Either.left(makeParseError(ctx.source, offset, kind, message));

const atEnd = (ctx: Context, offset: number): boolean => offset >= ctx.source.length;

const describeAt = (ctx: Context, offset: number): string =>
  atEnd(ctx, offset) ? "end of input" : JSON.stringify(ctx.source.charAt(offset));

const trivia = (ctx: Context, offset: number): Either.Either<number, ParseError> =>
  Either.map(skipTrivia(ctx.source, offset), ({ value, end }) => {
    for (const comment of value) {
      ctx.comments.push(comment);
    }
    return end;
  });

const unbalanced = (
  ctx: Context,
  offset: number,
  name: string,
  open: number
): Either.Either<never, ParseError> =>
  fail(
    ctx,
    offset,
    "UnbalancedBlock",
    `block ${JSON.stringify(name)} opened at line ${locate(ctx.source, open).line} is missing its closing "}"`
  );

const unexpectedEnd = (
  ctx: Context,
  offset: number,
  scope: Scope,
  kind: ParseErrorKind,
  message: string
): Either.Either<never, ParseError> =>
  pipe(
    Match.value(scope),
    Match.tag("Block", ({ name, open }) => unbalanced(ctx, offset, name, open)),
    Match.tag("TopLevel", () => fail(ctx, offset, kind, message)),
    Match.exhaustive
  );

// ============================================================================
// Parameters
// ============================================================================

const value = (ctx: Context, offset: number, scope: Scope, key: string): Scan<string> =>
  Either.gen(function* () {
    const start = yield* trivia(ctx, offset);
    if (atEnd(ctx, start)) {
      return yield* unexpectedEnd(
        ctx,
        start,
        scope,
        "UnexpectedToken",
        `expected a value for ${JSON.stringify(key)}, found end of input`
      );
    }
    if (ctx.source.charAt(start) === '"') {
      return yield* quotedString(ctx.source, start);
    }
    const bare = bareValue(ctx.source, start);
    if (bare.value.length === 0) {
      return yield* fail(
        ctx,
        start,
        "UnexpectedToken",
        `expected a value for ${JSON.stringify(key)}, found ${describeAt(ctx, start)}`
      );
    }
    return bare;
  });

const terminator = (
  ctx: Context,
  offset: number,
  scope: Scope,
  key: string
): Either.Either<number, ParseError> =>
  Either.gen(function* () {
    const pos = yield* trivia(ctx, offset);
    const message = `expected ";" after ${JSON.stringify(key)}, found ${describeAt(ctx, pos)}`;
    if (atEnd(ctx, pos)) {
      return yield* unexpectedEnd(ctx, pos, scope, "MissingSemicolon", message);
    }
    return yield* Option.match(symbol(ctx.source, pos, ";"), {
      onNone: (): Either.Either<number, ParseError> =>
        fail(ctx, pos, "MissingSemicolon", message),
      onSome: (end): Either.Either<number, ParseError> => Either.right(end),
    });
  });

/** Operator-and-value tails, in the order they are tried. */
const VALUED_FORMS = [
  ["+=", (key: string, v: string): Parameter => Parameter.Append({ key, value: v })],
  ["=", (key: string, v: string): Parameter => Parameter.Set({ key, value: v })],
] as const;

/**
 * The rest of a parameter whose name has been read. `after` is the first
 * significant offset behind the name.
 */
const parameter = (ctx: Context, name: Token, after: number, scope: Scope): Scan<Parameter> =>
  Either.gen(function* () {
    const key = yield* dottedKey(ctx.source, name.start, name.value);

    for (const [operator, make] of VALUED_FORMS) {
      const operand = symbol(ctx.source, after, operator);
      if (Option.isSome(operand)) {
        const parsed = yield* value(ctx, operand.value, scope, key);
        const end = yield* terminator(ctx, parsed.end, scope, key);
        return { value: make(key, parsed.value), end };
      }
    }

    const end = yield* terminator(ctx, after, scope, key);
    return { value: Parameter.Presence({ key }), end };
  });

/** Reads the name that starts a statement; rejects characters that cannot start one. */
const statementHead = (
  ctx: Context,
  offset: number,
  expected: string
): Either.Either<Token, ParseError> => {
  const c = ctx.source.charAt(offset);
  if (c === ";" || c === "=" || c === '"' || ctx.source.startsWith("+=", offset)) {
    return fail(ctx, offset, "UnexpectedToken", `expected ${expected}, found ${JSON.stringify(c)}`);
  }
  const { value: text, end } = word(ctx.source, offset);
  return Either.right({ value: text, start: offset, end });
};

// ============================================================================
// Blocks
// ============================================================================

const nestedBlock = (ctx: Context, offset: number, outer: string): Either.Either<never, ParseError> =>
  fail(
    ctx,
    offset,
    "UnexpectedToken",
    `nested blocks are not supported inside block ${JSON.stringify(outer)}`
  );

/** `brace` is the offset of the `{` that follows the block name. */
const jailBlock = (ctx: Context, header: Token, brace: number): Scan<JailBlock> =>
  Either.gen(function* () {
    const name = yield* blockName(ctx.source, header.start, header.value);
    const scope = Scope.Block({ name, open: brace });
    const parameters: Parameter[] = [];

    let pos = yield* trivia(ctx, brace + 1);
    while (Option.isNone(symbol(ctx.source, pos, "}"))) {
      if (atEnd(ctx, pos)) {
        return yield* unbalanced(ctx, pos, name, brace);
      }
      if (Option.isSome(symbol(ctx.source, pos, "{"))) {
        return yield* nestedBlock(ctx, pos, name);
      }
      const head = yield* statementHead(ctx, pos, "a parameter name");
      const after = yield* trivia(ctx, head.end);
      if (Option.isSome(symbol(ctx.source, after, "{"))) {
        return yield* nestedBlock(ctx, after, name);
      }
      const param = yield* parameter(ctx, head, after, scope);
      parameters.push(param.value);
      pos = yield* trivia(ctx, param.end);
    }

    return { value: { name, parameters }, end: pos + 1 };
  });

// ============================================================================
// Document
// ============================================================================

const document = (
  ctx: Context
): Either.Either<Pick<Document, "blocks" | "globals">, ParseError> =>
  Either.gen(function* () {
    const blocks: JailBlock[] = [];
    const globals: Parameter[] = [];

    let pos = yield* trivia(ctx, 0);
    while (!atEnd(ctx, pos)) {
      if (Option.isSome(symbol(ctx.source, pos, "}"))) {
        return yield* fail(ctx, pos, "UnexpectedToken", 'unexpected "}" outside of a block');
      }
      if (Option.isSome(symbol(ctx.source, pos, "{"))) {
        return yield* fail(ctx, pos, "InvalidBlockName", MISSING_BLOCK_NAME);
      }

      const head = yield* statementHead(ctx, pos, "a parameter or block name");
      const after = yield* trivia(ctx, head.end);
      if (Option.isSome(symbol(ctx.source, after, "{"))) {
        const block = yield* jailBlock(ctx, head, after);
        blocks.push(block.value);
        pos = yield* trivia(ctx, block.end);
      } else {
        const param = yield* parameter(ctx, head, after, Scope.TopLevel());
        globals.push(param.value);
        pos = yield* trivia(ctx, param.end);
      }
    }

    return { blocks, globals };
  });

// ============================================================================
// Entry points
// ============================================================================

/**
 * Parse a complete jail.conf text. Never throws: malformed input is a `Left`
 * carrying the first error and its position.
 */
export const parse = (text: string): Either.Either<Document, ParseError> => {
  const ctx: Context = { source: text, comments: [] };
  return Either.map(document(ctx), ({ blocks, globals }) => ({
    blocks,
    globals,
    comments: ctx.comments,
  }));
};

export const parseEffect = (text: string): Effect.Effect<Document, ParseError> =>
  Effect.suspend(() =>
    Either.match(parse(text), {
      onLeft: (error): Effect.Effect<Document, ParseError> => Effect.fail(error),
      onRight: (doc): Effect.Effect<Document, ParseError> => Effect.succeed(doc),
    })
  );

/** Throws the `ParseError` instead of returning it. */
export const parseOrThrow = (text: string): Document => Either.getOrThrowWith(parse(text), identity);
