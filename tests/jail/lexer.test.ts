// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either, Option } from "effect";
import { describe, expect, test } from "vitest";
import {
  bareValue,
  blockName,
  dottedKey,
  identifier,
  quotedString,
  skipTrivia,
  symbol,
  word,
} from "../../src/jail/lexer";

describe("lexer", () => {
  describe("skipTrivia", () => {
    test("skips whitespace", () => {
      expect(skipTrivia("  \t\n x", 0)).toEqual(Either.right({ value: [], end: 5 }));
    });

    test("stops at the first significant character", () => {
      expect(skipTrivia("abc", 0)).toEqual(Either.right({ value: [], end: 0 }));
    });

    test("drops the carriage return of a CRLF line comment", () => {
      expect(skipTrivia("# a\r\nx", 0)).toEqual(
        Either.right({ value: [{ style: "shell", text: " a", offset: 0 }], end: 5 })
      );
    });

    test("a line comment may end the input", () => {
      expect(skipTrivia("x // tail", 1)).toEqual(
        Either.right({ value: [{ style: "cpp", text: " tail", offset: 2 }], end: 9 })
      );
    });

    test("fails on an unterminated block comment", () => {
      const result = skipTrivia("/* a */ /* b", 0);
      expect(Either.isLeft(result)).toBe(true);
      const err = Either.getOrThrowWith(Either.flip(result), () => new Error("expected failure"));
      expect(err.kind).toBe("UnterminatedComment");
      expect(err.position.offset).toBe(8);
    });
  });

  describe("symbol", () => {
    test("returns the offset past the symbol", () => {
      expect(symbol("+=x", 0, "+=")).toEqual(Option.some(2));
      expect(symbol("a;", 1, ";")).toEqual(Option.some(2));
    });

    test("returns none when absent", () => {
      expect(symbol("=", 0, ";")).toEqual(Option.none());
      expect(symbol("", 0, "}")).toEqual(Option.none());
    });
  });

  describe("word", () => {
    test("stops before an append operator", () => {
      expect(word("ip4.addr+=x", 0)).toEqual({ value: "ip4.addr", end: 8 });
    });

    test("stops before = and quotes", () => {
      expect(word('key="v"', 0)).toEqual({ value: "key", end: 3 });
    });

    test("stops before a comment opener", () => {
      expect(word("key#x", 0)).toEqual({ value: "key", end: 3 });
      expect(word("a//b", 0)).toEqual({ value: "a", end: 1 });
      expect(word("j/* c */", 0)).toEqual({ value: "j", end: 1 });
    });

    test("keeps a single slash", () => {
      expect(word("a/b;", 0)).toEqual({ value: "a/b", end: 3 });
    });

    test("is empty at a break character", () => {
      expect(word(";", 0)).toEqual({ value: "", end: 0 });
    });
  });

  describe("identifier", () => {
    test("reads one segment", () => {
      expect(identifier("abc.d", 0)).toEqual(Option.some({ value: "abc", end: 3 }));
    });

    test("returns none without identifier characters", () => {
      expect(identifier(".x", 0)).toEqual(Option.none());
    });
  });

  describe("dottedKey", () => {
    test("accepts identifiers joined by dots", () => {
      expect(dottedKey("a.b_c.d1;", 0, "a.b_c.d1")).toEqual(Either.right("a.b_c.d1"));
    });

    test("rejects a trailing dot", () => {
      const err = Either.getOrThrowWith(
        Either.flip(dottedKey("a. = 1;", 0, "a.")),
        () => new Error("expected failure")
      );
      expect(err.kind).toBe("InvalidKey");
      expect(err.message).toBe('invalid key "a.": empty segment');
      expect(err.position.offset).toBe(2);
    });

    test("rejects a leading dot", () => {
      const err = Either.getOrThrowWith(
        Either.flip(dottedKey("x .a;", 2, ".a")),
        () => new Error("expected failure")
      );
      expect(err.position.offset).toBe(2);
    });

    test("names the illegal character", () => {
      const err = Either.getOrThrowWith(
        Either.flip(dottedKey("a$b;", 0, "a$b")),
        () => new Error("expected failure")
      );
      expect(err.message).toBe('invalid key "a$b": illegal character "$"');
      expect(err.position.offset).toBe(1);
    });
  });

  describe("blockName", () => {
    test("accepts names with dashes and the wildcard", () => {
      expect(blockName("ioc-test-jail {", 0, "ioc-test-jail")).toEqual(
        Either.right("ioc-test-jail")
      );
      expect(blockName("* {", 0, "*")).toEqual(Either.right("*"));
    });

    test("rejects dots", () => {
      const err = Either.getOrThrowWith(
        Either.flip(blockName("a.b {", 0, "a.b")),
        () => new Error("expected failure")
      );
      expect(err.kind).toBe("InvalidBlockName");
      expect(err.message).toBe('invalid block name "a.b"');
    });

    test("reports a missing name", () => {
      const err = Either.getOrThrowWith(
        Either.flip(blockName("{", 0, "")),
        () => new Error("expected failure")
      );
      expect(err.message).toBe('missing block name before "{"');
    });
  });

  describe("quotedString", () => {
    test("decodes an escaped quote", () => {
      expect(quotedString('"a\\"b";', 0)).toEqual(Either.right({ value: 'a"b', end: 6 }));
    });

    test("keeps unknown escapes verbatim", () => {
      expect(quotedString('"a\\tb"', 0)).toEqual(Either.right({ value: "a\\tb", end: 6 }));
    });

    test("fails at the opening quote when unterminated", () => {
      const err = Either.getOrThrowWith(
        Either.flip(quotedString('x = "abc', 4)),
        () => new Error("expected failure")
      );
      expect(err.kind).toBe("UnterminatedString");
      expect(err.position.offset).toBe(4);
    });
  });

  describe("bareValue", () => {
    test("runs up to the terminator", () => {
      expect(bareValue("lo1|127.0.0.1/32;", 0)).toEqual({ value: "lo1|127.0.0.1/32", end: 16 });
    });

    test("stops at whitespace and braces", () => {
      expect(bareValue("abc }", 0)).toEqual({ value: "abc", end: 3 });
      expect(bareValue("abc}", 0)).toEqual({ value: "abc", end: 3 });
    });
  });
});
