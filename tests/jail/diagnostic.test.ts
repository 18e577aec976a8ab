// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either } from "effect";
import { describe, expect, test } from "vitest";
import { formatDiagnostic } from "../../src/jail/diagnostic";
import type { ParseError } from "../../src/jail/errors";
import { parse } from "../../src/jail/parser";

const failure = (text: string): ParseError =>
  Either.getOrThrowWith(Either.flip(parse(text)), () => new Error("expected failure"));

describe("formatDiagnostic", () => {
  test("points a caret at the error column", () => {
    const source = 'j {\n  key = "abc;\n}\n';
    expect(formatDiagnostic(failure(source), source, "jail.conf").split("\n")).toEqual([
      "jail.conf:2:9: error: string literal is missing its closing quote [UnterminatedString]",
      ' 2 |   key = "abc;',
      "   |         ^",
    ]);
  });

  test("keeps tabs so the caret lines up", () => {
    const source = 'j {\n\tkey = "abc;\n}';
    const lines = formatDiagnostic(failure(source), source, "jail.conf").split("\n");
    expect(lines[0]).toBe(
      "jail.conf:2:8: error: string literal is missing its closing quote [UnterminatedString]"
    );
    expect(lines[2]).toBe("   | \t      ^");
  });

  test("defaults the origin and strips carriage returns", () => {
    const source = 'a = "x\r\nb;';
    expect(formatDiagnostic(failure(source), source)).toBe(
      [
        "<input>:1:5: error: string literal is missing its closing quote [UnterminatedString]",
        ' 1 | a = "x',
        "   |     ^",
      ].join("\n")
    );
  });

  test("widens the gutter for multi-digit lines", () => {
    const source = `${"a;\n".repeat(11)}}`;
    expect(formatDiagnostic(failure(source), source).split("\n").slice(1)).toEqual([
      " 12 | }",
      "    | ^",
    ]);
  });
});
