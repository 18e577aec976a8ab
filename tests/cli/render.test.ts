// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Either } from "effect";
import { describe, expect, test } from "vitest";
import {
  renderDocument,
  renderJson,
  renderParseErrorJson,
  renderPretty,
  toJson,
} from "../../src/cli/render";
import { parse, parseOrThrow } from "../../src/jail/parser";

const doc = parseOrThrow(
  'exec.clean;\nweb { ip4.addr += "lo1|127.0.1.1/32"; host.hostname = "web"; persist; }\n'
);

describe("render", () => {
  describe("renderPretty", () => {
    test("lists globals then each block", () => {
      expect(renderPretty(doc)).toBe(
        [
          "globals (1 parameter)",
          "  flag exec.clean",
          "",
          "jail web (3 parameters)",
          '  append ip4.addr "lo1|127.0.1.1/32"',
          '  set host.hostname "web"',
          "  flag persist",
        ].join("\n")
      );
    });

    test("shows empty blocks", () => {
      expect(renderPretty(parseOrThrow("e { }"))).toBe("jail e (0 parameters)");
    });

    test("reports an empty document", () => {
      expect(renderPretty(parseOrThrow("# nothing\n"))).toBe("no jail definitions");
    });

    test("quotes values that contain quotes", () => {
      expect(renderPretty(parseOrThrow('j { a = "x\\"y"; }'))).toBe(
        'jail j (1 parameter)\n  set a "x\\"y"'
      );
    });
  });

  describe("toJson", () => {
    test("describes each parameter by key, operator and values", () => {
      expect(toJson(doc)).toEqual({
        globals: [{ key: "exec.clean", operator: "Presence", values: [] }],
        blocks: [
          {
            name: "web",
            parameters: [
              { key: "ip4.addr", operator: "Append", values: ["lo1|127.0.1.1/32"] },
              { key: "host.hostname", operator: "Set", values: ["web"] },
              { key: "persist", operator: "Presence", values: [] },
            ],
          },
        ],
        comments: [],
      });
    });

    test("renderJson is the indented form of toJson", () => {
      expect(renderJson(doc)).toBe(JSON.stringify(toJson(doc), null, 2));
      expect(renderDocument(doc, "json")).toBe(renderJson(doc));
      expect(renderDocument(doc, "pretty")).toBe(renderPretty(doc));
    });
  });

  test("renderParseErrorJson", () => {
    const err = Either.getOrThrowWith(Either.flip(parse("}")), () => new Error("expected failure"));
    expect(JSON.parse(renderParseErrorJson(err, "x.conf"))).toEqual({
      error: 'unexpected "}" outside of a block',
      code: 11,
      kind: "UnexpectedToken",
      origin: "x.conf",
      line: 1,
      column: 1,
      offset: 0,
    });
  });
});
