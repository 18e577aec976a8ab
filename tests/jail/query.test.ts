// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Option } from "effect";
import { describe, expect, test } from "vitest";
import { parseOrThrow } from "../../src/jail/parser";
import {
  blockNames,
  collectValues,
  defaultBlocks,
  findBlock,
  findBlocks,
  hasFlag,
  parametersByKey,
} from "../../src/jail/query";
import { type JailBlock, isWildcard, operatorOf } from "../../src/jail/types";

const doc = parseOrThrow(`
exec.clean;
* { persist; }
web {
  ip4.addr = "a";
  ip4.addr += "b";
  ip4.addr += "c";
  allow.raw_sockets;
}
db {
  ip4.addr += "x";
  ip4.addr = "y";
  ip4.addr += "z";
}
web { host.hostname = "second"; }
`);

const paramsOf = (name: string): JailBlock["parameters"] =>
  Option.match(findBlock(doc, name), {
    onNone: (): JailBlock["parameters"] => [],
    onSome: (block): JailBlock["parameters"] => block.parameters,
  });

describe("query", () => {
  test("blockNames lists every block in order", () => {
    expect(blockNames(doc)).toEqual(["*", "web", "db", "web"]);
  });

  test("findBlocks returns every block with the name", () => {
    const webs = findBlocks(doc, "web");
    expect(webs).toHaveLength(2);
    expect(webs[1]?.parameters).toHaveLength(1);
  });

  test("findBlock returns the first match", () => {
    expect(Option.map(findBlock(doc, "web"), (b) => b.parameters.length)).toEqual(
      Option.some(4)
    );
    expect(Option.isNone(findBlock(doc, "mail"))).toBe(true);
  });

  test("defaultBlocks returns the wildcard blocks", () => {
    const defaults = defaultBlocks(doc);
    expect(defaults).toHaveLength(1);
    expect(defaults.every(isWildcard)).toBe(true);
  });

  test("parametersByKey keeps statement order", () => {
    expect(parametersByKey(paramsOf("web"), "ip4.addr").map(operatorOf)).toEqual([
      "Set",
      "Append",
      "Append",
    ]);
  });

  describe("collectValues", () => {
    test("appends after a set", () => {
      expect(collectValues(paramsOf("web"), "ip4.addr")).toEqual(Option.some(["a", "b", "c"]));
    });

    test("a set discards what was appended before it", () => {
      expect(collectValues(paramsOf("db"), "ip4.addr")).toEqual(Option.some(["y", "z"]));
    });

    test("a flag contributes no values", () => {
      expect(collectValues(paramsOf("web"), "allow.raw_sockets")).toEqual(Option.some([]));
    });

    test("is none for an absent key", () => {
      expect(Option.isNone(collectValues(paramsOf("web"), "missing"))).toBe(true);
    });

    test("works on globals", () => {
      expect(collectValues(doc.globals, "exec.clean")).toEqual(Option.some([]));
    });
  });

  test("hasFlag only matches presence statements", () => {
    expect(hasFlag(paramsOf("web"), "allow.raw_sockets")).toBe(true);
    expect(hasFlag(paramsOf("web"), "ip4.addr")).toBe(false);
    expect(hasFlag(paramsOf("*"), "persist")).toBe(true);
  });
});
