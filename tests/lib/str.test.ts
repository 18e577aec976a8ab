// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { isBlockNameChar } from "../../src/lib/char";
import { all, chars, plural } from "../../src/lib/str";

describe("str module", () => {
  describe("chars", () => {
    test("splits string into characters", () => {
      expect(chars("abc")).toEqual(["a", "b", "c"]);
    });

    test("returns empty array for empty string", () => {
      expect(chars("")).toEqual([]);
    });

    test("keeps surrogate pairs together", () => {
      expect(chars("a\u{1F600}b")).toEqual(["a", "\u{1F600}", "b"]);
    });
  });

  describe("all", () => {
    test("checks every character", () => {
      expect(all(isBlockNameChar)("ioc-test-jail")).toBe(true);
      expect(all(isBlockNameChar)("a.b")).toBe(false);
    });

    test("is vacuously true for the empty string", () => {
      expect(all(isBlockNameChar)("")).toBe(true);
    });
  });

  test("plural", () => {
    expect(plural(0, "parameter")).toBe("0 parameters");
    expect(plural(1, "parameter")).toBe("1 parameter");
    expect(plural(2, "jail")).toBe("2 jails");
  });
});
