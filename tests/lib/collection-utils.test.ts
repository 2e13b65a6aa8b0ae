// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { describe, expect, test } from "vitest";
import { emptyMap, foldLeft, mapInsert, sortStrings } from "../../src/lib/collection-utils";

describe("collection-utils", () => {
  describe("foldLeft", () => {
    test("threads the accumulator through every item in order", () => {
      const visited = foldLeft(["a", "b", "c"], "", (acc, item) => `${acc}${item}`);
      expect(visited).toBe("abc");
    });

    test("returns the initial value for no items", () => {
      const none: readonly number[] = [];
      expect(foldLeft(none, 7, (acc, n) => acc + n)).toBe(7);
    });

    test("consumes any iterable", () => {
      const set = new Set([1, 2, 3]);
      expect(foldLeft(set, 0, (acc, n) => acc + n)).toBe(6);
    });
  });

  describe("mapInsert", () => {
    test("returns a new map and leaves the original untouched", () => {
      const original = emptyMap<string, number>();
      const next = mapInsert("a", 1)(original);

      expect(original.size).toBe(0);
      expect([...next]).toEqual([["a", 1]]);
    });

    test("appends new keys at the end", () => {
      const map = mapInsert("b", 2)(mapInsert("a", 1)(emptyMap<string, number>()));
      expect([...map.keys()]).toEqual(["a", "b"]);
    });

    test("replacing a value keeps the key's position", () => {
      const map = new Map([
        ["a", 1],
        ["b", 2],
      ]);
      expect([...mapInsert("a", 9)(map)]).toEqual([
        ["a", 9],
        ["b", 2],
      ]);
    });
  });

  describe("sortStrings", () => {
    test("sorts ascending without mutating the input", () => {
      const input = ["lux", "ivy", "nick"];
      expect(sortStrings(input)).toEqual(["ivy", "lux", "nick"]);
      expect(input).toEqual(["lux", "ivy", "nick"]);
    });

    test("orders by code unit, so uppercase sorts first", () => {
      expect(sortStrings(["b", "B", "a"])).toEqual(["B", "a", "b"]);
    });
  });
});
