// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Cause, Effect, Exit, Option } from "effect";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { loadRosterFile } from "../../src/config/loader";
import { ErrorCode, type RosterEffectError } from "../../src/lib/errors";

let testDir = "";

const fixture = async (name: string, content: string): Promise<string> => {
  const path = join(testDir, name);
  await writeFile(path, content, "utf8");
  return path;
};

const failureOf = async (path: string): Promise<RosterEffectError> => {
  const exit = await Effect.runPromiseExit(loadRosterFile(path));
  if (Exit.isSuccess(exit)) {
    throw new Error(`expected loading ${path} to fail`);
  }
  return Option.getOrThrow(Cause.failureOption(exit.cause));
};

describe("loadRosterFile", () => {
  beforeAll(async () => {
    testDir = await mkdtemp(join(tmpdir(), "rosterfold-loader-"));
  });

  afterAll(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  test("loads a TOML [bands] table in file order", async () => {
    const path = await fixture(
      "bands.toml",
      `
[bands]
the_cramps = ["lux", "ivy", "nick"]
blondie = ["debbie", "chris"]
`
    );
    const roster = await Effect.runPromise(loadRosterFile(path));
    expect([...roster]).toEqual([
      ["the_cramps", ["lux", "ivy", "nick"]],
      ["blondie", ["debbie", "chris"]],
    ]);
  });

  test("loads a JSON object", async () => {
    const path = await fixture(
      "bands.json",
      JSON.stringify({ bands: { talking_heads: ["david", "tina"], blondie: ["clem"] } })
    );
    const roster = await Effect.runPromise(loadRosterFile(path));
    expect([...roster.keys()]).toEqual(["talking_heads", "blondie"]);
  });

  test("loads JSON tuples", async () => {
    const path = await fixture(
      "tuples.json",
      JSON.stringify({ bands: [["2001", ["a"]], ["1999", ["b"]]] })
    );
    const roster = await Effect.runPromise(loadRosterFile(path));
    expect([...roster.keys()]).toEqual(["2001", "1999"]);
  });

  test("reports a missing file as CONFIG_NOT_FOUND", async () => {
    const err = await failureOf(join(testDir, "missing.toml"));
    expect(err._tag).toBe("ConfigError");
    expect(err.code).toBe(ErrorCode.CONFIG_NOT_FOUND);
  });

  test("rejects unsupported extensions", async () => {
    const err = await failureOf(join(testDir, "bands.yaml"));
    expect(err._tag).toBe("ConfigError");
    expect(err.code).toBe(ErrorCode.CONFIG_PARSE_ERROR);
    expect(err.message).toContain("Unsupported roster file type '.yaml'");
  });

  test("reports malformed TOML as CONFIG_PARSE_ERROR", async () => {
    const path = await fixture("bad.toml", "this is not valid toml [[[");
    const err = await failureOf(path);
    expect(err.code).toBe(ErrorCode.CONFIG_PARSE_ERROR);
  });

  test("reports malformed JSON as CONFIG_PARSE_ERROR", async () => {
    const path = await fixture("bad.json", "{ bands: ");
    const err = await failureOf(path);
    expect(err.code).toBe(ErrorCode.CONFIG_PARSE_ERROR);
  });

  test("requires a bands table", async () => {
    const path = await fixture("nobands.toml", 'title = "mixtape"\n');
    const err = await failureOf(path);
    expect(err._tag).toBe("ConfigError");
    expect(err.code).toBe(ErrorCode.CONFIG_VALIDATION_ERROR);
  });

  test("rejects invalid member lists as InvalidInputError", async () => {
    const path = await fixture("numbers.json", JSON.stringify({ bands: { blondie: [1, 2] } }));
    const err = await failureOf(path);
    expect(err._tag).toBe("InvalidInputError");
    expect(err.code).toBe(ErrorCode.INVALID_INPUT);
  });
});
