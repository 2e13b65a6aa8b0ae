// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Cause, Effect, Exit, LogLevel, Logger, Option } from "effect";
import { describe, expect, test } from "vitest";
import { ErrorCode, type ResolveError } from "../../src/lib/errors";
import { earliestMember } from "../../src/roster/resolve";
import { sampleRoster } from "../../src/roster/sample";
import { type Roster, rosterOf } from "../../src/roster/types";

const failureOf = async (roster: Roster): Promise<ResolveError> => {
  const exit = await Effect.runPromiseExit(earliestMember(roster));
  if (Exit.isSuccess(exit)) {
    throw new Error("expected earliestMember to fail");
  }
  return Option.getOrThrow(Cause.failureOption(exit.cause));
};

/** Runs earliestMember at debug level, collecting every log message. */
const debugLinesOf = async (roster: Roster): Promise<readonly string[]> => {
  const lines: string[] = [];
  const collector = Logger.make(({ logLevel, message }) => {
    const text = Array.isArray(message) ? message.map(String).join(" ") : String(message);
    lines.push(`${logLevel.label} ${text}`);
  });
  await Effect.runPromise(
    earliestMember(roster).pipe(
      Logger.withMinimumLogLevel(LogLevel.Debug),
      Effect.provide(Logger.replace(Logger.defaultLogger, collector))
    )
  );
  return lines;
};

describe("earliestMember", () => {
  test("finds andy in the sample roster", async () => {
    expect(await Effect.runPromise(earliestMember(sampleRoster))).toBe("andy");
  });

  test("the seed is replaced by a smaller member of the same band", async () => {
    const roster = rosterOf({ blondie: ["debbie", "chris"] });
    expect(await Effect.runPromise(earliestMember(roster))).toBe("chris");
  });

  test("a later band does not displace a smaller memo", async () => {
    const roster = rosterOf({ the_smiths: ["andy"], the_cramps: ["lux", "ivy"] });
    expect(await Effect.runPromise(earliestMember(roster))).toBe("andy");
  });

  test("ties resolve to the shared name", async () => {
    const roster = rosterOf({ blondie: ["chris"], talking_heads: ["chris", "tina"] });
    expect(await Effect.runPromise(earliestMember(roster))).toBe("chris");
  });

  test("member order within a band does not change the result", async () => {
    const shuffled = rosterOf({
      joy_division: ["stephen", "peter", "ian", "bernard"],
      the_smiths: ["mike", "morrissey", "andy", "johnny"],
      the_cramps: ["nick", "lux", "ivy"],
      blondie: ["nigel", "jimmy", "clem", "chris", "debbie"],
      talking_heads: ["jerry", "chris", "tina", "david"],
    });
    expect(await Effect.runPromise(earliestMember(shuffled))).toBe("andy");
  });

  test("band order does not change the result", async () => {
    const reversed = rosterOf(Object.fromEntries([...sampleRoster].reverse()));
    expect(await Effect.runPromise(earliestMember(reversed))).toBe("andy");
  });

  test("fails with EmptyInputError on an empty roster", async () => {
    const err = await failureOf(rosterOf({}));
    expect(err._tag).toBe("EmptyInputError");
    expect(err.code).toBe(ErrorCode.EMPTY_INPUT);
  });

  test("fails with EmptyMemberListError naming the band", async () => {
    const err = await failureOf(rosterOf({ blondie: ["debbie"], the_cramps: [] }));
    expect(err._tag).toBe("EmptyMemberListError");
    expect(err.code).toBe(ErrorCode.EMPTY_MEMBER_LIST);
    expect(err.message).toBe("Band the_cramps has no members");
  });

  test("logs band, candidate and memo for each step at debug level", async () => {
    expect(await debugLinesOf(sampleRoster)).toEqual([
      "DEBUG joy_division: candidate bernard, memo bernard",
      "DEBUG the_smiths: candidate andy, memo andy",
      "DEBUG the_cramps: candidate ivy, memo andy",
      "DEBUG blondie: candidate chris, memo andy",
      "DEBUG talking_heads: candidate chris, memo andy",
    ]);
  });

  test("does not mutate the roster", async () => {
    const roster = rosterOf({ the_cramps: ["lux", "ivy", "nick"] });
    await Effect.runPromise(earliestMember(roster));
    expect([...roster]).toEqual([["the_cramps", ["lux", "ivy", "nick"]]]);
  });
});
