// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Earliest member across a roster. The memo is seeded with the first member
 * of the first band as listed, then each band's smallest member replaces it
 * when it sorts at or before the memo.
 */

import { Array as Arr, Effect, Option, Order, pipe } from "effect";
import {
  EmptyInputError,
  EmptyMemberListError,
  ErrorCode,
  type ResolveError,
} from "../lib/errors";
import type { MemberName } from "../lib/types";
import { enumerate } from "./enumerate";
import type { Roster, RosterEntry } from "./types";

const atOrBefore: (self: string, that: string) => boolean = Order.lessThanOrEqualTo(Order.string);

const requireMembers = (
  entry: RosterEntry
): Effect.Effect<Arr.NonEmptyReadonlyArray<MemberName>, EmptyMemberListError> =>
  Arr.isNonEmptyReadonlyArray(entry.value)
    ? Effect.succeed(entry.value)
    : Effect.fail(
        new EmptyMemberListError({
          code: ErrorCode.EMPTY_MEMBER_LIST,
          message: `Band ${entry.key} has no members`,
          band: entry.key,
        })
      );

const resolveStep = (
  memo: Option.Option<MemberName>,
  entry: RosterEntry
): Effect.Effect<Option.Option<MemberName>, EmptyMemberListError> =>
  Effect.gen(function* () {
    const members = yield* requireMembers(entry);
    const seeded = Option.getOrElse(memo, () => Arr.headNonEmpty(members));
    const candidate = Arr.headNonEmpty(Arr.sort(members, Order.string));
    const next = atOrBefore(candidate, seeded) ? candidate : seeded;
    yield* Effect.logDebug(`${entry.key}: candidate ${candidate}, memo ${next}`);
    return Option.some(next);
  });

/**
 * Lexicographically smallest member name across all bands.
 * Fails on an empty roster or on a band without members.
 */
export const earliestMember = (roster: Roster): Effect.Effect<MemberName, ResolveError> =>
  pipe(
    Effect.reduce(enumerate(roster), Option.none<MemberName>(), resolveStep),
    Effect.flatMap(
      Option.match({
        onNone: (): Effect.Effect<MemberName, EmptyInputError> =>
          Effect.fail(
            new EmptyInputError({
              code: ErrorCode.EMPTY_INPUT,
              message: "Cannot resolve the earliest member of an empty roster",
            })
          ),
        onSome: (name: MemberName): Effect.Effect<MemberName, EmptyInputError> =>
          Effect.succeed(name),
      })
    )
  );
