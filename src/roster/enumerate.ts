// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Roster enumeration. Entries are produced lazily in insertion order, one
 * named record per band; actions run once per entry, in order.
 */

import { Effect } from "effect";
import { writeOutput } from "../lib/log";
import { renderEntry } from "./render";
import type { Roster, RosterEntry } from "./types";

/** Lazily yields every entry of the roster in insertion order. */
export function* enumerate(roster: Roster): Generator<RosterEntry, void, undefined> {
  for (const [key, value] of roster) {
    yield { key, value };
  }
}

/** Runs `action` for each entry sequentially. Stops at the first failure. */
export const forEachEntry = <E, R>(
  roster: Roster,
  action: (entry: RosterEntry) => Effect.Effect<void, E, R>
): Effect.Effect<void, E, R> =>
  Effect.forEach(enumerate(roster), (entry) => action(entry), { discard: true });

/** Prints one `[key, members]` line per entry to stdout. */
export const printRoster = (roster: Roster): Effect.Effect<void> =>
  forEachEntry(roster, (entry) => writeOutput(renderEntry(entry)));
