// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Roster module exports.
 */

// Types
export type { MemberList, Roster, RosterEntry, RosterRecord } from "./types";

// Construction
export { makeRoster, rosterFromEntries, rosterOf } from "./types";
export { sampleRoster } from "./sample";

// Enumerate
export { enumerate, forEachEntry, printRoster } from "./enumerate";
export { renderEntry } from "./render";

// Folds
export { sortMembers } from "./transform";
export { earliestMember } from "./resolve";
