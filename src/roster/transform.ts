// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { emptyMap, foldLeft, mapInsert, sortStrings } from "../lib/collection-utils";
import type { BandName } from "../lib/types";
import { enumerate } from "./enumerate";
import type { MemberList, Roster, RosterEntry } from "./types";

const insertSorted = (acc: Roster, { key, value }: RosterEntry): Roster =>
  mapInsert<BandName, MemberList>(key, sortStrings(value))(acc);

/**
 * Same bands in the same order, each member list sorted ascending.
 * The input roster and its lists are left untouched.
 */
export const sortMembers = (roster: Roster): Roster =>
  foldLeft(enumerate(roster), emptyMap<BandName, MemberList>(), insertSorted);
