// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { type Roster, rosterOf } from "./types";

/** Built-in roster used when no roster file is configured. */
export const sampleRoster: Roster = rosterOf({
  joy_division: ["ian", "bernard", "peter", "stephen"],
  the_smiths: ["johnny", "andy", "morrissey", "mike"],
  the_cramps: ["lux", "ivy", "nick"],
  blondie: ["debbie", "chris", "clem", "jimmy", "nigel"],
  talking_heads: ["david", "tina", "chris", "jerry"],
});
