// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import type { RosterEntry } from "./types";

const quote = (s: string): string => JSON.stringify(s);

const renderList = (items: readonly string[]): string => `[${items.map(quote).join(", ")}]`;

/**
 * Debug notation for one entry: `["the_cramps", ["lux", "ivy", "nick"]]`.
 */
export const renderEntry = ({ key, value }: RosterEntry): string =>
  `[${quote(key)}, ${renderList(value)}]`;
