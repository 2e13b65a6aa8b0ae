// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * rosterfold - enumerate, transform and resolve folds over an ordered roster.
 */

// Roster
export type { MemberList, Roster, RosterEntry, RosterRecord } from "./roster";
export {
  earliestMember,
  enumerate,
  forEachEntry,
  makeRoster,
  printRoster,
  renderEntry,
  rosterFromEntries,
  rosterOf,
  sampleRoster,
  sortMembers,
} from "./roster";

// Primitives
export type { BandName, MemberName } from "./lib/types";
export { BandNameSchema, MemberNameSchema, bandName, memberName } from "./lib/types";
export { emptyMap, foldLeft, mapInsert, sortStrings } from "./lib/collection-utils";

// Errors
export type { ErrorCodeValue, ResolveError, RosterEffectError } from "./lib/errors";
export {
  ConfigError,
  EmptyInputError,
  EmptyMemberListError,
  ErrorCode,
  InvalidInputError,
  SystemError,
  toExitCode,
} from "./lib/errors";

// Config & logging
export type { EnvConfig } from "./config/env";
export { EnvConfigSpec, createTestConfigProvider, loadEnvConfig } from "./config/env";
export { loadRosterFile } from "./config/loader";
export { RosterLoggerLive } from "./lib/effect-logger";

// Walkthrough
export { program, walkthrough } from "./program";
