// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * The walkthrough: enumerate a roster, print it with sorted member lists,
 * then resolve the earliest member. Configuration comes from ROSTER_*
 * environment variables; see config/env.ts.
 */

import { Effect, Option, pipe } from "effect";
import { type EnvConfig, effectiveLogLevel, loadEnvConfig } from "./config/env";
import { LOG_FORMAT_DEFAULT, LOG_LEVEL_DEFAULT } from "./config/field-values";
import { loadRosterFile } from "./config/loader";
import { RosterLoggerLive } from "./lib/effect-logger";
import {
  type ConfigError,
  ErrorCode,
  type InvalidInputError,
  type ResolveError,
  type RosterEffectError,
  type SystemError,
  getErrorCodeName,
} from "./lib/errors";
import { createStepCounter, logFail, logSuccess, writeOutput } from "./lib/log";
import type { MemberName } from "./lib/types";
import { printRoster } from "./roster/enumerate";
import { earliestMember } from "./roster/resolve";
import { sampleRoster } from "./roster/sample";
import { sortMembers } from "./roster/transform";
import type { Roster } from "./roster/types";

const WALKTHROUGH_STEPS = 3;

const bandCount = (n: number): string => `${n} ${n === 1 ? "band" : "bands"}`;

/** Prints the enumeration, the sorted roster and the earliest member. */
export const walkthrough = (roster: Roster): Effect.Effect<MemberName, ResolveError> =>
  Effect.gen(function* () {
    const steps = yield* createStepCounter(WALKTHROUGH_STEPS);

    yield* steps.next("Enumerating roster");
    yield* printRoster(roster);

    yield* steps.next("Sorting member lists");
    yield* printRoster(sortMembers(roster));

    yield* steps.next("Resolving earliest member");
    const earliest = yield* earliestMember(roster);
    yield* writeOutput(`earliest member: ${earliest}`);

    yield* logSuccess(`Resolved earliest member across ${bandCount(roster.size)}`);
    return earliest;
  });

const loadRoster = (
  env: EnvConfig
): Effect.Effect<Roster, ConfigError | SystemError | InvalidInputError> =>
  Option.match(env.rosterFile, {
    onNone: (): Effect.Effect<Roster, never> => Effect.succeed(sampleRoster),
    onSome: (path): Effect.Effect<Roster, ConfigError | SystemError | InvalidInputError> =>
      loadRosterFile(path),
  });

const reportFailure = (err: RosterEffectError): Effect.Effect<void> =>
  logFail(err.message).pipe(Effect.annotateLogs("code", getErrorCodeName(err.code)));

/** Env config is read before the configured logger exists, so its failure uses defaults. */
const readEnv: Effect.Effect<EnvConfig, ConfigError> = pipe(
  loadEnvConfig,
  Effect.tapError((err) =>
    pipe(
      reportFailure(err),
      Effect.provide(RosterLoggerLive({ level: LOG_LEVEL_DEFAULT, format: LOG_FORMAT_DEFAULT }))
    )
  )
);

/** Resolves to the process exit code; failures are logged before they propagate. */
export const program: Effect.Effect<number, RosterEffectError> = Effect.gen(function* () {
  const env = yield* readEnv;
  yield* pipe(
    loadRoster(env),
    Effect.flatMap(walkthrough),
    Effect.annotateLogs("service", "rosterfold"),
    Effect.withLogSpan("walkthrough"),
    Effect.tapError(reportFailure),
    Effect.provide(RosterLoggerLive({ level: effectiveLogLevel(env), format: env.logging.format }))
  );
  return ErrorCode.SUCCESS;
});
