// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Walkthrough entry point. This is the "imperative shell": the only place
 * the Effect runtime is executed.
 */

import { Cause, Effect, Exit, Option } from "effect";
import { ErrorCode, type RosterEffectError, toExitCode } from "./lib/errors";
import { program } from "./program";

const exitCodeFromExit = (exit: Exit.Exit<number, RosterEffectError>): number =>
  Exit.match(exit, {
    onSuccess: (code): number => code,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => ErrorCode.GENERAL_ERROR,
        onSome: (err): number => toExitCode(err.code),
      }),
  });

/** Typed failures were already logged by the program; only defects are reported here. */
const reportDefect = (exit: Exit.Exit<number, RosterEffectError>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => console.error("Unexpected error:", Cause.pretty(cause)),
        onSome: (): void => undefined,
      }),
  });

async function main(): Promise<never> {
  const exit = await Effect.runPromiseExit(program);
  reportDefect(exit);
  process.exit(exitCodeFromExit(exit));
}

void main();
