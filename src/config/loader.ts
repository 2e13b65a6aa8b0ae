// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Roster file loading with fail-fast validation. The file is parsed and
 * validated in a single pass; syntax errors and bad roster shapes are
 * reported with the file path.
 *
 * TOML:
 * ```toml
 * [bands]
 * the_cramps = ["lux", "ivy", "nick"]
 * ```
 *
 * JSON: `{ "bands": { "the_cramps": ["lux", "ivy", "nick"] } }`, or
 * `{ "bands": [["the_cramps", ["lux", "ivy", "nick"]]] }` to pin the order.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { Effect, Match, Option, pipe } from "effect";
import { parse as parseToml } from "smol-toml";
import {
  ConfigError,
  ErrorCode,
  type InvalidInputError,
  SystemError,
  errorMessage,
} from "../lib/errors";
import { type Roster, makeRoster } from "../roster/types";
import { ROSTER_FILE_EXTENSIONS, type RosterFileExtension } from "./field-values";

const isRosterFileExtension = (ext: string): ext is RosterFileExtension =>
  ROSTER_FILE_EXTENSIONS.some((known) => known === ext);

const isNotFound = (e: unknown): boolean =>
  e instanceof Error && "code" in e && e.code === "ENOENT";

const fileFormat = (filePath: string): Effect.Effect<RosterFileExtension, ConfigError> => {
  const ext = extname(filePath).toLowerCase();
  return isRosterFileExtension(ext)
    ? Effect.succeed(ext)
    : Effect.fail(
        new ConfigError({
          code: ErrorCode.CONFIG_PARSE_ERROR,
          message: `Unsupported roster file type '${ext}' for ${filePath} (expected ${ROSTER_FILE_EXTENSIONS.join(" or ")})`,
          path: filePath,
        })
      );
};

const readText = (filePath: string): Effect.Effect<string, ConfigError | SystemError> =>
  Effect.tryPromise({
    try: (): Promise<string> => readFile(filePath, "utf8"),
    catch: (e): ConfigError | SystemError =>
      isNotFound(e)
        ? new ConfigError({
            code: ErrorCode.CONFIG_NOT_FOUND,
            message: `Roster file not found: ${filePath}`,
            path: filePath,
          })
        : new SystemError({
            code: ErrorCode.FILE_READ_FAILED,
            message: `Failed to read ${filePath}: ${errorMessage(e)}`,
            ...(e instanceof Error ? { cause: e } : {}),
          }),
  });

const parseDocument = (
  format: RosterFileExtension,
  content: string,
  filePath: string
): Effect.Effect<unknown, ConfigError> =>
  Effect.try({
    try: (): unknown =>
      pipe(
        Match.value(format),
        Match.when(".toml", (): unknown => parseToml(content)),
        Match.when(".json", (): unknown => JSON.parse(content)),
        Match.exhaustive
      ),
    catch: (e): ConfigError =>
      new ConfigError({
        code: ErrorCode.CONFIG_PARSE_ERROR,
        message: `Failed to parse ${filePath}: ${errorMessage(e)}`,
        path: filePath,
        ...(e instanceof Error ? { cause: e } : {}),
      }),
  });

const bandsTable = (document: unknown, filePath: string): Effect.Effect<unknown, ConfigError> =>
  pipe(
    Option.liftPredicate(
      document,
      (d: unknown): d is { readonly bands: unknown } =>
        typeof d === "object" && d !== null && "bands" in d
    ),
    Option.match({
      onNone: (): Effect.Effect<unknown, ConfigError> =>
        Effect.fail(
          new ConfigError({
            code: ErrorCode.CONFIG_VALIDATION_ERROR,
            message: `Roster file ${filePath} has no 'bands' table`,
            path: filePath,
          })
        ),
      onSome: (d): Effect.Effect<unknown, ConfigError> => Effect.succeed(d.bands),
    })
  );

/** Loads and validates a `.toml` or `.json` roster file. */
export const loadRosterFile = (
  filePath: string
): Effect.Effect<Roster, ConfigError | SystemError | InvalidInputError> =>
  Effect.gen(function* () {
    const format = yield* fileFormat(filePath);
    const content = yield* readText(filePath);
    const document = yield* parseDocument(format, content, filePath);
    const bands = yield* bandsTable(document, filePath);
    const roster = yield* makeRoster(bands);
    yield* Effect.logDebug(`Loaded ${roster.size} bands from ${filePath}`);
    return roster;
  });
