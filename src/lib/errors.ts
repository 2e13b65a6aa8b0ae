// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Error handling infrastructure for rosterfold.
 * Tagged errors carry typed codes that map to exit codes.
 */

import { Data } from "effect";

/**
 * Error code interface for isolatedDeclarations compatibility.
 */
interface ErrorCodeMap {
  // General (0-9)
  readonly SUCCESS: 0;
  readonly GENERAL_ERROR: 1;
  readonly INVALID_INPUT: 2;
  readonly EMPTY_INPUT: 3;
  readonly EMPTY_MEMBER_LIST: 4;

  // Config (10-19)
  readonly CONFIG_NOT_FOUND: 10;
  readonly CONFIG_PARSE_ERROR: 11;
  readonly CONFIG_VALIDATION_ERROR: 12;

  // System (20-29)
  readonly FILE_READ_FAILED: 20;
}

/**
 * Error codes for all rosterfold operations.
 * Organized by category for easy identification.
 */
export const ErrorCode: ErrorCodeMap = {
  // General (0-9)
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_INPUT: 2,
  EMPTY_INPUT: 3,
  EMPTY_MEMBER_LIST: 4,

  // Config (10-19)
  CONFIG_NOT_FOUND: 10,
  CONFIG_PARSE_ERROR: 11,
  CONFIG_VALIDATION_ERROR: 12,

  // System (20-29)
  FILE_READ_FAILED: 20,
};

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

type ConfigErrorCode =
  | ErrorCodeMap["CONFIG_NOT_FOUND"]
  | ErrorCodeMap["CONFIG_PARSE_ERROR"]
  | ErrorCodeMap["CONFIG_VALIDATION_ERROR"];

/** Roster input was not an ordered mapping of band names to string lists. */
export class InvalidInputError extends Data.TaggedError("InvalidInputError")<{
  readonly code: ErrorCodeMap["INVALID_INPUT"];
  readonly message: string;
}> {}

export class EmptyInputError extends Data.TaggedError("EmptyInputError")<{
  readonly code: ErrorCodeMap["EMPTY_INPUT"];
  readonly message: string;
}> {}

export class EmptyMemberListError extends Data.TaggedError("EmptyMemberListError")<{
  readonly code: ErrorCodeMap["EMPTY_MEMBER_LIST"];
  readonly message: string;
  readonly band: string;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly code: ConfigErrorCode;
  readonly message: string;
  readonly path?: string;
  readonly cause?: Error;
}> {}

export class SystemError extends Data.TaggedError("SystemError")<{
  readonly code: ErrorCodeMap["FILE_READ_FAILED"];
  readonly message: string;
  readonly cause?: Error;
}> {}

/** Failures that can reach the walkthrough shell. */
export type RosterEffectError =
  | InvalidInputError
  | EmptyInputError
  | EmptyMemberListError
  | ConfigError
  | SystemError;

/** Failures of the resolve fold. */
export type ResolveError = EmptyInputError | EmptyMemberListError;

/**
 * Convert error code to process exit code.
 * Exit codes are capped at 125 (POSIX convention).
 */
export const toExitCode = (code: ErrorCodeValue): number => Math.min(code, 125);

/**
 * Get human-readable error code name.
 */
export const getErrorCodeName = (code: number): string => {
  const entry = Object.entries(ErrorCode).find(([, v]) => v === code);
  return entry?.[0] ?? "UNKNOWN";
};

/**
 * Extract error message from unknown value.
 */
export const errorMessage = (e: unknown): string => {
  if (e instanceof Error) {
    return e.message;
  }
  if (typeof e === "string") {
    return e;
  }
  return String(e);
};
