// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Effect, Either, ParseResult, Schema } from "effect";
import { ErrorCode, InvalidInputError } from "./errors";

/** Renders a parse error as the indented tree Effect's formatter produces. */
export const formatParseError = (error: ParseResult.ParseError): string =>
  ParseResult.TreeFormatter.formatErrorSync(error);

/**
 * Decode unknown data synchronously, throwing on error.
 * Use only when input is known valid (e.g., a literal in source).
 */
export const decodeUnsafe = <A, I = A>(schema: Schema.Schema<A, I, never>, data: unknown): A =>
  Schema.decodeUnknownSync(schema)(data);

/**
 * Decode unknown data with a schema, returning Effect.
 * Failures become InvalidInputError carrying the formatted parse tree.
 */
export const decodeToEffect = <A, I = A>(
  schema: Schema.Schema<A, I, never>,
  data: unknown,
  context: string
): Effect.Effect<A, InvalidInputError> =>
  Either.match(Schema.decodeUnknownEither(schema)(data), {
    onLeft: (error): Effect.Effect<A, InvalidInputError> =>
      Effect.fail(
        new InvalidInputError({
          code: ErrorCode.INVALID_INPUT,
          message: `Invalid ${context}:\n${formatParseError(error)}`,
        })
      ),
    onRight: (value): Effect.Effect<A, InvalidInputError> => Effect.succeed(value),
  });
