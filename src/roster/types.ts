// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Roster types. A Roster maps each band to its members; insertion order is
 * the order bands were declared in and drives enumeration output. Rosters
 * are persistent: every operation returns a new map.
 */

import { Effect, Match, Schema, pipe } from "effect";
import type { InvalidInputError } from "../lib/errors";
import { decodeToEffect, decodeUnsafe } from "../lib/schema-utils";
import { type BandName, BandNameSchema, type MemberName, MemberNameSchema } from "../lib/types";

export type MemberList = readonly MemberName[];

export type Roster = ReadonlyMap<BandName, MemberList>;

/** One band with its members, as visited during enumeration. */
export interface RosterEntry {
  readonly key: BandName;
  readonly value: MemberList;
}

/** Plain-object literal form accepted by {@link rosterOf}. */
export type RosterRecord = Readonly<Record<string, readonly string[]>>;

const duplicateBandMsg = (): string => "Band names must be unique";

const MemberListSchema = Schema.Array(MemberNameSchema);

const RosterTuplesSchema = Schema.Array(Schema.Tuple(BandNameSchema, MemberListSchema)).pipe(
  Schema.filter((tuples) => new Set(tuples.map(([band]) => band)).size === tuples.length, {
    message: duplicateBandMsg,
  })
);

const isMap = (v: unknown): v is ReadonlyMap<unknown, unknown> => v instanceof Map;
const isArray = (v: unknown): v is readonly unknown[] => Array.isArray(v);
/** Object literals and `Object.create(null)` records; class instances such as Set or Date are not. */
const isPlainObject = (v: unknown): v is object => {
  if (typeof v !== "object" || v === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
};

/**
 * Normalizes the accepted input shapes to `[band, members]` tuples so one
 * schema validates them all. Object keys keep their own enumeration order,
 * which puts integer-like keys first; use tuples when that matters.
 */
const toEntryTuples = (input: unknown): unknown =>
  pipe(
    Match.value(input),
    Match.when(isMap, (m): unknown => Array.from(m)),
    Match.when(isArray, (a): unknown => a),
    Match.when(isPlainObject, (o): unknown => Object.entries(o)),
    Match.orElse((v): unknown => v)
  );

const fromTuples = (tuples: readonly (readonly [BandName, MemberList])[]): Roster =>
  new Map(tuples);

/**
 * Validates and builds a Roster from a plain object, a Map or an array of
 * `[band, members]` tuples.
 */
export const makeRoster = (input: unknown): Effect.Effect<Roster, InvalidInputError> =>
  pipe(decodeToEffect(RosterTuplesSchema, toEntryTuples(input), "roster"), Effect.map(fromTuples));

/** Synchronous construction for literals known to be valid. Throws on invalid input. */
export const rosterOf = (record: RosterRecord): Roster =>
  fromTuples(decodeUnsafe(RosterTuplesSchema, toEntryTuples(record)));

/** Builds a Roster from already-typed entries; later duplicates replace earlier values. */
export const rosterFromEntries = (entries: Iterable<RosterEntry>): Roster =>
  new Map(Array.from(entries, ({ key, value }): readonly [BandName, MemberList] => [key, value]));
