// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Branded types prevent accidental mixing of same-underlying-type values.
 * `BandName` and `MemberName` are both strings, but the compiler rejects
 * using one where the other is expected.
 */

import { type Brand, Schema } from "effect";

export type BandName = string & Brand.Brand<"BandName">;
export type MemberName = string & Brand.Brand<"MemberName">;

const bandNameEmptyMsg = (): string => "Band name cannot be empty";

export const BandNameSchema: Schema.BrandSchema<BandName, string, never> = Schema.String.pipe(
  Schema.minLength(1, { message: bandNameEmptyMsg }),
  Schema.brand("BandName")
);

export const MemberNameSchema: Schema.BrandSchema<MemberName, string, never> = Schema.String.pipe(
  Schema.brand("MemberName")
);

/** Constructs a BandName, throwing on an empty string. */
export const bandName = (s: string): BandName => Schema.decodeSync(BandNameSchema)(s);

export const memberName = (s: string): MemberName => Schema.decodeSync(MemberNameSchema)(s);
