// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Functional collection operations. ReadonlyMap/ReadonlyArray operations
 * are persistent (always return new collections).
 */

import { Array as Arr, Order } from "effect";

// ============================================================================
// Fold
// ============================================================================

/**
 * Left fold threading the accumulator by return value. The step's return
 * type is the accumulator type, so a step that forgets to return the next
 * accumulator is a compile error.
 */
export const foldLeft = <A, B>(
  items: Iterable<A>,
  initial: B,
  step: (acc: B, item: A) => B
): B => Arr.reduce(items, initial, step);

// ============================================================================
// ReadonlyMap Operations (Persistent)
// ============================================================================

/** Empty ReadonlyMap. */
export const emptyMap = <K, V>(): ReadonlyMap<K, V> => new Map();

/**
 * Insert a key-value pair, returning a new map.
 * An existing key keeps its position and takes the new value.
 */
export const mapInsert =
  <K, V>(key: K, value: V) =>
  (map: ReadonlyMap<K, V>): ReadonlyMap<K, V> =>
    new Map([...map, [key, value]]);

/** Non-mutating lexicographic sort (UTF-16 code unit order). */
export const sortStrings = <A extends string>(arr: readonly A[]): readonly A[] =>
  Arr.sort(arr, Order.string);
