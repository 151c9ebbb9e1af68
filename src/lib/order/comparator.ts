/*
 * Copyright (C) 2025 The OpenPSG Authors
 *
 * This file is licensed under the Functional Source License 1.1
 * with a grant of AGPLv3-or-later effective two years after publication.
 *
 * You may not use this file except in compliance with the License.
 * A copy of the license is available in the root of the repository
 * and online at: https://fsl.software
 *
 * After two years from publication, this file may also be used under
 * the GNU Affero General Public License, version 3 or (at your option) any
 * later version. See <https://www.gnu.org/licenses/agpl-3.0.html> for details.
 */

import { IncomparableValueError } from "@/lib/errors";

/**
 * Orders two values: negative if a < b, zero if equal, positive if a > b.
 * Must be a total order (reflexive, antisymmetric, transitive) over the
 * values it is given, otherwise the results of every query are undefined.
 */
export type Comparator<T> = (a: T, b: T) => number;

const isNumeric = (v: unknown): v is number | bigint =>
  typeof v === "number" || typeof v === "bigint";

function compareNumeric(a: number | bigint, b: number | bigint): number {
  if (a < b) return -1;
  if (a > b) return 1;
  // Loose equality so that 1 and 1n compare equal.
  if (a == b) return 0;
  throw new IncomparableValueError(a, b);
}

/**
 * Total-order adapter for floating-point samples. Every pair of numbers is
 * ordered except when one side is NaN, which throws IncomparableValueError.
 * -0 and 0 compare equal.
 */
export const compareF64: Comparator<number> = (a, b) => compareNumeric(a, b);

/**
 * Default comparator. Numbers and bigints are ordered numerically (NaN is
 * rejected as by compareF64), strings by UTF-16 code unit. Anything else,
 * including a string against a number, has no natural order and throws
 * TypeError: pass an explicit comparator for such samples.
 */
export function naturalOrder(a: unknown, b: unknown): number {
  if (isNumeric(a) && isNumeric(b)) return compareNumeric(a, b);
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  throw new TypeError(
    `no natural order between ${typeof a} and ${typeof b}; pass a comparator`,
  );
}

/**
 * Sorted copy of `samples` under `cmp`. Array.prototype.sort moves undefined
 * elements to the end without consulting the comparator, so the elements are
 * boxed to make every one of them go through `cmp`.
 */
export function sortedCopy<T>(
  samples: readonly T[],
  cmp: Comparator<T>,
): T[] {
  return samples
    .map((v) => ({ v }))
    .sort((a, b) => cmp(a.v, b.v))
    .map((b) => b.v);
}
