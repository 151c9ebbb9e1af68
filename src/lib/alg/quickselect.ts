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

import { DomainError, EmptyInputError } from "@/lib/errors";
import { naturalOrder, type Comparator } from "@/lib/order/comparator";

/**
 * Quickselect (iterative) for the element of 1-based `rank` in ascending order.
 * Works on a private copy; the input array is left untouched.
 *
 * The pivot is always the first element of the current window. Each round
 * does up to two partitions: one moving elements < pivot to the left, and,
 * when the rank is not in that block, one gathering every element == pivot
 * next to it. Treating the pivot's duplicates as a single block is what makes
 * samples with many repeated values resolve in a bounded number of rounds.
 *
 * Average O(n), worst case O(n^2) on already sorted input.
 */
export function quickselect<T>(
  samples: readonly T[],
  rank: number,
  cmp: Comparator<T> = naturalOrder,
): T {
  const length = samples.length;
  if (length === 0) throw new EmptyInputError();
  if (!Number.isInteger(rank) || rank < 1 || rank > length) {
    throw new DomainError("rank", rank, 1, length);
  }

  const arr = samples.slice();
  // Window is [low, high). Everything left of low is smaller than the rank
  // item, everything from high on is larger or equal.
  let low = 0;
  let high = length;

  for (;;) {
    const pivot = arr[low];
    if (low >= high - 1) return pivot;

    // bottom ends up as the number of elements < pivot in the whole array.
    let bottom = partition(arr, low, high, (v) => cmp(v, pivot) < 0);

    if (rank <= bottom) {
      high = bottom;
      continue;
    }

    low = bottom;
    bottom = partition(arr, low, high, (v) => cmp(v, pivot) === 0);

    if (rank <= bottom) return pivot;
    low = bottom;
  }
}

// Hoare-style two cursor scan: moves elements matching `left` before the
// returned index, the rest after it.
function partition<T>(
  arr: T[],
  low: number,
  high: number,
  left: (v: T) => boolean,
): number {
  let bottom = low;
  let top = high - 1;

  while (bottom < top) {
    while (bottom < top && left(arr[bottom])) bottom++;
    while (bottom < top && !left(arr[top])) top--;
    if (bottom < top) swap(arr, bottom, top);
  }
  return bottom;
}

function swap<T>(arr: T[], i: number, j: number): void {
  const tmp = arr[i];
  arr[i] = arr[j];
  arr[j] = tmp;
}
