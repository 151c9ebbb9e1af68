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

import { naturalOrder, type Comparator } from "@/lib/order/comparator";

export interface SearchResult {
  found: boolean;
  // Index of an equal element if found, otherwise the insertion point.
  index: number;
}

/**
 * Binary search over an ascending array. With duplicates, a hit may land on
 * any of the equal elements. A miss reports the insertion point, which is the
 * number of elements strictly less than the target.
 */
export function binarySearch<T>(
  sorted: readonly T[],
  target: T,
  cmp: Comparator<T> = naturalOrder,
): SearchResult {
  let lo = 0;
  let hi = sorted.length;

  while (lo < hi) {
    const mid = lo + ((hi - lo) >> 1);
    const c = cmp(sorted[mid], target);
    if (c === 0) return { found: true, index: mid };
    if (c < 0) lo = mid + 1;
    else hi = mid;
  }
  return { found: false, index: lo };
}

/**
 * Index of the greatest element <= target, or -1 if every element is larger.
 * When the target is present, walks forward past its duplicates so the result
 * is always the last equal element.
 */
export function lastIndexOf<T>(
  sorted: readonly T[],
  target: T,
  cmp: Comparator<T> = naturalOrder,
): number {
  const { found, index } = binarySearch(sorted, target, cmp);
  if (!found) return index - 1;

  let i = index;
  while (i + 1 < sorted.length && cmp(sorted[i + 1], target) === 0) i++;
  return i;
}
