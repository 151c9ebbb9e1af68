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

import { quickselect } from "@/lib/alg/quickselect";
import { EmptyInputError } from "@/lib/errors";
import { naturalOrder, type Comparator } from "@/lib/order/comparator";
import { checkRank, percentileRank, permilleRank } from "./nearest-rank";

// One-shot order statistics. Each call is O(n) and nothing is amortized
// across calls: prefer `new Ecdf(samples)` once more than a few queries are
// needed on the same sample. None of these modify `samples`.

/**
 * Fraction of samples <= t, by a single linear pass.
 *
 * @example
 * ecdf([9, 8, 7, 6, 5, 4, 3, 2, 1, 0], 4); // 0.5
 */
export function ecdf<T>(
  samples: readonly T[],
  t: T,
  cmp: Comparator<T> = naturalOrder,
): number {
  if (samples.length === 0) throw new EmptyInputError();

  let leq = 0;
  for (const s of samples) {
    if (cmp(s, t) <= 0) leq++;
  }
  return leq / samples.length;
}

/**
 * Nearest-rank percentile (p in 1..100) by Quickselect.
 *
 * @example
 * percentile([9, 8, 7, 6, 5, 4, 3, 2, 1, 0], 50); // 4
 */
export function percentile<T>(
  samples: readonly T[],
  p: number,
  cmp: Comparator<T> = naturalOrder,
): T {
  return quickselect(samples, percentileRank(p, samples.length), cmp);
}

// Nearest-rank permille (p in 1..1000) by Quickselect.
export function permille<T>(
  samples: readonly T[],
  p: number,
  cmp: Comparator<T> = naturalOrder,
): T {
  return quickselect(samples, permilleRank(p, samples.length), cmp);
}

// Element of 1-based rank r by Quickselect.
export function rank<T>(
  samples: readonly T[],
  r: number,
  cmp: Comparator<T> = naturalOrder,
): T {
  return quickselect(samples, checkRank(r, samples.length), cmp);
}
