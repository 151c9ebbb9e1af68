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

import { lastIndexOf } from "@/lib/alg/binarysearch";
import { EmptyInputError } from "@/lib/errors";
import {
  naturalOrder,
  sortedCopy,
  type Comparator,
} from "@/lib/order/comparator";
import { checkRank, percentileRank, permilleRank } from "./nearest-rank";

/**
 * Empirical cumulative distribution function of a fixed sample.
 *
 * Construction sorts a copy of the sample, O(n log n). After that `value` is
 * O(log n) (plus a walk over duplicates of the queried value) and the rank
 * queries are O(1). Use this when a sample is queried many times; for a
 * handful of queries the one-shot functions in `single-use` avoid the sort.
 *
 * @example
 * const ecdf = new Ecdf([9, 8, 7, 6, 5, 4, 3, 2, 1, 0]);
 * ecdf.value(4); // 0.5
 * ecdf.percentile(50); // 4
 */
export class Ecdf<T> {
  private readonly sorted: readonly T[];
  private readonly cmp: Comparator<T>;

  constructor(samples: readonly T[], cmp: Comparator<T> = naturalOrder) {
    if (samples.length === 0) throw new EmptyInputError();
    this.cmp = cmp;
    this.sorted = sortedCopy(samples, cmp);
  }

  get length(): number {
    return this.sorted.length;
  }

  // Fraction of samples <= t.
  value(t: T): number {
    return (lastIndexOf(this.sorted, t, this.cmp) + 1) / this.length;
  }

  // Nearest-rank percentile, p in 1..100.
  percentile(p: number): T {
    return this.sorted[percentileRank(p, this.length) - 1];
  }

  // Nearest-rank permille, p in 1..1000.
  permille(p: number): T {
    return this.sorted[permilleRank(p, this.length) - 1];
  }

  // Element of 1-based rank r in ascending order.
  rank(r: number): T {
    return this.sorted[checkRank(r, this.length) - 1];
  }

  min(): T {
    return this.sorted[0];
  }

  max(): T {
    return this.sorted[this.length - 1];
  }
}
