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

import {
  KS_COEFFICIENT_95,
  MIN_KS_SAMPLE_SIZE,
  SUPPORTED_CONFIDENCE,
} from "@/lib/constants";
import {
  DomainError,
  EmptyInputError,
  SampleTooSmallError,
  UnsupportedConfidenceError,
} from "@/lib/errors";
import {
  compareF64,
  naturalOrder,
  sortedCopy,
  type Comparator,
} from "@/lib/order/comparator";

export interface TestResult {
  readonly isRejected: boolean;
  // Greatest distance between the two ECDFs, in [0, 1].
  readonly statistic: number;
  readonly criticalValue: number;
  readonly confidence: number;
}

function checkConfidence(confidence: number): void {
  if (!(confidence > 0 && confidence < 1)) {
    throw new UnsupportedConfidenceError(
      confidence,
      "must be strictly between 0 and 1",
    );
  }
}

function checkSupported(n1: number, n2: number, confidence: number): void {
  for (const n of [n1, n2]) {
    if (n <= MIN_KS_SAMPLE_SIZE) {
      throw new SampleTooSmallError(n, MIN_KS_SAMPLE_SIZE);
    }
  }
  // The critical value formula below is the asymptotic one for alpha = 0.05.
  if (confidence !== SUPPORTED_CONFIDENCE) {
    throw new UnsupportedConfidenceError(
      confidence,
      `only ${SUPPORTED_CONFIDENCE} is implemented`,
    );
  }
}

/**
 * Two-sample Kolmogorov-Smirnov test: are `xs` and `ys` drawn from the same
 * distribution? The null hypothesis is rejected when the statistic exceeds
 * the critical value at `confidence`.
 *
 * Both samples must have more than 12 elements and the confidence must be
 * 0.95; anything else throws.
 *
 * @example
 * const xs = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];
 * const result = test(xs, [...xs].reverse(), 0.95);
 * result.isRejected; // false
 */
export function test<T>(
  xs: readonly T[],
  ys: readonly T[],
  confidence: number,
  cmp: Comparator<T> = naturalOrder,
): TestResult {
  if (xs.length === 0) throw new EmptyInputError("xs");
  if (ys.length === 0) throw new EmptyInputError("ys");
  checkConfidence(confidence);
  checkSupported(xs.length, ys.length, confidence);

  const statistic = calculateStatistic(xs, ys, cmp);
  const criticalValue = calculateCriticalValue(
    xs.length,
    ys.length,
    confidence,
  );

  return {
    isRejected: statistic > criticalValue,
    statistic,
    criticalValue,
    confidence,
  };
}

/**
 * `test` over floating-point samples ordered by compareF64. A NaN anywhere in
 * a sample that gets compared throws IncomparableValueError.
 */
export function testF64(
  xs: readonly number[],
  ys: readonly number[],
  confidence: number,
): TestResult {
  return test(xs, ys, confidence, compareF64);
}

/**
 * Critical value of the two-sample test for sample sizes n1 and n2, using
 * the large-sample approximation c(alpha) * sqrt((n1 + n2) / (n1 * n2)).
 */
export function calculateCriticalValue(
  n1: number,
  n2: number,
  confidence: number,
): number {
  for (const n of [n1, n2]) {
    if (!Number.isInteger(n) || n < 1) {
      throw new DomainError("sample size", n, 1);
    }
  }
  checkConfidence(confidence);
  checkSupported(n1, n2, confidence);

  const factor = (n1 + n2) / (n1 * n2);
  return KS_COEFFICIENT_95 * Math.sqrt(factor);
}

/**
 * Largest vertical distance between the ECDFs of `xs` and `ys`.
 *
 * The supremum is attained at a sample value, so it is enough to sweep the
 * two sorted samples together, stepping through each distinct value once and
 * tracking both ECDFs. O((n + m) log(n + m)) for the sorts, linear after.
 */
export function calculateStatistic<T>(
  xs: readonly T[],
  ys: readonly T[],
  cmp: Comparator<T> = naturalOrder,
): number {
  const n = xs.length;
  const m = ys.length;
  if (n === 0) throw new EmptyInputError("xs");
  if (m === 0) throw new EmptyInputError("ys");

  const sx = sortedCopy(xs, cmp);
  const sy = sortedCopy(ys, cmp);

  // i, j index the first elements not yet folded into ecdfX, ecdfY.
  let i = 0;
  let j = 0;
  let ecdfX = 0;
  let ecdfY = 0;
  let statistic = 0;

  while (i < n && j < m) {
    const x = sx[i];
    while (i + 1 < n && cmp(x, sx[i + 1]) === 0) i++;

    const y = sy[j];
    while (j + 1 < m && cmp(y, sy[j + 1]) === 0) j++;

    // Step to the smaller of the two values; on a tie both sides step.
    const c = cmp(x, y);
    if (c <= 0) {
      ecdfX = (i + 1) / n;
      i++;
    }
    if (c >= 0) {
      ecdfY = (j + 1) / m;
      j++;
    }

    const diff = Math.abs(ecdfX - ecdfY);
    if (diff > statistic) statistic = diff;
  }

  // Once one side is exhausted its ECDF is 1 and the other only climbs
  // towards 1, so the distance can no longer grow.
  return statistic;
}
