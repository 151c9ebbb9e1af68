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

import { describe, it, expect } from "vitest";
import * as lib from "./index";

describe("package entry point", () => {
  it("offers cached and one-shot front ends with the same answers", () => {
    const samples = [9, 8, 7, 6, 5, 4, 3, 2, 1, 0];
    const cached = new lib.Ecdf(samples);

    expect(cached.value(4)).toBe(lib.ecdf(samples, 4));
    expect(cached.percentile(50)).toBe(lib.percentile(samples, 50));
    expect(cached.permille(500)).toBe(lib.permille(samples, 500));
    expect(cached.rank(5)).toBe(lib.rank(samples, 5));
  });

  it("runs the two-sample test", () => {
    const xs = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];
    const ys = [12, 11, 10, 9, 8, 7, 6, 5, 4, 3, 2, 1, 0];
    const result: lib.TestResult = lib.test(xs, ys, 0.95);

    expect(result).toEqual({
      isRejected: false,
      statistic: 0,
      criticalValue: lib.calculateCriticalValue(13, 13, 0.95),
      confidence: 0.95,
    });
    expect(lib.testF64(xs, ys, 0.95)).toEqual(result);
  });

  it("exposes the error classes", () => {
    expect(() => lib.rank([], 1)).toThrow(lib.EmptyInputError);
    expect(() => lib.compareF64(NaN, 1)).toThrow(lib.IncomparableValueError);
  });
});
