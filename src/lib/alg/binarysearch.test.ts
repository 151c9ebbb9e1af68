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
import { binarySearch, lastIndexOf } from "./binarysearch";

describe("binarySearch", () => {
  it("reports insertion point 0 for empty array", () => {
    expect(binarySearch([], 3)).toEqual({ found: false, index: 0 });
  });

  it("finds exact matches", () => {
    const arr = [10, 20, 30];
    expect(binarySearch(arr, 10)).toEqual({ found: true, index: 0 });
    expect(binarySearch(arr, 20)).toEqual({ found: true, index: 1 });
    expect(binarySearch(arr, 30)).toEqual({ found: true, index: 2 });
  });

  it("reports the number of smaller elements on a miss", () => {
    const arr = [10, 20, 30];
    expect(binarySearch(arr, 5)).toEqual({ found: false, index: 0 });
    expect(binarySearch(arr, 15)).toEqual({ found: false, index: 1 });
    expect(binarySearch(arr, 25)).toEqual({ found: false, index: 2 });
    expect(binarySearch(arr, 35)).toEqual({ found: false, index: 3 });
  });

  it("lands on one of the duplicates", () => {
    const arr = [1, 2, 2, 2, 3];
    const { found, index } = binarySearch(arr, 2);
    expect(found).toBe(true);
    expect(arr[index]).toBe(2);
  });

  it("uses the given comparator", () => {
    const byLength = (a: string, b: string) => a.length - b.length;
    const arr = ["a", "bb", "ccc"];
    expect(binarySearch(arr, "xx", byLength)).toEqual({
      found: true,
      index: 1,
    });
  });
});

describe("lastIndexOf", () => {
  it("returns -1 for empty array", () => {
    expect(lastIndexOf([], 1)).toBe(-1);
  });

  it("returns -1 when target precedes the first element", () => {
    expect(lastIndexOf([10, 11], 1)).toBe(-1);
  });

  it("returns index of greatest <= target when between elements", () => {
    const arr = [1, 2, 3];
    expect(lastIndexOf(arr, 1.5)).toBe(0);
    expect(lastIndexOf(arr, 2.5)).toBe(1);
  });

  it("returns last index when target is after the last element", () => {
    expect(lastIndexOf([1, 2], 10)).toBe(1);
  });

  it("handles duplicates by returning the last matching index", () => {
    const arr = [1, 2, 2, 3];
    expect(lastIndexOf(arr, 2)).toBe(2);
    expect(lastIndexOf(arr, 2.5)).toBe(2);
  });

  it("walks past long runs of equal values", () => {
    const arr = [0, ...Array.from({ length: 50 }, () => 7), 9];
    expect(lastIndexOf(arr, 7)).toBe(50);
  });

  it("works with single-element arrays", () => {
    expect(lastIndexOf([5], 4)).toBe(-1);
    expect(lastIndexOf([5], 5)).toBe(0);
    expect(lastIndexOf([5], 6)).toBe(0);
  });
});
