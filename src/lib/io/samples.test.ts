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

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { parseSamples, readSamples } from "./samples";
import { SampleParseError } from "@/lib/errors";

describe("parseSamples (f64)", () => {
  it("parses one value per line", () => {
    expect(parseSamples("1.5\n-2\n3e2\n", "f64")).toEqual([1.5, -2, 300]);
  });

  it("skips blank lines and surrounding whitespace, accepts CRLF", () => {
    expect(parseSamples("  4 \r\n\r\n5\r\n", "f64")).toEqual([4, 5]);
  });

  it("accepts infinities", () => {
    expect(parseSamples("Infinity\n-Infinity", "f64")).toEqual([
      Infinity,
      -Infinity,
    ]);
    expect(parseSamples("inf\n-INF\n+infinity\n-Infinity", "f64")).toEqual([
      Infinity,
      -Infinity,
      Infinity,
      -Infinity,
    ]);
    expect(() => parseSamples("infin", "f64")).toThrow(SampleParseError);
  });

  it("rejects text that is not a decimal number", () => {
    expect(() => parseSamples("1\nabc\n", "f64")).toThrow(SampleParseError);
    expect(() => parseSamples("1\nabc\n", "f64")).toThrow(
      'line 2: not a floating point number ("abc")',
    );
    expect(() => parseSamples("NaN", "f64")).toThrow(SampleParseError);
    expect(() => parseSamples("0x10", "f64")).toThrow(SampleParseError);
  });

  it("returns an empty array for an empty file", () => {
    expect(parseSamples("", "f64")).toEqual([]);
  });
});

describe("parseSamples (i64)", () => {
  it("parses integers as bigints", () => {
    expect(parseSamples("1\n-20\n+3\n", "i64")).toEqual([1n, -20n, 3n]);
  });

  it("keeps the full 64-bit range", () => {
    const text = "9223372036854775807\n-9223372036854775808";
    expect(parseSamples(text, "i64")).toEqual([2n ** 63n - 1n, -(2n ** 63n)]);
  });

  it("rejects values outside 64 bits", () => {
    expect(() => parseSamples("9223372036854775808", "i64")).toThrow(
      "line 1: outside the 64-bit integer range",
    );
  });

  it("rejects non-integers with the line number", () => {
    try {
      parseSamples("1\n2\n\n3.5\n", "i64");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SampleParseError);
      if (err instanceof SampleParseError) expect(err.line).toBe(4);
    }
  });
});

describe("readSamples", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "samples-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a data file", async () => {
    const path = join(dir, "xs.txt");
    await writeFile(path, "3\n1\n2\n");
    await expect(readSamples(path, "i64")).resolves.toEqual([3n, 1n, 2n]);
    await expect(readSamples(path, "f64")).resolves.toEqual([3, 1, 2]);
  });

  it("rejects when the file is missing", async () => {
    await expect(readSamples(join(dir, "missing.txt"), "f64")).rejects.toThrow(
      /ENOENT/,
    );
  });
});
