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

import minimist from "minimist";
import { SUPPORTED_CONFIDENCE } from "@/lib/constants";
import { readSamples } from "@/lib/io/samples";
import { test, testF64, type TestResult } from "@/lib/ks/two-sample";
import {
  consoleIO,
  debugLogger,
  errorMessage,
  fail,
  type CliIO,
} from "./io";

const USAGE = `
Two-sample Kolmogorov-Smirnov test on data files.

Usage:
  ks [options] <file1> <file2>

Files are single-column, headerless, one value per line. The samples are
tested against each other at the ${SUPPORTED_CONFIDENCE} confidence level.

Options:
  --integer   Read the files as 64-bit integers instead of floating point
  --verbose   Print debug traces
  --help      Show this help message
`.trim();

export function formatResult(result: TestResult): string[] {
  return [
    result.isRejected
      ? "Samples are from different distributions."
      : "Samples are from the same distributions.",
    `test statistic = ${result.statistic}`,
    `critical value = ${result.criticalValue}`,
    `confidence = ${result.confidence}`,
  ];
}

export async function run(
  argv: string[],
  io: CliIO = consoleIO,
): Promise<number> {
  const args = minimist(argv, {
    boolean: ["integer", "verbose", "help"],
    string: ["_"],
    alias: { h: "help" },
  });

  if (args.help) {
    io.log(USAGE);
    return 0;
  }

  const files = args._;
  if (files.length !== 2) {
    return fail(io, "expected exactly two sample files", USAGE);
  }

  const debug = debugLogger(io, "ks", args.verbose);
  const [file1, file2] = files;

  try {
    let result: TestResult;
    if (args.integer) {
      const xs = await readSamples(file1, "i64");
      const ys = await readSamples(file2, "i64");
      debug(`read ${xs.length} + ${ys.length} integer samples`);
      result = test(xs, ys, SUPPORTED_CONFIDENCE);
    } else {
      const xs = await readSamples(file1, "f64");
      const ys = await readSamples(file2, "f64");
      debug(`read ${xs.length} + ${ys.length} floating point samples`);
      result = testF64(xs, ys, SUPPORTED_CONFIDENCE);
    }

    for (const line of formatResult(result)) io.log(line);
    return 0;
  } catch (err) {
    return fail(io, errorMessage(err));
  }
}
