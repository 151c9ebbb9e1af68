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
import { CRITICAL_VALUE_TABLE_START } from "@/lib/constants";
import { calculateCriticalValue } from "@/lib/ks/two-sample";
import {
  consoleIO,
  debugLogger,
  errorMessage,
  fail,
  type CliIO,
} from "./io";

const USAGE = `
Critical values of the two-sample Kolmogorov-Smirnov test.

Usage:
  critical-values [options] <confidence> <num_samples> <limit>

Prints a tab-separated table of critical values for samples of size
<num_samples> against samples of sizes ${CRITICAL_VALUE_TABLE_START} through
<limit> inclusive.
<num_samples> and <limit> must be positive integers, <confidence> strictly
between zero and one.

Options:
  --verbose   Print debug traces
  --help      Show this help message
`.trim();

function parsePositiveInt(name: string, text: string): number {
  const n = Number(text);
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(
      `<${name}> must be a positive integer, got "${text}"`,
    );
  }
  return n;
}

function parseConfidence(text: string): number {
  const c = Number(text);
  if (!(c > 0 && c < 1)) {
    throw new RangeError(
      `<confidence> must be a number strictly between 0 and 1, got "${text}"`,
    );
  }
  return c;
}

export function run(argv: string[], io: CliIO = consoleIO): number {
  const args = minimist(argv, {
    boolean: ["verbose", "help"],
    string: ["_"],
    alias: { h: "help" },
  });

  if (args.help) {
    io.log(USAGE);
    return 0;
  }

  if (args._.length !== 3) {
    return fail(io, "expected <confidence> <num_samples> <limit>", USAGE);
  }

  const debug = debugLogger(io, "critical-values", args.verbose);

  try {
    const [confidenceText, n1Text, limitText] = args._;
    const confidence = parseConfidence(confidenceText);
    const n1 = parsePositiveInt("num_samples", n1Text);
    const limit = parsePositiveInt("limit", limitText);
    debug(`n1=${n1} n2=${CRITICAL_VALUE_TABLE_START}..${limit}`);

    // Every row shares n1 and the confidence; the first one checks them
    // before the header goes out.
    calculateCriticalValue(n1, CRITICAL_VALUE_TABLE_START, confidence);

    io.log("n1\tn2\tconfidence\tcritical_value");
    for (let n2 = CRITICAL_VALUE_TABLE_START; n2 <= limit; n2++) {
      const cv = calculateCriticalValue(n1, n2, confidence);
      io.log(`${n1}\t${n2}\t${confidence}\t${cv}`);
    }
    return 0;
  } catch (err) {
    return fail(io, errorMessage(err));
  }
}
