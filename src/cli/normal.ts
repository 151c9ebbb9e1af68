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
import { NormalSampler, type UniformSource } from "@/lib/random/normal";
import {
  consoleIO,
  debugLogger,
  errorMessage,
  fail,
  type CliIO,
} from "./io";

const USAGE = `
Prints a sequence of Normal deviates, one per line.

Usage:
  normal [options] <num_deviates> <mean> <variance>

<num_deviates> must be a positive integer, <mean> and <variance> may be
integers or floating point numbers but <variance> must not be negative.
Put -- before the arguments when <mean> is negative.

Options:
  --verbose   Print debug traces
  --help      Show this help message
`.trim();

function parseNumber(name: string, text: string): number {
  const v = Number(text);
  if (text.trim() === "" || Number.isNaN(v)) {
    throw new RangeError(`<${name}> must be a number, got "${text}"`);
  }
  return v;
}

export function run(
  argv: string[],
  io: CliIO = consoleIO,
  uniform: UniformSource = Math.random,
): number {
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
    return fail(io, "expected <num_deviates> <mean> <variance>", USAGE);
  }

  const debug = debugLogger(io, "normal", args.verbose);

  try {
    const [countText, meanText, varianceText] = args._;
    const count = parseNumber("num_deviates", countText);
    const mean = parseNumber("mean", meanText);
    const variance = parseNumber("variance", varianceText);

    const sampler = new NormalSampler(mean, variance, uniform);
    const deviates = sampler.sampleMany(count);
    debug(
      `drew ${deviates.length} deviates, mean=${mean} variance=${variance}`,
    );

    for (const x of deviates) io.log(String(x));
    return 0;
  } catch (err) {
    return fail(io, errorMessage(err));
  }
}
