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

import { readFile } from "fs/promises";
import { I64_MAX, I64_MIN } from "@/lib/constants";
import { SampleParseError } from "@/lib/errors";

// Single-column, headerless sample files: one value per line.

export type SampleKind = "f64" | "i64";

export interface SampleTypes {
  f64: number;
  i64: bigint;
}

const INTEGER = /^[+-]?\d+$/;
const INFINITY = /^([+-]?)inf(inity)?$/i;

function parseF64(text: string, line: number): number {
  const inf = INFINITY.exec(text);
  if (inf) return inf[1] === "-" ? -Infinity : Infinity;

  const v = Number(text);
  // Number() also takes hex, octal and binary literals; data files are decimal.
  if (Number.isNaN(v) || /^[+-]?0[xob]/i.test(text)) {
    throw new SampleParseError(line, text, "not a floating point number");
  }
  return v;
}

function parseI64(text: string, line: number): bigint {
  if (!INTEGER.test(text)) {
    throw new SampleParseError(line, text, "not an integer");
  }
  const v = BigInt(text);
  if (v < I64_MIN || v > I64_MAX) {
    throw new SampleParseError(line, text, "outside the 64-bit integer range");
  }
  return v;
}

export function parseSamples<K extends SampleKind>(
  text: string,
  kind: K,
): SampleTypes[K][];
export function parseSamples(
  text: string,
  kind: SampleKind,
): (number | bigint)[] {
  const out: (number | bigint)[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const trimmed = lines[i].trim();
    if (trimmed === "") continue;
    const line = i + 1;
    out.push(
      kind === "i64" ? parseI64(trimmed, line) : parseF64(trimmed, line),
    );
  }
  return out;
}

export async function readSamples<K extends SampleKind>(
  path: string,
  kind: K,
): Promise<SampleTypes[K][]> {
  const text = await readFile(path, "utf8");
  return parseSamples(text, kind);
}
