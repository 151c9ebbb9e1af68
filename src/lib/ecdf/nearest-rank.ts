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

import { PERCENTILE_MAX, PERMILLE_MAX } from "@/lib/constants";
import { DomainError, EmptyInputError } from "@/lib/errors";

// Nearest-rank method: the p-th of `scale` parts maps to rank
// ceil(p * n / scale).
// There is no 0-percentile or 0-permille.

function nearestRank(
  what: string,
  p: number,
  scale: number,
  length: number,
): number {
  if (!Number.isInteger(p) || p < 1 || p > scale) {
    throw new DomainError(what, p, 1, scale);
  }
  if (length === 0) throw new EmptyInputError();
  return Math.ceil((p * length) / scale);
}

export const percentileRank = (p: number, length: number): number =>
  nearestRank("percentile", p, PERCENTILE_MAX, length);

export const permilleRank = (p: number, length: number): number =>
  nearestRank("permille", p, PERMILLE_MAX, length);

export function checkRank(rank: number, length: number): number {
  if (length === 0) throw new EmptyInputError();
  if (!Number.isInteger(rank) || rank < 1 || rank > length) {
    throw new DomainError("rank", rank, 1, length);
  }
  return rank;
}
