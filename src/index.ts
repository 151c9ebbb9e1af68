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

export { Ecdf } from "./lib/ecdf/ecdf";
export { ecdf, percentile, permille, rank } from "./lib/ecdf/single-use";
export {
  test,
  testF64,
  calculateCriticalValue,
  calculateStatistic,
} from "./lib/ks/two-sample";
export type { TestResult } from "./lib/ks/two-sample";
export { quickselect } from "./lib/alg/quickselect";
export { compareF64, naturalOrder, sortedCopy } from "./lib/order/comparator";
export type { Comparator } from "./lib/order/comparator";
export { NormalSampler } from "./lib/random/normal";
export type { UniformSource } from "./lib/random/normal";
export { parseSamples, readSamples } from "./lib/io/samples";
export type { SampleKind, SampleTypes } from "./lib/io/samples";
export {
  DomainError,
  EmptyInputError,
  IncomparableValueError,
  SampleParseError,
  SampleTooSmallError,
  UnsupportedConfidenceError,
} from "./lib/errors";
