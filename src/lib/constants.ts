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

// The only confidence level with a known critical value formula.
export const SUPPORTED_CONFIDENCE = 0.95;

// The asymptotic critical value is only used for samples larger than this.
export const MIN_KS_SAMPLE_SIZE = 12;

// c(alpha) for alpha = 0.05 in D > c(alpha) * sqrt((n1 + n2) / (n1 * n2)).
export const KS_COEFFICIENT_95 = 1.36;

export const PERCENTILE_MAX = 100;
export const PERMILLE_MAX = 1000;

// First n2 printed by the critical value table.
export const CRITICAL_VALUE_TABLE_START = 16;

export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;
