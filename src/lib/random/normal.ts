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

import { DomainError } from "@/lib/errors";

// Uniform source on [0, 1), e.g. Math.random.
export type UniformSource = () => number;

/**
 * Normal(mean, variance) deviates by the Box-Muller transform. Each pair of
 * uniforms yields two deviates; the second is kept for the next call.
 */
export class NormalSampler {
  private readonly mean: number;
  private readonly stdDev: number;
  private readonly uniform: UniformSource;
  private spare: number | undefined = undefined;

  constructor(
    mean: number,
    variance: number,
    uniform: UniformSource = Math.random,
  ) {
    if (!Number.isFinite(mean)) {
      throw new RangeError(`mean must be finite, got ${mean}`);
    }
    // Zero is allowed and yields the mean on every draw.
    if (!(variance >= 0) || !Number.isFinite(variance)) {
      throw new RangeError(
        `variance must be non-negative and finite, got ${variance}`,
      );
    }
    this.mean = mean;
    this.stdDev = Math.sqrt(variance);
    this.uniform = uniform;
  }

  sample(): number {
    if (this.spare !== undefined) {
      const z = this.spare;
      this.spare = undefined;
      return this.mean + this.stdDev * z;
    }

    // 1 - u keeps the argument of log in (0, 1].
    const u1 = 1 - this.uniform();
    const u2 = this.uniform();
    const r = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;

    this.spare = r * Math.sin(theta);
    return this.mean + this.stdDev * r * Math.cos(theta);
  }

  sampleMany(n: number): number[] {
    if (!Number.isInteger(n) || n < 1) throw new DomainError("count", n, 1);
    const out = new Array<number>(n);
    for (let i = 0; i < n; i++) out[i] = this.sample();
    return out;
  }
}
