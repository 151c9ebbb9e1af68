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

// Precondition failures. Nothing in the library catches these; callers are
// expected to validate their inputs up front.

export class EmptyInputError extends Error {
  constructor(what: string = "samples") {
    super(`${what} must not be empty`);
    this.name = "EmptyInputError";
  }
}

export class DomainError extends RangeError {
  constructor(what: string, value: number, min: number, max?: number) {
    const bounds =
      max === undefined
        ? `an integer >= ${min}`
        : `an integer in ${min}..${max}`;
    super(`${what} must be ${bounds}, got ${value}`);
    this.name = "DomainError";
  }
}

export class UnsupportedConfidenceError extends RangeError {
  readonly confidence: number;

  constructor(confidence: number, reason: string) {
    super(`unsupported confidence ${confidence}: ${reason}`);
    this.name = "UnsupportedConfidenceError";
    this.confidence = confidence;
  }
}

export class SampleTooSmallError extends RangeError {
  readonly length: number;

  constructor(length: number, minExclusive: number) {
    super(
      `sample of length ${length} is too small, ` +
        `need more than ${minExclusive} elements`,
    );
    this.name = "SampleTooSmallError";
    this.length = length;
  }
}

export class IncomparableValueError extends TypeError {
  constructor(a: unknown, b: unknown) {
    super(`cannot order ${String(a)} against ${String(b)}`);
    this.name = "IncomparableValueError";
  }
}

export class SampleParseError extends Error {
  readonly line: number;

  constructor(line: number, text: string, reason: string) {
    super(`line ${line}: ${reason} (${JSON.stringify(text)})`);
    this.name = "SampleParseError";
    this.line = line;
  }
}
