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

// Output sinks for the command-line tools, swappable in tests.
export interface CliIO {
  log(line: string): void;
  error(line: string): void;
  debug(line: string): void;
}

export const consoleIO: CliIO = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
  debug: (line) => console.debug(line),
};

// Debug traces are tagged like "[ks] read 120 samples" and only emitted when
// the tool runs with --verbose.
export function debugLogger(
  io: CliIO,
  tag: string,
  verbose: boolean,
): (msg: string) => void {
  return verbose ? (msg) => io.debug(`[${tag}] ${msg}`) : () => {};
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Reports an error the way every tool does and returns the exit code.
export function fail(io: CliIO, msg: string, usage?: string): number {
  io.error(`Error: ${msg}`);
  if (usage) io.error(usage);
  return 1;
}
