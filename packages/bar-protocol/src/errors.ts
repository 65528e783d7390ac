// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-protocol/errors`
 * Purpose: Errors raised while decoding bar-host input.
 * Scope: ClickParseError and its guard.
 * Invariants: Carries the offending line so the reader can log it.
 * Side-effects: none
 * Links: src/click-parser.ts
 * @public
 */

export class ClickParseError extends Error {
  constructor(
    public readonly line: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Malformed click event: ${reason}`, options);
    this.name = "ClickParseError";
  }
}

export function isClickParseError(error: unknown): error is ClickParseError {
  return error instanceof Error && error.name === "ClickParseError";
}
