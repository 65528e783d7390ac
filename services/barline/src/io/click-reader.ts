// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/barline/io/click-reader`
 * Purpose: Feeds click events read from the bar (stdin) to the scheduler.
 * Scope: Line splitting with readline and delegation to parseClickLine.
 * Invariants:
 * - A malformed line is logged and skipped
 * - End of input is logged; the bar keeps running without clicks
 * Side-effects: IO (stdin)
 * Links: packages/bar-protocol/src/click-parser.ts, src/main.ts
 * @internal
 */

import { once } from "node:events";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

import type { ClickEvent, LoggerLike } from "@barline/bar-core";
import { isClickParseError, parseClickLine } from "@barline/bar-protocol";

export interface ClickTarget {
  click(event: ClickEvent): void;
}

export interface ClickReader {
  /** Resolves once the input ended or close() was called */
  readonly closed: Promise<void>;
  close(): void;
}

export function startClickReader(
  input: Readable,
  target: ClickTarget,
  logger: LoggerLike
): ClickReader {
  const log = logger.child({ component: "ClickReader" });
  const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });

  lines.on("line", (line) => {
    try {
      const event = parseClickLine(line);
      if (event) {
        target.click(event);
      }
    } catch (error) {
      if (isClickParseError(error)) {
        log.warn({ err: error, line: error.line }, "Ignoring malformed click event");
        return;
      }
      log.error({ err: error }, "Click handling failed");
    }
  });

  const closed = once(lines, "close").then(() => {
    log.info({}, "Click input closed");
  });

  return {
    closed,
    close: () => lines.close(),
  };
}
