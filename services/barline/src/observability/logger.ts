// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/barline/observability/logger`
 * Purpose: Pino logger factory writing JSON to stderr.
 * Scope: Create configured pino loggers and flush them before exit.
 * Invariants:
 * - Never writes to stdout; stdout carries the bar protocol
 * - Safe to call at module scope (reads LOG_LEVEL/SERVICE_NAME directly, no env validation)
 * Side-effects: IO (stderr)
 * Notes: Use makeNoopLogger for tests. Formatting via external pipe (pino-pretty).
 * Links: src/observability/redact.ts, src/main.ts
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { LOG_LEVELS } from "../bootstrap/env";
import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

let destination: ReturnType<typeof pino.destination> | null = null;

function stderrDestination(): ReturnType<typeof pino.destination> {
  if (!destination) {
    destination = pino.destination({ dest: 2, sync: true });
  }
  return destination;
}

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const logLevel =
    LOG_LEVELS.find((level) => level === process.env.LOG_LEVEL) ?? "info";
  const serviceName = process.env.SERVICE_NAME || "barline";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  const config = {
    level: logLevel,
    enabled: !isTestTooling,
    // bindings first, then reserved keys
    base: { ...bindings, app: "barline", service: serviceName },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };

  return pino(config, stderrDestination());
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/** Writes out anything buffered before the process exits. */
export function flushLogger(): void {
  destination?.flushSync();
}
