// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/ports/logger`
 * Purpose: Minimal structured logger contract so the core stays free of a logging dependency.
 * Scope: LoggerLike interface. Does not create loggers.
 * Invariants: Compatible with pino's Logger type.
 * Side-effects: none (interface definition only)
 * Links: services/barline/src/observability/logger.ts
 * @public
 */

export interface LoggerLike {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug(obj: Record<string, unknown>, msg?: string): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}
