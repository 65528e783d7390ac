// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/barline/observability/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys.
 * Side-effects: none
 * Links: src/observability/logger.ts
 * @internal
 */

export const REDACT_PATHS = [
  "password",
  "token",
  "secret",
  "apiKey",
  "api_key",
];
