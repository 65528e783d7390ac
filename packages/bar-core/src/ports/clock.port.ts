// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/ports/clock`
 * Purpose: Time source used for due-time computation.
 * Scope: Clock interface and the wall-clock default. Does not schedule timers.
 * Invariants: now() returns epoch milliseconds.
 * Side-effects: time
 * Links: src/scheduler.ts
 * @public
 */

import type { Instant } from "../types";

export interface Clock {
  now(): Instant;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
