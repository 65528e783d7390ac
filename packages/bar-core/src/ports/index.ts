// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/ports`
 * Purpose: Core ports barrel export.
 * Scope: Re-exports block, logger, clock and frame-sink contracts. Does not contain implementations.
 * Invariants: All exports are interfaces, except the systemClock default.
 * Side-effects: none
 * Links: src/index.ts
 * @public
 */

export type { Block, RerenderSender } from "./block.port";
export { type Clock, systemClock } from "./clock.port";
export type { FrameSink } from "./frame-sink.port";
export type { LoggerLike } from "./logger.port";
