// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/ports/block`
 * Purpose: Capability contract every block variant implements for the scheduler.
 * Scope: Block and RerenderSender interfaces. Does not contain block implementations.
 * Invariants:
 * - updateInterval() is pure; queried once after each render
 * - render() is never re-entered for the same block before it settles
 * - signal()/click() run outside the render slot and must return quickly
 * - Options are validated before construction; the scheduler never re-validates
 * Side-effects: none (interface definition only)
 * Links: src/scheduler.ts, src/event-router.ts, packages/bar-blocks/src/custom/custom.block.ts
 * @public
 */

import type {
  BlockId,
  ClickEvent,
  Instant,
  RenderOutput,
  UpdateDirective,
} from "../types";

/**
 * A configured unit producing a piece of bar output.
 * Per-block mutable state (cycle position, caches) stays private to the implementation.
 */
export interface Block {
  readonly id: BlockId;
  /** OS signal numbers this block subscribes to */
  readonly signals: readonly number[];
  updateInterval(): UpdateDirective;
  /**
   * Produces the block's widgets. May reject; the rejection is shown as an
   * error widget for this cycle.
   */
  render(): Promise<RenderOutput>;
  signal(signal: number): Promise<void>;
  click(event: ClickEvent): Promise<void>;
}

/**
 * Outbound capability handed to blocks for out-of-cycle re-render requests.
 * Never throws and never blocks.
 */
export interface RerenderSender {
  request(blockId: BlockId, requestedAt?: Instant): void;
}
