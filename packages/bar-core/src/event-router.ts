// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/event-router`
 * Purpose: Routes OS signals and bar clicks to the blocks that own them.
 * Scope: Signal subscription index and click demultiplexing. Does not parse bar input or install OS handlers.
 * Invariants:
 * - A click reaches exactly the block named by event.blockId, nothing else
 * - A signal reaches every subscribed block, in configuration order
 * - A failing handler is logged as SignalError/ClickError; delivery to others continues
 * Side-effects: none (invokes block handlers)
 * Links: src/scheduler.ts, src/ports/block.port.ts
 * @public
 */

import { ClickError, SignalError } from "./errors";
import type { Block } from "./ports/block.port";
import type { LoggerLike } from "./ports/logger.port";
import type { BlockId, ClickEvent } from "./types";

export class EventRouter {
  private readonly blocks = new Map<BlockId, Block>();
  private readonly subscriptions = new Map<number, BlockId[]>();
  private readonly logger: LoggerLike;

  constructor(blocks: readonly Block[], logger: LoggerLike) {
    this.logger = logger.child({ component: "EventRouter" });
    for (const block of blocks) {
      this.blocks.set(block.id, block);
      for (const signal of new Set(block.signals)) {
        const subscribers = this.subscriptions.get(signal) ?? [];
        subscribers.push(block.id);
        this.subscriptions.set(signal, subscribers);
      }
    }
  }

  /** Signal numbers at least one block subscribes to. */
  signals(): number[] {
    return [...this.subscriptions.keys()].sort((a, b) => a - b);
  }

  subscribers(signal: number): readonly BlockId[] {
    return this.subscriptions.get(signal) ?? [];
  }

  /**
   * Delivers a signal to every subscriber concurrently.
   * @returns number of subscribers the signal was delivered to
   */
  async dispatchSignal(signal: number): Promise<number> {
    const targets = this.subscribers(signal);
    if (targets.length === 0) {
      this.logger.debug({ signal }, "No block subscribed to signal");
      return 0;
    }

    const results = await Promise.allSettled(
      targets.map((blockId) => this.invokeSignal(blockId, signal))
    );
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        const blockId = targets[index] ?? -1;
        const error = new SignalError(blockId, signal, {
          cause: result.reason,
        });
        this.logger.error({ err: error, blockId, signal }, error.message);
      }
    });
    return targets.length;
  }

  /**
   * Delivers a click to the block that emitted the clicked widget.
   * @returns whether a block received the click
   */
  async dispatchClick(event: ClickEvent): Promise<boolean> {
    const block = this.blocks.get(event.blockId);
    if (!block) {
      this.logger.warn(
        { blockId: event.blockId },
        "Click for unknown block dropped"
      );
      return false;
    }

    try {
      await block.click(event);
    } catch (cause) {
      const error = new ClickError(
        event.blockId,
        `Block ${event.blockId} failed to handle ${event.button} click`,
        { cause }
      );
      this.logger.error(
        { err: error, blockId: event.blockId, button: event.button },
        error.message
      );
    }
    return true;
  }

  private async invokeSignal(blockId: BlockId, signal: number): Promise<void> {
    const block = this.blocks.get(blockId);
    if (block) {
      await block.signal(signal);
    }
  }
}
