// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/rerender-channel`
 * Purpose: Block-facing sender for out-of-cycle re-render requests.
 * Scope: Wraps the scheduler inbox behind RerenderSender. Does not merge requests (the task queue does).
 * Invariants:
 * - request() never throws and never blocks
 * - A dropped request (closed/full inbox) is logged; Every blocks still fire on schedule
 * Side-effects: none beyond enqueueing
 * Links: src/ports/block.port.ts, src/inbox.ts
 * @public
 */

import { isChannelError } from "./errors";
import type { Inbox } from "./inbox";
import type { SchedulerMessage } from "./messages";
import type { RerenderSender } from "./ports/block.port";
import { type Clock, systemClock } from "./ports/clock.port";
import type { LoggerLike } from "./ports/logger.port";
import type { BlockId, Instant } from "./types";

export class RerenderChannel implements RerenderSender {
  private readonly logger: LoggerLike;

  constructor(
    private readonly inbox: Inbox<SchedulerMessage>,
    logger: LoggerLike,
    private readonly clock: Clock = systemClock
  ) {
    this.logger = logger.child({ component: "RerenderChannel" });
  }

  request(blockId: BlockId, requestedAt: Instant = this.clock.now()): void {
    try {
      this.inbox.send({ kind: "rerender", request: { blockId, requestedAt } });
    } catch (error) {
      if (!isChannelError(error)) {
        throw error;
      }
      this.logger.warn(
        { blockId, reason: error.reason },
        "Dropped re-render request"
      );
    }
  }
}
