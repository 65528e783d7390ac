// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/scheduler`
 * Purpose: Coordinating loop that decides when each block renders, runs renders concurrently and emits frames.
 * Scope: Owns the task queue, frame assembler and event router; consumes the inbox. Does not serialize frames or install OS handlers.
 * Invariants:
 * - At most one render in flight per block; a task popped while its block renders is coalesced into one follow-up render
 * - Every(d) reschedules from the fired due time (no drift); missed slots are skipped, not replayed
 * - Once/OnDemand blocks get no new task after a render
 * - Queue, cache and frame state are mutated only inside the loop
 * - A failing render, handler or sink never stops the loop
 * - After stop() buffered messages are still handled but no render starts
 * Side-effects: time (inbox receive timeouts)
 * Links: src/task-queue.ts, src/inbox.ts, src/event-router.ts, src/frame-assembler.ts
 * @public
 */

import { isChannelError, type RenderError, toRenderError } from "./errors";
import { EventRouter } from "./event-router";
import { FrameAssembler } from "./frame-assembler";
import type { Inbox } from "./inbox";
import type { RenderOutcome, SchedulerMessage } from "./messages";
import type { Block } from "./ports/block.port";
import { type Clock, systemClock } from "./ports/clock.port";
import type { FrameSink } from "./ports/frame-sink.port";
import type { LoggerLike } from "./ports/logger.port";
import { TaskQueue } from "./task-queue";
import type {
  BlockId,
  ClickEvent,
  Instant,
  RenderOutput,
  Task,
  UpdateDirective,
} from "./types";

export interface SchedulerOptions {
  /** Blocks in configuration order */
  blocks: readonly Block[];
  /** Shared with the RerenderChannel handed to blocks */
  inbox: Inbox<SchedulerMessage>;
  sink: FrameSink;
  logger: LoggerLike;
  clock?: Clock;
}

/**
 * Next due time after a render that was started for a task due at `firedDueAt`
 * and completed at `now`. Returns null when the block should not be rescheduled.
 */
export function nextDueTime(
  directive: UpdateDirective,
  firedDueAt: Instant,
  now: Instant
): Instant | null {
  switch (directive.kind) {
    case "every": {
      const elapsed = Math.max(0, now - firedDueAt);
      const slots = Math.floor(elapsed / directive.intervalMs) + 1;
      return firedDueAt + slots * directive.intervalMs;
    }
    case "once":
    case "onDemand":
      return null;
  }
}

export function errorOutput(error: RenderError): RenderOutput {
  return [{ text: error.message, state: "error" }];
}

export class Scheduler {
  private readonly blocks = new Map<BlockId, Block>();
  private readonly order: readonly BlockId[];
  private readonly queue = new TaskQueue();
  private readonly assembler: FrameAssembler;
  private readonly router: EventRouter;
  private readonly inbox: Inbox<SchedulerMessage>;
  private readonly sink: FrameSink;
  private readonly clock: Clock;
  private readonly logger: LoggerLike;

  private readonly rendering = new Set<BlockId>();
  /** Blocks whose task came due while they were rendering */
  private readonly rerunAfterRender = new Set<BlockId>();
  /** Renders and event deliveries running outside the loop */
  private readonly background = new Set<Promise<void>>();
  private running: Promise<void> | null = null;

  constructor(options: SchedulerOptions) {
    for (const block of options.blocks) {
      if (this.blocks.has(block.id)) {
        throw new Error(`Duplicate block id ${block.id}`);
      }
      this.blocks.set(block.id, block);
    }
    this.order = options.blocks.map((block) => block.id);
    this.inbox = options.inbox;
    this.sink = options.sink;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger.child({ component: "Scheduler" });
    this.assembler = new FrameAssembler(this.order);
    this.router = new EventRouter(options.blocks, options.logger);
  }

  /** Signal numbers at least one block subscribes to. */
  get subscribedSignals(): number[] {
    return this.router.signals();
  }

  /**
   * Starts the loop. Every block is due immediately.
   * Resolves once stop() was called and buffered messages are handled.
   */
  start(): Promise<void> {
    if (!this.running) {
      this.running = this.loop();
    }
    return this.running;
  }

  /** Closes the inbox and waits for the loop to exit. In-flight renders are abandoned. */
  async stop(): Promise<void> {
    this.inbox.close();
    await this.running;
  }

  signal(signal: number): void {
    this.post({ kind: "signal", signal });
  }

  click(event: ClickEvent): void {
    this.post({ kind: "click", event });
  }

  refreshAll(): void {
    this.post({ kind: "refreshAll" });
  }

  isRendering(blockId: BlockId): boolean {
    return this.rendering.has(blockId);
  }

  pendingTasks(): Task[] {
    return this.queue.tasks();
  }

  /** Resolves once every render and event delivery started so far has settled. */
  async settled(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all(this.background);
    }
  }

  private async loop(): Promise<void> {
    const now = this.clock.now();
    for (const blockId of this.order) {
      this.queue.upsert(blockId, now);
    }
    this.logger.info({ blocks: this.order.length }, "Scheduler started");

    for (;;) {
      // no new renders once stop() closed the inbox
      if (!this.inbox.closed) {
        this.fireDue();
      }
      this.flushFrame();

      const receipt = await this.inbox.receive(this.wakeDelay());
      if (receipt.kind === "closed") {
        break;
      }
      if (receipt.kind === "message") {
        this.handle(receipt.message);
      }
    }

    this.logger.info(
      { rendering: [...this.rendering] },
      "Scheduler stopped"
    );
  }

  private wakeDelay(): number | undefined {
    const due = this.queue.peekDue();
    return due === undefined ? undefined : Math.max(0, due - this.clock.now());
  }

  private fireDue(): void {
    const now = this.clock.now();
    for (
      let task = this.queue.popDue(now);
      task !== undefined;
      task = this.queue.popDue(now)
    ) {
      if (this.rendering.has(task.blockId)) {
        this.rerunAfterRender.add(task.blockId);
        this.logger.debug(
          { blockId: task.blockId },
          "Render already in flight, coalesced"
        );
        continue;
      }
      this.startRender(task);
    }
  }

  private startRender(task: Task): void {
    const block = this.blocks.get(task.blockId);
    if (!block) {
      return;
    }
    this.rendering.add(block.id);
    this.track(
      this.invokeRender(block).then((outcome) =>
        // completions are never refused for capacity
        this.post(
          { kind: "rendered", blockId: block.id, dueAt: task.dueAt, outcome },
          { ignoreCapacity: true }
        )
      )
    );
  }

  private async invokeRender(block: Block): Promise<RenderOutcome> {
    try {
      return { ok: true, output: await block.render() };
    } catch (error) {
      return { ok: false, error: toRenderError(block.id, error) };
    }
  }

  private handle(message: SchedulerMessage): void {
    switch (message.kind) {
      case "rerender": {
        const { blockId, requestedAt } = message.request;
        if (!this.blocks.has(blockId)) {
          this.logger.warn({ blockId }, "Re-render requested for unknown block");
          return;
        }
        this.queue.upsert(blockId, requestedAt);
        return;
      }
      case "signal":
        this.track(
          this.router.dispatchSignal(message.signal).then(() => undefined)
        );
        return;
      case "click":
        this.track(
          this.router.dispatchClick(message.event).then(() => undefined)
        );
        return;
      case "refreshAll": {
        const now = this.clock.now();
        for (const blockId of this.order) {
          this.queue.upsert(blockId, now);
        }
        return;
      }
      case "rendered":
        this.completeRender(message.blockId, message.dueAt, message.outcome);
        return;
    }
  }

  private completeRender(
    blockId: BlockId,
    dueAt: Instant,
    outcome: RenderOutcome
  ): void {
    this.rendering.delete(blockId);
    const block = this.blocks.get(blockId);
    if (!block) {
      return;
    }

    if (outcome.ok) {
      this.assembler.update(blockId, outcome.output);
    } else {
      this.logger.warn({ err: outcome.error, blockId }, "Block render failed");
      this.assembler.update(blockId, errorOutput(outcome.error));
    }

    const now = this.clock.now();
    const next = nextDueTime(block.updateInterval(), dueAt, now);
    if (next !== null) {
      this.queue.upsert(blockId, next);
    }
    if (this.rerunAfterRender.delete(blockId)) {
      this.queue.upsert(blockId, now);
    }
  }

  private flushFrame(): void {
    if (!this.assembler.stale) {
      return;
    }
    try {
      this.sink.emit(this.assembler.take());
    } catch (error) {
      this.logger.error({ err: error }, "Frame emission failed");
    }
  }

  private post(
    message: SchedulerMessage,
    options?: { ignoreCapacity?: boolean }
  ): void {
    try {
      this.inbox.send(message, options);
    } catch (error) {
      if (!isChannelError(error)) {
        throw error;
      }
      this.logger.debug(
        { kind: message.kind, reason: error.reason },
        "Scheduler message discarded"
      );
    }
  }

  private track(work: Promise<void>): void {
    const tracked: Promise<void> = work.then(
      () => {
        this.background.delete(tracked);
      },
      (error: unknown) => {
        this.background.delete(tracked);
        this.logger.error({ err: error }, "Background work failed");
      }
    );
    this.background.add(tracked);
  }
}
