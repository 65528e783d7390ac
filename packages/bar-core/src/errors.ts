// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/errors`
 * Purpose: Error classes raised or captured by the scheduling engine.
 * Scope: RenderError, SignalError, ClickError, ChannelError and their type guards. Does not decide propagation.
 * Invariants:
 * - Guards match on `name`, so errors survive module duplication
 * - None of these errors is fatal to the process
 * Side-effects: none
 * Links: src/scheduler.ts, src/event-router.ts, src/inbox.ts
 * @public
 */

import type { BlockId } from "./types";

/**
 * A single render attempt failed. Shown as the block's output for the cycle.
 */
export class RenderError extends Error {
  constructor(
    public readonly blockId: BlockId,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RenderError";
  }
}

/**
 * A block's signal handler failed.
 */
export class SignalError extends Error {
  constructor(
    public readonly blockId: BlockId,
    public readonly signal: number,
    options?: { cause?: unknown }
  ) {
    super(`Block ${blockId} failed to handle signal ${signal}`, options);
    this.name = "SignalError";
  }
}

/**
 * A block's click handler failed.
 */
export class ClickError extends Error {
  constructor(
    public readonly blockId: BlockId,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ClickError";
  }
}

export type ChannelErrorReason = "closed" | "full";

/**
 * A message could not be delivered to the scheduler inbox.
 */
export class ChannelError extends Error {
  constructor(public readonly reason: ChannelErrorReason) {
    super(`Scheduler channel is ${reason}`);
    this.name = "ChannelError";
  }
}

export function isRenderError(error: unknown): error is RenderError {
  return error instanceof Error && error.name === "RenderError";
}

export function isSignalError(error: unknown): error is SignalError {
  return error instanceof Error && error.name === "SignalError";
}

export function isClickError(error: unknown): error is ClickError {
  return error instanceof Error && error.name === "ClickError";
}

export function isChannelError(error: unknown): error is ChannelError {
  return error instanceof Error && error.name === "ChannelError";
}

/**
 * Normalizes anything a render rejected with into a RenderError for that block.
 */
export function toRenderError(blockId: BlockId, error: unknown): RenderError {
  if (isRenderError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new RenderError(blockId, message, { cause: error });
}
