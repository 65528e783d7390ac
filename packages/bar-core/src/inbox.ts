// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/inbox`
 * Purpose: Buffered multi-producer, single-consumer message channel with a receive timeout.
 * Scope: Inbox<T> used by the scheduler loop to wait for "next message or next due time". Does not interpret messages.
 * Invariants:
 * - send() never blocks; it throws ChannelError when closed or at capacity
 * - At most one pending receive() at a time
 * - Buffered messages are still delivered after close(), then receive() reports closed
 * - Timeouts beyond MAX_TIMER_DELAY_MS are clamped to it
 * Side-effects: time (setTimeout for receive timeouts)
 * Links: src/scheduler.ts, src/rerender-channel.ts
 * @public
 */

import { ChannelError } from "./errors";

export const DEFAULT_INBOX_CAPACITY = 1024;

/** Longest delay setTimeout honours; longer ones fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type Receipt<T> =
  | { readonly kind: "message"; readonly message: T }
  | { readonly kind: "timeout" }
  | { readonly kind: "closed" };

export class Inbox<T> {
  private readonly buffer: T[] = [];
  private waiter: ((receipt: Receipt<T>) => void) | null = null;
  private isClosed = false;

  constructor(private readonly capacity: number = DEFAULT_INBOX_CAPACITY) {}

  get closed(): boolean {
    return this.isClosed;
  }

  get pending(): number {
    return this.buffer.length;
  }

  send(message: T, options?: { ignoreCapacity?: boolean }): void {
    if (this.isClosed) {
      throw new ChannelError("closed");
    }
    const waiter = this.waiter;
    if (waiter) {
      waiter({ kind: "message", message });
      return;
    }
    if (!options?.ignoreCapacity && this.buffer.length >= this.capacity) {
      throw new ChannelError("full");
    }
    this.buffer.push(message);
  }

  /**
   * Resolves with the next message, with `timeout` once `timeoutMs` elapses
   * first, or with `closed` once the inbox is closed and drained.
   * Omit `timeoutMs` to wait indefinitely. A timeout longer than
   * MAX_TIMER_DELAY_MS resolves early with `timeout`.
   */
  receive(timeoutMs?: number): Promise<Receipt<T>> {
    if (this.buffer.length > 0) {
      const [message] = this.buffer.splice(0, 1);
      return Promise.resolve({ kind: "message", message });
    }
    if (this.isClosed) {
      return Promise.resolve({ kind: "closed" });
    }
    if (this.waiter) {
      return Promise.reject(new Error("Inbox already has a pending receive"));
    }

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const settle = (receipt: Receipt<T>): void => {
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        this.waiter = null;
        resolve(receipt);
      };
      this.waiter = settle;
      if (timeoutMs !== undefined) {
        timer = setTimeout(
          () => settle({ kind: "timeout" }),
          Math.min(MAX_TIMER_DELAY_MS, Math.max(0, timeoutMs))
        );
      }
    });
  }

  close(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.waiter?.({ kind: "closed" });
  }
}
