// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/task-queue`
 * Purpose: Time-ordered queue of pending block renders, one task per block.
 * Scope: Indexed binary min-heap keyed on (dueAt, blockId). Does not know about directives or renders.
 * Invariants:
 * - At most one task per block
 * - upsert only ever moves a task earlier (monotonic-earliest)
 * - Ties on dueAt pop the lower blockId first
 * Side-effects: none
 * Links: src/scheduler.ts
 * @public
 */

import type { BlockId, Instant, Task } from "./types";

function before(a: Task, b: Task): boolean {
  return a.dueAt < b.dueAt || (a.dueAt === b.dueAt && a.blockId < b.blockId);
}

export class TaskQueue {
  private readonly heap: Task[] = [];
  /** blockId → index in heap */
  private readonly positions = new Map<BlockId, number>();

  get size(): number {
    return this.heap.length;
  }

  has(blockId: BlockId): boolean {
    return this.positions.has(blockId);
  }

  dueAt(blockId: BlockId): Instant | undefined {
    const index = this.positions.get(blockId);
    return index === undefined ? undefined : this.heap[index]?.dueAt;
  }

  /** Earliest due time across all pending tasks. */
  peekDue(): Instant | undefined {
    return this.heap[0]?.dueAt;
  }

  /**
   * Removes and returns the earliest task due at or before `now`.
   */
  popDue(now: Instant): Task | undefined {
    const head = this.heap[0];
    if (head === undefined || head.dueAt > now) {
      return undefined;
    }
    this.removeAt(0);
    return head;
  }

  /**
   * Inserts a task, or moves the existing one earlier. A later due time
   * never replaces an earlier one.
   * @returns whether the queue changed
   */
  upsert(blockId: BlockId, dueAt: Instant): boolean {
    const index = this.positions.get(blockId);
    if (index === undefined) {
      this.heap.push({ blockId, dueAt });
      this.positions.set(blockId, this.heap.length - 1);
      this.siftUp(this.heap.length - 1);
      return true;
    }

    const existing = this.heap[index];
    if (existing === undefined || dueAt >= existing.dueAt) {
      return false;
    }
    this.heap[index] = { blockId, dueAt };
    this.siftUp(index);
    return true;
  }

  remove(blockId: BlockId): boolean {
    const index = this.positions.get(blockId);
    if (index === undefined) {
      return false;
    }
    this.removeAt(index);
    return true;
  }

  /** Snapshot of pending tasks in pop order. */
  tasks(): Task[] {
    return [...this.heap].sort((a, b) => (before(a, b) ? -1 : 1));
  }

  private removeAt(index: number): void {
    const last = this.heap.pop();
    const removed = this.heap[index];
    if (last === undefined) {
      return;
    }
    if (index === this.heap.length) {
      // removed the tail element itself
      this.positions.delete(last.blockId);
      return;
    }
    if (removed !== undefined) {
      this.positions.delete(removed.blockId);
    }
    this.heap[index] = last;
    this.positions.set(last.blockId, index);
    this.siftDown(index);
    this.siftUp(index);
  }

  private siftUp(start: number): void {
    let index = start;
    while (index > 0) {
      const parent = (index - 1) >> 1;
      if (!this.less(index, parent)) {
        break;
      }
      this.swap(index, parent);
      index = parent;
    }
  }

  private siftDown(start: number): void {
    let index = start;
    const length = this.heap.length;
    for (;;) {
      const left = 2 * index + 1;
      const right = left + 1;
      let smallest = index;
      if (left < length && this.less(left, smallest)) {
        smallest = left;
      }
      if (right < length && this.less(right, smallest)) {
        smallest = right;
      }
      if (smallest === index) {
        return;
      }
      this.swap(index, smallest);
      index = smallest;
    }
  }

  private less(i: number, j: number): boolean {
    const a = this.heap[i];
    const b = this.heap[j];
    return a !== undefined && b !== undefined && before(a, b);
  }

  private swap(i: number, j: number): void {
    const a = this.heap[i];
    const b = this.heap[j];
    if (a === undefined || b === undefined) {
      return;
    }
    this.heap[i] = b;
    this.heap[j] = a;
    this.positions.set(b.blockId, i);
    this.positions.set(a.blockId, j);
  }
}
