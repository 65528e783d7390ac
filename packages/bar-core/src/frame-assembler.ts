// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/frame-assembler`
 * Purpose: Caches the latest render output per block and rebuilds ordered frames.
 * Scope: Output cache, change detection and frame assembly. Does not serialize or write frames.
 * Invariants:
 * - frame() lists blocks in configuration order regardless of update order
 * - update() marks the frame stale only when the output actually changed
 * Side-effects: none
 * Links: src/scheduler.ts, packages/bar-protocol/src/serialize.ts
 * @public
 */

import type { BlockId, Frame, RenderOutput, Widget } from "./types";

function sameWidget(a: Widget, b: Widget): boolean {
  return (
    a.text === b.text &&
    a.shortText === b.shortText &&
    a.icon === b.icon &&
    a.state === b.state
  );
}

export function sameOutput(a: RenderOutput, b: RenderOutput): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((widget, index) => {
    const other = b[index];
    return other !== undefined && sameWidget(widget, other);
  });
}

export class FrameAssembler {
  private readonly order: readonly BlockId[];
  private readonly outputs = new Map<BlockId, RenderOutput>();
  private isStale = false;

  constructor(order: readonly BlockId[]) {
    this.order = [...order];
  }

  get stale(): boolean {
    return this.isStale;
  }

  /**
   * Stores a block's latest output.
   * @returns whether the cached output changed
   */
  update(blockId: BlockId, output: RenderOutput): boolean {
    const previous = this.outputs.get(blockId);
    if (previous !== undefined && sameOutput(previous, output)) {
      return false;
    }
    this.outputs.set(blockId, [...output]);
    this.isStale = true;
    return true;
  }

  output(blockId: BlockId): RenderOutput | undefined {
    return this.outputs.get(blockId);
  }

  frame(): Frame {
    return this.order.map((blockId, position) => ({
      blockId,
      position,
      widgets: this.outputs.get(blockId) ?? [],
    }));
  }

  /** Returns the current frame and clears the stale flag. */
  take(): Frame {
    this.isStale = false;
    return this.frame();
  }
}
