// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/types`
 * Purpose: Shared block, widget, frame and event type definitions for the scheduling engine.
 * Scope: Defines data shapes and directive constructors. Does not contain scheduling logic.
 * Invariants:
 * - BlockId is the configuration index; stable for the process lifetime
 * - UpdateDirective is immutable once a block is constructed
 * - Frame order is configuration order, never completion order
 * Side-effects: none (constants and types only)
 * Links: src/scheduler.ts, src/frame-assembler.ts
 * @public
 */

/** Configuration index of a block (0, 1, 2, … in declaration order). */
export type BlockId = number;

/** Epoch milliseconds. */
export type Instant = number;

/**
 * Re-render cadence of a block.
 * - every: periodic, anchored to the previous due time
 * - onDemand: only on signal/click/explicit request
 * - once: render at startup, then idle
 */
export type UpdateDirective =
  | { readonly kind: "every"; readonly intervalMs: number }
  | { readonly kind: "onDemand" }
  | { readonly kind: "once" };

export function every(intervalMs: number): UpdateDirective {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new RangeError(`Update interval must be positive, got ${intervalMs}`);
  }
  return { kind: "every", intervalMs };
}

export const ON_DEMAND: UpdateDirective = { kind: "onDemand" };

export const ONCE: UpdateDirective = { kind: "once" };

export const WIDGET_STATES = [
  "idle",
  "info",
  "good",
  "warning",
  "critical",
  "error",
] as const;

export type WidgetState = (typeof WIDGET_STATES)[number];

/** One display unit produced by a block render. */
export interface Widget {
  readonly text: string;
  readonly shortText?: string;
  /** Icon name; resolved to a glyph by the theme at serialization time */
  readonly icon?: string;
  readonly state: WidgetState;
}

/** Widgets produced by one render. Empty is valid (block shows nothing). */
export type RenderOutput = readonly Widget[];

export interface FrameBlock {
  readonly blockId: BlockId;
  /** Position in the configured block list */
  readonly position: number;
  readonly widgets: RenderOutput;
}

/** Latest output of every configured block, in configuration order. */
export type Frame = readonly FrameBlock[];

export const MOUSE_BUTTONS = [
  "left",
  "middle",
  "right",
  "wheelUp",
  "wheelDown",
  "wheelLeft",
  "wheelRight",
  "back",
  "forward",
  "unknown",
] as const;

export type MouseButton = (typeof MOUSE_BUTTONS)[number];

/** Bar click already resolved to the block that emitted the clicked widget. */
export interface ClickEvent {
  readonly blockId: BlockId;
  /** Index of the clicked widget inside the block's output, if known */
  readonly instance: number | null;
  readonly button: MouseButton;
  readonly x: number | null;
  readonly y: number | null;
  readonly relativeX: number | null;
  readonly relativeY: number | null;
  readonly modifiers: readonly string[];
}

export interface RerenderRequest {
  readonly blockId: BlockId;
  readonly requestedAt: Instant;
}

/** Pending render of one block. */
export interface Task {
  readonly blockId: BlockId;
  readonly dueAt: Instant;
}
