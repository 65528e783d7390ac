// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core`
 * Purpose: Scheduler and update-dispatch engine for status-bar blocks.
 * Scope: Re-exports the scheduler, its collaborators, ports, errors and types. Does not contain implementations.
 * Invariants:
 * - FORBIDDEN: logging libraries, protocol serialization, process/OS access
 * - ALLOWED: timers via the inbox only
 * Side-effects: none
 * Links: src/scheduler.ts, DESIGN.md
 * @public
 */

// Errors
export {
  ChannelError,
  type ChannelErrorReason,
  ClickError,
  isChannelError,
  isClickError,
  isRenderError,
  isSignalError,
  RenderError,
  SignalError,
  toRenderError,
} from "./errors";
// Collaborators
export { EventRouter } from "./event-router";
export { FrameAssembler, sameOutput } from "./frame-assembler";
export {
  DEFAULT_INBOX_CAPACITY,
  Inbox,
  MAX_TIMER_DELAY_MS,
  type Receipt,
} from "./inbox";
export type { RenderOutcome, SchedulerMessage } from "./messages";
// Ports
export {
  type Block,
  type Clock,
  type FrameSink,
  type LoggerLike,
  type RerenderSender,
  systemClock,
} from "./ports";
export { RerenderChannel } from "./rerender-channel";
// Scheduler
export {
  errorOutput,
  nextDueTime,
  Scheduler,
  type SchedulerOptions,
} from "./scheduler";
export { TaskQueue } from "./task-queue";
// Types
export {
  type BlockId,
  type ClickEvent,
  every,
  type Frame,
  type FrameBlock,
  type Instant,
  MOUSE_BUTTONS,
  type MouseButton,
  ON_DEMAND,
  ONCE,
  type RenderOutput,
  type RerenderRequest,
  type Task,
  type UpdateDirective,
  WIDGET_STATES,
  type Widget,
  type WidgetState,
} from "./types";
