// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/messages`
 * Purpose: Messages the scheduler loop consumes from its inbox.
 * Scope: Tagged union of inbound stimuli and render completions. Does not contain handling logic.
 * Invariants: Every message kind is handled by Scheduler.handle (exhaustive switch).
 * Side-effects: none
 * Links: src/scheduler.ts, src/inbox.ts
 * @public
 */

import type { RenderError } from "./errors";
import type {
  BlockId,
  ClickEvent,
  Instant,
  RenderOutput,
  RerenderRequest,
} from "./types";

export type RenderOutcome =
  | { readonly ok: true; readonly output: RenderOutput }
  | { readonly ok: false; readonly error: RenderError };

export type SchedulerMessage =
  | { readonly kind: "rerender"; readonly request: RerenderRequest }
  | { readonly kind: "signal"; readonly signal: number }
  | { readonly kind: "click"; readonly event: ClickEvent }
  | { readonly kind: "refreshAll" }
  | {
      readonly kind: "rendered";
      readonly blockId: BlockId;
      /** Due time of the task that started this render */
      readonly dueAt: Instant;
      readonly outcome: RenderOutcome;
    };
