// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/ports/frame-sink`
 * Purpose: Destination for assembled frames (protocol serializer + output stream).
 * Scope: FrameSink interface. Does not define the wire schema.
 * Invariants: emit() writes one frame atomically; called only when the frame changed.
 * Side-effects: none (interface definition only)
 * Links: services/barline/src/io/frame-writer.ts
 * @public
 */

import type { Frame } from "../types";

export interface FrameSink {
  emit(frame: Frame): void;
}
