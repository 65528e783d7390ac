// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-protocol/encoder`
 * Purpose: Text framing of the i3bar output stream.
 * Scope: Header and per-frame lines. Writing the text is the caller's concern.
 * Invariants: Output is a header line, a "[" line, then one "<array>," line per frame.
 * Side-effects: none
 * Links: src/serialize.ts, services/barline/src/io/frame-writer.ts
 * @public
 */

import type { Frame } from "@barline/bar-core";

import { serializeFrame } from "./serialize";
import type { Theme } from "./theme";

export interface ProtocolHeader {
  version: 1;
  click_events: boolean;
}

export const DEFAULT_HEADER: ProtocolHeader = {
  version: 1,
  click_events: true,
};

/** Header line plus the line opening the infinite frame array. */
export function encodeHeader(header: ProtocolHeader = DEFAULT_HEADER): string {
  return `${JSON.stringify(header)}\n[\n`;
}

export function encodeFrame(frame: Frame, theme: Theme): string {
  return `${JSON.stringify(serializeFrame(frame, theme))},\n`;
}
