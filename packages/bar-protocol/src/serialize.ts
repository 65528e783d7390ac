// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-protocol/serialize`
 * Purpose: Converts an assembled frame into i3bar protocol blocks.
 * Scope: Pure mapping from Frame + Theme to wire objects. Does not write to streams.
 * Invariants:
 * - name is the block id and instance the widget index, both decimal strings
 * - Unset colours are omitted, never emitted as null
 * - Separator widgets sit between blocks with output, never after the last one
 * Side-effects: none
 * Links: src/theme.ts, src/click-parser.ts (reverse mapping of name/instance)
 * @public
 */

import type { BlockId, Frame, Widget } from "@barline/bar-core";

import { resolveIcon, type Theme } from "./theme";

/** One entry of an i3bar status line array. */
export interface I3barBlock {
  full_text: string;
  short_text?: string;
  name?: string;
  instance?: string;
  color?: string;
  background?: string;
  border?: string;
  separator: false;
  separator_block_width: number;
  markup: "none";
}

function withGlyph(glyph: string, text: string): string {
  return glyph === "" ? text : `${glyph} ${text}`;
}

export function serializeWidget(
  blockId: BlockId,
  index: number,
  widget: Widget,
  theme: Theme
): I3barBlock {
  const glyph = resolveIcon(theme, widget.icon);
  const colors = theme.states[widget.state];
  const block: I3barBlock = {
    full_text: withGlyph(glyph, widget.text),
    name: String(blockId),
    instance: String(index),
    separator: false,
    separator_block_width: theme.separatorWidth,
    markup: "none",
  };
  if (widget.shortText !== undefined) {
    block.short_text = withGlyph(glyph, widget.shortText);
  }
  if (colors.fg !== undefined) {
    block.color = colors.fg;
  }
  if (colors.bg !== undefined) {
    block.background = colors.bg;
  }
  if (colors.border !== undefined) {
    block.border = colors.border;
  }
  return block;
}

function separatorBlock(text: string, theme: Theme): I3barBlock {
  return {
    full_text: text,
    separator: false,
    separator_block_width: theme.separatorWidth,
    markup: "none",
  };
}

export function serializeFrame(frame: Frame, theme: Theme): I3barBlock[] {
  const out: I3barBlock[] = [];
  let hasOutput = false;
  for (const entry of frame) {
    if (entry.widgets.length === 0) {
      continue;
    }
    if (hasOutput && theme.separator !== null) {
      out.push(separatorBlock(theme.separator, theme));
    }
    entry.widgets.forEach((widget, index) => {
      out.push(serializeWidget(entry.blockId, index, widget, theme));
    });
    hasOutput = true;
  }
  return out;
}
