// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-protocol/tests/serialize`
 * Purpose: Unit tests for frame serialization, theming and stream framing.
 * Scope: serializeFrame, resolveTheme, encodeHeader, encodeFrame.
 * Invariants: Pure; no streams.
 * Side-effects: none
 * Links: src/serialize.ts, src/theme.ts, src/encoder.ts
 * @internal
 */

import type { Frame } from "@barline/bar-core";
import { describe, expect, it } from "vitest";

import { encodeFrame, encodeHeader } from "../src/encoder";
import { serializeFrame } from "../src/serialize";
import {
  DEFAULT_THEME,
  resolveTheme,
  ThemeOverridesSchema,
} from "../src/theme";

describe("serializeFrame", () => {
  it("names widgets by block id and widget index", () => {
    const frame: Frame = [
      {
        blockId: 3,
        position: 0,
        widgets: [
          { text: "a", state: "idle" },
          { text: "b", state: "idle" },
        ],
      },
    ];

    expect(serializeFrame(frame, DEFAULT_THEME)).toEqual([
      {
        full_text: "a",
        name: "3",
        instance: "0",
        separator: false,
        separator_block_width: 9,
        markup: "none",
      },
      {
        full_text: "b",
        name: "3",
        instance: "1",
        separator: false,
        separator_block_width: 9,
        markup: "none",
      },
    ]);
  });

  it("prefixes resolved icon glyphs and applies state colours", () => {
    const frame: Frame = [
      {
        blockId: 0,
        position: 0,
        widgets: [
          { text: "93%", shortText: "93", icon: "cpu", state: "warning" },
        ],
      },
    ];

    const [block] = serializeFrame(frame, DEFAULT_THEME);
    expect(block).toEqual({
      full_text: "CPU 93%",
      short_text: "CPU 93",
      name: "0",
      instance: "0",
      color: "#b58900",
      separator: false,
      separator_block_width: 9,
      markup: "none",
    });
  });

  it("ignores icons the theme does not know", () => {
    const frame: Frame = [
      {
        blockId: 0,
        position: 0,
        widgets: [{ text: "x", icon: "no-such-icon", state: "idle" }],
      },
    ];

    expect(serializeFrame(frame, DEFAULT_THEME)[0].full_text).toBe("x");
  });

  it("colours error widgets with foreground and background", () => {
    const frame: Frame = [
      {
        blockId: 0,
        position: 0,
        widgets: [{ text: "boom", state: "error" }],
      },
    ];

    const [block] = serializeFrame(frame, DEFAULT_THEME);
    expect(block.color).toBe("#ffffff");
    expect(block.background).toBe("#dc322f");
    expect(block.border).toBeUndefined();
  });

  it("places separators only between blocks that produced output", () => {
    const theme = resolveTheme({ separator: "|", separator_width: 4 });
    const frame: Frame = [
      { blockId: 0, position: 0, widgets: [{ text: "a", state: "idle" }] },
      { blockId: 1, position: 1, widgets: [] },
      { blockId: 2, position: 2, widgets: [{ text: "c", state: "idle" }] },
      { blockId: 3, position: 3, widgets: [] },
    ];

    expect(
      serializeFrame(frame, theme).map((block) => [
        block.full_text,
        block.name,
      ])
    ).toEqual([
      ["a", "0"],
      ["|", undefined],
      ["c", "2"],
    ]);
    expect(serializeFrame(frame, theme)[1].separator_block_width).toBe(4);
  });

  it("serializes an all-empty frame as an empty array", () => {
    expect(
      serializeFrame([{ blockId: 0, position: 0, widgets: [] }], DEFAULT_THEME)
    ).toEqual([]);
  });
});

describe("resolveTheme", () => {
  it("merges state colours per field", () => {
    const theme = resolveTheme({ error: { bg: "#000000" } });

    expect(theme.states.error).toEqual({ fg: "#ffffff", bg: "#000000" });
    expect(theme.states.idle).toEqual({});
    expect(theme.separator).toBeNull();
    expect(theme.separatorWidth).toBe(9);
  });

  it("layers icon overrides on the default set", () => {
    const theme = resolveTheme({}, { cpu: "C", custom: "*" });

    expect(theme.icons.cpu).toBe("C");
    expect(theme.icons.custom).toBe("*");
    expect(theme.icons.time).toBe("TIME");
  });

  it("rejects malformed colours and unknown keys", () => {
    expect(
      ThemeOverridesSchema.safeParse({ good: { fg: "green" } }).success
    ).toBe(false);
    expect(ThemeOverridesSchema.safeParse({ shiny: true }).success).toBe(false);
    expect(
      ThemeOverridesSchema.safeParse({ good: { fg: "#00ff0080" } }).success
    ).toBe(true);
  });
});

describe("encoder", () => {
  it("writes the header and opens the frame array", () => {
    expect(encodeHeader()).toBe('{"version":1,"click_events":true}\n[\n');
  });

  it("writes one comma-terminated line per frame", () => {
    const frame: Frame = [
      { blockId: 0, position: 0, widgets: [{ text: "hi", state: "idle" }] },
    ];

    expect(encodeFrame(frame, DEFAULT_THEME)).toBe(
      '[{"full_text":"hi","name":"0","instance":"0","separator":false,"separator_block_width":9,"markup":"none"}],\n'
    );
  });
});
