// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-protocol/theme`
 * Purpose: Per-state colours, separator and icon glyphs applied at serialization time.
 * Scope: Theme types, zod schema for user overrides, defaults and merge. Does not read files.
 * Invariants:
 * - Colours are #rrggbb or #rrggbbaa
 * - idle is uncoloured by default so the bar's own colours apply
 * - Unknown icon names resolve to no glyph
 * Side-effects: none
 * Links: src/serialize.ts, src/icons/default.json
 * @public
 */

import type { WidgetState } from "@barline/bar-core";
import { z } from "zod";

import defaultIcons from "./icons/default.json";

const ColorSchema = z
  .string()
  .regex(/^#[0-9a-fA-F]{6}([0-9a-fA-F]{2})?$/, "expected #rrggbb or #rrggbbaa");

export const StateColorsSchema = z
  .object({
    fg: ColorSchema.optional(),
    bg: ColorSchema.optional(),
    border: ColorSchema.optional(),
  })
  .strict();

export type StateColors = z.infer<typeof StateColorsSchema>;

/** User-facing theme section (YAML keys). Every field is optional. */
export const ThemeOverridesSchema = z
  .object({
    idle: StateColorsSchema.optional(),
    info: StateColorsSchema.optional(),
    good: StateColorsSchema.optional(),
    warning: StateColorsSchema.optional(),
    critical: StateColorsSchema.optional(),
    error: StateColorsSchema.optional(),
    separator: z.string().min(1).optional(),
    separator_width: z.number().int().min(0).max(200).optional(),
  })
  .strict();

export type ThemeOverrides = z.infer<typeof ThemeOverridesSchema>;

export interface Theme {
  readonly states: Readonly<Record<WidgetState, StateColors>>;
  /** Text drawn between blocks; null draws none */
  readonly separator: string | null;
  /** i3bar separator_block_width, in pixels */
  readonly separatorWidth: number;
  readonly icons: Readonly<Record<string, string>>;
}

export const DEFAULT_ICONS: Readonly<Record<string, string>> = defaultIcons;

export const DEFAULT_THEME: Theme = {
  states: {
    idle: {},
    info: { fg: "#93a1a1" },
    good: { fg: "#859900" },
    warning: { fg: "#b58900" },
    critical: { fg: "#dc322f" },
    error: { fg: "#ffffff", bg: "#dc322f" },
  },
  separator: null,
  separatorWidth: 9,
  icons: DEFAULT_ICONS,
};

/**
 * Merges user overrides onto the default theme. State colours merge per field.
 */
export function resolveTheme(
  overrides: ThemeOverrides = {},
  icons: Readonly<Record<string, string>> = {}
): Theme {
  const base = DEFAULT_THEME.states;
  return {
    states: {
      idle: { ...base.idle, ...overrides.idle },
      info: { ...base.info, ...overrides.info },
      good: { ...base.good, ...overrides.good },
      warning: { ...base.warning, ...overrides.warning },
      critical: { ...base.critical, ...overrides.critical },
      error: { ...base.error, ...overrides.error },
    },
    separator: overrides.separator ?? DEFAULT_THEME.separator,
    separatorWidth: overrides.separator_width ?? DEFAULT_THEME.separatorWidth,
    icons: { ...DEFAULT_ICONS, ...icons },
  };
}

export function resolveIcon(theme: Theme, name: string | undefined): string {
  if (name === undefined) {
    return "";
  }
  return theme.icons[name] ?? "";
}
