// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-protocol`
 * Purpose: i3bar/swaybar wire protocol: frame encoding, theme and click decoding.
 * Scope: Pure functions and schemas. No stream I/O.
 * Side-effects: none
 * Links: src/encoder.ts, src/click-parser.ts
 * @public
 */

export {
  type ClickLine,
  ClickLineSchema,
  parseClickLine,
  toMouseButton,
} from "./click-parser";
export {
  DEFAULT_HEADER,
  encodeFrame,
  encodeHeader,
  type ProtocolHeader,
} from "./encoder";
export { ClickParseError, isClickParseError } from "./errors";
export { type I3barBlock, serializeFrame, serializeWidget } from "./serialize";
export {
  DEFAULT_ICONS,
  DEFAULT_THEME,
  resolveIcon,
  resolveTheme,
  type StateColors,
  StateColorsSchema,
  type Theme,
  type ThemeOverrides,
  ThemeOverridesSchema,
} from "./theme";
