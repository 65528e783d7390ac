// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-blocks`
 * Purpose: Block catalogue and the adapters blocks run commands through.
 * Scope: Public exports only.
 * Side-effects: none
 * Links: src/registry.ts
 * @public
 */

export type { BlockContext } from "./context";
export { CustomBlock } from "./custom/custom.block";
export {
  CustomJsonOutputSchema,
  type CustomOptions,
  CustomOptionsSchema,
  toDirective,
} from "./custom/custom.schema";
export {
  CommandError,
  type CommandFailure,
  ConfigError,
  formatIssues,
  isCommandError,
  isConfigError,
} from "./errors";
export {
  BLOCK_KINDS,
  type BlockKind,
  createBlock,
  customKind,
  defineBlockKind,
} from "./registry";
export {
  SUBSCRIBABLE_SIGNALS,
  type SubscribableSignal,
  signalName,
  toSubscribableSignal,
} from "./signals";
export {
  type CommandResult,
  type CommandRunner,
  DetachedLauncher,
  ExecFileRunner,
  type ProgramLauncher,
  type RunOptions,
  toCommandResult,
} from "./subprocess";
