// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-blocks/context`
 * Purpose: Capabilities handed to every block at construction.
 * Scope: Type only.
 * Side-effects: none
 * Links: src/registry.ts, services/barline/src/bootstrap/container.ts
 * @public
 */

import type { LoggerLike, RerenderSender } from "@barline/bar-core";

import type { CommandRunner, ProgramLauncher } from "./subprocess";

export interface BlockContext {
  rerender: RerenderSender;
  runner: CommandRunner;
  launcher: ProgramLauncher;
  logger: LoggerLike;
  /** Shell used when a block does not configure one */
  defaultShell: string;
}
