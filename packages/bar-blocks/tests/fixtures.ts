// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-blocks/tests/fixtures`
 * Purpose: Fake block context for bar-blocks unit tests.
 * Scope: vi.fn-backed runner, launcher, re-render sender and logger.
 * Invariants: Nothing here spawns a process.
 * Side-effects: none
 * Links: tests/*.test.ts
 * @internal
 */

import type { ClickEvent, RerenderSender } from "@barline/bar-core";
import { vi } from "vitest";

import type { BlockContext } from "../src/context";
import type {
  CommandResult,
  CommandRunner,
  ProgramLauncher,
} from "../src/subprocess";

export function createMockLogger() {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export function result(
  stdout: string,
  exitCode = 0,
  stderr = ""
): CommandResult {
  return { stdout, stderr, exitCode };
}

export function createContext() {
  const run = vi.fn<CommandRunner["run"]>();
  const launch = vi.fn<ProgramLauncher["launch"]>();
  launch.mockResolvedValue(undefined);
  const request = vi.fn<RerenderSender["request"]>();
  const logger = createMockLogger();

  const context: BlockContext = {
    rerender: { request },
    runner: { run },
    launcher: { launch },
    logger,
    defaultShell: "sh",
  };
  return { context, run, launch, request, logger };
}

export const LEFT_CLICK: ClickEvent = {
  blockId: 0,
  instance: 0,
  button: "left",
  x: null,
  y: null,
  relativeX: null,
  relativeY: null,
  modifiers: [],
};
