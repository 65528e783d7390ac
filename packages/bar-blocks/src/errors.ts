// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-blocks/errors`
 * Purpose: Configuration and subprocess errors shared by block kinds and the service.
 * Scope: ConfigError, CommandError, guards and zod issue formatting.
 * Invariants: ConfigError lists every issue as `path: message`
 * Side-effects: none
 * Links: src/registry.ts, src/subprocess.ts
 * @public
 */

import type { z } from "zod";

export class ConfigError extends Error {
  constructor(
    public readonly issues: readonly string[],
    options?: { cause?: unknown }
  ) {
    super(
      `Invalid configuration:\n${issues.map((issue) => `  ${issue}`).join("\n")}`,
      options
    );
    this.name = "ConfigError";
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof Error && error.name === "ConfigError";
}

/** Flattens zod issues to `path: message` lines, optionally under a path prefix. */
export function formatIssues(
  error: z.ZodError,
  prefix: readonly (string | number)[] = []
): string[] {
  return error.errors.map((issue) => {
    const path = [...prefix, ...issue.path].join(".");
    return `${path || "(root)"}: ${issue.message}`;
  });
}

export type CommandFailure = "notFound" | "timeout" | "spawn";

/** A command could not produce an exit status (missing binary, timeout, spawn failure). */
export class CommandError extends Error {
  constructor(
    public readonly file: string,
    public readonly reason: CommandFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "CommandError";
  }
}

export function isCommandError(error: unknown): error is CommandError {
  return error instanceof Error && error.name === "CommandError";
}
