// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-blocks/subprocess`
 * Purpose: Ports and child_process adapters for running block commands.
 * Scope: CommandRunner (captured output, exit status) and ProgramLauncher (fire-and-forget).
 * Invariants:
 * - run() resolves on any exit status; it rejects only with CommandError
 * - Launched programs are detached, unref'd and have ignored stdio
 * Side-effects: IO (subprocess execution)
 * Links: src/custom/custom.block.ts
 * @public
 */

import { type ExecFileException, execFile, spawn } from "node:child_process";

import { CommandError } from "./errors";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  /** Kill the command after this many milliseconds */
  timeoutMs?: number;
}

export interface CommandRunner {
  run(file: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

export interface ProgramLauncher {
  /** Resolves once the program started; the caller never waits for its exit. */
  launch(file: string, args: readonly string[]): Promise<void>;
}

const MAX_BUFFER = 1024 * 1024;

/**
 * Maps an execFile callback to a result, or to the CommandError explaining
 * why there is no exit status.
 */
export function toCommandResult(
  file: string,
  error: ExecFileException | null,
  stdout: string,
  stderr: string
): CommandResult {
  if (!error) {
    return { stdout, stderr, exitCode: 0 };
  }
  if (error.killed) {
    throw new CommandError(file, "timeout", `${file} timed out`, {
      cause: error,
    });
  }
  if (typeof error.code === "number") {
    return { stdout, stderr, exitCode: error.code };
  }
  if (error.code === "ENOENT") {
    throw new CommandError(file, "notFound", `${file}: command not found`, {
      cause: error,
    });
  }
  throw new CommandError(file, "spawn", `${file} failed: ${error.message}`, {
    cause: error,
  });
}

export class ExecFileRunner implements CommandRunner {
  run(
    file: string,
    args: readonly string[],
    options: RunOptions = {}
  ): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      execFile(
        file,
        args,
        {
          encoding: "utf8",
          timeout: options.timeoutMs ?? 0,
          maxBuffer: MAX_BUFFER,
        },
        (error, stdout, stderr) => {
          try {
            resolve(toCommandResult(file, error, stdout, stderr));
          } catch (failure) {
            reject(failure);
          }
        }
      );
    });
  }
}

export class DetachedLauncher implements ProgramLauncher {
  launch(file: string, args: readonly string[]): Promise<void> {
    return new Promise((resolve, reject) => {
      const child = spawn(file, args, { detached: true, stdio: "ignore" });
      child.once("error", (error) => {
        reject(
          new CommandError(file, "spawn", `${file} failed to start`, {
            cause: error,
          })
        );
      });
      child.once("spawn", () => {
        child.unref();
        resolve();
      });
    });
  }
}
