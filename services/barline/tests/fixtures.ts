// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/barline/tests/fixtures`
 * Purpose: In-memory streams and a mock logger for service tests.
 * Scope: Test helpers only.
 * Side-effects: none
 * Links: tests/*.test.ts
 * @internal
 */

import { Writable } from "node:stream";

import { vi } from "vitest";

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

/** Writable that keeps everything written to it. */
export function createOutput() {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf8"));
      callback();
    },
  });
  return { output, text: () => chunks.join("") };
}

/** Writable with a one-byte highWaterMark that completes writes only on release(). */
export function createSlowOutput() {
  const chunks: string[] = [];
  const held: Array<() => void> = [];
  const output = new Writable({
    highWaterMark: 1,
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf8"));
      held.push(() => callback());
    },
  });
  const release = () => {
    for (const done of held.splice(0)) {
      done();
    }
  };
  return { output, chunks, release };
}

/** Writable whose every write fails like a closed pipe. */
export function createBrokenOutput() {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback(Object.assign(new Error("write EPIPE"), { code: "EPIPE" }));
    },
  });
}

export function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
