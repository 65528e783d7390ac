// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/barline/tests/click-reader`
 * Purpose: Unit tests for the stdin click reader.
 * Scope: Line delivery, malformed input and end of input.
 * Invariants: Input is an in-memory PassThrough.
 * Side-effects: none
 * Links: src/io/click-reader.ts
 * @internal
 */

import { PassThrough } from "node:stream";

import { describe, expect, it, vi } from "vitest";

import { startClickReader } from "../src/io/click-reader";
import { createMockLogger } from "./fixtures";

describe("startClickReader", () => {
  it("forwards parsed clicks and skips framing lines", async () => {
    const input = new PassThrough();
    const click = vi.fn();
    const reader = startClickReader(input, { click }, createMockLogger());

    input.end('[\n{"name":"1","button":1}\n,{"name":"0","instance":"2","button":3}\n');
    await reader.closed;

    expect(click).toHaveBeenCalledTimes(2);
    expect(click.mock.calls[0][0]).toMatchObject({ blockId: 1, button: "left" });
    expect(click.mock.calls[1][0]).toMatchObject({
      blockId: 0,
      instance: 2,
      button: "right",
    });
  });

  it("logs malformed lines and keeps reading", async () => {
    const input = new PassThrough();
    const click = vi.fn();
    const logger = createMockLogger();
    const reader = startClickReader(input, { click }, logger);

    input.end('not json\n{"name":"2","button":2}\n');
    await reader.closed;

    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ line: "not json" }),
      "Ignoring malformed click event"
    );
    expect(click).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith({}, "Click input closed");
  });

  it("logs failures of the click target", async () => {
    const input = new PassThrough();
    const logger = createMockLogger();
    const click = vi.fn(() => {
      throw new Error("inbox gone");
    });
    const reader = startClickReader(input, { click }, logger);

    input.end('{"name":"0","button":1}\n');
    await reader.closed;

    expect(logger.error).toHaveBeenCalledWith(
      { err: expect.any(Error) },
      "Click handling failed"
    );
  });

  it("stops on close()", async () => {
    const input = new PassThrough();
    const reader = startClickReader(input, { click: vi.fn() }, createMockLogger());

    reader.close();

    await expect(reader.closed).resolves.toBeUndefined();
  });
});
