// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/tests/inbox`
 * Purpose: Unit tests for the scheduler inbox and the block-facing re-render channel.
 * Scope: Buffering, receive timeouts, close semantics, capacity and ChannelError handling.
 * Invariants: Fake timers; no real waiting.
 * Side-effects: none
 * Links: src/inbox.ts, src/rerender-channel.ts
 * @internal
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ChannelError, isChannelError } from "../src/errors";
import { Inbox, MAX_TIMER_DELAY_MS } from "../src/inbox";
import type { SchedulerMessage } from "../src/messages";
import { RerenderChannel } from "../src/rerender-channel";
import { createMockLogger, START } from "./fixtures";

describe("Inbox", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("delivers buffered messages in order", async () => {
    const inbox = new Inbox<string>();
    inbox.send("a");
    inbox.send("b");

    await expect(inbox.receive()).resolves.toEqual({
      kind: "message",
      message: "a",
    });
    await expect(inbox.receive()).resolves.toEqual({
      kind: "message",
      message: "b",
    });
  });

  it("wakes a pending receive on send", async () => {
    const inbox = new Inbox<string>();
    const receipt = inbox.receive(10_000);

    inbox.send("hello");

    await expect(receipt).resolves.toEqual({ kind: "message", message: "hello" });
    expect(inbox.pending).toBe(0);
  });

  it("times out when nothing arrives", async () => {
    const inbox = new Inbox<string>();
    const receipt = inbox.receive(250);

    await vi.advanceTimersByTimeAsync(250);

    await expect(receipt).resolves.toEqual({ kind: "timeout" });
  });

  it("caps timeouts longer than the timer limit", async () => {
    const inbox = new Inbox<string>();
    let settled = false;
    const receipt = inbox.receive(30 * 24 * 60 * 60 * 1000).then((r) => {
      settled = true;
      return r;
    });

    await vi.advanceTimersByTimeAsync(60_000);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS - 60_000);
    await expect(receipt).resolves.toEqual({ kind: "timeout" });
  });

  it("drains buffered messages after close, then reports closed", async () => {
    const inbox = new Inbox<string>();
    inbox.send("last");
    inbox.close();

    await expect(inbox.receive()).resolves.toEqual({
      kind: "message",
      message: "last",
    });
    await expect(inbox.receive()).resolves.toEqual({ kind: "closed" });
  });

  it("resolves a pending receive with closed", async () => {
    const inbox = new Inbox<string>();
    const receipt = inbox.receive();

    inbox.close();

    await expect(receipt).resolves.toEqual({ kind: "closed" });
  });

  it("rejects sends after close", () => {
    const inbox = new Inbox<string>();
    inbox.close();

    expect(() => inbox.send("late")).toThrow(ChannelError);
  });

  it("rejects sends beyond capacity unless told to ignore it", () => {
    const inbox = new Inbox<string>(2);
    inbox.send("1");
    inbox.send("2");

    let caught: unknown;
    try {
      inbox.send("3");
    } catch (error) {
      caught = error;
    }
    expect(isChannelError(caught) && caught.reason).toBe("full");

    inbox.send("4", { ignoreCapacity: true });
    expect(inbox.pending).toBe(3);
  });

  it("refuses a second concurrent receive", async () => {
    const inbox = new Inbox<string>();
    const first = inbox.receive();

    await expect(inbox.receive()).rejects.toThrow(
      "Inbox already has a pending receive"
    );

    inbox.send("x");
    await expect(first).resolves.toEqual({ kind: "message", message: "x" });
  });
});

describe("RerenderChannel", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("enqueues a request stamped with the current time", async () => {
    const inbox = new Inbox<SchedulerMessage>();
    const channel = new RerenderChannel(inbox, createMockLogger());

    channel.request(4);

    await expect(inbox.receive()).resolves.toEqual({
      kind: "message",
      message: { kind: "rerender", request: { blockId: 4, requestedAt: START } },
    });
  });

  it("logs and drops requests once the inbox is closed", () => {
    const inbox = new Inbox<SchedulerMessage>();
    const logger = createMockLogger();
    const channel = new RerenderChannel(inbox, logger);
    inbox.close();

    expect(() => channel.request(1)).not.toThrow();
    expect(logger.warn).toHaveBeenCalledWith(
      { blockId: 1, reason: "closed" },
      "Dropped re-render request"
    );
  });

  it("logs and drops requests when the inbox is full", () => {
    const inbox = new Inbox<SchedulerMessage>(1);
    const logger = createMockLogger();
    const channel = new RerenderChannel(inbox, logger);

    channel.request(1);
    channel.request(2);

    expect(inbox.pending).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith(
      { blockId: 2, reason: "full" },
      "Dropped re-render request"
    );
  });
});
