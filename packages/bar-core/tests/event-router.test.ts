// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/tests/event-router`
 * Purpose: Unit tests for signal and click routing.
 * Scope: Subscription index, targeted click delivery and handler failure isolation. Does not run the scheduler loop.
 * Invariants: Handlers are fakes; failures must be logged, never thrown.
 * Side-effects: none
 * Links: src/event-router.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { isClickError, isSignalError } from "../src/errors";
import { EventRouter } from "../src/event-router";
import { ON_DEMAND } from "../src/types";
import { createClick, createMockLogger, FakeBlock } from "./fixtures";

const SIGUSR2 = 12;
const SIGHUP = 1;

describe("EventRouter", () => {
  describe("signals", () => {
    it("indexes subscriptions in configuration order", () => {
      const router = new EventRouter(
        [
          new FakeBlock(0, ON_DEMAND, { signals: [SIGUSR2] }),
          new FakeBlock(1, ON_DEMAND),
          new FakeBlock(2, ON_DEMAND, { signals: [SIGUSR2, SIGHUP] }),
        ],
        createMockLogger()
      );

      expect(router.subscribers(SIGUSR2)).toEqual([0, 2]);
      expect(router.subscribers(SIGHUP)).toEqual([2]);
      expect(router.subscribers(99)).toEqual([]);
      expect(router.signals()).toEqual([SIGHUP, SIGUSR2]);
    });

    it("broadcasts to every subscriber and nobody else", async () => {
      const a = new FakeBlock(0, ON_DEMAND, { signals: [SIGUSR2] });
      const b = new FakeBlock(1, ON_DEMAND, { signals: [SIGHUP] });
      const c = new FakeBlock(2, ON_DEMAND, { signals: [SIGUSR2] });
      const router = new EventRouter([a, b, c], createMockLogger());

      await expect(router.dispatchSignal(SIGUSR2)).resolves.toBe(2);

      expect(a.signalsReceived).toEqual([SIGUSR2]);
      expect(b.signalsReceived).toEqual([]);
      expect(c.signalsReceived).toEqual([SIGUSR2]);
    });

    it("keeps delivering when one handler fails", async () => {
      const failing = new FakeBlock(0, ON_DEMAND, {
        signals: [SIGUSR2],
        onSignal: () => Promise.reject(new Error("handler exploded")),
      });
      const healthy = new FakeBlock(1, ON_DEMAND, { signals: [SIGUSR2] });
      const logger = createMockLogger();
      const router = new EventRouter([failing, healthy], logger);

      await expect(router.dispatchSignal(SIGUSR2)).resolves.toBe(2);

      expect(healthy.signalsReceived).toEqual([SIGUSR2]);
      expect(logger.error).toHaveBeenCalledTimes(1);
      const [fields, message] = logger.error.mock.calls[0];
      expect(isSignalError(fields.err)).toBe(true);
      expect(fields.blockId).toBe(0);
      expect(message).toBe("Block 0 failed to handle signal 12");
    });

    it("reports zero deliveries for unsubscribed signals", async () => {
      const router = new EventRouter(
        [new FakeBlock(0, ON_DEMAND)],
        createMockLogger()
      );

      await expect(router.dispatchSignal(SIGHUP)).resolves.toBe(0);
    });
  });

  describe("clicks", () => {
    it("delivers a click only to the addressed block", async () => {
      const blocks = [1, 2, 3].map((id) => new FakeBlock(id, ON_DEMAND));
      const router = new EventRouter(blocks, createMockLogger());

      await expect(router.dispatchClick(createClick(2))).resolves.toBe(true);

      expect(blocks.map((block) => block.clicks.length)).toEqual([0, 1, 0]);
    });

    it("drops clicks for unknown blocks", async () => {
      const logger = createMockLogger();
      const router = new EventRouter([new FakeBlock(0, ON_DEMAND)], logger);

      await expect(router.dispatchClick(createClick(9))).resolves.toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(
        { blockId: 9 },
        "Click for unknown block dropped"
      );
    });

    it("logs a ClickError when the handler throws", async () => {
      const logger = createMockLogger();
      const block = new FakeBlock(0, ON_DEMAND, {
        onClick: () => Promise.reject(new Error("launch failed")),
      });
      const router = new EventRouter([block], logger);

      await expect(
        router.dispatchClick(createClick(0, { button: "right" }))
      ).resolves.toBe(true);

      const [fields, message] = logger.error.mock.calls[0];
      expect(isClickError(fields.err)).toBe(true);
      expect(fields.err.cause).toEqual(new Error("launch failed"));
      expect(message).toBe("Block 0 failed to handle right click");
    });
  });
});
