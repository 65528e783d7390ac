// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-core/tests/fixtures`
 * Purpose: Reusable fakes for bar-core unit tests.
 * Scope: FakeBlock with controllable renders, a mock logger and click-event builder. Does not touch real processes.
 * Invariants: FakeBlock records concurrency so tests can assert at-most-one render per block.
 * Side-effects: none
 * Links: tests/*.test.ts
 * @internal
 */

import { vi } from "vitest";

import type {
  Block,
  BlockId,
  ClickEvent,
  RenderOutput,
  UpdateDirective,
} from "../src";

export const START = Date.parse("2025-01-15T10:00:00.000Z");

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

export function createClick(
  blockId: BlockId,
  overrides?: Partial<ClickEvent>
): ClickEvent {
  return {
    blockId,
    instance: 0,
    button: "left",
    x: 100,
    y: 10,
    relativeX: 4,
    relativeY: 6,
    modifiers: [],
    ...overrides,
  };
}

interface PendingRender {
  resolve: (output: RenderOutput) => void;
  reject: (error: unknown) => void;
}

export interface FakeBlockOptions {
  signals?: number[];
  /** Output of automatic renders; defaults to one idle widget naming the block */
  output?: RenderOutput;
  /** Automatic renders reject with this error */
  fail?: unknown;
  /** Automatic renders settle after this many (fake) milliseconds */
  delayMs?: number;
  /** Renders stay pending until resolveNext()/rejectNext() */
  manual?: boolean;
  onSignal?: (signal: number) => Promise<void>;
  onClick?: (event: ClickEvent) => Promise<void>;
}

export class FakeBlock implements Block {
  readonly signals: readonly number[];
  renders = 0;
  active = 0;
  maxActive = 0;
  readonly renderTimes: number[] = [];
  readonly signalsReceived: number[] = [];
  readonly clicks: ClickEvent[] = [];
  private readonly pending: PendingRender[] = [];

  constructor(
    readonly id: BlockId,
    private readonly directive: UpdateDirective,
    private readonly options: FakeBlockOptions = {}
  ) {
    this.signals = options.signals ?? [];
  }

  updateInterval(): UpdateDirective {
    return this.directive;
  }

  async render(): Promise<RenderOutput> {
    this.renders += 1;
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    this.renderTimes.push(Date.now());
    try {
      return await this.produce();
    } finally {
      this.active -= 1;
    }
  }

  async signal(signal: number): Promise<void> {
    this.signalsReceived.push(signal);
    await this.options.onSignal?.(signal);
  }

  async click(event: ClickEvent): Promise<void> {
    this.clicks.push(event);
    await this.options.onClick?.(event);
  }

  get waiting(): number {
    return this.pending.length;
  }

  resolveNext(output?: RenderOutput): void {
    const next = this.pending.shift();
    if (!next) {
      throw new Error(`Block ${this.id} has no pending render`);
    }
    next.resolve(output ?? this.defaultOutput());
  }

  rejectNext(error: unknown): void {
    const next = this.pending.shift();
    if (!next) {
      throw new Error(`Block ${this.id} has no pending render`);
    }
    next.reject(error);
  }

  private produce(): Promise<RenderOutput> {
    if (this.options.manual) {
      return new Promise((resolve, reject) => {
        this.pending.push({ resolve, reject });
      });
    }
    const { delayMs, fail } = this.options;
    return new Promise((resolve, reject) => {
      const settle = (): void => {
        if (fail !== undefined) {
          reject(fail);
        } else {
          resolve(this.defaultOutput());
        }
      };
      if (delayMs === undefined) {
        settle();
      } else {
        setTimeout(settle, delayMs);
      }
    });
  }

  private defaultOutput(): RenderOutput {
    return this.options.output ?? [{ text: `block-${this.id}`, state: "idle" }];
  }
}
