// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/barline/io/frame-writer`
 * Purpose: Frame sink writing the i3bar protocol to a byte stream.
 * Scope: Header and frame lines onto a Writable; output failure detection.
 * Invariants:
 * - The first write error (EPIPE when the bar exits) calls onFatal exactly once
 * - Nothing is written after a failure
 * - While the stream is over its highWaterMark only the latest frame is kept; it is written on "drain"
 * Side-effects: IO (stdout)
 * Links: packages/bar-protocol/src/encoder.ts, src/main.ts
 * @internal
 */

import type { Writable } from "node:stream";

import type { Frame, FrameSink, LoggerLike } from "@barline/bar-core";
import {
  encodeFrame,
  encodeHeader,
  type ProtocolHeader,
  type Theme,
} from "@barline/bar-protocol";

export interface StreamFrameSinkOptions {
  output: Writable;
  theme: Theme;
  logger: LoggerLike;
  onFatal: (error: Error) => void;
}

export class StreamFrameSink implements FrameSink {
  private readonly output: Writable;
  private readonly theme: Theme;
  private readonly logger: LoggerLike;
  private readonly onFatal: (error: Error) => void;
  private failed = false;
  private frames = 0;
  private draining = false;
  private pending: Frame | null = null;

  constructor(options: StreamFrameSinkOptions) {
    this.output = options.output;
    this.theme = options.theme;
    this.logger = options.logger.child({ component: "StreamFrameSink" });
    this.onFatal = options.onFatal;
    this.output.on("error", (error) => this.fail(error));
  }

  get framesWritten(): number {
    return this.frames;
  }

  writeHeader(header?: ProtocolHeader): void {
    this.write(encodeHeader(header));
  }

  emit(frame: Frame): void {
    if (this.draining) {
      if (this.pending !== null) {
        this.logger.debug({}, "Dropped a frame while the bar catches up");
      }
      this.pending = frame;
      return;
    }
    if (this.write(encodeFrame(frame, this.theme))) {
      this.frames += 1;
    }
  }

  private write(text: string): boolean {
    if (this.failed) {
      return false;
    }
    const flowing = this.output.write(text, (error) => {
      if (error) {
        this.fail(error);
      }
    });
    if (!flowing && !this.draining) {
      this.draining = true;
      this.output.once("drain", () => this.onDrain());
    }
    return true;
  }

  private onDrain(): void {
    this.draining = false;
    const frame = this.pending;
    this.pending = null;
    if (frame !== null) {
      this.emit(frame);
    }
  }

  private fail(error: Error): void {
    if (this.failed) {
      return;
    }
    this.failed = true;
    this.pending = null;
    this.logger.error({ err: error }, "Bar output failed");
    this.onFatal(error);
  }
}
