// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/barline/bootstrap/container`
 * Purpose: Composition root wiring blocks, scheduler and bar output.
 * Scope: Object construction only. Does not start anything or touch process handlers.
 * Invariants: Block option errors across all blocks are reported in one ConfigError.
 * Side-effects: none
 * Links: src/main.ts, src/config.ts
 * @internal
 */

import type { Writable } from "node:stream";

import {
  type BlockContext,
  type CommandRunner,
  ConfigError,
  createBlock,
  DetachedLauncher,
  ExecFileRunner,
  isConfigError,
  type ProgramLauncher,
} from "@barline/bar-blocks";
import {
  type Block,
  type Clock,
  Inbox,
  type LoggerLike,
  RerenderChannel,
  Scheduler,
  type SchedulerMessage,
} from "@barline/bar-core";

import type { BarConfig, BlockSpec } from "../config";
import { StreamFrameSink } from "../io/frame-writer";
import type { Env } from "./env";

export interface ContainerDeps {
  config: BarConfig;
  env: Pick<Env, "SHELL">;
  logger: LoggerLike;
  output: Writable;
  onFatal: (error: Error) => void;
  runner?: CommandRunner;
  launcher?: ProgramLauncher;
  clock?: Clock;
}

export interface Container {
  scheduler: Scheduler;
  sink: StreamFrameSink;
  blocks: readonly Block[];
}

export function buildBlocks(
  specs: readonly BlockSpec[],
  context: BlockContext
): Block[] {
  const blocks: Block[] = [];
  const issues: string[] = [];
  for (const spec of specs) {
    try {
      blocks.push(createBlock(spec.id, spec.kind, spec.options, context));
    } catch (error) {
      if (!isConfigError(error)) {
        throw error;
      }
      issues.push(...error.issues);
    }
  }
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return blocks;
}

export function createContainer(deps: ContainerDeps): Container {
  const { config, logger, clock } = deps;
  const inbox = new Inbox<SchedulerMessage>();

  const context: BlockContext = {
    rerender: new RerenderChannel(inbox, logger, clock),
    runner: deps.runner ?? new ExecFileRunner(),
    launcher: deps.launcher ?? new DetachedLauncher(),
    logger,
    defaultShell: deps.env.SHELL,
  };
  const blocks = buildBlocks(config.blocks, context);

  const sink = new StreamFrameSink({
    output: deps.output,
    theme: config.theme,
    logger,
    onFatal: deps.onFatal,
  });
  const scheduler = new Scheduler({ blocks, inbox, sink, logger, clock });

  return { scheduler, sink, blocks };
}
