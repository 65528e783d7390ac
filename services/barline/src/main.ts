// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/barline/main`
 * Purpose: Process entry point with graceful shutdown.
 * Scope: Loads env and config, builds the container, starts the scheduler, click reader and signal handlers.
 *   Does not contain scheduling logic.
 * Invariants:
 *   - stdout carries only the bar protocol; logs go to stderr
 *   - SIGTERM/SIGINT exit 0; broken bar output or startup failure exits 1
 * Side-effects: IO (stdin, stdout, process signals, child processes)
 * Links: src/bootstrap/container.ts, src/signals.ts
 * @public
 */

import { homedir } from "node:os";

import { createContainer } from "./bootstrap/container";
import { env } from "./bootstrap/env";
import { loadConfig, resolveConfigPath } from "./config";
import { startClickReader } from "./io/click-reader";
import { flushLogger, makeLogger } from "./observability/logger";
import { installSignalHandlers } from "./signals";

async function main(): Promise<void> {
  const config = env();
  const logger = makeLogger();

  const configPath = resolveConfigPath({
    argv: process.argv.slice(2),
    env: config,
    homeDir: homedir(),
  });
  const barConfig = loadConfig(configPath);
  logger.info(
    { configPath, blocks: barConfig.blocks.length, logLevel: config.LOG_LEVEL },
    "Configuration loaded"
  );

  const shutdownHandles: Array<() => void | Promise<void>> = [];
  let shuttingDown = false;

  const shutdown = (reason: string, exitCode: number): void => {
    if (shuttingDown) {
      logger.warn({ reason }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;
    logger.info({ reason }, "Shutting down");

    Promise.all(shutdownHandles.map((handle) => handle())).then(
      () => {
        logger.info({}, "Stopped");
        flushLogger();
        process.exit(exitCode);
      },
      (err: unknown) => {
        logger.error({ err }, "Error during shutdown");
        flushLogger();
        process.exit(1);
      }
    );
  };

  const container = createContainer({
    config: barConfig,
    env: config,
    logger,
    output: process.stdout,
    onFatal: () => shutdown("output", 1),
  });
  const { scheduler, sink } = container;

  sink.writeHeader();
  scheduler.start().catch((err: unknown) => {
    logger.error({ err }, "Scheduler failed");
    shutdown("scheduler", 1);
  });
  shutdownHandles.push(() => scheduler.stop());

  const clicks = startClickReader(process.stdin, scheduler, logger);
  shutdownHandles.push(() => clicks.close());

  const uninstall = installSignalHandlers(
    scheduler,
    scheduler.subscribedSignals,
    logger
  );
  shutdownHandles.push(uninstall);

  process.on("SIGTERM", () => shutdown("SIGTERM", 0));
  process.on("SIGINT", () => shutdown("SIGINT", 0));

  logger.info(
    { signals: scheduler.subscribedSignals },
    "barline started"
  );
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  flushLogger();
  process.exit(1);
});
