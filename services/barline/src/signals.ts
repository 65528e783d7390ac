// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/barline/signals`
 * Purpose: Installs OS signal handlers that feed the scheduler.
 * Scope: SIGUSR1 refresh and per-block subscriptions. Shutdown signals live in main.ts.
 * Invariants: The returned function removes every handler it installed.
 * Side-effects: process signal handlers
 * Links: packages/bar-blocks/src/signals.ts, src/main.ts
 * @internal
 */

import { signalName } from "@barline/bar-blocks";
import type { LoggerLike } from "@barline/bar-core";

export const REFRESH_SIGNAL = "SIGUSR1";

export interface SignalTarget {
  refreshAll(): void;
  signal(signal: number): void;
}

export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

export function installSignalHandlers(
  target: SignalTarget,
  subscribed: readonly number[],
  logger: LoggerLike,
  source: SignalSource = process
): () => void {
  const installed: Array<[NodeJS.Signals, () => void]> = [];
  const listen = (name: NodeJS.Signals, listener: () => void): void => {
    source.on(name, listener);
    installed.push([name, listener]);
  };

  listen(REFRESH_SIGNAL, () => {
    logger.info({ signal: REFRESH_SIGNAL }, "Refreshing all blocks");
    target.refreshAll();
  });

  for (const signal of subscribed) {
    const name = signalName(signal);
    if (name === undefined) {
      logger.warn({ signal }, "Signal cannot be handled on this platform");
      continue;
    }
    listen(name, () => target.signal(signal));
  }

  return () => {
    for (const [name, listener] of installed) {
      source.off(name, listener);
    }
  };
}
