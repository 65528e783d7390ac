// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-blocks/signals`
 * Purpose: Signals a block may subscribe to, by name or platform number.
 * Scope: Name/number lookup through os.constants.signals.
 * Invariants:
 * - SIGUSR1 is reserved for refreshing every block
 * - SIGTERM/SIGINT are reserved for shutdown
 * - Signals the platform does not define resolve to undefined
 * Side-effects: none
 * Links: src/custom/custom.schema.ts, services/barline/src/signals.ts
 * @public
 */

import { constants } from "node:os";

export const SUBSCRIBABLE_SIGNALS = [
  "SIGHUP",
  "SIGUSR2",
  "SIGWINCH",
  "SIGCONT",
  "SIGTTIN",
  "SIGTTOU",
  "SIGURG",
  "SIGPWR",
] as const satisfies readonly NodeJS.Signals[];

export type SubscribableSignal = (typeof SUBSCRIBABLE_SIGNALS)[number];

function platformNumber(name: SubscribableSignal): number | undefined {
  const value: number | undefined = constants.signals[name];
  return value;
}

export function signalName(signal: number): SubscribableSignal | undefined {
  return SUBSCRIBABLE_SIGNALS.find((name) => platformNumber(name) === signal);
}

/**
 * Resolves "SIGHUP", "HUP" or a platform signal number to the number a block
 * subscribes to. Returns undefined for reserved, unknown or unsupported signals.
 */
export function toSubscribableSignal(value: string | number): number | undefined {
  if (typeof value === "number") {
    return signalName(value) === undefined ? undefined : value;
  }
  const upper = value.toUpperCase();
  const wanted = upper.startsWith("SIG") ? upper : `SIG${upper}`;
  const name = SUBSCRIBABLE_SIGNALS.find((candidate) => candidate === wanted);
  return name === undefined ? undefined : platformNumber(name);
}
