// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/barline/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Env parsing only. Does not read the config file.
 * Invariants:
 * - Empty strings count as unset
 * - Fails fast with every invalid variable listed
 * Side-effects: Reads process.env
 * Links: src/config.ts, src/main.ts
 * @internal
 */

import { z } from "zod";

const optionalString = z
  .string()
  .min(1)
  .optional()
  .or(z.literal("").transform(() => undefined));

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

const EnvSchema = z.object({
  /** Log level (default: info) */
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),

  /** Config file path, when not given on the command line */
  BARLINE_CONFIG: optionalString,

  /** Base directory for the default config location */
  XDG_CONFIG_HOME: optionalString,

  /** Shell for block commands that do not name one */
  SHELL: z
    .string()
    .min(1)
    .default("sh")
    .or(z.literal("").transform(() => "sh")),

  /** Service name for logging (default: barline) */
  SERVICE_NAME: z.string().min(1).default("barline"),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
