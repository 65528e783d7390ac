// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/barline/config`
 * Purpose: Locates, reads and validates the YAML bar configuration.
 * Scope: Path resolution, YAML parsing, top-level schema and theme resolution.
 *   Block options are validated later by the block registry.
 * Invariants:
 * - Every failure is a ConfigError listing `path: message` issues
 * - Block ids are list indices
 * Side-effects: IO (reads the config file)
 * Links: src/bootstrap/container.ts, packages/bar-blocks/src/registry.ts
 * @public
 */

import fs from "node:fs";
import path from "node:path";

import { ConfigError, formatIssues } from "@barline/bar-blocks";
import type { BlockId } from "@barline/bar-core";
import {
  resolveTheme,
  type Theme,
  ThemeOverridesSchema,
} from "@barline/bar-protocol";
import { parse } from "yaml";
import { z } from "zod";

const BlockEntrySchema = z
  .object({ block: z.string().min(1) })
  .passthrough();

export const BarConfigSchema = z
  .object({
    theme: ThemeOverridesSchema.default({}),
    icons: z.record(z.string()).default({}),
    blocks: z.array(BlockEntrySchema).min(1, "at least one block is required"),
  })
  .strict();

export interface BlockSpec {
  id: BlockId;
  kind: string;
  /** Remaining keys of the entry, validated by the block kind */
  options: Record<string, unknown>;
}

export interface BarConfig {
  theme: Theme;
  blocks: BlockSpec[];
}

export interface ConfigLocation {
  /** Command line arguments after the script name */
  argv: readonly string[];
  env: { BARLINE_CONFIG?: string; XDG_CONFIG_HOME?: string };
  homeDir: string;
}

export function resolveConfigPath({ argv, env, homeDir }: ConfigLocation): string {
  const [fromArgs] = argv;
  if (fromArgs) {
    return path.resolve(fromArgs);
  }
  if (env.BARLINE_CONFIG) {
    return path.resolve(env.BARLINE_CONFIG);
  }
  const base = env.XDG_CONFIG_HOME ?? path.join(homeDir, ".config");
  return path.join(base, "barline", "config.yaml");
}

export function parseConfig(content: string, source: string): BarConfig {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (cause) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    throw new ConfigError([`${source}: ${detail}`], { cause });
  }

  const result = BarConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }

  const { theme, icons, blocks } = result.data;
  return {
    theme: resolveTheme(theme, icons),
    blocks: blocks.map(({ block, ...options }, id) => ({
      id,
      kind: block,
      options,
    })),
  };
}

export function loadConfig(configPath: string): BarConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError([`${configPath}: file not found`]);
  }
  const content = fs.readFileSync(configPath, "utf8");
  return parseConfig(content, configPath);
}
