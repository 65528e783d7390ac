// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-blocks/registry`
 * Purpose: Maps configured block kinds to validated block instances.
 * Scope: BlockKind definition, built-in kinds and createBlock. Does not read config files.
 * Invariants:
 * - Options are validated by the kind's zod schema before construction
 * - Unknown kinds and invalid options are ConfigError, with issues under blocks.<id>
 * Side-effects: none
 * Links: src/custom/custom.schema.ts, services/barline/src/config.ts
 * @public
 */

import type { Block, BlockId } from "@barline/bar-core";
import type { z } from "zod";

import type { BlockContext } from "./context";
import { CustomBlock } from "./custom/custom.block";
import { CustomOptionsSchema } from "./custom/custom.schema";
import { ConfigError, formatIssues } from "./errors";

export interface BlockKind {
  readonly name: string;
  build(id: BlockId, options: unknown, context: BlockContext): Block;
}

export function defineBlockKind<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  create: (id: BlockId, options: z.output<S>, context: BlockContext) => Block
): BlockKind {
  return {
    name,
    build(id, options, context) {
      const result = schema.safeParse(options);
      if (!result.success) {
        throw new ConfigError(formatIssues(result.error, ["blocks", id]));
      }
      return create(id, result.data, context);
    },
  };
}

export const customKind = defineBlockKind(
  "custom",
  CustomOptionsSchema,
  (id, options, context) => new CustomBlock(id, options, context)
);

export const BLOCK_KINDS: ReadonlyMap<string, BlockKind> = new Map([
  [customKind.name, customKind],
]);

export function createBlock(
  id: BlockId,
  kind: string,
  options: unknown,
  context: BlockContext,
  kinds: ReadonlyMap<string, BlockKind> = BLOCK_KINDS
): Block {
  const blockKind = kinds.get(kind);
  if (!blockKind) {
    throw new ConfigError([
      `blocks.${id}.block: unknown block kind "${kind}"; expected one of ${[...kinds.keys()].join(", ")}`,
    ]);
  }
  return blockKind.build(id, options, context);
}
