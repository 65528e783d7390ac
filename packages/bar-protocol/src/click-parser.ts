// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-protocol/click-parser`
 * Purpose: Decodes one line of the bar's click stream into a ClickEvent.
 * Scope: Line framing, zod validation and button mapping. Does not read streams.
 * Invariants:
 * - "[" and blank lines yield null
 * - name must be the decimal block id written by serializeWidget
 * - Any other malformed line throws ClickParseError
 * Side-effects: none
 * Links: src/serialize.ts, services/barline/src/io/click-reader.ts
 * @public
 */

import type { ClickEvent, MouseButton } from "@barline/bar-core";
import { z } from "zod";

import { ClickParseError } from "./errors";

const DECIMAL = /^\d+$/;

export const ClickLineSchema = z.object({
  name: z.string().regex(DECIMAL, "expected a block id"),
  instance: z.string().nullish(),
  button: z.number().int(),
  x: z.number().optional(),
  y: z.number().optional(),
  relative_x: z.number().optional(),
  relative_y: z.number().optional(),
  modifiers: z.array(z.string()).optional(),
});

export type ClickLine = z.infer<typeof ClickLineSchema>;

const BUTTONS: Readonly<Record<number, MouseButton>> = {
  1: "left",
  2: "middle",
  3: "right",
  4: "wheelUp",
  5: "wheelDown",
  6: "wheelLeft",
  7: "wheelRight",
  8: "back",
  9: "forward",
};

export function toMouseButton(button: number): MouseButton {
  return BUTTONS[button] ?? "unknown";
}

function parseInstance(instance: string | null | undefined): number | null {
  if (instance === null || instance === undefined || !DECIMAL.test(instance)) {
    return null;
  }
  return Number(instance);
}

export function parseClickLine(line: string): ClickEvent | null {
  let text = line.trim();
  if (text === "" || text === "[") {
    return null;
  }
  if (text.startsWith(",")) {
    text = text.slice(1).trimStart();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (cause) {
    throw new ClickParseError(line, "invalid JSON", { cause });
  }

  const result = ClickLineSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ClickParseError(line, issues);
  }

  const click = result.data;
  return {
    blockId: Number(click.name),
    instance: parseInstance(click.instance),
    button: toMouseButton(click.button),
    x: click.x ?? null,
    y: click.y ?? null,
    relativeX: click.relative_x ?? null,
    relativeY: click.relative_y ?? null,
    modifiers: click.modifiers ?? [],
  };
}
