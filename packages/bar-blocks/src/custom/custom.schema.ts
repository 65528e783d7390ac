// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-blocks/custom/custom.schema`
 * Purpose: Options of the `custom` block and the JSON shape its commands may print.
 * Scope: zod schemas and the interval to UpdateDirective mapping.
 * Invariants:
 * - Keys are snake_case, unknown keys are rejected
 * - command and cycle are mutually exclusive
 * - Durations are given in seconds
 * Side-effects: none
 * Links: src/custom/custom.block.ts
 * @public
 */

import {
  every,
  ON_DEMAND,
  ONCE,
  type UpdateDirective,
  WIDGET_STATES,
} from "@barline/bar-core";
import { z } from "zod";

import { SUBSCRIBABLE_SIGNALS, toSubscribableSignal } from "../signals";

const SecondsSchema = z.number().positive();

const IntervalSchema = z.union([
  SecondsSchema,
  z.literal("once"),
  z.literal("on-demand"),
]);

export type Interval = z.infer<typeof IntervalSchema>;

const SignalSchema = z
  .union([z.string(), z.number().int()])
  .transform((value, ctx) => {
    const signal = toSubscribableSignal(value);
    if (signal === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `unsupported signal ${value}; expected one of ${SUBSCRIBABLE_SIGNALS.join(", ")}`,
      });
      return z.NEVER;
    }
    return signal;
  });

export const CustomOptionsSchema = z
  .object({
    interval: IntervalSchema.default(10),
    command: z.string().min(1).optional(),
    cycle: z.array(z.string().min(1)).nonempty().optional(),
    on_click: z.string().min(1).optional(),
    signal: SignalSchema.optional(),
    json: z.boolean().default(false),
    hide_when_empty: z.boolean().default(false),
    shell: z.string().min(1).optional(),
    timeout: SecondsSchema.optional(),
  })
  .strict()
  .superRefine((options, ctx) => {
    if (options.command !== undefined && options.cycle !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["cycle"],
        message: "command and cycle are mutually exclusive",
      });
    }
  });

export type CustomOptions = z.output<typeof CustomOptionsSchema>;

/** What a command prints when `json: true`. */
export const CustomJsonOutputSchema = z.object({
  text: z.string(),
  short_text: z.string().optional(),
  icon: z.string().optional(),
  state: z.enum(WIDGET_STATES).default("idle"),
});

export function toDirective(interval: Interval): UpdateDirective {
  switch (interval) {
    case "once":
      return ONCE;
    case "on-demand":
      return ON_DEMAND;
    default:
      return every(interval * 1000);
  }
}
