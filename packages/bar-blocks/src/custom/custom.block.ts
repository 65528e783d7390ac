// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@barline/bar-blocks/custom/custom.block`
 * Purpose: Block showing the output of a shell command, optionally cycling between commands on click.
 * Scope: Command execution through the CommandRunner port, output parsing, click and signal handling.
 * Invariants:
 * - Non-zero exit with output still displays the output
 * - Non-zero exit without output is a RenderError naming the exit code
 * - The cycle position only changes on click
 * - Click and signal handlers never render; they request a re-render
 * - A failed click launch is logged; the cycle still advances
 * Side-effects: IO (via CommandRunner / ProgramLauncher)
 * Links: src/custom/custom.schema.ts, packages/bar-core/src/ports/block.port.ts
 * @public
 */

import {
  type Block,
  type BlockId,
  ClickError,
  type ClickEvent,
  type LoggerLike,
  RenderError,
  type RenderOutput,
  type UpdateDirective,
  type Widget,
} from "@barline/bar-core";

import type { BlockContext } from "../context";
import { isCommandError } from "../errors";
import type { CommandResult } from "../subprocess";
import {
  CustomJsonOutputSchema,
  type CustomOptions,
  toDirective,
} from "./custom.schema";

export class CustomBlock implements Block {
  readonly signals: readonly number[];
  private readonly directive: UpdateDirective;
  private readonly shell: string;
  private readonly logger: LoggerLike;
  private cycleIndex = 0;

  constructor(
    readonly id: BlockId,
    private readonly options: CustomOptions,
    private readonly context: BlockContext
  ) {
    this.signals = options.signal === undefined ? [] : [options.signal];
    this.directive = toDirective(options.interval);
    this.shell = options.shell ?? context.defaultShell;
    this.logger = context.logger.child({ component: "CustomBlock", blockId: id });
  }

  updateInterval(): UpdateDirective {
    return this.directive;
  }

  /** Command the next render runs. */
  get activeCommand(): string {
    const { cycle, command } = this.options;
    if (cycle) {
      return cycle[this.cycleIndex % cycle.length] ?? "";
    }
    return command ?? "";
  }

  async render(): Promise<RenderOutput> {
    const result = await this.execute(this.activeCommand);
    const stdout = result.stdout.trim();

    if (result.exitCode !== 0 && stdout === "") {
      const reason = result.stderr.trim().split("\n")[0] ?? "";
      throw new RenderError(
        this.id,
        reason === ""
          ? `Command exited with code ${result.exitCode}`
          : `Command exited with code ${result.exitCode}: ${reason}`
      );
    }

    const widget = this.options.json
      ? this.parseJson(stdout)
      : { text: stdout, state: "idle" as const };
    if (widget.text === "" && this.options.hide_when_empty) {
      return [];
    }
    return [widget];
  }

  async signal(signal: number): Promise<void> {
    if (this.signals.includes(signal)) {
      this.context.rerender.request(this.id);
    }
  }

  async click(event: ClickEvent): Promise<void> {
    let changed = false;

    if (this.options.on_click !== undefined) {
      try {
        await this.context.launcher.launch(this.shell, [
          "-c",
          this.options.on_click,
        ]);
        this.logger.debug({ button: event.button }, "Launched click command");
      } catch (cause) {
        const err = new ClickError(
          this.id,
          `Block ${this.id} failed to launch its click command`,
          { cause }
        );
        this.logger.error({ err, button: event.button }, err.message);
      }
      changed = true;
    }

    const { cycle } = this.options;
    if (cycle) {
      this.cycleIndex = (this.cycleIndex + 1) % cycle.length;
      changed = true;
    }

    if (changed) {
      this.context.rerender.request(this.id);
    }
  }

  private async execute(command: string): Promise<CommandResult> {
    const timeoutMs =
      this.options.timeout === undefined
        ? undefined
        : this.options.timeout * 1000;
    try {
      return await this.context.runner.run(this.shell, ["-c", command], {
        timeoutMs,
      });
    } catch (error) {
      if (isCommandError(error)) {
        throw new RenderError(this.id, error.message, { cause: error });
      }
      throw error;
    }
  }

  private parseJson(stdout: string): Widget {
    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch (cause) {
      const detail = cause instanceof Error ? cause.message : String(cause);
      throw new RenderError(this.id, `Error parsing JSON: ${detail}`, {
        cause,
      });
    }

    const result = CustomJsonOutputSchema.safeParse(raw);
    if (!result.success) {
      const detail = result.error.errors
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new RenderError(this.id, `Error parsing JSON: ${detail}`);
    }

    const { text, short_text, icon, state } = result.data;
    return {
      text,
      state,
      ...(short_text === undefined ? {} : { shortText: short_text }),
      ...(icon === undefined || icon === "" ? {} : { icon }),
    };
  }
}
