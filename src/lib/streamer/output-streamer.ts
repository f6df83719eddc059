/**
 * Live, self-erasing terminal status for a running operation
 *
 * While an operation runs, the terminal shows its most recent output lines
 * with a spinner line underneath:
 *
 * ```
 * From github.com:acme/widgets
 *  - [deleted]         (none)     -> origin/feature-x
 * ⠹ Pruning local branches
 * ```
 *
 * Each new line erases the previously drawn ones before redrawing, so the
 * region never grows past `maxDisplayLines` + 1 rows. When the operation
 * settles, the region collapses into a single ✔ or ✖ line.
 *
 * @example
 * ```typescript
 * const result = await run("Pulling latest changes", (sink) =>
 *   git.pull("main", sink),
 * );
 * if (!result.success) process.exitCode = 1;
 * ```
 */

import { stripVTControlCharacters } from "util";
import chalk from "chalk";
import stringWidth from "string-width";
import { toError } from "../errors.js";
import type { ShutdownManager } from "../shutdown.js";
import type { Operation, OperationResult } from "../types.js";
import { LineChannel } from "./line-channel.js";
import {
  CLEAR_LINE,
  CURSOR_UP_CLEAR,
  Spinner,
  type TerminalOutput,
} from "./spinner.js";

export const MAX_DISPLAY_LINES = 2;

export const SUCCESS_GLYPH = "✔";
export const FAILURE_GLYPH = "✖";

const RESTORE_TERMINAL_TASK = "Restore terminal";

/**
 * Options for OutputStreamer and run()
 */
export interface OutputStreamerOptions {
  /** Stream to draw on (default: process.stdout) */
  output?: TerminalOutput;
  /** Most recent lines kept on screen (default: MAX_DISPLAY_LINES) */
  maxDisplayLines?: number;
  /** Spinner frame interval in milliseconds (default: 100) */
  interval?: number;
  /** Registers a terminal-restoring task for the duration of the run */
  shutdown?: ShutdownManager;
}

export class OutputStreamer {
  private spinner: Spinner;
  private lines: string[] = [];
  /** Output rows currently on screen above the spinner line */
  private drawn = 0;
  private output: TerminalOutput;
  private maxDisplayLines: number;
  private stopped = false;

  constructor(title: string, options: OutputStreamerOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.maxDisplayLines = options.maxDisplayLines ?? MAX_DISPLAY_LINES;
    this.spinner = new Spinner(title, {
      output: this.output,
      interval: options.interval,
    });
  }

  get title(): string {
    return this.spinner.message;
  }

  /**
   * Copy of the lines currently shown, oldest first
   */
  get visibleLines(): string[] {
    return [...this.lines];
  }

  start(): void {
    this.spinner.start();
  }

  addOutput(line: string): void {
    if (line.length === 0 || this.stopped) {
      return;
    }

    this.lines.push(this.fitToWidth(line));
    if (this.lines.length > this.maxDisplayLines) {
      this.lines = this.lines.slice(-this.maxDisplayLines);
    }
    this.redraw();
  }

  /**
   * Finalize with the success glyph
   */
  pass(): void {
    this.stop(`${SUCCESS_GLYPH} ${this.title}`);
  }

  /**
   * Finalize with the failure glyph and print the error below it
   */
  fail(error: Error): void {
    this.stop(chalk.red(`${FAILURE_GLYPH} ${this.title}`));
    for (const line of error.message.split("\n")) {
      this.output.write(chalk.gray(`  ${line}`) + "\n");
    }
  }

  /**
   * Clear the line buffer and stop the spinner. Safe to call twice.
   */
  stop(finalMessage?: string): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.clearOutput();
    this.spinner.stop(finalMessage);
  }

  /**
   * Erase every drawn output line, leaving the cursor on the spinner line
   */
  private clearOutput(): void {
    this.output.write(CLEAR_LINE + CURSOR_UP_CLEAR.repeat(this.drawn));
    this.drawn = 0;
  }

  private redraw(): void {
    this.clearOutput();
    for (const line of this.lines) {
      this.output.write(line + "\n");
    }
    this.drawn = this.lines.length;
    this.spinner.render();
  }

  /**
   * A wrapped line would occupy more rows than the erase count covers.
   *
   * Width is measured in terminal columns; a line that has to be cut loses
   * its colours.
   */
  private fitToWidth(line: string): string {
    const columns = this.output.columns;
    if (!columns || stringWidth(line) < columns) {
      return line;
    }

    const limit = Math.max(columns - 1, 1);
    let fitted = "";
    let width = 0;
    for (const char of stripVTControlCharacters(line)) {
      const charWidth = stringWidth(char);
      if (width + charWidth > limit) break;
      fitted += char;
      width += charWidth;
    }
    return fitted;
  }
}

/**
 * Run an operation under a live status line.
 *
 * The operation runs as its own task and pushes lines into its sink; the
 * redraw loop consumes them until the operation settles and every buffered
 * line has been drawn. Never rejects: the outcome is returned.
 */
export async function run(
  title: string,
  operation: Operation,
  options: OutputStreamerOptions = {},
): Promise<OperationResult> {
  const streamer = new OutputStreamer(title, options);
  const channel = new LineChannel();

  options.shutdown?.registerCleanup(RESTORE_TERMINAL_TASK, async () => {
    streamer.stop();
  });

  streamer.start();

  const settled: Promise<OperationResult> = (async () =>
    operation((line) => channel.push(line)))()
    .then(
      (): OperationResult => ({ success: true }),
      (err: unknown): OperationResult => ({
        success: false,
        error: toError(err),
      }),
    )
    .finally(() => channel.close());

  try {
    for await (const line of channel) {
      streamer.addOutput(line);
    }

    const result = await settled;
    if (result.success) {
      streamer.pass();
    } else {
      streamer.fail(result.error);
    }
    return result;
  } finally {
    streamer.stop();
    options.shutdown?.unregisterCleanup(RESTORE_TERMINAL_TASK);
  }
}
