/**
 * Terminal spinner for the status line of a running operation.
 *
 * The spinner owns one terminal line and redraws it in place. The animation
 * timer only runs on a TTY; elsewhere the line is drawn once per render().
 */

import chalk from "chalk";

/** Return to column 0 and clear to end of line */
export const CLEAR_LINE = "\r\x1b[K";
/** Move up one line and clear it */
export const CURSOR_UP_CLEAR = "\x1b[1A\x1b[K";
export const HIDE_CURSOR = "\x1b[?25l";
export const SHOW_CURSOR = "\x1b[?25h";

/**
 * The part of a writable terminal stream the spinner and streamer need
 */
export interface TerminalOutput {
  write(chunk: string): unknown;
  isTTY?: boolean;
  columns?: number;
}

export interface SpinnerOptions {
  /** Stream to draw on (default: process.stdout) */
  output?: TerminalOutput;
  /** Frame interval in milliseconds (default: 100) */
  interval?: number;
}

export const SPINNER_FRAMES = [
  "⠋",
  "⠙",
  "⠹",
  "⠸",
  "⠼",
  "⠴",
  "⠦",
  "⠧",
  "⠇",
  "⠏",
];

export class Spinner {
  private intervalId?: ReturnType<typeof setInterval>;
  private currentFrame = 0;
  private output: TerminalOutput;
  private interval: number;
  readonly message: string;

  constructor(message: string, options: SpinnerOptions = {}) {
    this.message = message;
    this.output = options.output ?? process.stdout;
    this.interval = options.interval ?? 100;
  }

  get isSpinning(): boolean {
    return this.intervalId !== undefined;
  }

  /**
   * The current spinner line, without a trailing newline
   */
  line(): string {
    return `${chalk.cyan(SPINNER_FRAMES[this.currentFrame])} ${this.message}`;
  }

  render(): void {
    this.output.write(CLEAR_LINE + this.line());
  }

  start(): void {
    this.render();
    if (!this.output.isTTY || this.intervalId) {
      return;
    }

    this.output.write(HIDE_CURSOR);
    this.intervalId = setInterval(() => {
      this.currentFrame = (this.currentFrame + 1) % SPINNER_FRAMES.length;
      this.render();
    }, this.interval);
  }

  /**
   * Stop animating and replace the spinner line with `finalMessage`
   * (or leave it blank).
   */
  stop(finalMessage?: string): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
    }

    this.output.write(CLEAR_LINE);
    if (finalMessage) {
      this.output.write(finalMessage + "\n");
    }
    if (this.output.isTTY) {
      this.output.write(SHOW_CURSOR);
    }
  }
}
