/**
 * Interrupt handling for git-cleanup
 *
 * A git subprocess is never cancelled mid-way, but Ctrl+C still kills the
 * process group. Before exiting, the terminal must be put back in order:
 * a live status region leaves a hidden cursor and half-drawn lines behind.
 *
 * @example
 * ```typescript
 * const shutdown = new ShutdownManager();
 *
 * shutdown.registerCleanup("Restore terminal", async () => {
 *   streamer.stop();
 * });
 *
 * // In finally block
 * shutdown.dispose();
 * ```
 */

import chalk from "chalk";

/** Conventional exit code for a process stopped by SIGINT */
export const INTERRUPTED_EXIT_CODE = 130;

interface CleanupTask {
  name: string;
  task: () => Promise<void>;
}

/**
 * Options for ShutdownManager
 */
export interface ShutdownManagerOptions {
  /** Timeout for cleanup tasks in milliseconds (default: 5000) */
  forceExitTimeout?: number;
  /** Custom output function for testing (default: console.log) */
  output?: (message: string) => void;
  /** Custom error output function for testing (default: console.error) */
  errorOutput?: (message: string) => void;
  /** Custom exit function for testing (default: process.exit) */
  exit?: (code: number) => void;
}

/**
 * Runs registered cleanup tasks (LIFO) on SIGINT/SIGTERM, then exits.
 *
 * A second signal while cleanup is running exits immediately.
 */
export class ShutdownManager {
  private cleanupTasks: CleanupTask[] = [];
  private _isShuttingDown = false;
  private forceExitTimeout: number;
  private output: (message: string) => void;
  private errorOutput: (message: string) => void;
  private exit: (code: number) => void;

  private sigintHandler: () => void;
  private sigtermHandler: () => void;

  constructor(options: ShutdownManagerOptions = {}) {
    this.forceExitTimeout = options.forceExitTimeout ?? 5000;
    this.output = options.output ?? console.log.bind(console);
    this.errorOutput = options.errorOutput ?? console.error.bind(console);
    this.exit = options.exit ?? process.exit.bind(process);

    this.sigintHandler = () => void this.gracefulShutdown("SIGINT");
    this.sigtermHandler = () => void this.gracefulShutdown("SIGTERM");

    process.on("SIGINT", this.sigintHandler);
    process.on("SIGTERM", this.sigtermHandler);
  }

  get isShuttingDown(): boolean {
    return this._isShuttingDown;
  }

  /**
   * Register a cleanup task. Tasks run last-registered first.
   */
  registerCleanup(name: string, task: () => Promise<void>): void {
    this.cleanupTasks.push({ name, task });
  }

  /**
   * Unregister every cleanup task with this name
   */
  unregisterCleanup(name: string): void {
    this.cleanupTasks = this.cleanupTasks.filter((t) => t.name !== name);
  }

  getCleanupTaskCount(): number {
    return this.cleanupTasks.length;
  }

  /**
   * Run cleanup and exit with INTERRUPTED_EXIT_CODE.
   *
   * Called on SIGINT/SIGTERM; public so tests can trigger it directly.
   */
  async gracefulShutdown(signal: string): Promise<void> {
    if (this._isShuttingDown) {
      this.errorOutput(chalk.red("\nForce exiting..."));
      this.exit(1);
      return;
    }

    this._isShuttingDown = true;

    const forceExitTimer = setTimeout(() => {
      this.errorOutput(chalk.red("Cleanup timeout, force exiting"));
      this.exit(1);
    }, this.forceExitTimeout);

    const tasksToRun = [...this.cleanupTasks].reverse();

    for (const { name, task } of tasksToRun) {
      try {
        await task();
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.errorOutput(chalk.red(`✖ ${name}: ${message}`));
      }
    }

    clearTimeout(forceExitTimer);

    this.output(chalk.yellow(`\nInterrupted (${signal}).`));
    this.exit(INTERRUPTED_EXIT_CODE);
  }

  /**
   * Remove signal handlers and forget registered tasks
   */
  dispose(): void {
    process.removeListener("SIGINT", this.sigintHandler);
    process.removeListener("SIGTERM", this.sigtermHandler);
    this.cleanupTasks = [];
  }
}
