/**
 * Subprocess execution with automatic retry of transient git failures
 *
 * @example
 * ```typescript
 * const executor = new RetryingExecutor();
 * const { output, error } = await executor.execute(
 *   { command: "git", args: ["fetch", "-p"] },
 *   (line) => console.log(line),
 * );
 * ```
 */

import { spawn } from "child_process";
import { createInterface } from "readline";
import type { Readable } from "stream";
import chalk from "chalk";
import { CommandError } from "../errors.js";
import type { LineSink } from "../types.js";
import {
  DEFAULT_RETRY_POLICY,
  isTransientError,
  type RetryPolicy,
} from "./retry-policy.js";

/**
 * An external command, treated as opaque by the executor
 */
export interface Command {
  command: string;
  args: string[];
  /** Working directory (default: the current process directory) */
  cwd?: string;
}

export interface CommandResult {
  /** Combined stdout and stderr, in arrival order */
  output: string;
  /** Stdout alone, for commands whose output is parsed as data */
  stdout: string;
  /** Null when the command exited with code 0 */
  error: CommandError | null;
}

export type CommandRunner = (
  cmd: Command,
  sink?: LineSink,
) => Promise<CommandResult>;

/**
 * Forward each non-empty line of a stream to the sink
 */
function streamLines(stream: Readable, sink: LineSink): void {
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  lines.on("line", (line) => {
    if (line.length > 0) {
      sink(line);
    }
  });
}

/**
 * Run a command to completion, capturing its combined output.
 *
 * When a sink is given, every non-empty stdout/stderr line is pushed to it
 * as it arrives. Stdout is also kept on its own, so warnings git prints to
 * stderr never end up in parsed data. Never rejects: failures, including a command that cannot
 * be started, come back as `error`.
 */
export function runCommand(
  cmd: Command,
  sink?: LineSink,
): Promise<CommandResult> {
  return new Promise((resolve) => {
    let output = "";
    let stdout = "";
    let settled = false;

    const finish = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    const proc = spawn(cmd.command, cmd.args, {
      cwd: cmd.cwd,
      stdio: ["ignore", "pipe", "pipe"],
    });

    for (const stream of [proc.stdout, proc.stderr]) {
      stream.setEncoding("utf8");
      stream.on("data", (chunk: string) => {
        output += chunk;
      });
      if (sink) {
        streamLines(stream, sink);
      }
    }
    proc.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });

    proc.on("error", (err) => {
      proc.stdout.destroy();
      proc.stderr.destroy();
      finish({
        output,
        stdout,
        error: new CommandError(
          cmd.command,
          cmd.args,
          null,
          output,
          err.message,
        ),
      });
    });

    proc.on("close", (code) => {
      finish({
        output,
        stdout,
        error:
          code === 0
            ? null
            : new CommandError(cmd.command, cmd.args, code, output),
      });
    });
  });
}

/**
 * Options for RetryingExecutor
 */
export interface RetryingExecutorOptions {
  /** Attempts, delay and transient signatures (default: DEFAULT_RETRY_POLICY) */
  policy?: RetryPolicy;
  /** Push each command line into the sink before running it */
  verbose?: boolean;
  /** Custom runner for testing (default: runCommand) */
  run?: CommandRunner;
  /** Custom sleep for testing (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Runs commands, retrying the ones that fail with a known transient error.
 *
 * Non-transient failures and successes return after a single attempt.
 */
export class RetryingExecutor {
  private policy: RetryPolicy;
  private verbose: boolean;
  private run: CommandRunner;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: RetryingExecutorOptions = {}) {
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.verbose = options.verbose ?? false;
    this.run = options.run ?? runCommand;
    this.sleep =
      options.sleep ??
      ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Execute a command, returning the last attempt's output and error
   */
  async execute(cmd: Command, sink?: LineSink): Promise<CommandResult> {
    const { maxAttempts, delayMs } = this.policy;
    let result: CommandResult = { output: "", stdout: "", error: null };

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (this.verbose && sink) {
        sink(chalk.gray(`$ ${[cmd.command, ...cmd.args].join(" ")}`));
      }

      result = await this.run(cmd, sink);
      if (!isTransientError(result.error, this.policy)) {
        break;
      }

      if (attempt < maxAttempts) {
        sink?.(
          chalk.yellow(
            `Transient failure, retrying in ${delayMs / 1000}s (attempt ${attempt + 1}/${maxAttempts})`,
          ),
        );
        await this.sleep(delayMs);
      }
    }

    return result;
  }
}
