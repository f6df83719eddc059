/**
 * Error types for git-cleanup
 */

/**
 * A git subprocess that exited unsuccessfully or could not be started.
 *
 * The message is the trimmed combined output of the subprocess, which is what
 * the user sees and what transient-failure signatures are matched against.
 */
export class CommandError extends Error {
  readonly command: string;
  readonly args: string[];
  /** Exit code, or null when the process never started or was killed */
  readonly exitCode: number | null;
  readonly output: string;

  constructor(
    command: string,
    args: string[],
    exitCode: number | null,
    output: string,
    message?: string,
  ) {
    super(
      message ??
        (output.trim() ||
          `${[command, ...args].join(" ")} exited with code ${exitCode}`),
    );
    this.name = "CommandError";
    this.command = command;
    this.args = args;
    this.exitCode = exitCode;
    this.output = output;
  }
}

/**
 * A failure that originates in git-cleanup's own logic rather than in a
 * subprocess, e.g. a branch that has no worktree.
 */
export class CleanupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CleanupError";
  }
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalise a thrown value into an Error instance
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
