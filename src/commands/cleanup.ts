/**
 * git-cleanup - Tidy a working copy after branches were merged upstream
 *
 * Checks out and pulls the default branch, prunes remote-tracking refs,
 * then resets or removes worktrees on gone branches and deletes those
 * branches. Setup failures abort the run; per-branch failures are reported
 * and the run moves on.
 */

import chalk from "chalk";
import { CleanupError, getErrorMessage } from "../lib/errors.js";
import { isDirectory } from "../lib/fs.js";
import { RetryingExecutor } from "../lib/git/executor.js";
import { GitClient } from "../lib/git/client.js";
import { resetWorktree } from "../lib/git/worktree-reset.js";
import { classifyWorktree, tildify } from "../lib/git/worktrees.js";
import { ShutdownManager } from "../lib/shutdown.js";
import {
  run,
  type OutputStreamerOptions,
} from "../lib/streamer/output-streamer.js";
import { commandExists, getInstallHint } from "../lib/system.js";
import type { Operation, OperationResult } from "../lib/types.js";

export interface CleanupOptions {
  /** Run every git command in this directory */
  cwd?: string;
  /** Worktree directory prefix that marks pool slots */
  poolPrefix?: string;
  /** Report what would change without changing it */
  dryRun?: boolean;
  /** Show each git command in the live status */
  verbose?: boolean;
}

export interface CleanupSummary {
  defaultBranch: string;
  /** Worktree paths reset to their home branch */
  reset: string[];
  /** Worktree paths removed */
  removed: string[];
  deleted: string[];
  /** Branches whose worktree or deletion step failed */
  failed: string[];
}

/**
 * Collaborators of cleanup(), replaceable in tests
 */
export interface CleanupDependencies {
  git?: GitClient;
  /** Streamed operation runner (default: output-streamer run) */
  runOperation?: (
    title: string,
    operation: Operation,
    options?: OutputStreamerOptions,
  ) => Promise<OperationResult>;
  /** Options passed to every runOperation call */
  streamer?: OutputStreamerOptions;
  /** Custom output function for testing (default: console.log) */
  output?: (message: string) => void;
  /** Custom error output function for testing (default: console.error) */
  errorOutput?: (message: string) => void;
}

/**
 * Run the cleanup. Throws on setup failures; per-branch failures are
 * reported and collected in the summary.
 */
export async function cleanup(
  options: CleanupOptions = {},
  deps: CleanupDependencies = {},
): Promise<CleanupSummary> {
  const git =
    deps.git ??
    new GitClient({
      cwd: options.cwd,
      executor: new RetryingExecutor({ verbose: options.verbose }),
    });
  const runOperation = deps.runOperation ?? run;
  const output = deps.output ?? console.log.bind(console);
  const errorOutput = deps.errorOutput ?? console.error.bind(console);

  const step = async (
    title: string,
    failure: string,
    operation: Operation,
  ): Promise<void> => {
    const result = await runOperation(title, operation, deps.streamer);
    if (!result.success) {
      throw new CleanupError(failure, { cause: result.error });
    }
  };

  const defaultBranch = await git.getDefaultBranch();
  const currentBranch = await git.getCurrentBranch();

  if (!options.dryRun) {
    if (currentBranch !== defaultBranch) {
      await step(
        "Checking out default branch",
        `failed to check out ${defaultBranch}`,
        (sink) => git.checkout(defaultBranch, sink),
      );
    }

    await step(
      "Pulling latest changes",
      `failed to pull ${defaultBranch}`,
      (sink) => git.pull(defaultBranch, sink),
    );
  }

  await step("Pruning local branches", "failed to prune branches", (sink) =>
    git.fetchPrune(sink),
  );

  const { branches, worktreeBranches } = await git.getDeletedBranches();

  const summary: CleanupSummary = {
    defaultBranch,
    reset: [],
    removed: [],
    deleted: [],
    failed: [],
  };

  for (const branch of worktreeBranches) {
    let worktreePath: string;
    try {
      worktreePath = await git.getWorktreePath(branch);
    } catch (err) {
      errorOutput(
        chalk.red(
          `Error finding worktree for branch ${branch}: ${getErrorMessage(err)}`,
        ),
      );
      summary.failed.push(branch);
      continue;
    }

    const display = tildify(worktreePath);
    const disposition = classifyWorktree(
      worktreePath,
      branch,
      options.poolPrefix,
    );

    if (options.dryRun) {
      output(
        disposition.kind === "reset"
          ? chalk.yellow(
              `Would reset worktree ${display} to ${disposition.homeBranch}`,
            )
          : chalk.yellow(`Would remove worktree ${display}`),
      );
      continue;
    }

    const result =
      disposition.kind === "reset"
        ? await runOperation(
            `Resetting worktree: ${display}`,
            (sink) =>
              resetWorktree(
                git,
                {
                  path: worktreePath,
                  branch,
                  homeBranch: disposition.homeBranch,
                  defaultBranch,
                },
                sink,
              ),
            deps.streamer,
          )
        : await runOperation(
            `Removing worktree: ${display}`,
            (sink) => git.removeWorktree(worktreePath, sink),
            deps.streamer,
          );

    if (!result.success) {
      summary.failed.push(branch);
    } else if (disposition.kind === "reset") {
      summary.reset.push(worktreePath);
    } else {
      summary.removed.push(worktreePath);
    }
  }

  for (const branch of branches) {
    // Still checked out in its worktree, so git would refuse to delete it
    if (summary.failed.includes(branch)) {
      output(
        chalk.yellow(
          `Skipping branch ${branch}: its worktree was not cleaned up`,
        ),
      );
      continue;
    }

    if (options.dryRun) {
      output(chalk.yellow(`Would delete branch ${branch}`));
      continue;
    }

    const result = await runOperation(
      `Deleting branch: ${branch}`,
      (sink) => git.deleteBranch(branch, sink),
      deps.streamer,
    );
    if (result.success) {
      summary.deleted.push(branch);
    } else {
      summary.failed.push(branch);
    }
  }

  if (options.dryRun) {
    output(chalk.gray("Dry run: no branches or worktrees were changed"));
  } else {
    output(chalk.green("✔ Git cleanup completed"));
  }

  return summary;
}

/**
 * Check prerequisites that would otherwise surface as confusing git errors
 */
async function checkPrerequisites(options: CleanupOptions): Promise<void> {
  if (!commandExists("git")) {
    throw new CleanupError(`git is not installed (${getInstallHint("git")})`);
  }

  if (options.cwd !== undefined && !(await isDirectory(options.cwd))) {
    throw new CleanupError(`--cwd is not a directory: ${options.cwd}`);
  }
}

/**
 * CLI entry point: exit code 0 on success, 1 on any top-level failure
 */
export async function cleanupCommand(options: CleanupOptions): Promise<void> {
  const shutdown = new ShutdownManager();
  let failed = false;

  try {
    await checkPrerequisites(options);
    await cleanup(options, { streamer: { shutdown } });
  } catch (error) {
    console.error(chalk.red(`Error: ${getErrorMessage(error)}`));
    failed = true;
  } finally {
    shutdown.dispose();
  }

  if (failed) {
    process.exit(1);
  }
}
