/**
 * Git operations used by the cleanup command
 *
 * Every command goes through a RetryingExecutor, so ref-lock races and
 * dropped connections are retried transparently. Methods that change the
 * repository accept a sink and stream git's output into it.
 *
 * @example
 * ```typescript
 * const git = new GitClient({ cwd: "/path/to/repo" });
 * const defaultBranch = await git.getDefaultBranch();
 * await git.pull(defaultBranch, (line) => console.log(line));
 * ```
 */

import { CleanupError, getErrorMessage } from "../errors.js";
import type { LineSink } from "../types.js";
import {
  normalizeBranchRef,
  parseDeletedBranches,
  type DeletedBranches,
} from "./branches.js";
import { RetryingExecutor, type CommandResult } from "./executor.js";
import { parseWorktreeList, type WorktreeEntry } from "./worktrees.js";

export interface GitClientOptions {
  /** Directory every git command runs in (default: process.cwd()) */
  cwd?: string;
  /** Executor to run git through (default: a RetryingExecutor) */
  executor?: RetryingExecutor;
}

/**
 * Ways to ask git for the default branch, tried in order
 */
const DEFAULT_BRANCH_QUERIES: string[][] = [
  ["symbolic-ref", "refs/remotes/origin/HEAD"],
  ["rev-parse", "--abbrev-ref", "origin/HEAD"],
  ["config", "--get", "init.defaultBranch"],
];

export class GitClient {
  private cwd?: string;
  private executor: RetryingExecutor;

  constructor(options: GitClientOptions = {}) {
    this.cwd = options.cwd;
    this.executor = options.executor ?? new RetryingExecutor();
  }

  private run(args: string[], sink?: LineSink): Promise<CommandResult> {
    return this.executor.execute(
      { command: "git", args, cwd: this.cwd },
      sink,
    );
  }

  /**
   * Run git, throwing its CommandError on failure. Returns stdout only.
   */
  private async exec(args: string[], sink?: LineSink): Promise<string> {
    const { stdout, error } = await this.run(args, sink);
    if (error) {
      throw error;
    }
    return stdout;
  }

  async getDefaultBranch(): Promise<string> {
    for (const query of DEFAULT_BRANCH_QUERIES) {
      const { stdout, error } = await this.run(query);
      if (error) continue;

      const branch = normalizeBranchRef(stdout);
      if (branch) {
        return branch;
      }
    }

    throw new CleanupError("failed to get default branch");
  }

  async getCurrentBranch(): Promise<string> {
    try {
      return (await this.exec(["branch", "--show-current"])).trim();
    } catch (err) {
      throw new CleanupError(
        `failed to get current branch: ${getErrorMessage(err)}`,
        { cause: err },
      );
    }
  }

  async checkout(branch: string, sink?: LineSink): Promise<void> {
    await this.exec(["checkout", branch], sink);
  }

  async pull(branch: string, sink?: LineSink): Promise<void> {
    await this.exec(["pull", "origin", branch], sink);
  }

  async fetchPrune(sink?: LineSink): Promise<void> {
    await this.exec(["fetch", "-p"], sink);
  }

  async getDeletedBranches(): Promise<DeletedBranches> {
    try {
      return parseDeletedBranches(await this.exec(["branch", "-vv"]));
    } catch (err) {
      throw new CleanupError(
        `failed to get branch info: ${getErrorMessage(err)}`,
        { cause: err },
      );
    }
  }

  async deleteBranch(branch: string, sink?: LineSink): Promise<void> {
    await this.exec(["branch", "-D", branch], sink);
  }

  async branchExists(branch: string): Promise<boolean> {
    const { error } = await this.run([
      "show-ref",
      "--verify",
      "--quiet",
      `refs/heads/${branch}`,
    ]);
    return error === null;
  }

  async listWorktrees(): Promise<WorktreeEntry[]> {
    try {
      return parseWorktreeList(
        await this.exec(["worktree", "list", "--porcelain"]),
      );
    } catch (err) {
      throw new CleanupError(
        `failed to get worktree list: ${getErrorMessage(err)}`,
        { cause: err },
      );
    }
  }

  /**
   * Path of the worktree that has `branch` checked out
   */
  async getWorktreePath(branch: string): Promise<string> {
    const worktree = (await this.listWorktrees()).find(
      (w) => w.branch === branch,
    );
    if (!worktree) {
      throw new CleanupError(`worktree not found for branch ${branch}`);
    }
    return worktree.path;
  }

  async removeWorktree(worktreePath: string, sink?: LineSink): Promise<void> {
    await this.exec(["worktree", "remove", worktreePath], sink);
  }

  // Commands below run inside a specific worktree

  async isDirty(worktreePath: string): Promise<boolean> {
    const output = await this.exec([
      "-C",
      worktreePath,
      "status",
      "--porcelain",
    ]);
    return output.trim().length > 0;
  }

  async stashPush(
    worktreePath: string,
    message: string,
    sink?: LineSink,
  ): Promise<void> {
    await this.exec(
      ["-C", worktreePath, "stash", "push", "--include-untracked", "-m", message],
      sink,
    );
  }

  /**
   * Commit id of the newest stash entry, or null when the stash is empty
   */
  async stashTop(worktreePath: string): Promise<string | null> {
    const { stdout, error } = await this.run([
      "-C",
      worktreePath,
      "rev-parse",
      "-q",
      "--verify",
      "refs/stash",
    ]);
    if (error) {
      return null;
    }
    return stdout.trim() || null;
  }

  async stashPop(worktreePath: string, sink?: LineSink): Promise<void> {
    await this.exec(["-C", worktreePath, "stash", "pop"], sink);
  }

  /**
   * Check out `branch` in the worktree and rebase it onto `upstream`
   */
  async rebase(
    worktreePath: string,
    upstream: string,
    branch: string,
    sink?: LineSink,
  ): Promise<void> {
    await this.exec(["-C", worktreePath, "rebase", upstream, branch], sink);
  }

  async abortRebase(worktreePath: string, sink?: LineSink): Promise<void> {
    await this.exec(["-C", worktreePath, "rebase", "--abort"], sink);
  }

  async checkoutIn(
    worktreePath: string,
    branch: string,
    sink?: LineSink,
  ): Promise<void> {
    await this.exec(["-C", worktreePath, "checkout", branch], sink);
  }

  /**
   * Create `branch` at `startPoint` and check it out in the worktree
   */
  async createBranchIn(
    worktreePath: string,
    branch: string,
    startPoint: string,
    sink?: LineSink,
  ): Promise<void> {
    await this.exec(
      ["-C", worktreePath, "checkout", "-b", branch, startPoint],
      sink,
    );
  }
}
