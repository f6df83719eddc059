/**
 * Reset a worktree-pool slot whose branch was deleted upstream
 *
 * A pool slot is a long-lived worktree that is reused for one feature
 * branch after another. Once its branch is gone, the slot goes back to its
 * home branch, rebased onto the latest default branch. Uncommitted changes
 * are stashed first and re-applied afterwards; if any step fails, the slot
 * is put back on the branch it was on, with its changes restored.
 *
 * The stash is shared by every worktree of the repository, so only an entry
 * this reset created is ever popped, and only while it is still on top.
 */

import { CleanupError, getErrorMessage } from "../errors.js";
import type { LineSink } from "../types.js";
import type { GitClient } from "./client.js";

export interface PoolSlot {
  /** Absolute path of the worktree */
  path: string;
  /** Branch currently checked out (the one with a gone upstream) */
  branch: string;
  /** Branch the slot returns to */
  homeBranch: string;
  defaultBranch: string;
}

export async function resetWorktree(
  git: GitClient,
  slot: PoolSlot,
  sink?: LineSink,
): Promise<void> {
  const { path, branch, homeBranch, defaultBranch } = slot;
  const upstream = `origin/${defaultBranch}`;

  const stash = (await git.isDirty(path))
    ? await stashChanges(git, slot, sink)
    : null;

  let rebasing = false;
  try {
    if (await git.branchExists(homeBranch)) {
      rebasing = true;
      await git.rebase(path, upstream, homeBranch, sink);
      rebasing = false;
    } else {
      await git.createBranchIn(path, homeBranch, upstream, sink);
    }
  } catch (err) {
    throw await restore(git, slot, { stash, rebasing }, err, sink);
  }

  if (stash) {
    try {
      await popOwnStash(git, path, stash, sink);
    } catch (err) {
      throw new CleanupError(
        `reset to ${homeBranch}, but local changes could not be re-applied ` +
          `and remain in the stash:\n${getErrorMessage(err)}`,
        { cause: err },
      );
    }
  }
}

/**
 * Stash the slot's changes. Returns the new stash commit, or null when git
 * saved nothing (e.g. only a submodule's content changed).
 */
async function stashChanges(
  git: GitClient,
  slot: PoolSlot,
  sink?: LineSink,
): Promise<string | null> {
  const before = await git.stashTop(slot.path);
  await git.stashPush(slot.path, `git-cleanup: ${slot.branch}`, sink);
  const after = await git.stashTop(slot.path);

  return after !== null && after !== before ? after : null;
}

async function popOwnStash(
  git: GitClient,
  worktreePath: string,
  stash: string,
  sink?: LineSink,
): Promise<void> {
  const top = await git.stashTop(worktreePath);
  if (top !== stash) {
    throw new CleanupError(
      `stash entry ${stash} is no longer the newest stash; ` +
        `apply it with: git stash apply ${stash}`,
    );
  }
  await git.stashPop(worktreePath, sink);
}

/**
 * Undo a failed reset and build the error to report.
 *
 * Every restore step runs even if an earlier one fails; their failures are
 * appended below the original message.
 */
async function restore(
  git: GitClient,
  slot: PoolSlot,
  state: { stash: string | null; rebasing: boolean },
  cause: unknown,
  sink?: LineSink,
): Promise<CleanupError> {
  const problems: string[] = [];
  const attempt = async (step: () => Promise<void>) => {
    try {
      await step();
    } catch (err) {
      problems.push(getErrorMessage(err));
    }
  };

  if (state.rebasing) {
    await attempt(() => git.abortRebase(slot.path, sink));
  }
  await attempt(() => git.checkoutIn(slot.path, slot.branch, sink));
  const { stash } = state;
  if (stash) {
    await attempt(() => popOwnStash(git, slot.path, stash, sink));
  }

  const lines = [getErrorMessage(cause)];
  for (const problem of problems) {
    lines.push(`restore failed: ${problem}`);
  }
  return new CleanupError(lines.join("\n"), { cause });
}
