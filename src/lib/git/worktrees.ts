/**
 * Parsing and classification of git worktrees
 */

import { homedir } from "os";
import { basename } from "path";

export interface WorktreeEntry {
  /** Absolute path to the worktree */
  path: string;
  /** Commit checked out, absent for a bare repository */
  head?: string;
  /** Short branch name, or null when detached or bare */
  branch: string | null;
  bare: boolean;
  detached: boolean;
}

/**
 * Parse `git worktree list --porcelain` output.
 *
 * Records are separated by blank lines; the first one is always the main
 * worktree.
 */
export function parseWorktreeList(output: string): WorktreeEntry[] {
  const worktrees: WorktreeEntry[] = [];
  let current: WorktreeEntry | null = null;

  for (const line of output.split("\n")) {
    if (line.startsWith("worktree ")) {
      if (current) {
        worktrees.push(current);
      }
      current = {
        path: line.substring("worktree ".length),
        branch: null,
        bare: false,
        detached: false,
      };
    } else if (!current) {
      continue;
    } else if (line.startsWith("HEAD ")) {
      current.head = line.substring("HEAD ".length);
    } else if (line.startsWith("branch ")) {
      current.branch = line
        .substring("branch ".length)
        .replace(/^refs\/heads\//, "");
    } else if (line === "bare") {
      current.bare = true;
    } else if (line === "detached") {
      current.detached = true;
    } else if (line === "") {
      worktrees.push(current);
      current = null;
    }
  }

  // Last record when output has no trailing blank line
  if (current) {
    worktrees.push(current);
  }

  return worktrees;
}

/**
 * How a worktree on a gone branch gets cleaned up
 */
export type WorktreeDisposition =
  | {
      /** A reusable pool slot, moved back to its home branch */
      kind: "reset";
      homeBranch: string;
    }
  | {
      /** An ad-hoc worktree that existed only for the gone branch */
      kind: "remove";
    };

/**
 * Decide whether a worktree is a pool slot or an ad-hoc worktree.
 *
 * A slot's home branch is its directory name, minus `poolPrefix` when one
 * is configured. Directories without the prefix, or whose home branch is
 * the gone branch itself, are ad-hoc. With no prefix, every worktree whose
 * directory is not named after its branch counts as a slot.
 *
 * @example
 * ```typescript
 * classifyWorktree("/src/web-2", "feature-x", "web-");
 * // { kind: "reset", homeBranch: "2" }
 * classifyWorktree("/src/feature-x", "feature-x");
 * // { kind: "remove" }
 * ```
 */
export function classifyWorktree(
  worktreePath: string,
  branch: string,
  poolPrefix = "",
): WorktreeDisposition {
  const name = basename(worktreePath);
  if (poolPrefix && !name.startsWith(poolPrefix)) {
    return { kind: "remove" };
  }

  const homeBranch = name.slice(poolPrefix.length);
  if (homeBranch === "" || homeBranch === branch) {
    return { kind: "remove" };
  }

  return { kind: "reset", homeBranch };
}

/**
 * Abbreviate the home directory to `~` for display
 */
export function tildify(path: string, home: string = homedir()): string {
  if (home && (path === home || path.startsWith(home + "/"))) {
    return "~" + path.slice(home.length);
  }
  return path;
}
