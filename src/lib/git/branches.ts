/**
 * Parsing of git branch output
 */

/**
 * Branches whose upstream was deleted on the remote
 */
export interface DeletedBranches {
  /** Every local branch tracking a gone upstream */
  branches: string[];
  /** The subset checked out in a linked worktree (`+` marker) */
  worktreeBranches: string[];
}

/** Upstream marker git prints once `fetch -p` removed the remote branch */
const GONE_UPSTREAM = /origin\/.*: gone\]/;

/**
 * Marker column (`*` current, `+` checked out in a worktree, or blank)
 * followed by the branch name
 */
const BRANCH_LINE = /^([*+ ]?)\s*(\S+)/;

/**
 * Parse `git branch -vv` output into branches with a gone upstream.
 *
 * @example
 * ```typescript
 * parseDeletedBranches(
 *   "  feature-x  abc123 [origin/feature-x: gone] msg\n" +
 *   "+ feature-y  def456 [origin/feature-y: gone] msg\n",
 * );
 * // { branches: ["feature-x", "feature-y"], worktreeBranches: ["feature-y"] }
 * ```
 */
export function parseDeletedBranches(output: string): DeletedBranches {
  const branches: string[] = [];
  const worktreeBranches: string[] = [];

  for (const line of output.split("\n")) {
    if (!GONE_UPSTREAM.test(line)) continue;

    const match = line.match(BRANCH_LINE);
    if (!match) continue;

    const [, marker, name] = match;
    branches.push(name);
    if (marker === "+") {
      worktreeBranches.push(name);
    }
  }

  return { branches, worktreeBranches };
}

const REF_PREFIXES = ["refs/heads/", "refs/remotes/", "origin/"];

/**
 * Reduce a ref printed by git to a plain branch name.
 *
 * Strips `refs/heads/`, `refs/remotes/` and `origin/` in that order.
 * Returns null when nothing usable is left: an empty string, or the
 * symbolic `HEAD` itself.
 */
export function normalizeBranchRef(ref: string): string | null {
  let result = ref.trim();
  for (const prefix of REF_PREFIXES) {
    if (result.startsWith(prefix)) {
      result = result.slice(prefix.length);
    }
  }

  if (result === "" || result === "HEAD") {
    return null;
  }
  return result;
}
