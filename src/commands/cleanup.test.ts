import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import chalk from "chalk";

vi.mock("../lib/system.js", () => ({
  commandExists: vi.fn(),
  getInstallHint: vi.fn(),
}));

vi.mock("../lib/fs.js", () => ({
  isDirectory: vi.fn(),
}));

import { cleanup, cleanupCommand } from "./cleanup.js";
import { createFakeGit, type FakeResponse } from "../lib/__tests__/fake-git.js";
import { VirtualTerminal } from "../lib/__tests__/virtual-terminal.js";
import { CleanupError } from "../lib/errors.js";
import { GitClient } from "../lib/git/client.js";
import { RetryingExecutor } from "../lib/git/executor.js";
import { isDirectory } from "../lib/fs.js";
import { commandExists, getInstallHint } from "../lib/system.js";

const mockCommandExists = vi.mocked(commandExists);
const mockGetInstallHint = vi.mocked(getInstallHint);
const mockIsDirectory = vi.mocked(isDirectory);

const BRANCHES = [
  "  feature-x  abc123 [origin/feature-x: gone] Add x",
  "+ feature-y  def456 (/wt/slot-1) [origin/feature-y: gone] Add y",
  "* main       789abc [origin/main] Release",
  "",
].join("\n");

const WORKTREES = [
  "worktree /repo",
  "HEAD 789abc",
  "branch refs/heads/main",
  "",
  "worktree /wt/slot-1",
  "HEAD def456",
  "branch refs/heads/feature-y",
  "",
].join("\n");

const BASE_SCRIPT: Record<string, FakeResponse | FakeResponse[]> = {
  "symbolic-ref refs/remotes/origin/HEAD": {
    output: "refs/remotes/origin/main\n",
  },
  "branch --show-current": { output: "feature-x\n" },
  "pull origin main": { output: "Updating 1a2b..3c4d\nFast-forward\n" },
  "fetch -p": {
    output: " - [deleted]         (none)     -> origin/feature-x\n",
  },
  "branch -vv": { output: BRANCHES },
  "worktree list --porcelain": { output: WORKTREES },
  "show-ref --verify --quiet refs/heads/slot-1": { exitCode: 0 },
};

describe("cleanup", () => {
  let term: VirtualTerminal;

  beforeEach(() => {
    chalk.level = 0;
    term = new VirtualTerminal();
  });

  function setup(
    overrides: Record<string, FakeResponse | FakeResponse[]> = {},
  ) {
    const fake = createFakeGit({ ...BASE_SCRIPT, ...overrides });
    const git = new GitClient({
      executor: new RetryingExecutor({ run: fake.run, sleep: async () => {} }),
    });
    const print = (message: string) => {
      term.write(message + "\n");
    };
    return {
      calls: fake.calls,
      deps: {
        git,
        streamer: { output: term },
        output: print,
        errorOutput: print,
      },
    };
  }

  it("should update the default branch and clean up gone branches", async () => {
    const { calls, deps } = setup();

    const summary = await cleanup({}, deps);

    expect(calls).toEqual([
      "symbolic-ref refs/remotes/origin/HEAD",
      "branch --show-current",
      "checkout main",
      "pull origin main",
      "fetch -p",
      "branch -vv",
      "worktree list --porcelain",
      "-C /wt/slot-1 status --porcelain",
      "show-ref --verify --quiet refs/heads/slot-1",
      "-C /wt/slot-1 rebase origin/main slot-1",
      "branch -D feature-x",
      "branch -D feature-y",
    ]);
    expect(summary).toEqual({
      defaultBranch: "main",
      reset: ["/wt/slot-1"],
      removed: [],
      deleted: ["feature-x", "feature-y"],
      failed: [],
    });
    expect(term.screen()).toEqual([
      "✔ Checking out default branch",
      "✔ Pulling latest changes",
      "✔ Pruning local branches",
      "✔ Resetting worktree: /wt/slot-1",
      "✔ Deleting branch: feature-x",
      "✔ Deleting branch: feature-y",
      "✔ Git cleanup completed",
    ]);
  });

  it("should skip checkout when already on the default branch", async () => {
    const { calls, deps } = setup({
      "branch --show-current": { output: "main\n" },
    });

    await cleanup({}, deps);

    expect(calls).not.toContain("checkout main");
    expect(term.screen()[0]).toBe("✔ Pulling latest changes");
  });

  it("should stop when the pull fails", async () => {
    const { calls, deps } = setup({
      "pull origin main": {
        output: "fatal: couldn't find remote ref main",
        exitCode: 1,
      },
    });

    const error = await cleanup({}, deps).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CleanupError);
    expect(error).toHaveProperty("message", "failed to pull main");
    expect(calls).not.toContain("fetch -p");
    expect(term.screen()).toEqual([
      "✔ Checking out default branch",
      "✖ Pulling latest changes",
      "  fatal: couldn't find remote ref main",
    ]);
  });

  it("should stop when the default branch cannot be found", async () => {
    const { calls, deps } = setup({
      "symbolic-ref refs/remotes/origin/HEAD": { exitCode: 128 },
      "rev-parse --abbrev-ref origin/HEAD": { exitCode: 128 },
      "config --get init.defaultBranch": { exitCode: 1 },
    });

    await expect(cleanup({}, deps)).rejects.toThrow(
      "failed to get default branch",
    );
    expect(calls).toHaveLength(3);
  });

  it("should remove a worktree named after its branch", async () => {
    const { calls, deps } = setup({
      "worktree list --porcelain": {
        output: "worktree /wt/feature-y\nbranch refs/heads/feature-y\n",
      },
    });

    const summary = await cleanup({}, deps);

    expect(calls).toContain("worktree remove /wt/feature-y");
    expect(summary.removed).toEqual(["/wt/feature-y"]);
    expect(term.screen()).toContain("✔ Removing worktree: /wt/feature-y");
  });

  it("should derive the home branch from the pool prefix", async () => {
    const { calls, deps } = setup({
      "show-ref --verify --quiet refs/heads/1": { exitCode: 1 },
    });

    await cleanup({ poolPrefix: "slot-" }, deps);

    expect(calls).toContain("-C /wt/slot-1 checkout -b 1 origin/main");
  });

  it("should skip the branch of a worktree that cannot be found", async () => {
    const { calls, deps } = setup({
      "worktree list --porcelain": { output: "worktree /repo\nbranch refs/heads/main\n" },
    });

    const summary = await cleanup({}, deps);

    expect(calls).toContain("branch -D feature-x");
    expect(calls).not.toContain("branch -D feature-y");
    expect(summary.failed).toEqual(["feature-y"]);
    expect(term.screen().slice(3)).toEqual([
      "Error finding worktree for branch feature-y: worktree not found for branch feature-y",
      "✔ Deleting branch: feature-x",
      "Skipping branch feature-y: its worktree was not cleaned up",
      "✔ Git cleanup completed",
    ]);
  });

  it("should skip the branch of a worktree that failed to reset", async () => {
    const { calls, deps } = setup({
      "-C /wt/slot-1 rebase origin/main slot-1": {
        output: "CONFLICT (content): Merge conflict in app.ts",
        exitCode: 1,
      },
    });

    const summary = await cleanup({}, deps);

    expect(calls).not.toContain("branch -D feature-y");
    expect(summary.failed).toEqual(["feature-y"]);
    expect(term.screen()).toContain("✖ Resetting worktree: /wt/slot-1");
  });

  it("should keep going after a branch fails to delete", async () => {
    const { deps } = setup({
      "branch -D feature-x": {
        output: "error: cannot delete branch 'feature-x' used by worktree",
        exitCode: 1,
      },
    });

    const summary = await cleanup({}, deps);

    expect(summary.deleted).toEqual(["feature-y"]);
    expect(summary.failed).toEqual(["feature-x"]);
    expect(term.screen().slice(4)).toEqual([
      "✖ Deleting branch: feature-x",
      "  error: cannot delete branch 'feature-x' used by worktree",
      "✔ Deleting branch: feature-y",
      "✔ Git cleanup completed",
    ]);
  });

  it("should only report what would change in a dry run", async () => {
    const { calls, deps } = setup();

    const summary = await cleanup({ dryRun: true }, deps);

    expect(calls).toEqual([
      "symbolic-ref refs/remotes/origin/HEAD",
      "branch --show-current",
      "fetch -p",
      "branch -vv",
      "worktree list --porcelain",
    ]);
    expect(summary.deleted).toEqual([]);
    expect(term.screen()).toEqual([
      "✔ Pruning local branches",
      "Would reset worktree /wt/slot-1 to slot-1",
      "Would delete branch feature-x",
      "Would delete branch feature-y",
      "Dry run: no branches or worktrees were changed",
    ]);
  });
});

describe("cleanupCommand", () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.resetAllMocks();
    chalk.level = 0;
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    processExitSpy = vi
      .spyOn(process, "exit")
      .mockImplementation(() => undefined as never);
    mockGetInstallHint.mockReturnValue("apt install git");
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  it("should exit 1 when git is not installed", async () => {
    mockCommandExists.mockReturnValue(false);

    await cleanupCommand({});

    expect(consoleErrorSpy).toHaveBeenCalledWith(
      "Error: git is not installed (apt install git)",
    );
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it("should exit 1 when --cwd is not a directory", async () => {
    mockCommandExists.mockReturnValue(true);
    mockIsDirectory.mockResolvedValue(false);

    await cleanupCommand({ cwd: "/no/such/repo" });

    expect(mockIsDirectory).toHaveBeenCalledWith("/no/such/repo");
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      "Error: --cwd is not a directory: /no/such/repo",
    );
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it("should remove its signal handlers when done", async () => {
    mockCommandExists.mockReturnValue(false);
    const listeners = process.listenerCount("SIGINT");

    await cleanupCommand({});

    expect(process.listenerCount("SIGINT")).toBe(listeners);
  });
});
