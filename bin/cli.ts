#!/usr/bin/env node
/**
 * git-cleanup CLI
 *
 * Installed on PATH, git also runs it as `git cleanup`.
 */

import { Command } from "commander";
import chalk from "chalk";
import { cleanupCommand } from "../src/commands/cleanup.js";

const program = new Command();

// Handle --no-color before parsing
if (process.argv.includes("--no-color")) {
  chalk.level = 0;
}

program
  .name("git-cleanup")
  .description(
    "Update the default branch, prune branches whose upstream is gone, and tidy their worktrees",
  )
  .version("0.1.0")
  .option("-C, --cwd <path>", "Run as if started in <path>")
  .option(
    "--pool-prefix <prefix>",
    "Worktree directory prefix marking reusable pool slots (without it, " +
      "every worktree not named after its branch is reset, not removed)",
  )
  .option("-n, --dry-run", "Show what would be cleaned up without changing it")
  .option("-v, --verbose", "Show each git command as it runs")
  .option("--no-color", "Disable colored output")
  .action(cleanupCommand);

await program.parseAsync();
