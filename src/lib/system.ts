/**
 * System utility functions for checking prerequisites
 */

import { execSync } from "child_process";

/**
 * Check if a command exists on the system
 */
export function commandExists(cmd: string): boolean {
  try {
    execSync(
      process.platform === "win32" ? `where ${cmd}` : `command -v ${cmd}`,
      { stdio: "ignore" },
    );
    return true;
  } catch {
    return false;
  }
}

/**
 * Get platform-specific install hint for a package
 */
export function getInstallHint(pkg: string): string {
  const hints: Record<string, Record<string, string>> = {
    git: {
      darwin: "brew install git  # or: xcode-select --install",
      linux: "apt install git  # or: yum install git",
      win32: "winget install Git.Git  # or: choco install git",
    },
  };

  const pkgHints = hints[pkg];
  if (!pkgHints) {
    return `Install ${pkg}`;
  }

  return pkgHints[process.platform] || pkgHints["linux"] || `Install ${pkg}`;
}
