/**
 * File system utilities
 */

import { stat } from "fs/promises";

/**
 * Check if a path exists and is a directory (symlinks are followed)
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
