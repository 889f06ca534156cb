/**
 * Recursive file walker shared by the classifier, the ecosystem detector
 * and the coverage lookup
 */

import { promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';

/** Directories never descended into */
export const SKIP_DIRS = new Set([
  '.git', 'node_modules', '__pycache__', '.venv', 'venv',
  '.scannerwork', '.sonarqube', '.gradle', '.idea',
]);

export interface WalkEntry {
  name: string;
  relativePath: string;
  absolutePath: string;
  depth: number;
}

/**
 * Lowercased extension of a file name, including the dot
 */
export function fileExtension(name: string): string {
  return path.extname(name).toLowerCase();
}

/**
 * Walk regular files below rootDir depth-first, in name order.
 * Unreadable directories are skipped; symbolic links are not followed.
 *
 * @param rootDir - Directory to walk
 */
export async function* walkFiles(rootDir: string): AsyncGenerator<WalkEntry> {
  async function* recurse(dir: string, depth: number): AsyncGenerator<WalkEntry> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch {
      return;
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const abs = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (SKIP_DIRS.has(entry.name)) continue;
        yield* recurse(abs, depth + 1);
      } else if (entry.isFile()) {
        yield {
          name: entry.name,
          relativePath: path.relative(rootDir, abs),
          absolutePath: abs,
          depth,
        };
      }
    }
  }

  yield* recurse(rootDir, 0);
}

/**
 * Check if a path exists on the filesystem.
 */
export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is an existing directory.
 */
export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}
