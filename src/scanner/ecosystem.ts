/**
 * Ecosystem detector
 *
 * Picks one executor for a code repository. First match wins:
 *  1. Java build descriptor at the root
 *  2. .NET solution/project file anywhere, or any C# source
 *  3. any Python source
 *  4. go.mod at the root, or any Go source
 *  5. generic sources-only scan
 */

import path from 'node:path';
import { walkFiles, fileExtension, pathExists } from './walk.js';
import {
  JAVA_BUILD_DESCRIPTORS,
  DOTNET_SOLUTION_EXTENSIONS,
  DOTNET_PROJECT_EXTENSIONS,
  DOTNET_SOURCE_EXTENSIONS,
  PYTHON_SOURCE_EXTENSIONS,
  GO_MODULE_FILE,
  GO_SOURCE_EXTENSIONS,
} from './extensions.js';
import type { Ecosystem } from '../types/classification.js';

interface MarkerInventory {
  solutions: Array<{ path: string; depth: number }>;
  projects: Array<{ path: string; depth: number }>;
  hasCSharp: boolean;
  hasPython: boolean;
  hasGo: boolean;
}

async function collectMarkers(rootDir: string): Promise<MarkerInventory> {
  const inventory: MarkerInventory = {
    solutions: [],
    projects: [],
    hasCSharp: false,
    hasPython: false,
    hasGo: false,
  };

  for await (const file of walkFiles(rootDir)) {
    const ext = fileExtension(file.name);
    if (DOTNET_SOLUTION_EXTENSIONS.has(ext)) {
      inventory.solutions.push({ path: file.relativePath, depth: file.depth });
    } else if (DOTNET_PROJECT_EXTENSIONS.has(ext)) {
      inventory.projects.push({ path: file.relativePath, depth: file.depth });
    } else if (DOTNET_SOURCE_EXTENSIONS.has(ext)) {
      inventory.hasCSharp = true;
    } else if (PYTHON_SOURCE_EXTENSIONS.has(ext)) {
      inventory.hasPython = true;
    } else if (GO_SOURCE_EXTENSIONS.has(ext)) {
      inventory.hasGo = true;
    }
  }

  return inventory;
}

/**
 * Shallowest candidate, ties broken by path
 */
function pickShallowest(candidates: Array<{ path: string; depth: number }>): string | null {
  const sorted = [...candidates].sort((a, b) => a.depth - b.depth || a.path.localeCompare(b.path));
  return sorted[0]?.path ?? null;
}

/**
 * Detect the ecosystem of a repository already classified as code
 *
 * @param rootDir - The job's scan path
 */
export async function detectEcosystem(rootDir: string): Promise<Ecosystem> {
  for (const descriptor of JAVA_BUILD_DESCRIPTORS) {
    if (await pathExists(path.join(rootDir, descriptor.file))) {
      return { kind: 'java', buildTool: descriptor.buildTool };
    }
  }

  const markers = await collectMarkers(rootDir);

  if (markers.solutions.length > 0 || markers.projects.length > 0 || markers.hasCSharp) {
    // A solution covers its projects, so it is preferred as the build target
    const projectFile = pickShallowest(markers.solutions) ?? pickShallowest(markers.projects);
    return { kind: 'dotnet', projectFile };
  }

  if (markers.hasPython) {
    return { kind: 'python' };
  }

  if (markers.hasGo || (await pathExists(path.join(rootDir, GO_MODULE_FILE)))) {
    return { kind: 'go' };
  }

  return { kind: 'generic' };
}
