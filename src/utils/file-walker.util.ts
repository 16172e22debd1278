import fs from 'fs';
import path from 'path';
import { IoFailureError } from './errors';

export interface WalkEntry {
  path: string;
  isDirectory: boolean;
  depth: number;
}

function byName(a: fs.Dirent, b: fs.Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * Depth-first walk with each directory's entries sorted by name, so the same tree
 * always yields the same order. The root itself is yielded first at depth 0.
 */
export function walkSorted(root: string, maxDepth: number = Infinity): WalkEntry[] {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(root);
  } catch (error) {
    throw new IoFailureError(root, 'Cannot read source', error);
  }

  const entries: WalkEntry[] = [{ path: root, isDirectory: stats.isDirectory(), depth: 0 }];
  if (stats.isDirectory()) {
    walkDirectory(root, 1, maxDepth, entries);
  }
  return entries;
}

function walkDirectory(directory: string, depth: number, maxDepth: number, entries: WalkEntry[]): void {
  if (depth > maxDepth) {
    return;
  }

  let children: fs.Dirent[];
  try {
    children = fs.readdirSync(directory, { withFileTypes: true });
  } catch (error) {
    throw new IoFailureError(directory, 'Cannot read directory', error);
  }

  for (const child of children.sort(byName)) {
    const fullPath = path.join(directory, child.name);
    const isDirectory = child.isDirectory();
    entries.push({ path: fullPath, isDirectory, depth });
    if (isDirectory) {
      walkDirectory(fullPath, depth + 1, maxDepth, entries);
    }
  }
}
