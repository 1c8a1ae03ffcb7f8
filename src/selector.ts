import path from "node:path";
import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import { TraversalError } from "./errors.js";
import type { SelectionCriteria } from "./types.js";

async function listDirectory(dir: string): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (err) {
    throw new TraversalError(dir, err);
  }
}

async function sizeOf(filePath: string): Promise<number> {
  try {
    return (await fs.lstat(filePath)).size;
  } catch (err) {
    throw new TraversalError(filePath, err);
  }
}

/**
 * Walks `root` and yields every regular file passing the name and size
 * constraints. Symbolic links are neither followed nor yielded. Within a
 * directory, files come first in name order, then each subdirectory.
 */
export async function* selectFiles(criteria: SelectionCriteria): AsyncGenerator<string, void, undefined> {
  const { include, exclude } = criteria;
  const minLength = criteria.minLength;
  const pending = [criteria.root];

  while (pending.length > 0) {
    const dir = pending.shift();
    if (dir === undefined) break;

    const entries = await listDirectory(dir);
    const subdirs: string[] = [];

    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        subdirs.push(entryPath);
        continue;
      }
      if (!entry.isFile()) continue;

      if (exclude && exclude(entry.name)) continue;
      if (include && !include(entry.name)) continue;
      if (minLength !== undefined && (await sizeOf(entryPath)) <= minLength) continue;

      yield entryPath;
    }

    pending.unshift(...subdirs);
  }
}
