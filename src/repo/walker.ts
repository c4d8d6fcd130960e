import fs from 'fs/promises';
import path from 'path';
import type { Dirent } from 'fs';
import { IOError } from '../shared/errors.js';

export interface WalkOptions {
  extensions: readonly string[];
  ignoreDirs: readonly string[];
}

/**
 * Lists matching files under `root`. Entries are visited in name order, and the files of a
 * directory come before anything found in its subdirectories.
 */
export async function discoverFiles(root: string, options: WalkOptions): Promise<string[]> {
  const found: string[] = [];
  await walk(path.resolve(root), options, found);
  return found;
}

async function walk(dir: string, options: WalkOptions, found: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    throw new IOError(`Failed to read directory: ${dir}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const subdirs: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory()) {
      if (!options.ignoreDirs.includes(entry.name)) subdirs.push(path.join(dir, entry.name));
    } else if (entry.isFile() && options.extensions.includes(path.extname(entry.name))) {
      found.push(path.join(dir, entry.name));
    }
  }
  for (const subdir of subdirs) {
    await walk(subdir, options, found);
  }
}
