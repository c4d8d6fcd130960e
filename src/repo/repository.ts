import fs from 'fs/promises';
import path from 'path';
import { IOError, NotFoundError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { summarize } from '../summary/summarizer.js';
import { contentToEntry, entryToContent, toDict } from '../interchange/payload.js';
import type { InterchangeEntry } from '../interchange/types.js';
import { normalize, reconstruct } from './paths.js';
import { discoverFiles } from './walker.js';
import { DEFAULT_EXTENSIONS, DEFAULT_IGNORE_DIRS, keep } from './types.js';
import type { FileRecord, LoadOptions } from './types.js';

export interface PersistResult {
  written: string[];
  deleted: string[];
}

/**
 * In-memory model of the tracked files under one root directory. Records are keyed by
 * their repo-relative path and keep the order in which they were discovered or received.
 */
export class Repository {
  private readonly files = new Map<string, FileRecord>();

  constructor(readonly root: string, records: Iterable<FileRecord> = []) {
    for (const record of records) this.set(record);
  }

  static async load(root: string, options: LoadOptions = {}): Promise<Repository> {
    const absoluteRoot = path.resolve(root);
    const discovered = await discoverFiles(absoluteRoot, {
      extensions: options.extensions ?? DEFAULT_EXTENSIONS,
      ignoreDirs: options.ignoreDirs ?? DEFAULT_IGNORE_DIRS,
    });
    const repo = new Repository(absoluteRoot);
    for (const filePath of discovered) {
      repo.set(await readRecord(absoluteRoot, filePath));
    }
    logger.debug({ root: absoluteRoot, files: repo.size }, 'Repository loaded');
    return repo;
  }

  // Builds a detached model; nothing touches the disk until persist().
  static fromInterchange(entries: readonly InterchangeEntry[], root: string): Repository {
    const byName = toDict(entries);
    return new Repository(
      path.resolve(root),
      [...byName.values()].map(entry => ({ relativePath: entry.name, content: entryToContent(entry) })),
    );
  }

  get size(): number {
    return this.files.size;
  }

  has(relativePath: string): boolean {
    return this.files.has(relativePath);
  }

  get(relativePath: string): FileRecord | undefined {
    return this.files.get(relativePath);
  }

  paths(): string[] {
    return [...this.files.keys()];
  }

  records(): FileRecord[] {
    return [...this.files.values()];
  }

  /** Replaces the record stored under the same path, or appends it. */
  set(record: FileRecord): void {
    this.files.set(record.relativePath, record);
  }

  absolutePath(relativePath: string): string {
    return reconstruct(relativePath, this.root);
  }

  toInterchange(summaryMode = false): InterchangeEntry[] {
    return this.records().map(record => {
      if (summaryMode && record.content.kind === 'keep') {
        return { name: record.relativePath, content: summarize(record.content.text) };
      }
      return contentToEntry(record.relativePath, record.content);
    });
  }

  toMarkdown(): string {
    const outputs: string[] = [];
    for (const record of this.records()) {
      if (record.content.kind !== 'keep') continue;
      outputs.push(`**${record.relativePath}**:\n\`\`\`js\n${record.content.text}\n\`\`\`\n`);
    }
    return outputs.join('\n');
  }

  /**
   * Writes every kept file (creating parent directories) and removes every deleted one.
   * Writes are plain overwrites: no temp file, no backup, no diff against the disk.
   */
  async persist(): Promise<PersistResult> {
    // Every name is checked before the first write, so a bad entry leaves the disk untouched.
    // normalize() throws PathError for names that resolve outside the root, e.g. '../x.js'.
    const targets = this.records().map(record => {
      const target = this.absolutePath(record.relativePath);
      normalize(target, this.root);
      return { record, target };
    });

    const result: PersistResult = { written: [], deleted: [] };
    for (const { record, target } of targets) {
      try {
        if (record.content.kind === 'keep') {
          await fs.mkdir(path.dirname(target), { recursive: true });
          await fs.writeFile(target, record.content.text, 'utf-8');
          result.written.push(record.relativePath);
        } else {
          await fs.rm(target, { force: true });
          result.deleted.push(record.relativePath);
        }
      } catch (err) {
        throw new IOError(`Failed to persist ${record.relativePath}`, {
          path: target,
          cause: err instanceof Error ? err.message : String(err),
        });
      }
    }
    logger.info({ root: this.root, written: result.written.length, deleted: result.deleted.length }, 'Repository persisted');
    return result;
  }
}

export async function readRecord(root: string, filePath: string): Promise<FileRecord> {
  const relativePath = normalize(filePath, root);
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new NotFoundError(`File disappeared before it could be read: ${filePath}`, { path: filePath });
    }
    throw new IOError(`Failed to read ${filePath}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  return { relativePath, content: keep(text) };
}
