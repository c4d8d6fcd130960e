import { NotFoundError, WorkbenchError, WorkbenchErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { Repository } from '../repo/repository.js';
import { toFlatText } from '../interchange/payload.js';
import type { InterchangeEntry } from '../interchange/types.js';
import { createRunner, reportsToEntries, runAll } from '../harness/harness.js';
import type { DiagnosticReport, ExecutionMode } from '../harness/types.js';
import type { WorkbenchConfig } from '../config.js';
import { CommandCodeEditor, CommandDocumentRenderer } from './collaborators.js';
import type { ApplyResult, CodeEditor, DocumentRenderer, FixResult } from './types.js';

type ExecutionOptions = { mode: ExecutionMode; timeoutMs: number; nodePath?: string };

export interface EditOptions {
  summary?: boolean;
  files?: readonly string[];
  folder?: string;
}

const DEFAULT_EXECUTION: ExecutionOptions = { mode: 'in-process', timeoutMs: 30_000 };

export interface WorkbenchOptions {
  root: string;
  extensions?: readonly string[];
  ignoreDirs?: readonly string[];
  execution?: ExecutionOptions;
  editor?: CodeEditor;
  renderer?: DocumentRenderer;
}

/**
 * The operations an orchestrator calls. Every call reloads the repository from disk, so
 * edits made by anyone between two calls are always picked up.
 */
export class Workbench {
  constructor(private readonly options: WorkbenchOptions) {}

  static fromConfig(config: WorkbenchConfig): Workbench {
    const root = config.repository.root;
    if (!root) {
      throw new WorkbenchError(
        WorkbenchErrorCode.NO_REPOSITORY,
        'No repository configured. Set repository.root in the config file or WORKBENCH_REPO_ROOT.',
      );
    }
    return new Workbench({
      root,
      extensions: config.repository.extensions,
      ignoreDirs: config.repository.ignore_dirs,
      execution: {
        mode: config.execution.mode,
        timeoutMs: config.execution.timeout_ms,
        nodePath: config.execution.node_path ?? undefined,
      },
      editor: config.editor.command
        ? new CommandCodeEditor(config.editor.command, config.editor.timeout_ms)
        : undefined,
      renderer: config.renderer.command
        ? new CommandDocumentRenderer(config.renderer.command, config.renderer.timeout_ms)
        : undefined,
    });
  }

  load(): Promise<Repository> {
    return Repository.load(this.options.root, {
      extensions: this.options.extensions,
      ignoreDirs: this.options.ignoreDirs,
    });
  }

  async getPayload(opts: { summary?: boolean } = {}): Promise<InterchangeEntry[]> {
    const repo = await this.load();
    return repo.toInterchange(opts.summary ?? false);
  }

  async getRepositoryMap(opts: { summary?: boolean } = {}): Promise<string> {
    return toFlatText(await this.getPayload(opts));
  }

  async getFile(relativePath: string): Promise<string> {
    const repo = await this.load();
    const record = repo.get(relativePath);
    if (!record || record.content.kind !== 'keep') {
      throw this.notInRepository(relativePath, repo);
    }
    return record.content.text;
  }

  async diagnose(opts: { withOutputs?: boolean; withErrors?: boolean } = {}): Promise<DiagnosticReport[] | null> {
    const repo = await this.load();
    const execution = this.options.execution ?? DEFAULT_EXECUTION;
    return runAll(repo, {
      withOutputs: opts.withOutputs ?? false,
      withErrors: opts.withErrors ?? true,
      runner: createRunner(repo, execution.mode, execution),
    });
  }

  async applyPayload(entries: readonly InterchangeEntry[]): Promise<ApplyResult> {
    const incoming = Repository.fromInterchange(entries, this.options.root);
    return incoming.persist();
  }

  /**
   * Runs the repository, and when anything fails sends the failures plus the full payload
   * to the code editor and applies what it returns.
   */
  async requestFix(instructions?: string): Promise<FixResult> {
    const reports = await this.diagnose({ withOutputs: false, withErrors: true });
    if (!reports) {
      logger.info({ root: this.options.root }, 'No problems found');
      return { problems: null, applied: null };
    }
    const problems = toFlatText(reportsToEntries(reports));
    const instruction = [instructions?.trim(), `Errors found while running the repository:\n\n${problems}`]
      .filter(Boolean)
      .join('\n\n');
    const applied = await this.sendToEditor(instruction, await this.getPayload({ summary: false }));
    return { problems, applied };
  }

  /**
   * Sends an instruction to the code editor with the repository payload, or only the part
   * of it named by `files` (relative paths) or `folder` (a directory under the root).
   */
  async requestEdit(instruction: string, opts: EditOptions = {}): Promise<ApplyResult> {
    const repo = await this.load();
    const payload = repo.toInterchange(opts.summary ?? false);
    return this.sendToEditor(instruction, this.selectEntries(repo, payload, opts));
  }

  async renderDocument(relativePath: string): Promise<string> {
    if (!this.options.renderer) {
      throw new WorkbenchError(WorkbenchErrorCode.RENDERER_NOT_CONFIGURED, 'No document renderer configured (renderer.command)');
    }
    const repo = await this.load();
    const record = repo.get(relativePath);
    if (!record || record.content.kind !== 'keep') {
      throw this.notInRepository(relativePath, repo);
    }
    return this.options.renderer.render(repo.absolutePath(relativePath));
  }

  private async sendToEditor(instruction: string, files: InterchangeEntry[]): Promise<ApplyResult> {
    if (!this.options.editor) {
      throw new WorkbenchError(WorkbenchErrorCode.EDITOR_NOT_CONFIGURED, 'No code editor configured (editor.command)');
    }
    const changed = await this.options.editor.edit(instruction, files);
    logger.info({ files: changed.length }, 'Code editor returned changes');
    return this.applyPayload(changed);
  }

  private selectEntries(repo: Repository, payload: InterchangeEntry[], opts: EditOptions): InterchangeEntry[] {
    if (opts.files) {
      for (const file of opts.files) {
        if (repo.get(file)?.content.kind !== 'keep') throw this.notInRepository(file, repo);
      }
      const wanted = new Set(opts.files);
      return payload.filter(entry => wanted.has(entry.name));
    }
    if (opts.folder !== undefined) {
      const prefix = folderPrefix(opts.folder);
      const entries = payload.filter(entry => entry.name.startsWith(prefix));
      if (entries.length === 0) {
        throw new NotFoundError(`No source files found in the folder ${opts.folder} of the repository ${repo.root}.`, {
          folder: opts.folder,
        });
      }
      return entries;
    }
    return payload;
  }

  private notInRepository(relativePath: string, repo: Repository): NotFoundError {
    return new NotFoundError(
      `The file ${relativePath} is not found in the repository ${repo.root}.\n` +
      `Here is the list of files in the repository:\n${repo.paths().join('\n')}`,
      { path: relativePath },
    );
  }
}

// '' and '.' select the whole repository.
function folderPrefix(folder: string): string {
  const trimmed = folder.replace(/\\/g, '/').replace(/^(\.\/)+/, '').replace(/\/+$/, '');
  return trimmed === '' || trimmed === '.' ? '' : `${trimmed}/`;
}
