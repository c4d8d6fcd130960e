import { WorkbenchError, WorkbenchErrorCode } from '../shared/errors.js';
import { run } from '../shared/exec.js';
import type { RunFn } from '../shared/exec.js';
import { parsePayloadText } from '../interchange/payload.js';
import type { InterchangeEntry } from '../interchange/types.js';
import type { CodeEditor, DocumentRenderer } from './types.js';

/**
 * Delegates edits to an external command: `{ instruction, files }` as JSON on stdin, the
 * changed files as a JSON payload on stdout.
 */
export class CommandCodeEditor implements CodeEditor {
  constructor(
    private readonly argv: readonly string[],
    private readonly timeoutMs: number,
    private readonly exec: RunFn = run,
  ) {}

  async edit(instruction: string, files: InterchangeEntry[]): Promise<InterchangeEntry[]> {
    const [command, ...args] = this.argv;
    const result = await this.exec(command, args, {
      input: JSON.stringify({ instruction, files }),
      timeoutMs: this.timeoutMs,
    });
    if (result.exitCode !== 0 || result.timedOut) {
      throw new WorkbenchError(WorkbenchErrorCode.EDITOR_FAILED, `Code editor failed: ${command}`, {
        exitCode: result.exitCode,
        timedOut: result.timedOut,
        stderr: result.stderr,
      });
    }
    // An editor with nothing to change may print nothing at all.
    if (!result.stdout.trim()) return [];
    return parsePayloadText(result.stdout);
  }
}

/** Runs an external command with the file's absolute path appended and returns its stdout. */
export class CommandDocumentRenderer implements DocumentRenderer {
  constructor(
    private readonly argv: readonly string[],
    private readonly timeoutMs: number,
    private readonly exec: RunFn = run,
  ) {}

  async render(absolutePath: string): Promise<string> {
    const [command, ...args] = this.argv;
    const result = await this.exec(command, [...args, absolutePath], { timeoutMs: this.timeoutMs });
    if (result.exitCode !== 0 || result.timedOut) {
      throw new WorkbenchError(WorkbenchErrorCode.RENDER_FAILED, `Document renderer failed for ${absolutePath}`, {
        exitCode: result.exitCode,
        stderr: result.stderr,
      });
    }
    return result.stdout;
  }
}
