import path from 'path';
import { ExecutionError } from '../shared/errors.js';
import { run } from '../shared/exec.js';
import type { RunFn } from '../shared/exec.js';
import type { OutputChannel } from './output-channel.js';
import type { ExecutionRequest, ExecutionRunner } from './types.js';

export interface SubprocessRunnerOptions {
  timeoutMs: number;
  nodePath?: string;
}

/**
 * Runs each file in its own node process, fed on stdin with the file's directory as cwd so
 * relative requires resolve against the persisted tree. A run that outlives the timeout
 * gets SIGTERM, then SIGKILL.
 */
export class SubprocessRunner implements ExecutionRunner {
  constructor(
    private readonly options: SubprocessRunnerOptions,
    private readonly exec: RunFn = run,
  ) {}

  async execute(request: ExecutionRequest, channel: OutputChannel): Promise<void> {
    const result = await this.exec(this.options.nodePath ?? process.execPath, ['-'], {
      cwd: path.dirname(request.absolutePath),
      input: request.source,
      timeoutMs: this.options.timeoutMs,
    });
    channel.write(result.stdout);

    if (result.timedOut) {
      throw new ExecutionError(
        `${request.relativePath} timed out`,
        `Error: Execution timed out after ${this.options.timeoutMs}ms and was killed\n${result.stderr}`,
        { moduleId: request.moduleId },
      );
    }
    if (result.exitCode !== 0 || result.signal) {
      const status = result.signal ? `signal ${result.signal}` : `code ${result.exitCode}`;
      throw new ExecutionError(
        `${request.relativePath} exited with ${status}`,
        result.stderr || `Error: Process exited with ${status}\n`,
        { moduleId: request.moduleId },
      );
    }
  }
}
