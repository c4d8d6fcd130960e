import execa from 'execa';
import { WorkbenchError, WorkbenchErrorCode } from './errors.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
  timedOut: boolean;
}

export interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  input?: string;
  timeoutMs?: number;
}

export type RunFn = (command: string, args: string[], options?: RunOptions) => Promise<ExecResult>;

// SIGTERM on timeout, SIGKILL if the process is still alive this long afterwards.
export const FORCE_KILL_AFTER_MS = 2000;

export async function run(command: string, args: string[], options?: RunOptions): Promise<ExecResult> {
  let timedOut = false;
  let timer: NodeJS.Timeout | undefined;
  try {
    const child = execa(command, args, {
      cwd: options?.cwd,
      env: options?.env,
      input: options?.input,
      stripFinalNewline: false,
      reject: false,
    });
    // execa's own `timeout` kills with its default 5s grace; the timer here applies ours.
    if (options?.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM', { forceKillAfterTimeout: FORCE_KILL_AFTER_MS });
      }, options.timeoutMs);
    }
    const result = await child;
    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      exitCode: result.exitCode ?? (result.killed || timedOut ? 128 : result.failed ? 1 : 0),
      signal: result.signal ?? undefined,
      timedOut,
    };
  } catch (err) {
    throw new WorkbenchError(WorkbenchErrorCode.COMMAND_FAILED, `Command failed to spawn: ${command}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  } finally {
    if (timer) clearTimeout(timer);
  }
}
