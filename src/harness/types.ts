import type { OutputChannel } from './output-channel.js';

export interface ExecutionRequest {
  /** Dotted identity derived from the relative path, e.g. `pkg.util`. */
  moduleId: string;
  relativePath: string;
  absolutePath: string;
  source: string;
}

/**
 * Executes one file. Printed output goes to `channel`; a failure rejects with the
 * error raised by the file (or an ExecutionError carrying its trace).
 */
export interface ExecutionRunner {
  execute(request: ExecutionRequest, channel: OutputChannel): Promise<void>;
}

export interface DiagnosticReport {
  path: string;
  text: string;
}

export type ExecutionMode = 'in-process' | 'subprocess';
