import type { InterchangeEntry } from '../interchange/types.js';

/** External component that rewrites files according to an instruction. */
export interface CodeEditor {
  edit(instruction: string, files: InterchangeEntry[]): Promise<InterchangeEntry[]>;
}

/** External component that turns one source file into human-readable text. */
export interface DocumentRenderer {
  render(absolutePath: string): Promise<string>;
}

export interface ApplyResult {
  written: string[];
  deleted: string[];
}

export interface FixResult {
  /** Diagnostics that were sent to the editor; null when the repository ran clean. */
  problems: string | null;
  applied: ApplyResult | null;
}
