export enum WorkbenchErrorCode {
  PATH_OUTSIDE_ROOT = 'PATH_OUTSIDE_ROOT',
  NOT_FOUND = 'NOT_FOUND',
  DUPLICATE_PATH = 'DUPLICATE_PATH',
  PARSE_ERROR = 'PARSE_ERROR',
  EXECUTION_FAILED = 'EXECUTION_FAILED',
  IO_ERROR = 'IO_ERROR',
  INVALID_PAYLOAD = 'INVALID_PAYLOAD',
  INVALID_CONFIG = 'INVALID_CONFIG',
  NO_REPOSITORY = 'NO_REPOSITORY',
  COMMAND_FAILED = 'COMMAND_FAILED',
  EDITOR_NOT_CONFIGURED = 'EDITOR_NOT_CONFIGURED',
  EDITOR_FAILED = 'EDITOR_FAILED',
  RENDERER_NOT_CONFIGURED = 'RENDERER_NOT_CONFIGURED',
  RENDER_FAILED = 'RENDER_FAILED',
}

export class WorkbenchError extends Error {
  readonly code: WorkbenchErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: WorkbenchErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'WorkbenchError';
    this.code = code;
    this.context = context;
  }
}

/** A path that does not lie under the repository root. */
export class PathError extends WorkbenchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(WorkbenchErrorCode.PATH_OUTSIDE_ROOT, message, context);
    this.name = 'PathError';
  }
}

/** A file that vanished during load, or a path the repository does not track. */
export class NotFoundError extends WorkbenchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(WorkbenchErrorCode.NOT_FOUND, message, context);
    this.name = 'NotFoundError';
  }
}

export class DuplicatePathError extends WorkbenchError {
  constructor(path: string) {
    super(WorkbenchErrorCode.DUPLICATE_PATH, `Can't have two files with the same name: ${path}`, { path });
    this.name = 'DuplicatePathError';
  }
}

export class ParseError extends WorkbenchError {
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, location?: { line: number; column: number }) {
    super(WorkbenchErrorCode.PARSE_ERROR, message, location ? { ...location } : undefined);
    this.name = 'ParseError';
    this.line = location?.line;
    this.column = location?.column;
  }
}

// Raised by runners and caught by the harness; it never escapes runAll.
export class ExecutionError extends WorkbenchError {
  readonly trace: string;

  constructor(message: string, trace: string, context?: Record<string, unknown>) {
    super(WorkbenchErrorCode.EXECUTION_FAILED, message, context);
    this.name = 'ExecutionError';
    this.trace = trace;
  }
}

export class IOError extends WorkbenchError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(WorkbenchErrorCode.IO_ERROR, message, context);
    this.name = 'IOError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Values thrown from a vm context are not instances of this realm's Error,
// so the stack is read structurally.
export function formatTrace(err: unknown): string {
  if (err instanceof ExecutionError) return err.trace;
  if (typeof err === 'object' && err !== null && 'stack' in err && typeof err.stack === 'string') {
    return err.stack;
  }
  return `Uncaught ${String(err)}`;
}
