import { parse } from 'acorn';
import type {
  AnonymousClassDeclaration,
  AnonymousFunctionDeclaration,
  Comment,
  Expression,
  ModuleDeclaration,
  Program,
  Statement,
} from 'acorn';
import { ParseError } from '../shared/errors.js';
import { cleanComment, findAttachedDoc, findModuleComment } from './comments.js';

export interface SummaryOptions {
  includeHeader?: boolean;
  includeDescriptions?: boolean;
}

type TopLevelNode = Statement | ModuleDeclaration | Expression | AnonymousClassDeclaration | AnonymousFunctionDeclaration;

type Classified =
  | { kind: 'class'; bodyStart: number }
  | { kind: 'function'; bodyStart: number }
  | { kind: 'variable' }
  | { kind: 'ignored' };

interface Parsed {
  program: Program;
  comments: Comment[];
}

/**
 * Condensed outline of a JavaScript file: the module description, then the header of every
 * top-level class and function with its JSDoc, then the first line of every top-level
 * binding. Definitions nested inside other definitions are never listed. The code is
 * parsed, not run; unparseable input throws ParseError and yields nothing.
 */
export function summarize(source: string, options: SummaryOptions = {}): string {
  const includeHeader = options.includeHeader ?? true;
  const includeDescriptions = options.includeDescriptions ?? true;

  const { program, comments } = parseSource(source);
  const lines = source.split('\n');
  const lineStarts = computeLineStarts(source);

  const classes: string[] = [];
  const functions: string[] = [];
  const variables: string[] = [];

  for (const statement of program.body) {
    const classified = classify(unwrapExport(statement));
    if (classified.kind === 'ignored') continue;

    const startLine = lineAt(lineStarts, statement.start);
    if (classified.kind === 'variable') {
      variables.push(lines[startLine].trim());
      continue;
    }

    const endLine = lineAt(lineStarts, classified.bodyStart);
    let signature = lines.slice(startLine, endLine + 1).join('\n').trim();
    const doc = includeDescriptions ? findAttachedDoc(source, comments, statement.start) : undefined;
    if (doc) {
      signature += `\n/**\n${cleanComment(doc.value)}\n*/`;
    }
    (classified.kind === 'class' ? classes : functions).push(signature);
  }

  const header = includeHeader ? findModuleComment(source, comments, program.body[0]?.start) : undefined;
  const headerText = header ? cleanComment(header.value) : '';

  const summary: string[] = [];
  if (headerText) summary.push(`Module Description:\n${headerText}\n`);
  if (classes.length > 0) summary.push(`Classes:\n${classes.join('\n')}\n`);
  if (functions.length > 0) summary.push(`Functions:\n${functions.join('\n')}\n`);
  if (variables.length > 0) summary.push(`Variables:\n${variables.join('\n')}\n`);
  return summary.join('\n').trim();
}

function parseSource(source: string): Parsed {
  // CommonJS scripts first; ES modules only parse in module mode.
  let scriptError: unknown;
  try {
    return parseAs(source, 'script');
  } catch (err) {
    scriptError = err;
  }
  try {
    return parseAs(source, 'module');
  } catch (moduleError) {
    const best = errorPosition(moduleError) > errorPosition(scriptError) ? moduleError : scriptError;
    throw toParseError(best);
  }
}

function parseAs(source: string, sourceType: 'script' | 'module'): Parsed {
  const comments: Comment[] = [];
  const program = parse(source, {
    ecmaVersion: 'latest',
    sourceType,
    allowHashBang: true,
    allowReturnOutsideFunction: true,
    onComment: comments,
  });
  return { program, comments };
}

function unwrapExport(statement: Statement | ModuleDeclaration): TopLevelNode {
  if (statement.type === 'ExportNamedDeclaration' && statement.declaration) return statement.declaration;
  if (statement.type === 'ExportDefaultDeclaration') return statement.declaration;
  return statement;
}

function classify(node: TopLevelNode): Classified {
  switch (node.type) {
    case 'ClassDeclaration':
      return { kind: 'class', bodyStart: node.body.start };
    case 'FunctionDeclaration':
      return { kind: 'function', bodyStart: node.body.start };
    case 'VariableDeclaration': {
      const init = node.declarations.length === 1 ? node.declarations[0].init : null;
      if (init && (init.type === 'FunctionExpression' || init.type === 'ArrowFunctionExpression')) {
        return { kind: 'function', bodyStart: init.body.start };
      }
      return { kind: 'variable' };
    }
    case 'ExpressionStatement':
      return node.expression.type === 'AssignmentExpression' ? { kind: 'variable' } : { kind: 'ignored' };
    default:
      return { kind: 'ignored' };
  }
}

function computeLineStarts(source: string): number[] {
  const starts = [0];
  for (let i = 0; i < source.length; i++) {
    if (source[i] === '\n') starts.push(i + 1);
  }
  return starts;
}

function lineAt(lineStarts: readonly number[], offset: number): number {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineStarts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo;
}

function errorPosition(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'pos' in err && typeof err.pos === 'number') return err.pos;
  return -1;
}

function toParseError(err: unknown): ParseError {
  const message = err instanceof Error ? err.message : String(err);
  if (typeof err === 'object' && err !== null && 'loc' in err) {
    const loc = err.loc;
    if (
      typeof loc === 'object' && loc !== null &&
      'line' in loc && typeof loc.line === 'number' &&
      'column' in loc && typeof loc.column === 'number'
    ) {
      return new ParseError(`Failed to parse source: ${message}`, { line: loc.line, column: loc.column });
    }
  }
  return new ParseError(`Failed to parse source: ${message}`);
}
