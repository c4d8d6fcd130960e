import type { Comment } from 'acorn';

const BLANK_LINE = /\n[ \t]*\r?\n/;

/** Strips comment markers and the leading `*` gutter, like a docstring cleaner. */
export function cleanComment(value: string): string {
  const lines = value.split(/\r?\n/).map(line => {
    const stripped = line.replace(/^\s*/, '');
    return (stripped.startsWith('*') ? stripped.replace(/^\* ?/, '') : stripped).trimEnd();
  });
  while (lines.length > 0 && lines[0] === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines.join('\n');
}

/**
 * The file's description: a block comment that opens the file (after an optional
 * hashbang) and is separated from the first statement by a blank line.
 */
export function findModuleComment(
  source: string,
  comments: readonly Comment[],
  firstStatementStart: number | undefined,
): Comment | undefined {
  // A hashbang is reported as a line comment at offset 0.
  const first = comments.find(comment => !(comment.start === 0 && source.startsWith('#!')));
  if (!first || first.type !== 'Block') return undefined;
  const before = source.slice(0, first.start).replace(/^#!.*/, '');
  if (before.trim() !== '') return undefined;
  if (firstStatementStart !== undefined && !BLANK_LINE.test(source.slice(first.end, firstStatementStart))) {
    return undefined;
  }
  return first;
}

/** The JSDoc block directly above `start`, with no blank line or code in between. */
export function findAttachedDoc(source: string, comments: readonly Comment[], start: number): Comment | undefined {
  let nearest: Comment | undefined;
  for (const comment of comments) {
    if (comment.end > start) break;
    nearest = comment;
  }
  if (!nearest || nearest.type !== 'Block' || !nearest.value.startsWith('*')) return undefined;
  const gap = source.slice(nearest.end, start);
  if (gap.trim() !== '' || BLANK_LINE.test(gap)) return undefined;
  return nearest;
}
