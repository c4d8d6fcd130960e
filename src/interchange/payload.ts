import { DuplicatePathError, WorkbenchError, WorkbenchErrorCode, errorMessage } from '../shared/errors.js';
import { DELETE, keep } from '../repo/types.js';
import type { FileContent } from '../repo/types.js';
import { PayloadSchema } from './types.js';
import type { InterchangeEntry } from './types.js';

export function parsePayload(value: unknown): InterchangeEntry[] {
  const parsed = PayloadSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new WorkbenchError(WorkbenchErrorCode.INVALID_PAYLOAD, 'Payload is not a list of { name, content } entries', {
      issues: issues.join('; '),
    });
  }
  return parsed.data;
}

export function parsePayloadText(text: string): InterchangeEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new WorkbenchError(WorkbenchErrorCode.INVALID_PAYLOAD, `Payload is not valid JSON: ${errorMessage(e)}`);
  }
  return parsePayload(raw);
}

export function toDict(entries: readonly InterchangeEntry[]): Map<string, InterchangeEntry> {
  const output = new Map<string, InterchangeEntry>();
  for (const entry of entries) {
    if (output.has(entry.name)) throw new DuplicatePathError(entry.name);
    output.set(entry.name, entry);
  }
  return output;
}

// Display only: the result is not meant to be parsed back into entries.
export function toFlatText(entries: readonly InterchangeEntry[]): string {
  return entries
    .map(entry => `**${entry.name}**:\n${entry.content ?? '<deleted>'}`)
    .join('\n\n');
}

export function entryToContent(entry: InterchangeEntry): FileContent {
  return entry.content === null ? DELETE : keep(entry.content);
}

export function contentToEntry(name: string, content: FileContent): InterchangeEntry {
  return { name, content: content.kind === 'keep' ? content.text : null };
}
