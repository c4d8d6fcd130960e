import {
  contentToEntry,
  entryToContent,
  parsePayload,
  parsePayloadText,
  toDict,
  toFlatText,
} from '../../../src/interchange/payload.js';
import { DuplicatePathError, WorkbenchError, WorkbenchErrorCode } from '../../../src/shared/errors.js';

describe('toDict', () => {
  it('maps entries by name', () => {
    const dict = toDict([
      { name: 'a.js', content: 'x' },
      { name: 'b.js', content: null },
    ]);
    expect([...dict.keys()]).toEqual(['a.js', 'b.js']);
    expect(dict.get('b.js')).toEqual({ name: 'b.js', content: null });
  });

  it('throws DuplicatePathError when two entries share a name', () => {
    const entries = [
      { name: 'a.js', content: 'one' },
      { name: 'a.js', content: 'two' },
    ];
    expect(() => toDict(entries)).toThrow(DuplicatePathError);
    try {
      toDict(entries);
    } catch (err) {
      expect(err).toBeInstanceOf(WorkbenchError);
      expect(err).toMatchObject({ code: WorkbenchErrorCode.DUPLICATE_PATH });
    }
  });
});

describe('toFlatText', () => {
  it('joins name/content blocks in list order', () => {
    const text = toFlatText([
      { name: 'b.js', content: 'const b = 2;' },
      { name: 'a.js', content: 'const a = 1;' },
    ]);
    expect(text).toBe('**b.js**:\nconst b = 2;\n\n**a.js**:\nconst a = 1;');
  });

  it('marks deleted entries', () => {
    expect(toFlatText([{ name: 'gone.js', content: null }])).toBe('**gone.js**:\n<deleted>');
  });

  it('returns an empty string for an empty payload', () => {
    expect(toFlatText([])).toBe('');
  });
});

describe('parsePayload', () => {
  it('accepts a bare array of entries', () => {
    expect(parsePayload([{ name: 'a.js', content: 'x' }])).toEqual([{ name: 'a.js', content: 'x' }]);
  });

  it('accepts a { files } wrapper', () => {
    expect(parsePayload({ files: [{ name: 'a.js', content: null }] })).toEqual([{ name: 'a.js', content: null }]);
  });

  it('rejects entries without content', () => {
    expect(() => parsePayload([{ name: 'a.js' }])).toThrow(WorkbenchError);
  });

  it('rejects invalid JSON text with INVALID_PAYLOAD', () => {
    try {
      parsePayloadText('not json');
      throw new Error('expected parsePayloadText to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(WorkbenchError);
      expect(err).toMatchObject({ code: WorkbenchErrorCode.INVALID_PAYLOAD });
    }
  });
});

describe('entry/content conversion', () => {
  it('maps null content to a delete record and back', () => {
    const content = entryToContent({ name: 'a.js', content: null });
    expect(content).toEqual({ kind: 'delete' });
    expect(contentToEntry('a.js', content)).toEqual({ name: 'a.js', content: null });
  });

  it('maps text content to a keep record', () => {
    expect(entryToContent({ name: 'a.js', content: '' })).toEqual({ kind: 'keep', text: '' });
  });
});
