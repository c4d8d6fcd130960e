import path from 'path';
import { normalize, reconstruct, toModuleId } from '../../../src/repo/paths.js';
import { PathError } from '../../../src/shared/errors.js';

describe('normalize', () => {
  const root = path.resolve('/tmp/project');

  it('returns the path relative to the root with forward slashes', () => {
    expect(normalize(path.join(root, 'lib', 'units.js'), root)).toBe('lib/units.js');
  });

  it('throws PathError for a path outside the root', () => {
    expect(() => normalize(path.resolve('/tmp/other/a.js'), root)).toThrow(PathError);
  });

  it('throws PathError for the root itself', () => {
    expect(() => normalize(root, root)).toThrow(PathError);
  });
});

describe('reconstruct', () => {
  it('joins the relative path onto the root', () => {
    const root = path.resolve('/tmp/project');
    expect(reconstruct('lib/units.js', root)).toBe(path.join(root, 'lib', 'units.js'));
  });

  it('is the inverse of normalize for plain relative paths', () => {
    const root = path.resolve('/tmp/project');
    const abs = path.join(root, 'a', 'b.js');
    expect(reconstruct(normalize(abs, root), root)).toBe(abs);
  });

  it('does not guard against parent segments', () => {
    const root = path.resolve('/tmp/project');
    expect(reconstruct('../escape.js', root)).toBe(path.resolve('/tmp/escape.js'));
  });
});

describe('toModuleId', () => {
  it('replaces separators with dots and strips the extension', () => {
    expect(toModuleId('pkg/sub/util.js')).toBe('pkg.sub.util');
  });

  it('keeps a top-level file name', () => {
    expect(toModuleId('main.cjs')).toBe('main');
  });
});
