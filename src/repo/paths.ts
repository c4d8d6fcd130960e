import path from 'path';
import { PathError } from '../shared/errors.js';

// Repo-relative identities always use '/' so payload names are stable across platforms.
export function normalize(absolutePath: string, repoRoot: string): string {
  const relative = path.relative(path.resolve(repoRoot), path.resolve(absolutePath));
  if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new PathError(`Path is not inside the repository: ${absolutePath}`, { absolutePath, repoRoot });
  }
  return relative.split(path.sep).join('/');
}

// TODO: reject '..' segments in relativePath; a payload name such as '../x.js' currently
// resolves outside the root and only persist() catches it.
export function reconstruct(relativePath: string, repoRoot: string): string {
  return path.join(repoRoot, relativePath);
}

export function toModuleId(relativePath: string): string {
  const ext = path.posix.extname(relativePath);
  const withoutExt = ext ? relativePath.slice(0, -ext.length) : relativePath;
  return withoutExt.split('/').join('.');
}
