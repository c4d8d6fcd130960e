export type FileContent =
  | { readonly kind: 'keep'; readonly text: string }
  | { readonly kind: 'delete' };

export interface FileRecord {
  readonly relativePath: string;
  readonly content: FileContent;
}

export interface LoadOptions {
  extensions?: readonly string[];
  ignoreDirs?: readonly string[];
}

export const DEFAULT_EXTENSIONS: readonly string[] = ['.js', '.cjs'];
export const DEFAULT_IGNORE_DIRS: readonly string[] = ['node_modules', '.git'];

export function keep(text: string): FileContent {
  return { kind: 'keep', text };
}

export const DELETE: FileContent = { kind: 'delete' };
