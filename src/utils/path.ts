import * as path from 'path';

export function normalizeRepoPath(value: string): string {
  return value.split(path.sep).join('/');
}

/** Resolves a caller-supplied path (absolute or root-relative) to both forms. */
export function resolveRepoPath(rootDir: string, target: string): { absPath: string; relPath: string } {
  const absPath = path.isAbsolute(target) ? path.normalize(target) : path.resolve(rootDir, target);
  return {
    absPath,
    relPath: normalizeRepoPath(path.relative(rootDir, absPath)),
  };
}

/** Code-unit order, independent of the host locale. */
export function comparePaths(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
