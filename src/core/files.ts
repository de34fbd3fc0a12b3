import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';

import { DEFAULT_IGNORES, SUPPORTED_EXTENSIONS } from './constants';
import { SourceFile, SupportedLanguage } from '../types';
import { comparePaths, normalizeRepoPath, resolveRepoPath } from '../utils/path';

export function detectLanguage(filePath: string): SupportedLanguage | null {
  const ext = path.extname(filePath).toLowerCase();
  return SUPPORTED_EXTENSIONS[ext] ?? null;
}

export function toSourceFile(rootDir: string, target: string): SourceFile {
  const { absPath, relPath } = resolveRepoPath(rootDir, target);
  return { absPath, relPath, language: detectLanguage(absPath) };
}

/**
 * Lists every non-hidden file below `dir`, skipping the usual vendor and build
 * directories. Files of unknown language are kept: they still show up as
 * header-only entries, and the heuristic extractor may find names in them.
 */
export async function discoverSourceFiles(dir: string, ignore: string[] = []): Promise<string[]> {
  const files = await glob('**/*', {
    cwd: dir,
    absolute: true,
    nodir: true,
    dot: false,
    ignore: [...DEFAULT_IGNORES, ...ignore],
  });

  return files
    .map((file) => normalizeRepoPath(file))
    .sort(comparePaths);
}

/** Expands directories among `targets` into the files they contain. */
export async function expandPaths(targets: string[], ignore: string[] = []): Promise<string[]> {
  const out: string[] = [];
  for (const target of targets) {
    const absTarget = path.resolve(target);
    const stats = await fs.stat(absTarget).catch(() => null);
    if (!stats) {
      continue;
    }
    if (stats.isDirectory()) {
      out.push(...(await discoverSourceFiles(absTarget, ignore)));
    } else if (stats.isFile()) {
      out.push(absTarget);
    }
  }
  return out;
}

export async function readTextFile(absPath: string): Promise<string | null> {
  try {
    return await fs.readFile(absPath, 'utf8');
  } catch {
    return null;
  }
}
