import * as path from 'path';

import { FileRole, SourceFile } from '../types';
import { comparePaths } from '../utils/path';
import { toSourceFile } from './files';

const ROLE_PRIORITY: Record<FileRole, number> = {
  other: 0,
  mentioned: 1,
  chat: 2,
};

export interface RoleAssignmentInput {
  rootDir: string;
  chatFiles: string[];
  otherFiles: string[];
  mentionedFiles?: string[];
  mentionedIdents?: Iterable<string>;
}

export type RoledFile = SourceFile & { role: FileRole };

function pathMatchesIdent(relPath: string, idents: ReadonlySet<string>): boolean {
  const base = path.posix.basename(relPath);
  const stem = base.slice(0, base.length - path.posix.extname(base).length);
  const candidates = [...relPath.split('/'), base, stem];
  return candidates.some((candidate) => idents.has(candidate));
}

/**
 * Merges the caller's file lists into one entry per path. A file listed more
 * than once keeps its strongest role; a file whose path names a mentioned
 * identifier counts as mentioned.
 */
export function assignRoles(input: RoleAssignmentInput): RoledFile[] {
  const byPath = new Map<string, RoledFile>();

  const add = (target: string, role: FileRole): void => {
    const file = toSourceFile(input.rootDir, target);
    const existing = byPath.get(file.relPath);
    if (existing && ROLE_PRIORITY[existing.role] >= ROLE_PRIORITY[role]) {
      return;
    }
    byPath.set(file.relPath, { ...file, role });
  };

  for (const file of input.chatFiles) {
    add(file, 'chat');
  }
  for (const file of input.mentionedFiles ?? []) {
    add(file, 'mentioned');
  }
  for (const file of input.otherFiles) {
    add(file, 'other');
  }

  const idents = new Set(input.mentionedIdents ?? []);
  if (idents.size > 0) {
    for (const file of byPath.values()) {
      if (file.role === 'other' && pathMatchesIdent(file.relPath, idents)) {
        file.role = 'mentioned';
      }
    }
  }

  return Array.from(byPath.values()).sort((a, b) => comparePaths(a.relPath, b.relPath));
}
