import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { FileRecord, FileRole, SourceFile, Tag } from '../src/types';
import { detectLanguage } from '../src/core/files';
import { Logger } from '../src/utils/log';

const created: string[] = [];

export function makeRepo(files: Record<string, string>): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'repomap-test-'));
  created.push(root);
  for (const [relPath, content] of Object.entries(files)) {
    const target = path.join(root, relPath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content, 'utf8');
  }
  return root;
}

export function cleanupRepos(): void {
  while (created.length > 0) {
    const root = created.pop();
    if (root) {
      fs.rmSync(root, { recursive: true, force: true });
    }
  }
}

export function sourceFile(relPath: string, root = '/repo'): SourceFile {
  return { absPath: path.join(root, relPath), relPath, language: detectLanguage(relPath) };
}

export function def(relPath: string, name: string, line: number, endLine = line, type = 'function'): Tag {
  return { relPath, absPath: `/repo/${relPath}`, name, kind: 'def', line, endLine, type };
}

export function ref(relPath: string, name: string, line: number): Tag {
  return { relPath, absPath: `/repo/${relPath}`, name, kind: 'ref', line, endLine: line, type: 'identifier' };
}

export function record(relPath: string, role: FileRole, tags: Tag[]): FileRecord {
  return { ...sourceFile(relPath), mtimeMs: 0, size: 0, tags, role };
}

export interface RecordingLogger extends Logger {
  warnings: string[];
  verboseLines: string[];
}

export function recordingLogger(): RecordingLogger {
  const warnings: string[] = [];
  const verboseLines: string[] = [];
  return {
    warnings,
    verboseLines,
    info: () => undefined,
    warn: (message) => {
      warnings.push(message);
    },
    verbose: (message) => {
      verboseLines.push(message);
    },
  };
}
