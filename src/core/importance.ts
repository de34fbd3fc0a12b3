import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

const importantFilesSchema = z.object({
  files: z.array(z.string()),
  directories: z.array(
    z.object({
      dir: z.string(),
      extensions: z.array(z.string()),
    }),
  ),
});

export type ImportantFileRules = z.infer<typeof importantFilesSchema>;

let cachedRules: ImportantFileRules | null = null;

function dataFile(): string {
  const candidates = [
    path.resolve(__dirname, '../../data/important-files.json'),
    path.resolve(__dirname, '../../../data/important-files.json'),
  ];
  return candidates.find((file) => fs.existsSync(file)) ?? candidates[0];
}

export function loadImportantFileRules(): ImportantFileRules {
  if (!cachedRules) {
    cachedRules = importantFilesSchema.parse(JSON.parse(fs.readFileSync(dataFile(), 'utf8')));
  }
  return cachedRules;
}

/** Project manifests, readmes and CI definitions, matched by repo-relative path. */
export function isImportantFile(relPath: string, rules: ImportantFileRules = loadImportantFileRules()): boolean {
  if (rules.files.includes(relPath)) {
    return true;
  }
  const dir = path.posix.dirname(relPath);
  const ext = path.posix.extname(relPath);
  return rules.directories.some((rule) => rule.dir === dir && rule.extensions.includes(ext));
}
