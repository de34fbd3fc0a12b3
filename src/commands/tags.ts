import * as fs from 'fs/promises';
import * as path from 'path';

import { readTextFile, toSourceFile } from '../core/files';
import { assertRootDir, createDefaultRegistry } from '../repomap';
import { Tag, TagsCommandOptions } from '../types';
import { createConsoleLogger } from '../utils/log';

export interface TagsResult {
  file: string;
  extractor: string;
  definitions: number;
  references: number;
  tags: Tag[];
}

export async function runTags(options: TagsCommandOptions): Promise<TagsResult> {
  await assertRootDir(options.rootDir);
  const logger = createConsoleLogger(options.verbose);

  const file = toSourceFile(options.rootDir, path.resolve(options.targetFile));
  const stats = await fs.stat(file.absPath).catch(() => null);
  if (!stats || !stats.isFile()) {
    throw new Error(`tags target is not a file: ${options.targetFile}`);
  }

  const registry = createDefaultRegistry(logger);
  const content = (await readTextFile(file.absPath)) ?? '';
  const tags = await registry.extract(file, content);

  return {
    file: file.relPath,
    extractor: registry.select(file).name,
    definitions: tags.filter((tag) => tag.kind === 'def').length,
    references: tags.filter((tag) => tag.kind === 'ref').length,
    tags,
  };
}
