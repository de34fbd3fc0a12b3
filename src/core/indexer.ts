import * as fs from 'fs/promises';

import { FileRecord, FileRole, SourceFile, Tag, TextReader } from '../types';
import { Logger, silentLogger } from '../utils/log';
import { TAG_CACHE_VERSION } from './constants';
import { errorMessage } from './errors';
import { ExtractorRegistry } from './extractors';
import { mapLimit } from './parallel';
import { TagStore } from './store';

export interface TagLookup {
  tags: Tag[];
  mtimeMs: number;
  size: number;
  fromCache: boolean;
}

export interface TagIndexOptions {
  store: TagStore;
  registry: ExtractorRegistry;
  readText: TextReader;
  maxFileBytes: number;
  logger?: Logger;
}

/**
 * Tags per file, served from the store while (mtime, size) still match and
 * re-extracted otherwise. Store failures only cost a re-extraction.
 */
export class TagIndex {
  private readonly store: TagStore;
  private readonly registry: ExtractorRegistry;
  private readonly readText: TextReader;
  private readonly maxFileBytes: number;
  private readonly logger: Logger;

  constructor(options: TagIndexOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.readText = options.readText;
    this.maxFileBytes = options.maxFileBytes;
    this.logger = options.logger ?? silentLogger;
  }

  async getTags(file: SourceFile, forceRefresh = false): Promise<TagLookup> {
    const stats = await fs.stat(file.absPath).catch(() => null);
    if (!stats || !stats.isFile()) {
      this.logger.warn(`cannot read ${file.relPath}; it will have no tags`);
      return { tags: [], mtimeMs: 0, size: 0, fromCache: false };
    }

    const mtimeMs = stats.mtimeMs;
    const size = stats.size;

    if (!forceRefresh) {
      const cached = await this.store.get(file.absPath).catch((error: unknown) => {
        this.logger.verbose(`[cache] read failed for ${file.relPath}: ${errorMessage(error)}`);
        return null;
      });
      if (cached && cached.mtimeMs === mtimeMs && cached.size === size) {
        return {
          tags: cached.tags.map((tag) => ({ ...tag, relPath: file.relPath, absPath: file.absPath })),
          mtimeMs,
          size,
          fromCache: true,
        };
      }
    }

    if (size > this.maxFileBytes) {
      this.logger.verbose(`[index] skipping ${file.relPath}: ${size} bytes exceeds ${this.maxFileBytes}`);
      return { tags: [], mtimeMs, size, fromCache: false };
    }

    const content = await this.readText(file.absPath);
    if (content === null) {
      this.logger.warn(`cannot read ${file.relPath}; it will have no tags`);
      return { tags: [], mtimeMs, size, fromCache: false };
    }

    const tags = await this.registry.extract(file, content);
    await this.store
      .set({ version: TAG_CACHE_VERSION, absPath: file.absPath, mtimeMs, size, tags })
      .catch((error: unknown) => {
        this.logger.verbose(`[cache] write failed for ${file.relPath}: ${errorMessage(error)}`);
      });

    return { tags, mtimeMs, size, fromCache: false };
  }
}

export interface IndexBuildResult {
  records: FileRecord[];
  parsedFiles: number;
  reusedFiles: number;
}

export async function buildFileIndex(
  files: Array<SourceFile & { role: FileRole }>,
  index: TagIndex,
  maxWorkers: number,
  forceRefresh: boolean,
  signal?: AbortSignal,
): Promise<IndexBuildResult> {
  const results = await mapLimit(
    files,
    maxWorkers,
    async (file) => ({ file, lookup: await index.getTags(file, forceRefresh) }),
    signal,
  );

  const records: FileRecord[] = [];
  let parsedFiles = 0;
  let reusedFiles = 0;

  for (const { file, lookup } of results) {
    records.push({
      ...file,
      mtimeMs: lookup.mtimeMs,
      size: lookup.size,
      tags: lookup.tags,
    });
    if (lookup.fromCache) {
      reusedFiles += 1;
    } else {
      parsedFiles += 1;
    }
  }

  return { records, parsedFiles, reusedFiles };
}
