import { createHash, randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

import { TAG_CACHE_DIR, TAG_CACHE_VERSION } from './constants';
import { Logger, silentLogger } from '../utils/log';

const tagSchema = z.object({
  relPath: z.string(),
  absPath: z.string(),
  name: z.string(),
  kind: z.enum(['def', 'ref']),
  line: z.number().int(),
  endLine: z.number().int(),
  type: z.string(),
});

const entrySchema = z.object({
  version: z.literal(TAG_CACHE_VERSION),
  absPath: z.string(),
  mtimeMs: z.number(),
  size: z.number(),
  tags: z.array(tagSchema),
});

export type TagCacheEntry = z.infer<typeof entrySchema>;

/**
 * Key-value store for extracted tags, keyed by absolute file path. Freshness
 * (mtime and size) is checked by the caller, not the store.
 */
export interface TagStore {
  get(absPath: string): Promise<TagCacheEntry | null>;
  set(entry: TagCacheEntry): Promise<void>;
  close(): Promise<void>;
}

export class MemoryTagStore implements TagStore {
  private readonly entries = new Map<string, TagCacheEntry>();

  async get(absPath: string): Promise<TagCacheEntry | null> {
    return this.entries.get(absPath) ?? null;
  }

  async set(entry: TagCacheEntry): Promise<void> {
    this.entries.set(entry.absPath, entry);
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function entryFileName(absPath: string): string {
  return `${createHash('sha1').update(absPath).digest('hex')}.json`;
}

/**
 * One JSON document per file under `.repomap/tags.v1`. Writes go to a
 * temporary file first and are renamed into place, so a reader sees either
 * the previous entry or the new one.
 */
export class FileTagStore implements TagStore {
  readonly dir: string;
  private readonly logger: Logger;
  private closed = false;

  private constructor(dir: string, logger: Logger) {
    this.dir = dir;
    this.logger = logger;
  }

  static async open(rootDir: string, logger: Logger = silentLogger): Promise<FileTagStore> {
    const dir = path.join(rootDir, TAG_CACHE_DIR);
    await fs.mkdir(dir, { recursive: true });
    return new FileTagStore(dir, logger);
  }

  entryPath(absPath: string): string {
    return path.join(this.dir, entryFileName(absPath));
  }

  async get(absPath: string): Promise<TagCacheEntry | null> {
    if (this.closed) {
      return null;
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.entryPath(absPath), 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      this.logger.verbose(`[cache] discarding unreadable entry for ${absPath}`);
      return null;
    }

    const parsed = entrySchema.safeParse(json);
    if (!parsed.success || parsed.data.absPath !== absPath) {
      this.logger.verbose(`[cache] discarding malformed entry for ${absPath}`);
      return null;
    }
    return parsed.data;
  }

  async set(entry: TagCacheEntry): Promise<void> {
    if (this.closed) {
      return;
    }

    const target = this.entryPath(entry.absPath);
    const temp = `${target}.${process.pid}.${randomUUID()}.tmp`;
    try {
      await fs.writeFile(temp, JSON.stringify(entry), 'utf8');
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw error;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
