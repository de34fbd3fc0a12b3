import { SourceFile, Tag } from '../types';
import { Logger, silentLogger } from '../utils/log';
import { errorMessage } from './errors';

export interface TagExtractor {
  readonly name: string;
  canHandle(file: SourceFile): boolean;
  extract(file: SourceFile, content: string): Promise<Iterable<Tag>>;
}

export interface ExtractorRegistryOptions {
  fallback: TagExtractor;
  logger?: Logger;
}

/**
 * Ordered list of extractors. The first one that can handle a file wins;
 * the fallback takes every file nobody claims.
 */
export class ExtractorRegistry {
  private readonly extractors: TagExtractor[] = [];
  private readonly fallback: TagExtractor;
  private readonly logger: Logger;

  constructor(options: ExtractorRegistryOptions) {
    this.fallback = options.fallback;
    this.logger = options.logger ?? silentLogger;
  }

  register(extractor: TagExtractor): this {
    this.extractors.push(extractor);
    return this;
  }

  names(): string[] {
    return [...this.extractors.map((extractor) => extractor.name), this.fallback.name];
  }

  select(file: SourceFile): TagExtractor {
    for (const extractor of this.extractors) {
      if (extractor.canHandle(file)) {
        return extractor;
      }
    }
    return this.fallback;
  }

  async extract(file: SourceFile, content: string): Promise<Tag[]> {
    if (content.includes('\u0000')) {
      this.logger.verbose(`[extract] skipping binary file ${file.relPath}`);
      return [];
    }

    const extractor = this.select(file);
    try {
      // Materialize inside the try: lazy sequences may fail mid-iteration.
      return Array.from(await extractor.extract(file, content));
    } catch (error) {
      this.logger.warn(
        `could not extract tags from ${file.relPath} (${extractor.name}): ${errorMessage(error)}`,
      );
      return [];
    }
  }
}
