import * as fs from 'fs/promises';

import { RepoMapConfig, RepoMapConfigInput, resolveConfig } from './core/config';
import { CONTEXT_WINDOW_PADDING } from './core/constants';
import { RepoMapError } from './core/errors';
import { ExtractorRegistry } from './core/extractors';
import { readTextFile } from './core/files';
import { buildGraph, RelevanceGraph, summarizeGraph } from './core/graph';
import { HeuristicExtractor } from './core/heuristic';
import { buildFileIndex, TagIndex } from './core/indexer';
import { TreeSitterExtractor } from './core/parser';
import { rankGraph } from './core/ranker';
import { renderMap, RenderContext, splitLines } from './core/render';
import { assignRoles } from './core/roles';
import { buildMapEntries, selectWithinBudget } from './core/selector';
import { FileTagStore, MemoryTagStore, TagStore } from './core/store';
import { estimateTokens, SafeTokenCounter } from './core/tokens';
import {
  FileRecord,
  MapEntry,
  RankingResult,
  RepoMapRequest,
  Tag,
  TextReader,
  TokenCounter,
} from './types';
import { Logger, silentLogger } from './utils/log';
import { resolveRepoPath } from './utils/path';

export interface RepoMapOptions {
  rootDir: string;
  tokenCounter?: TokenCounter;
  readText?: TextReader;
  logger?: Logger;
  /** Defaults to an in-memory store that lives as long as this instance. */
  store?: TagStore;
  registry?: ExtractorRegistry;
  config?: RepoMapConfigInput;
}

export interface MapAnalysis {
  records: FileRecord[];
  graph: RelevanceGraph;
  ranking: RankingResult;
  entries: MapEntry[];
  budget: number;
  parsedFiles: number;
  reusedFiles: number;
}

export async function assertRootDir(rootDir: string): Promise<void> {
  const stats = await fs.stat(rootDir).catch(() => null);
  if (!stats) {
    throw new RepoMapError('INVALID_ROOT', `root directory does not exist: ${rootDir}`);
  }
  if (!stats.isDirectory()) {
    throw new RepoMapError('INVALID_ROOT', `root is not a directory: ${rootDir}`);
  }
}

export function createDefaultRegistry(logger: Logger = silentLogger): ExtractorRegistry {
  return new ExtractorRegistry({ fallback: new HeuristicExtractor(), logger }).register(
    new TreeSitterExtractor({ logger }),
  );
}

function uniqueRelPaths(rootDir: string, targets: string[]): string[] {
  const seen = new Set<string>();
  for (const target of targets) {
    seen.add(resolveRepoPath(rootDir, target).relPath);
  }
  return Array.from(seen);
}

function groupDefinitions(records: FileRecord[]): Map<string, Tag[]> {
  const byFile = new Map<string, Tag[]>();
  for (const record of records) {
    const definitions = record.tags.filter((tag) => tag.kind === 'def');
    if (definitions.length > 0) {
      byFile.set(record.relPath, definitions);
    }
  }
  return byFile;
}

/**
 * Builds token-budgeted maps of one repository. Tags survive between calls in
 * the store, so repeated maps only re-extract files that changed.
 */
export class RepoMap {
  readonly rootDir: string;
  readonly config: RepoMapConfig;

  private readonly tokenCounter: TokenCounter;
  private readonly readText: TextReader;
  private readonly logger: Logger;
  private readonly index: TagIndex;

  constructor(options: RepoMapOptions) {
    this.rootDir = options.rootDir;
    this.config = resolveConfig(options.config);
    this.tokenCounter = options.tokenCounter ?? estimateTokens;
    this.readText = options.readText ?? readTextFile;
    this.logger = options.logger ?? silentLogger;
    this.index = new TagIndex({
      store: options.store ?? new MemoryTagStore(),
      registry: options.registry ?? createDefaultRegistry(this.logger),
      readText: this.readText,
      maxFileBytes: this.config.maxFileBytes,
      logger: this.logger,
    });
  }

  resolveBudget(request: RepoMapRequest): number {
    const base = request.maxTokens ?? this.config.mapTokens;
    if (base <= 0 || request.chatFiles.length > 0 || this.config.maxContextWindow === undefined) {
      return base;
    }
    const widened = Math.min(
      base * this.config.mapMulNoFiles,
      this.config.maxContextWindow - CONTEXT_WINDOW_PADDING,
    );
    return widened > 0 ? Math.floor(widened) : base;
  }

  async analyze(request: RepoMapRequest): Promise<MapAnalysis> {
    await assertRootDir(this.rootDir);

    const files = assignRoles({
      rootDir: this.rootDir,
      chatFiles: request.chatFiles,
      otherFiles: request.otherFiles,
      mentionedFiles: request.mentionedFiles,
      mentionedIdents: request.mentionedIdents,
    });
    const budget = this.resolveBudget(request);

    const { records, parsedFiles, reusedFiles } = await buildFileIndex(
      files,
      this.index,
      this.config.maxWorkers,
      request.forceRefresh ?? false,
      request.signal,
    );
    this.logger.verbose(`[map] indexed ${records.length} files (${parsedFiles} parsed, ${reusedFiles} reused)`);
    request.signal?.throwIfAborted();

    const graph = buildGraph(records, {
      identifiers: this.config.identifiers,
      mentionedIdents: request.mentionedIdents,
    });
    const summary = summarizeGraph(graph);
    this.logger.verbose(`[map] graph has ${summary.nodes} files and ${summary.edges} edges (${summary.selfEdges} self)`);

    const ranking = rankGraph(graph, records, {
      dampingFactor: this.config.dampingFactor,
      maxIterations: this.config.maxIterations,
      tolerance: this.config.tolerance,
      personalization: this.config.personalization,
    });
    if (!ranking.converged) {
      this.logger.verbose(`[map] ranking stopped after ${ranking.iterations} iterations without converging`);
    }
    request.signal?.throwIfAborted();

    return {
      records,
      graph,
      ranking,
      entries: buildMapEntries(ranking, records),
      budget,
      parsedFiles,
      reusedFiles,
    };
  }

  async getRepoMap(request: RepoMapRequest): Promise<string> {
    if (
      request.chatFiles.length === 0 &&
      request.otherFiles.length === 0 &&
      (request.mentionedFiles ?? []).length === 0
    ) {
      await assertRootDir(this.rootDir);
      return '';
    }

    const analysis = await this.analyze(request);
    if (analysis.budget <= 0) {
      return '';
    }

    const context = await this.renderContext(request, analysis);
    const counter = new SafeTokenCounter(this.tokenCounter, this.logger);
    const selection = selectWithinBudget(
      analysis.entries,
      analysis.budget,
      (prefix) => renderMap(prefix, context),
      (text) => counter.count(text),
    );
    request.signal?.throwIfAborted();

    this.logger.verbose(
      `[map] Generated map: ${selection.text.length} chars, ~${selection.tokens} tokens (${selection.count} of ${analysis.entries.length} entries)`,
    );
    return selection.text;
  }

  private async renderContext(request: RepoMapRequest, analysis: MapAnalysis): Promise<RenderContext> {
    const absByRel = new Map(analysis.records.map((record) => [record.relPath, record.absPath]));
    const needed = new Set<string>();
    for (const entry of analysis.entries) {
      if (entry.kind === 'tag') {
        needed.add(entry.relPath);
      }
    }

    const linesByFile = new Map<string, string[]>();
    for (const relPath of needed) {
      const absPath = absByRel.get(relPath);
      if (absPath === undefined) {
        continue;
      }
      const content = await this.readText(absPath);
      if (content !== null) {
        linesByFile.set(relPath, splitLines(content));
      }
    }

    return {
      chatFiles: uniqueRelPaths(this.rootDir, request.chatFiles),
      definitionsByFile: groupDefinitions(analysis.records),
      linesByFile,
      config: this.config.render,
    };
  }
}

export interface GenerateRepoMapInput extends RepoMapRequest {
  rootDir: string;
  tokenCounter?: TokenCounter;
  logger?: Logger;
  config?: RepoMapConfigInput;
  /** Persist tags under `.repomap/tags.v1`; defaults to true. */
  useCache?: boolean;
}

/** Opens the tag store for `rootDir`, builds one map and closes the store. */
export async function generateRepoMap(input: GenerateRepoMapInput): Promise<string> {
  const logger = input.logger ?? silentLogger;
  await assertRootDir(input.rootDir);

  const store: TagStore =
    input.useCache === false ? new MemoryTagStore() : await FileTagStore.open(input.rootDir, logger);
  try {
    const repoMap = new RepoMap({
      rootDir: input.rootDir,
      tokenCounter: input.tokenCounter,
      logger,
      store,
      config: input.config,
    });
    return await repoMap.getRepoMap(input);
  } finally {
    await store.close();
  }
}
