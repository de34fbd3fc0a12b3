export { assertRootDir, createDefaultRegistry, generateRepoMap, RepoMap } from './repomap';
export type { GenerateRepoMapInput, MapAnalysis, RepoMapOptions } from './repomap';
export { repoMapConfigSchema, resolveConfig } from './core/config';
export type { RepoMapConfig, RepoMapConfigInput } from './core/config';
export { isRepoMapError, RepoMapError } from './core/errors';
export type { RepoMapErrorCode } from './core/errors';
export { ExtractorRegistry } from './core/extractors';
export type { TagExtractor } from './core/extractors';
export { HeuristicExtractor } from './core/heuristic';
export { TreeSitterExtractor } from './core/parser';
export { FileTagStore, MemoryTagStore } from './core/store';
export type { TagCacheEntry, TagStore } from './core/store';
export { estimateTokens } from './core/tokens';
export { createConsoleLogger, silentLogger } from './utils/log';
export type { Logger } from './utils/log';
export type * from './types';
