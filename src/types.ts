export type TagKind = 'def' | 'ref';

export interface Tag {
  relPath: string;
  absPath: string;
  name: string;
  kind: TagKind;
  /** 1-based first line of the occurrence (or of the enclosing construct for a definition). */
  line: number;
  /** 1-based last line, inclusive. Equals `line` for references. */
  endLine: number;
  type: string;
}

export type GrammarLanguage = 'python' | 'javascript' | 'typescript' | 'tsx';

export type SupportedLanguage =
  | GrammarLanguage
  | 'go'
  | 'rust'
  | 'java'
  | 'kotlin'
  | 'c'
  | 'cpp'
  | 'csharp'
  | 'ruby'
  | 'php'
  | 'swift';

export interface SourceFile {
  absPath: string;
  relPath: string;
  language: SupportedLanguage | null;
}

export type FileRole = 'chat' | 'mentioned' | 'other';

export interface FileRecord extends SourceFile {
  mtimeMs: number;
  size: number;
  tags: Tag[];
  role: FileRole;
}

export interface RankedFile {
  relPath: string;
  role: FileRole;
  personalization: number;
  score: number;
}

export interface RankedTag {
  tag: Tag;
  score: number;
}

export interface RankingResult {
  files: RankedFile[];
  tags: RankedTag[];
  iterations: number;
  converged: boolean;
}

export type MapEntry =
  | { kind: 'tag'; relPath: string; ranked: RankedTag }
  | { kind: 'file'; relPath: string };

/** Returns the token length of `text` for the model the map is built for. */
export type TokenCounter = (text: string) => number;

/** Reads a file as UTF-8 text, or resolves `null` when it cannot be read. */
export type TextReader = (absPath: string) => Promise<string | null>;

export interface RepoMapRequest {
  chatFiles: string[];
  otherFiles: string[];
  mentionedFiles?: string[];
  mentionedIdents?: string[];
  /** Token budget; falls back to the configured `mapTokens` when omitted. */
  maxTokens?: number;
  forceRefresh?: boolean;
  signal?: AbortSignal;
}

export interface MapCommandOptions {
  rootDir: string;
  paths: string[];
  chatFiles: string[];
  otherFiles: string[];
  mentionedFiles: string[];
  mentionedIdents: string[];
  mapTokens?: number;
  maxContextWindow?: number;
  maxWorkers: number;
  ignore: string[];
  forceRefresh: boolean;
  useCache: boolean;
  verbose: boolean;
}

export interface TagsCommandOptions {
  rootDir: string;
  targetFile: string;
  verbose: boolean;
}
