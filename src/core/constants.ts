import { SupportedLanguage } from '../types';

export const REPOMAP_DIR = '.repomap';
export const TAG_CACHE_DIR = `${REPOMAP_DIR}/tags.v1`;
export const TAG_CACHE_VERSION = 1;

export const DEFAULT_IGNORES = [
  '**/.git/**',
  '**/.repomap/**',
  '**/node_modules/**',
  '**/__pycache__/**',
  '**/.venv/**',
  '**/venv/**',
  '**/env/**',
  '**/dist/**',
  '**/build/**',
  '**/coverage/**',
];

export const DEFAULT_MAP_TOKENS = 1024;
export const DEFAULT_MAP_MUL_NO_FILES = 8;
export const CONTEXT_WINDOW_PADDING = 4096;
export const DEFAULT_MAX_WORKERS = 4;
export const DEFAULT_MAX_FILE_BYTES = 1024 * 1024;

export const DEFAULT_DAMPING_FACTOR = 0.85;
export const DEFAULT_MAX_ITERATIONS = 100;
export const DEFAULT_TOLERANCE = 1e-6;

export const DEFAULT_PERSONALIZATION = {
  chat: 1,
  mentioned: 0.5,
  other: 0.1,
} as const;

export const DEFAULT_IDENTIFIER_WEIGHTS = {
  longNameLength: 8,
  longNameBoost: 10,
  privatePenalty: 0.1,
  commonDefinerThreshold: 5,
  commonPenalty: 0.1,
  mentionedBoost: 10,
} as const;

export const DEFAULT_RENDER = {
  maxLineLength: 100,
  mergeGap: 1,
} as const;

export const SUPPORTED_EXTENSIONS: Record<string, SupportedLanguage> = {
  '.py': 'python',
  '.pyi': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.ts': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.tsx': 'tsx',
  '.go': 'go',
  '.rs': 'rust',
  '.java': 'java',
  '.kt': 'kotlin',
  '.kts': 'kotlin',
  '.c': 'c',
  '.h': 'c',
  '.cc': 'cpp',
  '.cpp': 'cpp',
  '.cxx': 'cpp',
  '.hpp': 'cpp',
  '.cs': 'csharp',
  '.rb': 'ruby',
  '.php': 'php',
  '.swift': 'swift',
};
