export type RepoMapErrorCode = 'INVALID_ROOT' | 'INVALID_CONFIG';

/**
 * Raised only for conditions that make the whole map impossible to build.
 * Per-file problems never surface as a `RepoMapError`.
 */
export class RepoMapError extends Error {
  readonly code: RepoMapErrorCode;

  constructor(code: RepoMapErrorCode, message: string) {
    super(message);
    this.name = 'RepoMapError';
    this.code = code;
  }
}

export function isRepoMapError(error: unknown): error is RepoMapError {
  return error instanceof RepoMapError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
