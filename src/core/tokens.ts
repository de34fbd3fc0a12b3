import { TokenCounter } from '../types';
import { Logger, silentLogger } from '../utils/log';
import { errorMessage } from './errors';

/** Rough count for code: about four characters per token. */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Guards a caller-supplied counter. A throw or a non-finite or negative
 * result falls back to `estimateTokens` for that text and marks the counter
 * as degraded. Counts are memoized per text within one map build.
 */
export class SafeTokenCounter {
  private readonly counter: TokenCounter;
  private readonly logger: Logger;
  private readonly memo = new Map<string, number>();
  private failures = 0;

  constructor(counter: TokenCounter, logger: Logger = silentLogger) {
    this.counter = counter;
    this.logger = logger;
  }

  get degraded(): boolean {
    return this.failures > 0;
  }

  count(text: string): number {
    const memoized = this.memo.get(text);
    if (memoized !== undefined) {
      return memoized;
    }

    let result: number;
    try {
      result = this.counter(text);
      if (!Number.isFinite(result) || result < 0) {
        throw new Error(`token counter returned ${result}`);
      }
    } catch (error) {
      if (this.failures === 0) {
        this.logger.warn(`token counter failed (${errorMessage(error)}); estimating from text length`);
      }
      this.failures += 1;
      result = estimateTokens(text);
    }

    this.memo.set(text, result);
    return result;
  }
}
