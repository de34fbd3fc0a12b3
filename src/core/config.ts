import { z } from 'zod';

import {
  DEFAULT_DAMPING_FACTOR,
  DEFAULT_IDENTIFIER_WEIGHTS,
  DEFAULT_MAP_MUL_NO_FILES,
  DEFAULT_MAP_TOKENS,
  DEFAULT_MAX_FILE_BYTES,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MAX_WORKERS,
  DEFAULT_PERSONALIZATION,
  DEFAULT_RENDER,
  DEFAULT_TOLERANCE,
} from './constants';
import { RepoMapError } from './errors';

const personalizationSchema = z
  .object({
    chat: z.number().positive().default(DEFAULT_PERSONALIZATION.chat),
    mentioned: z.number().positive().default(DEFAULT_PERSONALIZATION.mentioned),
    other: z.number().positive().default(DEFAULT_PERSONALIZATION.other),
  })
  .refine((weights) => weights.chat >= weights.mentioned && weights.mentioned >= weights.other, {
    message: 'personalization weights must satisfy chat >= mentioned >= other',
  });

const identifierSchema = z.object({
  longNameLength: z.number().int().positive().default(DEFAULT_IDENTIFIER_WEIGHTS.longNameLength),
  longNameBoost: z.number().min(1).default(DEFAULT_IDENTIFIER_WEIGHTS.longNameBoost),
  privatePenalty: z.number().positive().max(1).default(DEFAULT_IDENTIFIER_WEIGHTS.privatePenalty),
  commonDefinerThreshold: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_IDENTIFIER_WEIGHTS.commonDefinerThreshold),
  commonPenalty: z.number().positive().max(1).default(DEFAULT_IDENTIFIER_WEIGHTS.commonPenalty),
  mentionedBoost: z.number().min(1).default(DEFAULT_IDENTIFIER_WEIGHTS.mentionedBoost),
});

const renderSchema = z.object({
  maxLineLength: z.number().int().positive().default(DEFAULT_RENDER.maxLineLength),
  mergeGap: z.number().int().nonnegative().default(DEFAULT_RENDER.mergeGap),
});

export const repoMapConfigSchema = z.object({
  // A non-positive budget is a valid request for an empty map, not a config error.
  mapTokens: z.number().int().default(DEFAULT_MAP_TOKENS),
  maxContextWindow: z.number().int().positive().optional(),
  mapMulNoFiles: z.number().positive().default(DEFAULT_MAP_MUL_NO_FILES),
  maxWorkers: z.number().int().positive().default(DEFAULT_MAX_WORKERS),
  maxFileBytes: z.number().int().positive().default(DEFAULT_MAX_FILE_BYTES),
  dampingFactor: z.number().gt(0).lt(1).default(DEFAULT_DAMPING_FACTOR),
  maxIterations: z.number().int().positive().default(DEFAULT_MAX_ITERATIONS),
  tolerance: z.number().positive().default(DEFAULT_TOLERANCE),
  personalization: personalizationSchema.default({}),
  identifiers: identifierSchema.default({}),
  render: renderSchema.default({}),
});

export type RepoMapConfig = z.infer<typeof repoMapConfigSchema>;
export type RepoMapConfigInput = z.input<typeof repoMapConfigSchema>;
export type PersonalizationWeights = RepoMapConfig['personalization'];
export type IdentifierWeights = RepoMapConfig['identifiers'];
export type RenderConfig = RepoMapConfig['render'];

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

export function resolveConfig(input: RepoMapConfigInput = {}): RepoMapConfig {
  const parsed = repoMapConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new RepoMapError('INVALID_CONFIG', `invalid repomap config: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
