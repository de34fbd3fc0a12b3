import * as path from 'path';

import { expandPaths } from '../core/files';
import { estimateTokens } from '../core/tokens';
import { generateRepoMap, assertRootDir } from '../repomap';
import { MapCommandOptions } from '../types';
import { createConsoleLogger, logVerbose } from '../utils/log';

export interface MapResult {
  text: string;
  tokens: number;
}

export async function runMap(options: MapCommandOptions): Promise<MapResult> {
  await assertRootDir(options.rootDir);
  const logger = createConsoleLogger(options.verbose);

  // Command-line paths are relative to the working directory, not to --root.
  const chatFiles = await expandPaths(options.chatFiles, options.ignore);
  let otherFiles = await expandPaths(options.otherFiles, options.ignore);
  if (chatFiles.length === 0 && otherFiles.length === 0) {
    const targets = options.paths.length > 0 ? options.paths : [options.rootDir];
    otherFiles = await expandPaths(targets, options.ignore);
  }
  logVerbose(options.verbose, `[map] ${chatFiles.length} chat files, ${otherFiles.length} other files`);

  const text = await generateRepoMap({
    rootDir: options.rootDir,
    chatFiles,
    otherFiles,
    mentionedFiles: options.mentionedFiles.map((target) => path.resolve(target)),
    mentionedIdents: options.mentionedIdents,
    maxTokens: options.mapTokens,
    forceRefresh: options.forceRefresh,
    useCache: options.useCache,
    tokenCounter: estimateTokens,
    logger,
    config: {
      maxWorkers: options.maxWorkers,
      maxContextWindow: options.maxContextWindow,
    },
  });

  return { text, tokens: estimateTokens(text) };
}
