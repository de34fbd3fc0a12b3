#!/usr/bin/env node

import * as path from 'path';

import { runMap } from './commands/map';
import { runTags } from './commands/tags';
import { DEFAULT_MAX_WORKERS } from './core/constants';
import { errorMessage } from './core/errors';
import {
  parseArgs,
  readBooleanOption,
  readCsvOption,
  readIntOption,
  readOptionalIntOption,
  readStringArrayOption,
  readStringOption,
} from './utils/args';

function printHelp(): void {
  console.log(`repomap - token-budgeted map of the most relevant code in a repository

Usage:
  repomap map [paths...] [--root <dir>] [--map-tokens <n>] [--chat <file>] [--other <file>]
              [--mentioned-file <file>] [--mentioned-ident <name,...>] [--max-context-window <n>]
              [--max-workers <n>] [--ignore <glob>] [--force-refresh] [--no-cache] [--verbose]
  repomap tags <file> [--root <dir>] [--verbose]

Examples:
  repomap map src --map-tokens 2048
  repomap map --chat src/app.ts --other src --mentioned-ident parseConfig
  repomap map --max-context-window 128000 --no-cache
  repomap tags src/core/graph.ts

Notes:
  tree-sitter grammars in this build: python, javascript, typescript, tsx
  other files fall back to keyword scanning
  file and directory arguments are resolved against the current directory;
  with no paths, map scans --root
  tags are cached under <root>/.repomap/tags.v1 unless --no-cache is given
`);
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  if (
    !parsed.command ||
    parsed.command === 'help' ||
    parsed.command === '--help' ||
    readBooleanOption(parsed.options, 'help')
  ) {
    printHelp();
    return;
  }

  const rootDir = path.resolve(readStringOption(parsed.options, 'root') ?? process.cwd());
  const verbose = readBooleanOption(parsed.options, 'verbose');

  if (parsed.command === 'map') {
    const result = await runMap({
      rootDir,
      paths: parsed.positionals,
      chatFiles: readCsvOption(parsed.options, 'chat'),
      otherFiles: readCsvOption(parsed.options, 'other'),
      mentionedFiles: readCsvOption(parsed.options, 'mentioned-file'),
      mentionedIdents: readCsvOption(parsed.options, 'mentioned-ident'),
      mapTokens: readOptionalIntOption(parsed.options, 'map-tokens'),
      maxContextWindow: readOptionalIntOption(parsed.options, 'max-context-window'),
      maxWorkers: readIntOption(parsed.options, 'max-workers', DEFAULT_MAX_WORKERS),
      ignore: readStringArrayOption(parsed.options, 'ignore'),
      forceRefresh: readBooleanOption(parsed.options, 'force-refresh'),
      useCache: !readBooleanOption(parsed.options, 'no-cache'),
      verbose,
    });
    console.log(result.text.length > 0 ? result.text : 'No repository map generated.');
    return;
  }

  if (parsed.command === 'tags') {
    const targetFile = parsed.positionals[0] ?? readStringOption(parsed.options, 'target');
    if (!targetFile) {
      throw new Error('tags requires a <file>');
    }
    const result = await runTags({ rootDir, targetFile, verbose });
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  throw new Error(`unknown command: ${parsed.command}`);
}

main().catch((error: unknown) => {
  console.error(`[repomap] ${errorMessage(error)}`);
  process.exitCode = 1;
});
