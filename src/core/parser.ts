import * as fs from 'fs';
import * as path from 'path';
import type Parser from 'tree-sitter';

import { GrammarLanguage, SourceFile, SupportedLanguage, Tag } from '../types';
import { Logger, silentLogger, warnOnce } from '../utils/log';
import { errorMessage } from './errors';
import { TagExtractor } from './extractors';

type ParserModule = typeof Parser;

interface GrammarConfig {
  moduleName: string;
  variant?: 'typescript' | 'tsx';
  queryFile: string;
  identifierTypes: ReadonlySet<string>;
}

const JS_IDENTIFIERS = new Set(['identifier', 'property_identifier', 'shorthand_property_identifier']);
const TS_IDENTIFIERS = new Set([...JS_IDENTIFIERS, 'type_identifier']);

const LANGUAGE_CONFIG: Record<GrammarLanguage, GrammarConfig> = {
  python: {
    moduleName: 'tree-sitter-python',
    queryFile: 'tree-sitter-python-tags.scm',
    identifierTypes: new Set(['identifier']),
  },
  javascript: {
    moduleName: 'tree-sitter-javascript',
    queryFile: 'tree-sitter-javascript-tags.scm',
    identifierTypes: JS_IDENTIFIERS,
  },
  typescript: {
    moduleName: 'tree-sitter-typescript',
    variant: 'typescript',
    queryFile: 'tree-sitter-typescript-tags.scm',
    identifierTypes: TS_IDENTIFIERS,
  },
  tsx: {
    moduleName: 'tree-sitter-typescript',
    variant: 'tsx',
    queryFile: 'tree-sitter-typescript-tags.scm',
    identifierTypes: TS_IDENTIFIERS,
  },
};

const DEFINITION_NAME_PREFIX = 'name.definition.';
const DEFINITION_SPAN_PREFIX = 'definition.';

interface LoadedGrammar {
  parser: Parser;
  query: Parser.Query;
}

export function isGrammarLanguage(language: SupportedLanguage | null): language is GrammarLanguage {
  return language !== null && language in LANGUAGE_CONFIG;
}

function defaultQueryDir(): string {
  // Sources sit at src/core, compiled output at dist/src/core.
  const candidates = [path.resolve(__dirname, '../../queries'), path.resolve(__dirname, '../../../queries')];
  return candidates.find((dir) => fs.existsSync(dir)) ?? candidates[0];
}

function loadModule(moduleName: string): unknown {
  return require(moduleName);
}

function pickVariant(loaded: unknown, variant: GrammarConfig['variant']): unknown {
  if (!variant) {
    return loaded;
  }
  if (typeof loaded !== 'object' || loaded === null) {
    return undefined;
  }
  return Reflect.get(loaded, variant);
}

export interface TreeSitterExtractorOptions {
  logger?: Logger;
  queryDir?: string;
}

/**
 * Extracts definitions with the per-language tag queries under `queries/`
 * and treats every other identifier leaf as a reference. Grammars are loaded
 * on first use; a grammar that fails to load hands its files to the fallback.
 */
export class TreeSitterExtractor implements TagExtractor {
  readonly name = 'tree-sitter';

  private readonly logger: Logger;
  private readonly queryDir: string;
  private readonly warn: (key: string, message: string) => void;
  private readonly grammars = new Map<GrammarLanguage, LoadedGrammar | null>();
  private runtime: ParserModule | null | undefined;

  constructor(options: TreeSitterExtractorOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.queryDir = options.queryDir ?? defaultQueryDir();
    this.warn = warnOnce(this.logger);
  }

  canHandle(file: SourceFile): boolean {
    return isGrammarLanguage(file.language) && this.grammarFor(file.language) !== null;
  }

  async extract(file: SourceFile, content: string): Promise<Iterable<Tag>> {
    const language = file.language;
    if (!isGrammarLanguage(language)) {
      return [];
    }
    const grammar = this.grammarFor(language);
    if (!grammar) {
      return [];
    }

    const tree = grammar.parser.parse(content, undefined, {
      bufferSize: Math.max(content.length + 1, 32 * 1024),
    });

    const tags: Tag[] = [];
    const definitionNameStarts = new Set<number>();

    for (const match of grammar.query.matches(tree.rootNode)) {
      let nameNode: Parser.SyntaxNode | null = null;
      let spanNode: Parser.SyntaxNode | null = null;
      let type = '';

      for (const capture of match.captures) {
        if (capture.name.startsWith(DEFINITION_NAME_PREFIX)) {
          nameNode = capture.node;
          type = capture.name.slice(DEFINITION_NAME_PREFIX.length);
        } else if (capture.name.startsWith(DEFINITION_SPAN_PREFIX)) {
          spanNode = capture.node;
        }
      }

      if (!nameNode) {
        continue;
      }
      const name = nameNode.text.trim();
      if (!name || definitionNameStarts.has(nameNode.startIndex)) {
        continue;
      }

      definitionNameStarts.add(nameNode.startIndex);
      const span = spanNode ?? nameNode;
      tags.push({
        relPath: file.relPath,
        absPath: file.absPath,
        name,
        kind: 'def',
        line: span.startPosition.row + 1,
        endLine: span.endPosition.row + 1,
        type,
      });
    }

    const identifierTypes = LANGUAGE_CONFIG[language].identifierTypes;
    const stack: Parser.SyntaxNode[] = [tree.rootNode];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) {
        break;
      }

      if (identifierTypes.has(node.type) && !definitionNameStarts.has(node.startIndex)) {
        const name = node.text.trim();
        if (name) {
          const line = node.startPosition.row + 1;
          tags.push({
            relPath: file.relPath,
            absPath: file.absPath,
            name,
            kind: 'ref',
            line,
            endLine: line,
            type: node.type,
          });
        }
        continue;
      }

      const children = node.namedChildren;
      for (let i = children.length - 1; i >= 0; i -= 1) {
        stack.push(children[i]);
      }
    }

    return tags;
  }

  private loadRuntime(): ParserModule | null {
    if (this.runtime !== undefined) {
      return this.runtime;
    }
    try {
      const runtime: ParserModule = require('tree-sitter');
      this.runtime = runtime;
    } catch (error) {
      this.warn(
        'runtime',
        `tree-sitter is unavailable (${errorMessage(error)}); using heuristic tags`,
      );
      this.runtime = null;
    }
    return this.runtime;
  }

  private grammarFor(language: GrammarLanguage): LoadedGrammar | null {
    const cached = this.grammars.get(language);
    if (cached !== undefined) {
      return cached;
    }

    const loaded = this.loadGrammar(language);
    this.grammars.set(language, loaded);
    return loaded;
  }

  private loadGrammar(language: GrammarLanguage): LoadedGrammar | null {
    const runtime = this.loadRuntime();
    if (!runtime) {
      return null;
    }

    const config = LANGUAGE_CONFIG[language];
    try {
      const grammar = pickVariant(loadModule(config.moduleName), config.variant);
      if (grammar === undefined || grammar === null) {
        throw new Error(`${config.moduleName} does not export a ${config.variant ?? 'default'} grammar`);
      }

      const parser = new runtime();
      parser.setLanguage(grammar);

      const queryString = fs.readFileSync(path.join(this.queryDir, config.queryFile), 'utf8');
      const query = new runtime.Query(grammar, queryString);
      this.logger.verbose(`[extract] loaded ${language} grammar`);
      return { parser, query };
    } catch (error) {
      this.warn(
        language,
        `failed to load the ${language} grammar (${errorMessage(error)}); using heuristic tags for ${language} files`,
      );
      return null;
    }
  }
}
