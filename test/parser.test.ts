import { describe, expect, it } from 'vitest';

import { isGrammarLanguage, TreeSitterExtractor } from '../src/core/parser';
import { Tag } from '../src/types';
import { recordingLogger, sourceFile } from './helpers';

const extractor = new TreeSitterExtractor();

function definitions(tags: Iterable<Tag>): Array<[string, string, number, number]> {
  return Array.from(tags)
    .filter((tag) => tag.kind === 'def')
    .map((tag): [string, string, number, number] => [tag.name, tag.type, tag.line, tag.endLine])
    .sort((a, b) => a[2] - b[2]);
}

function referenceNames(tags: Iterable<Tag>): string[] {
  return Array.from(tags)
    .filter((tag) => tag.kind === 'ref')
    .map((tag) => tag.name);
}

describe('isGrammarLanguage', () => {
  it('accepts only languages with a bundled grammar', () => {
    expect(isGrammarLanguage('python')).toBe(true);
    expect(isGrammarLanguage('tsx')).toBe(true);
    expect(isGrammarLanguage('go')).toBe(false);
    expect(isGrammarLanguage(null)).toBe(false);
  });
});

describe('TreeSitterExtractor', () => {
  it('leaves languages without a grammar to other extractors', () => {
    expect(extractor.canHandle(sourceFile('main.go'))).toBe(false);
    expect(extractor.canHandle(sourceFile('notes.md'))).toBe(false);
  });

  it('warns once and declines files when the query directory is missing', () => {
    const logger = recordingLogger();
    const broken = new TreeSitterExtractor({ logger, queryDir: '/nonexistent/repomap-queries' });

    expect(broken.canHandle(sourceFile('a.py'))).toBe(false);
    expect(broken.canHandle(sourceFile('b.py'))).toBe(false);
    expect(logger.warnings).toHaveLength(1);
  });

  describe('with native grammars', () => {
    it('handles every bundled language', () => {
      expect(extractor.canHandle(sourceFile('a.py'))).toBe(true);
      expect(extractor.canHandle(sourceFile('a.js'))).toBe(true);
      expect(extractor.canHandle(sourceFile('a.ts'))).toBe(true);
      expect(extractor.canHandle(sourceFile('a.tsx'))).toBe(true);
    });

    it('extracts python classes, methods and references', async () => {
      const content = ['class Parser:', '    def parse(self, text):', '        return helper(text)', ''].join('\n');
      const tags = await extractor.extract(sourceFile('pkg/parser.py'), content);

      expect(definitions(tags)).toEqual([
        ['Parser', 'class', 1, 3],
        ['parse', 'function', 2, 3],
      ]);
      expect(referenceNames(tags)).toEqual(['self', 'text', 'helper', 'text']);
    });

    it('extracts typescript interfaces and functions with their spans', async () => {
      const content = [
        'export interface Options {',
        '  depth: number;',
        '}',
        'export function walk(options: Options): number {',
        '  return options.depth;',
        '}',
        '',
      ].join('\n');
      const tags = await extractor.extract(sourceFile('src/walk.ts'), content);

      expect(definitions(tags)).toEqual([
        ['Options', 'interface', 1, 3],
        ['walk', 'function', 4, 6],
      ]);
      expect(referenceNames(tags).sort()).toEqual(['Options', 'depth', 'depth', 'options', 'options']);
    });

    it('records the path it was given on every tag', async () => {
      const file = sourceFile('lib/util.js');
      const tags = Array.from(await extractor.extract(file, 'function util() { return 1; }\n'));

      expect(tags.length).toBeGreaterThan(0);
      expect(tags.every((tag) => tag.relPath === 'lib/util.js' && tag.absPath === file.absPath)).toBe(true);
    });
  });
});
