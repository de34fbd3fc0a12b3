import { describe, expect, it } from 'vitest';

import { HeuristicExtractor, scanTags } from '../src/core/heuristic';
import { sourceFile } from './helpers';

describe('scanTags', () => {
  it('finds a python definition and treats other names as references', () => {
    const file = sourceFile('a.py');
    const tags = Array.from(scanTags(file, 'def parse(text):\n    return helper(text)\n'));

    expect(tags.filter((tag) => tag.kind === 'def')).toEqual([
      {
        relPath: 'a.py',
        absPath: file.absPath,
        name: 'parse',
        kind: 'def',
        line: 1,
        endLine: 1,
        type: 'function',
      },
    ]);
    expect(tags.filter((tag) => tag.kind === 'ref').map((tag) => `${tag.line}:${tag.name}`)).toEqual([
      '1:def',
      '1:text',
      '2:return',
      '2:helper',
      '2:text',
    ]);
  });

  it('understands modifiers and keywords of several languages', () => {
    const file = sourceFile('mixed.txt');
    const content = [
      'export default class Widget {',
      'pub(crate) fn render_frame() {}',
      'func (s *Server) Serve() {}',
      'export interface Options {}',
      'data class Point(val x: Int)',
      'async function* stream() {}',
    ].join('\n');

    const defs = Array.from(scanTags(file, content))
      .filter((tag) => tag.kind === 'def')
      .map((tag) => [tag.line, tag.name, tag.type]);

    expect(defs).toEqual([
      [1, 'Widget', 'class'],
      [2, 'render_frame', 'function'],
      [3, 'Serve', 'function'],
      [4, 'Options', 'interface'],
      [5, 'Point', 'class'],
      [6, 'stream', 'function'],
    ]);
  });

  it('does not report the defined name as a reference on its own line', () => {
    const tags = Array.from(scanTags(sourceFile('b.py'), 'class Parser(Parser): pass'));
    expect(tags.map((tag) => `${tag.kind}:${tag.name}`)).toEqual([
      'def:Parser',
      'ref:class',
      'ref:Parser',
      'ref:pass',
    ]);
  });
});

describe('HeuristicExtractor', () => {
  it('claims every file', () => {
    const extractor = new HeuristicExtractor();
    expect(extractor.canHandle()).toBe(true);
    expect(extractor.name).toBe('heuristic');
  });

  it('returns a sequence that can be materialized', async () => {
    const tags = Array.from(await new HeuristicExtractor().extract(sourceFile('c.go'), 'func Run() {}'));
    expect(tags.map((tag) => `${tag.kind}:${tag.name}`)).toEqual(['def:Run', 'ref:func']);
  });
});
