import { describe, expect, it } from 'vitest';

import { resolveConfig } from '../src/core/config';
import { renderFileBlock, renderMap, RenderContext, splitLines } from '../src/core/render';
import { MapEntry, Tag } from '../src/types';
import { def } from './helpers';

const config = resolveConfig().render;
const tenLines = Array.from({ length: 10 }, (_, index) => `L${index + 1}`);

function tagEntry(tag: Tag, score = 1): MapEntry {
  return { kind: 'tag', relPath: tag.relPath, ranked: { tag, score } };
}

describe('splitLines', () => {
  it('drops the empty line after a trailing newline', () => {
    expect(splitLines('a\r\nb\n')).toEqual(['a', 'b']);
    expect(splitLines('a\n\nb')).toEqual(['a', '', 'b']);
    expect(splitLines('')).toEqual([]);
  });
});

describe('renderFileBlock', () => {
  it('collapses large gaps to an ellipsis', () => {
    expect(renderFileBlock('f.py', tenLines, [7, 3], config)).toBe('f.py:\n⋮\n│L3\n⋮\n│L7\n⋮\n');
  });

  it('fills gaps of a single line', () => {
    expect(renderFileBlock('f.py', tenLines, [2, 4], config)).toBe('f.py:\n│L1\n│L2\n│L3\n│L4\n⋮\n');
    expect(renderFileBlock('f.py', tenLines, [9], config)).toBe('f.py:\n⋮\n│L9\n│L10\n');
  });

  it('truncates long lines and trims trailing space', () => {
    const lines = ['x'.repeat(120), '  value = 1   '];
    expect(renderFileBlock('g.py', lines, [1, 2], config)).toBe(`g.py:\n│${'x'.repeat(100)}\n│  value = 1\n`);
  });

  it('shows only the header when there is nothing to show', () => {
    expect(renderFileBlock('h.py', undefined, [1], config)).toBe('h.py:\n');
    expect(renderFileBlock('h.py', tenLines, [], config)).toBe('h.py:\n');
    expect(renderFileBlock('h.py', tenLines, [42], config)).toBe('h.py:\n');
  });
});

describe('renderMap', () => {
  const lines = ['class A:', '    x = 1', '    def m(self):', '        pass', '    y = 2', 'z = 3'];
  const classA = def('a.py', 'A', 1, 5, 'class');
  const methodM = def('a.py', 'm', 3, 4);

  const context: RenderContext = {
    chatFiles: ['chat.py'],
    definitionsByFile: new Map([['a.py', [classA, methodM]]]),
    linesByFile: new Map([['a.py', lines]]),
    config,
  };

  it('shows the enclosing definition of a selected one', () => {
    expect(renderMap([tagEntry(methodM)], { ...context, chatFiles: [] })).toBe(
      'a.py:\n│class A:\n│    x = 1\n│    def m(self):\n⋮\n',
    );
  });

  it('puts chat files first and separates blocks with a blank line', () => {
    const entries: MapEntry[] = [tagEntry(methodM), { kind: 'file', relPath: 'README.md' }];
    expect(renderMap(entries, context)).toBe(
      'chat.py:\n\na.py:\n│class A:\n│    x = 1\n│    def m(self):\n⋮\n\nREADME.md:\n',
    );
  });

  it('renders only chat headers for an empty prefix', () => {
    expect(renderMap([], context)).toBe('chat.py:\n');
    expect(renderMap([], { ...context, chatFiles: [] })).toBe('');
  });

  it('orders files by their first entry', () => {
    const b = def('b.py', 'helper', 1);
    const entries = [tagEntry(b, 0.9), tagEntry(methodM, 0.5), tagEntry(def('b.py', 'other', 3), 0.1)];
    const output = renderMap(entries, {
      ...context,
      chatFiles: [],
      linesByFile: new Map([
        ['a.py', lines],
        ['b.py', ['def helper():', '    pass', 'def other():']],
      ]),
    });
    expect(output).toBe(
      'b.py:\n│def helper():\n│    pass\n│def other():\n\na.py:\n│class A:\n│    x = 1\n│    def m(self):\n⋮\n',
    );
  });
});
