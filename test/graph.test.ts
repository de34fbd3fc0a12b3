import { describe, expect, it } from 'vitest';

import { resolveConfig } from '../src/core/config';
import { buildGraph, identifierSpecialness, RelevanceGraph, summarizeGraph } from '../src/core/graph';
import { def, record, ref } from './helpers';

const { identifiers } = resolveConfig();

function describeEdges(graph: RelevanceGraph): string[] {
  const out: string[] = [];
  graph.forEachEdge((_edge, attrs, source, target) => {
    out.push(`${source}->${target} ${attrs.symbol} w=${attrs.weight} n=${attrs.refCount}${attrs.selfReference ? ' self' : ''}`);
  });
  return out;
}

describe('identifierSpecialness', () => {
  it('boosts long compound names', () => {
    expect(identifierSpecialness('parse_config', 1, false, identifiers)).toBe(10);
    expect(identifierSpecialness('parseConfig', 1, false, identifiers)).toBe(10);
    expect(identifierSpecialness('parseconfig', 1, false, identifiers)).toBe(1);
    expect(identifierSpecialness('x', 1, false, identifiers)).toBe(1);
  });

  it('penalizes private names and names defined in many files', () => {
    expect(identifierSpecialness('_hidden', 1, false, identifiers)).toBeCloseTo(0.1);
    expect(identifierSpecialness('helper', 5, false, identifiers)).toBe(1);
    expect(identifierSpecialness('helper', 6, false, identifiers)).toBeCloseTo(0.1);
  });

  it('boosts mentioned identifiers', () => {
    expect(identifierSpecialness('helper', 1, true, identifiers)).toBe(10);
  });

  it('never weighs a commoner name above a rarer one', () => {
    for (const name of ['x', 'helper', 'parse_config', '_private_thing']) {
      let previous = Number.POSITIVE_INFINITY;
      for (let definers = 1; definers <= 10; definers += 1) {
        const weight = identifierSpecialness(name, definers, false, identifiers);
        expect(weight).toBeLessThanOrEqual(previous);
        previous = weight;
      }
    }
  });
});

describe('buildGraph', () => {
  const records = [
    record('c.ts', 'other', [def('c.ts', 'helper', 1)]),
    record('a.ts', 'chat', [ref('a.ts', 'helper', 2), ref('a.ts', 'Local', 3), ref('a.ts', 'helper', 4), def('a.ts', 'Local', 1)]),
    record('b.ts', 'other', [def('b.ts', 'helper', 1), ref('b.ts', 'unknown', 2)]),
  ];

  it('adds one node per file with its role and definition count', () => {
    const graph = buildGraph(records, { identifiers });
    expect(graph.nodes()).toEqual(['a.ts', 'b.ts', 'c.ts']);
    expect(graph.getNodeAttributes('a.ts')).toEqual({ path: 'a.ts', role: 'chat', definitionCount: 1 });
  });

  it('links referencers to every definer, weighted by reference count', () => {
    const graph = buildGraph(records, { identifiers });
    expect(describeEdges(graph)).toEqual([
      'a.ts->b.ts helper w=2 n=2',
      'a.ts->c.ts helper w=2 n=2',
      'a.ts->a.ts Local w=1 n=1 self',
    ]);
    expect(summarizeGraph(graph)).toEqual({ nodes: 3, edges: 3, selfEdges: 1 });
  });

  it('weights edges of mentioned identifiers higher', () => {
    const graph = buildGraph(records, { identifiers, mentionedIdents: ['helper'] });
    expect(describeEdges(graph).slice(0, 2)).toEqual(['a.ts->b.ts helper w=20 n=2', 'a.ts->c.ts helper w=20 n=2']);
  });

  it('builds an empty graph from no files', () => {
    expect(summarizeGraph(buildGraph([], { identifiers }))).toEqual({ nodes: 0, edges: 0, selfEdges: 0 });
  });
});
