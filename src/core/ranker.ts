import { FileRecord, RankedFile, RankedTag, RankingResult, Tag } from '../types';
import { comparePaths } from '../utils/path';
import { PersonalizationWeights } from './config';
import { RelevanceGraph } from './graph';

export interface RankerOptions {
  dampingFactor: number;
  maxIterations: number;
  tolerance: number;
  personalization: PersonalizationWeights;
}

interface InboundLink {
  source: number;
  weight: number;
}

export function compareRankedTags(a: RankedTag, b: RankedTag): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  const byPath = comparePaths(a.tag.relPath, b.tag.relPath);
  if (byPath !== 0) {
    return byPath;
  }
  if (a.tag.line !== b.tag.line) {
    return a.tag.line - b.tag.line;
  }
  return comparePaths(a.tag.name, b.tag.name);
}

interface PowerIterationResult {
  scores: number[];
  iterations: number;
  converged: boolean;
}

/**
 * Personalized PageRank by power iteration. Self-edges never reach this
 * function; mass held by nodes without out-edges is handed back according to
 * the personalization vector.
 */
function powerIterate(
  personalization: number[],
  inbound: InboundLink[][],
  outWeight: number[],
  options: RankerOptions,
): PowerIterationResult {
  const n = personalization.length;
  const d = options.dampingFactor;
  let scores = personalization.slice();

  for (let iteration = 1; iteration <= options.maxIterations; iteration += 1) {
    let danglingMass = 0;
    for (let i = 0; i < n; i += 1) {
      if (outWeight[i] === 0) {
        danglingMass += scores[i];
      }
    }

    const next = new Array<number>(n);
    let delta = 0;
    for (let v = 0; v < n; v += 1) {
      let flow = danglingMass * personalization[v];
      for (const link of inbound[v]) {
        flow += (scores[link.source] * link.weight) / outWeight[link.source];
      }
      next[v] = (1 - d) * personalization[v] + d * flow;
      delta += Math.abs(next[v] - scores[v]);
    }

    scores = next;
    if (delta < n * options.tolerance) {
      return { scores, iterations: iteration, converged: true };
    }
  }

  return { scores, iterations: options.maxIterations, converged: false };
}

/**
 * Hands each file's score to its definitions in proportion to the cross-file
 * reference weight each defined name receives. A file nobody references
 * splits its score evenly across its defined names.
 */
function distributeToDefinitions(
  record: FileRecord,
  fileScore: number,
  incomingBySymbol: Map<string, number> | undefined,
): RankedTag[] {
  const definitions = record.tags.filter((tag) => tag.kind === 'def');
  if (definitions.length === 0) {
    return [];
  }

  const byName = new Map<string, Tag[]>();
  for (const tag of definitions) {
    const group = byName.get(tag.name) ?? [];
    group.push(tag);
    byName.set(tag.name, group);
  }

  let totalIncoming = 0;
  for (const name of byName.keys()) {
    totalIncoming += incomingBySymbol?.get(name) ?? 0;
  }

  const ranked: RankedTag[] = [];
  for (const [name, group] of byName) {
    const share =
      totalIncoming > 0 ? (incomingBySymbol?.get(name) ?? 0) / totalIncoming : 1 / byName.size;
    const score = (fileScore * share) / group.length;
    for (const tag of group) {
      ranked.push({ tag, score });
    }
  }
  return ranked;
}

export function rankGraph(graph: RelevanceGraph, records: FileRecord[], options: RankerOptions): RankingResult {
  const nodes = graph.nodes();
  if (nodes.length === 0) {
    return { files: [], tags: [], iterations: 0, converged: true };
  }

  const indexOf = new Map<string, number>();
  nodes.forEach((node, index) => indexOf.set(node, index));

  const rawPersonalization = nodes.map((node) => options.personalization[graph.getNodeAttribute(node, 'role')]);
  const totalPersonalization = rawPersonalization.reduce((sum, value) => sum + value, 0);
  const personalization = rawPersonalization.map((value) => value / totalPersonalization);

  const inbound: InboundLink[][] = nodes.map(() => []);
  const outWeight = new Array<number>(nodes.length).fill(0);
  const incomingBySymbol = new Map<string, Map<string, number>>();

  graph.forEachEdge((_edge, attrs, source, target) => {
    if (attrs.selfReference) {
      return;
    }
    const sourceIndex = indexOf.get(source);
    const targetIndex = indexOf.get(target);
    if (sourceIndex === undefined || targetIndex === undefined) {
      return;
    }

    inbound[targetIndex].push({ source: sourceIndex, weight: attrs.weight });
    outWeight[sourceIndex] += attrs.weight;

    const symbols = incomingBySymbol.get(target) ?? new Map<string, number>();
    symbols.set(attrs.symbol, (symbols.get(attrs.symbol) ?? 0) + attrs.weight);
    incomingBySymbol.set(target, symbols);
  });

  const { scores, iterations, converged } = powerIterate(personalization, inbound, outWeight, options);

  const files: RankedFile[] = nodes.map((node, index) => ({
    relPath: node,
    role: graph.getNodeAttribute(node, 'role'),
    personalization: personalization[index],
    score: scores[index],
  }));

  const tags: RankedTag[] = [];
  for (const record of records) {
    const index = indexOf.get(record.relPath);
    if (index === undefined) {
      continue;
    }
    tags.push(...distributeToDefinitions(record, scores[index], incomingBySymbol.get(record.relPath)));
  }
  tags.sort(compareRankedTags);

  return { files, tags, iterations, converged };
}
