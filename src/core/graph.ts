import { MultiDirectedGraph } from 'graphology';

import { FileRecord, FileRole } from '../types';
import { comparePaths } from '../utils/path';
import { IdentifierWeights } from './config';

export type FileNodeAttributes = {
  path: string;
  role: FileRole;
  definitionCount: number;
};

export type ReferenceEdgeAttributes = {
  symbol: string;
  weight: number;
  refCount: number;
  selfReference: boolean;
};

export type RelevanceGraph = MultiDirectedGraph<FileNodeAttributes, ReferenceEdgeAttributes>;

export interface BuildGraphOptions {
  identifiers: IdentifierWeights;
  mentionedIdents?: Iterable<string>;
}

function encodeKeyPart(value: string): string {
  return encodeURIComponent(value);
}

function edgeKey(symbol: string, source: string, target: string): string {
  return [encodeKeyPart(symbol), encodeKeyPart(source), encodeKeyPart(target)].join('|');
}

function isCompoundName(name: string): boolean {
  const hasLetter = /[A-Za-z]/.test(name);
  const isSnake = name.includes('_') && hasLetter;
  const isKebab = name.includes('-') && hasLetter;
  const isCamel = /[a-z]/.test(name) && /[A-Z]/.test(name);
  return isSnake || isKebab || isCamel;
}

/**
 * Weight multiplier for references to `name`. Long compound names weigh more,
 * names defined in many files weigh less, `_private` names weigh less, and
 * mentioned identifiers get a fixed boost.
 */
export function identifierSpecialness(
  name: string,
  definerCount: number,
  mentioned: boolean,
  weights: IdentifierWeights,
): number {
  let weight = 1;
  if (name.length >= weights.longNameLength && isCompoundName(name)) {
    weight *= weights.longNameBoost;
  }
  if (name.startsWith('_')) {
    weight *= weights.privatePenalty;
  }
  if (definerCount > weights.commonDefinerThreshold) {
    weight *= weights.commonPenalty;
  }
  if (mentioned) {
    weight *= weights.mentionedBoost;
  }
  return weight;
}

function collectDefiners(records: FileRecord[]): Map<string, string[]> {
  const definers = new Map<string, string[]>();
  for (const record of records) {
    for (const tag of record.tags) {
      if (tag.kind !== 'def') {
        continue;
      }
      const files = definers.get(tag.name) ?? [];
      if (files[files.length - 1] !== record.relPath) {
        files.push(record.relPath);
      }
      definers.set(tag.name, files);
    }
  }
  return definers;
}

function countReferences(record: FileRecord): Map<string, number> {
  const counts = new Map<string, number>();
  for (const tag of record.tags) {
    if (tag.kind === 'ref') {
      counts.set(tag.name, (counts.get(tag.name) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Builds the file-level relevance graph: one node per file and one edge
 * referencer -> definer per shared name, weighted by specialness times the
 * number of references. Insertion order is files by path, then names by first
 * reference, then definers by path.
 */
export function buildGraph(records: FileRecord[], options: BuildGraphOptions): RelevanceGraph {
  const graph: RelevanceGraph = new MultiDirectedGraph<FileNodeAttributes, ReferenceEdgeAttributes>();
  const ordered = [...records].sort((a, b) => comparePaths(a.relPath, b.relPath));
  const mentioned = new Set(options.mentionedIdents ?? []);

  for (const record of ordered) {
    if (graph.hasNode(record.relPath)) {
      continue;
    }
    graph.addNode(record.relPath, {
      path: record.relPath,
      role: record.role,
      definitionCount: record.tags.filter((tag) => tag.kind === 'def').length,
    });
  }

  const definers = collectDefiners(ordered);

  for (const record of ordered) {
    for (const [name, refCount] of countReferences(record)) {
      const targets = definers.get(name);
      if (!targets) {
        continue;
      }

      const weight = identifierSpecialness(name, targets.length, mentioned.has(name), options.identifiers) * refCount;
      for (const target of targets) {
        const key = edgeKey(name, record.relPath, target);
        if (graph.hasEdge(key)) {
          continue;
        }
        graph.addDirectedEdgeWithKey(key, record.relPath, target, {
          symbol: name,
          weight,
          refCount,
          selfReference: target === record.relPath,
        });
      }
    }
  }

  return graph;
}

export interface GraphSummary {
  nodes: number;
  edges: number;
  selfEdges: number;
}

export function summarizeGraph(graph: RelevanceGraph): GraphSummary {
  let selfEdges = 0;
  graph.forEachEdge((_edge, attrs) => {
    if (attrs.selfReference) {
      selfEdges += 1;
    }
  });
  return { nodes: graph.order, edges: graph.size, selfEdges };
}
