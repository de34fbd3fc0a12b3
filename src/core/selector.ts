import { FileRecord, MapEntry, RankingResult } from '../types';
import { comparePaths } from '../utils/path';
import { isImportantFile } from './importance';

export interface Selection {
  text: string;
  /** Number of leading entries included in `text`. */
  count: number;
  tokens: number;
}

/**
 * Orders what the map may show: important project files that carry no ranked
 * definitions, then ranked definitions, then the remaining files without
 * definitions. Chat files are left out; the renderer always shows them.
 */
export function buildMapEntries(
  ranking: RankingResult,
  records: FileRecord[],
  isImportant: (relPath: string) => boolean = isImportantFile,
): MapEntry[] {
  const chat = new Set(records.filter((record) => record.role === 'chat').map((record) => record.relPath));
  const withDefinitions = new Set(ranking.tags.map((ranked) => ranked.tag.relPath));
  const candidates = records
    .filter((record) => !chat.has(record.relPath) && !withDefinitions.has(record.relPath))
    .map((record) => record.relPath)
    .sort(comparePaths);

  const important = candidates.filter((relPath) => isImportant(relPath));
  const importantSet = new Set(important);
  const rest = candidates.filter((relPath) => !importantSet.has(relPath));

  return [
    ...important.map((relPath): MapEntry => ({ kind: 'file', relPath })),
    ...ranking.tags.map((ranked): MapEntry => ({ kind: 'tag', relPath: ranked.tag.relPath, ranked })),
    ...rest.map((relPath): MapEntry => ({ kind: 'file', relPath })),
  ];
}

/**
 * Finds the longest prefix of `entries` whose rendering fits in `maxTokens`,
 * by bisection over the prefix length. Rendered size grows with the prefix,
 * so the search is exact. An empty string means nothing fits.
 */
export function selectWithinBudget(
  entries: MapEntry[],
  maxTokens: number,
  render: (prefix: MapEntry[]) => string,
  countTokens: (text: string) => number,
): Selection {
  if (maxTokens <= 0) {
    return { text: '', count: 0, tokens: 0 };
  }

  const baseText = render([]);
  const baseTokens = countTokens(baseText);
  if (baseTokens > maxTokens) {
    return { text: '', count: 0, tokens: 0 };
  }

  let best: Selection = { text: baseText, count: 0, tokens: baseTokens };
  let low = 0;
  let high = entries.length;

  while (low < high) {
    const middle = Math.ceil((low + high) / 2);
    const text = render(entries.slice(0, middle));
    const tokens = countTokens(text);
    if (tokens <= maxTokens) {
      best = { text, count: middle, tokens };
      low = middle;
    } else {
      high = middle - 1;
    }
  }

  return best;
}
