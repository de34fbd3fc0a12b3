import { MapEntry, Tag } from '../types';
import { RenderConfig } from './config';

export const LINE_MARKER = '│';
export const ELLIPSIS = '⋮';

export interface RenderContext {
  /** Chat files by relative path, in the order they are shown. */
  chatFiles: string[];
  /** Every definition per file, used to find enclosing scopes. */
  definitionsByFile: ReadonlyMap<string, Tag[]>;
  /** Source lines per file; a file missing here renders header-only. */
  linesByFile: ReadonlyMap<string, string[]>;
  config: RenderConfig;
}

export function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function linesOfInterest(selected: Tag[], definitions: Tag[]): Set<number> {
  const shown = new Set<number>();
  for (const tag of selected) {
    shown.add(tag.line);
    for (const scope of definitions) {
      if (scope.line < tag.line && scope.endLine >= tag.line) {
        shown.add(scope.line);
      }
    }
  }
  return shown;
}

function fillSmallGaps(shown: number[], lastLine: number, mergeGap: number): number[] {
  const visible: number[] = [];
  let previous = 0;
  for (const line of shown) {
    const gap = line - previous - 1;
    if (gap > 0 && gap <= mergeGap) {
      for (let filler = previous + 1; filler < line; filler += 1) {
        visible.push(filler);
      }
    }
    visible.push(line);
    previous = line;
  }

  const trailing = lastLine - previous;
  if (trailing > 0 && trailing <= mergeGap) {
    for (let filler = previous + 1; filler <= lastLine; filler += 1) {
      visible.push(filler);
    }
  }
  return visible;
}

export function renderFileBlock(
  relPath: string,
  lines: string[] | undefined,
  shownLines: Iterable<number>,
  config: RenderConfig,
): string {
  let out = `${relPath}:\n`;
  if (!lines || lines.length === 0) {
    return out;
  }

  const shown = Array.from(new Set(shownLines))
    .filter((line) => line >= 1 && line <= lines.length)
    .sort((a, b) => a - b);
  if (shown.length === 0) {
    return out;
  }

  let previous = 0;
  for (const line of fillSmallGaps(shown, lines.length, config.mergeGap)) {
    if (line - previous > 1) {
      out += `${ELLIPSIS}\n`;
    }
    out += `${LINE_MARKER}${lines[line - 1].slice(0, config.maxLineLength).trimEnd()}\n`;
    previous = line;
  }
  if (previous < lines.length) {
    out += `${ELLIPSIS}\n`;
  }
  return out;
}

/**
 * Renders a prefix of the ranked entries. Chat files come first, then every
 * other file in order of its first entry, which is descending best score.
 */
export function renderMap(entries: MapEntry[], context: RenderContext): string {
  const order: string[] = [];
  const selectedByFile = new Map<string, Tag[]>();

  const touch = (relPath: string): Tag[] => {
    let selected = selectedByFile.get(relPath);
    if (!selected) {
      selected = [];
      selectedByFile.set(relPath, selected);
      order.push(relPath);
    }
    return selected;
  };

  for (const relPath of context.chatFiles) {
    touch(relPath);
  }
  for (const entry of entries) {
    const selected = touch(entry.relPath);
    if (entry.kind === 'tag') {
      selected.push(entry.ranked.tag);
    }
  }

  const blocks = order.map((relPath) => {
    const selected = selectedByFile.get(relPath) ?? [];
    const shown = linesOfInterest(selected, context.definitionsByFile.get(relPath) ?? []);
    return renderFileBlock(relPath, context.linesByFile.get(relPath), shown, context.config);
  });

  return blocks.join('\n');
}
