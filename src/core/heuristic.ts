import { SourceFile, Tag } from '../types';
import { TagExtractor } from './extractors';

const IDENTIFIER_PATTERN = /[A-Za-z_$][A-Za-z0-9_$]*/g;

const DEFINITION_PATTERN =
  /^\s*(?:(?:export|default|declare|pub(?:\([^)]*\))?|public|private|protected|internal|static|abstract|final|async|unsafe|extern|data|sealed|open)\s+)*(def|class|function\*?|fn|func|interface|struct|enum|trait|type|module|object)\s+(?:\([^)]*\)\s*)?([A-Za-z_$][A-Za-z0-9_$]*)/;

const KEYWORD_TYPES: Record<string, string> = {
  def: 'function',
  function: 'function',
  'function*': 'function',
  fn: 'function',
  func: 'function',
  class: 'class',
  object: 'class',
};

interface DefinitionMatch {
  name: string;
  type: string;
  column: number;
}

function matchDefinition(line: string): DefinitionMatch | null {
  const match = DEFINITION_PATTERN.exec(line);
  if (!match) {
    return null;
  }
  const keyword = match[1];
  const name = match[2];
  return {
    name,
    type: KEYWORD_TYPES[keyword] ?? keyword,
    // The pattern ends exactly at the name.
    column: match[0].length - name.length,
  };
}

/**
 * Yields tags line by line. A line that opens with a definition keyword
 * defines the name that follows it; every other identifier-shaped token is a
 * reference. Restarting the generator restarts the scan.
 */
export function* scanTags(file: SourceFile, content: string): Generator<Tag> {
  const lines = content.split(/\r?\n/);

  for (let index = 0; index < lines.length; index += 1) {
    const text = lines[index];
    const line = index + 1;
    const definition = matchDefinition(text);

    if (definition) {
      yield {
        relPath: file.relPath,
        absPath: file.absPath,
        name: definition.name,
        kind: 'def',
        line,
        endLine: line,
        type: definition.type,
      };
    }

    for (const match of text.matchAll(IDENTIFIER_PATTERN)) {
      if (definition && match.index === definition.column) {
        continue;
      }
      yield {
        relPath: file.relPath,
        absPath: file.absPath,
        name: match[0],
        kind: 'ref',
        line,
        endLine: line,
        type: 'identifier',
      };
    }
  }
}

export class HeuristicExtractor implements TagExtractor {
  readonly name = 'heuristic';

  canHandle(): boolean {
    return true;
  }

  async extract(file: SourceFile, content: string): Promise<Iterable<Tag>> {
    return scanTags(file, content);
  }
}
