export type OptionValue = string | string[] | boolean;
export type ParsedOptions = Record<string, OptionValue>;

export interface ParsedArgs {
  command: string | null;
  positionals: string[];
  options: ParsedOptions;
}

/** Flags that never take a value, so a following path stays positional. */
const BOOLEAN_FLAGS = new Set(['verbose', 'force-refresh', 'no-cache', 'help']);

function appendOption(options: ParsedOptions, key: string, value: string | boolean): void {
  const current = options[key];
  if (current === undefined) {
    options[key] = value;
    return;
  }
  if (Array.isArray(current)) {
    current.push(String(value));
    return;
  }
  options[key] = [String(current), String(value)];
}

export function parseArgs(argv: string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const options: ParsedOptions = {};
  const positionals: string[] = [];

  for (let i = 0; i < rest.length; i += 1) {
    const token = rest[i];
    if (!token.startsWith('--')) {
      positionals.push(token);
      continue;
    }

    const body = token.slice(2);
    const equals = body.indexOf('=');
    if (equals >= 0) {
      appendOption(options, body.slice(0, equals), body.slice(equals + 1));
      continue;
    }

    const next = rest[i + 1];
    const hasValue = !BOOLEAN_FLAGS.has(body) && next !== undefined && !next.startsWith('--');
    if (hasValue) {
      appendOption(options, body, next);
      i += 1;
    } else {
      appendOption(options, body, true);
    }
  }

  return {
    command: command ?? null,
    positionals,
    options,
  };
}

export function readStringOption(options: ParsedOptions, key: string): string | undefined {
  const value = options[key];
  if (value === undefined || typeof value === 'boolean') {
    return undefined;
  }
  return Array.isArray(value) ? value[value.length - 1] : value;
}

export function readStringArrayOption(options: ParsedOptions, key: string): string[] {
  const value = options[key];
  if (value === undefined || typeof value === 'boolean') {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/** Repeated flags and comma-separated values both add entries. */
export function readCsvOption(options: ParsedOptions, key: string): string[] {
  const out: string[] = [];
  for (const value of readStringArrayOption(options, key)) {
    for (const part of value.split(',')) {
      const trimmed = part.trim();
      if (trimmed.length > 0) {
        out.push(trimmed);
      }
    }
  }
  return out;
}

export function readBooleanOption(options: ParsedOptions, key: string): boolean {
  const value = options[key];
  if (value === undefined) {
    return false;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  const last = Array.isArray(value) ? value[value.length - 1] : value;
  return ['1', 'true', 'yes', 'on'].includes(last.toLowerCase());
}

/** Positive integer, or `fallback` when the flag is absent or malformed. */
export function readIntOption(options: ParsedOptions, key: string, fallback: number): number {
  const value = readOptionalIntOption(options, key);
  if (value === undefined || value <= 0) {
    return fallback;
  }
  return value;
}

/** Any integer, zero and negatives included; `undefined` when absent. */
export function readOptionalIntOption(options: ParsedOptions, key: string): number | undefined {
  const value = readStringOption(options, key);
  if (value === undefined || !/^-?\d+$/.test(value.trim())) {
    return undefined;
  }
  return Number.parseInt(value, 10);
}
