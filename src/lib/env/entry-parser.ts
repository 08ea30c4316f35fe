import { findUnescaped, isQuote } from './scan.js';
import type { Quote } from './scan.js';
import type { LogicalEntry } from './tokenizer.js';

export interface EnvironmentVariable {
  name: string;
  value: string;
}

const ESCAPES = new Map<string, string>([
  ['n', '\n'],
  ['t', '\t'],
  ['r', '\r'],
  ['\\', '\\'],
  ['"', '"'],
  ["'", "'"],
]);

/** Decode `\n \t \r \\ \" \'`. Any other escape is kept as written. */
export function decodeEscapes(text: string): string {
  return text.replace(/\\(.)/gs, (match, ch: string) => ESCAPES.get(ch) ?? match);
}

/**
 * The quote wrapping `value`, if its opening quote is closed by the last
 * character and by no earlier one.
 */
export function wrappingQuote(value: string): Quote | undefined {
  const first = value[0];
  if (!isQuote(first) || value.length < 2) return undefined;
  return findUnescaped(value, first, 1) === value.length - 1 ? first : undefined;
}

/**
 * Turn a logical entry into a variable, or drop it. Entries without `=`,
 * with an empty key, or with an unquoted empty value are dropped. Quotes are
 * only stripped from a value the tokenizer read as a quoted span.
 */
export function parseEntry(entry: LogicalEntry): EnvironmentVariable | undefined {
  if (entry.value === undefined) return undefined;

  const name = entry.key.toUpperCase();
  if (name === '' || name.includes('=')) return undefined;

  if (entry.quoted && wrappingQuote(entry.value)) {
    return { name, value: decodeEscapes(entry.value.slice(1, -1)) };
  }

  const value = entry.value.trim();
  if (value === '') return undefined;
  return { name, value };
}
