import { parseEntry } from './entry-parser.js';
import type { EnvironmentVariable } from './entry-parser.js';
import { buildTable } from './table.js';
import type { EnvironmentTable } from './table.js';
import { tokenize } from './tokenizer.js';

export { tokenize } from './tokenizer.js';
export type { LogicalEntry, RawLine } from './tokenizer.js';
export { parseEntry, decodeEscapes, wrappingQuote } from './entry-parser.js';
export type { EnvironmentVariable } from './entry-parser.js';
export { EnvironmentTable, buildTable } from './table.js';
export { merge, layerTables, ambientFromProcess, keyOf } from './merge.js';
export type { Invocation, MergeResult } from './merge.js';
export * from './keys.js';

function* variables(content: string): Generator<EnvironmentVariable, void> {
  for (const entry of tokenize(content)) {
    const variable = parseEntry(entry);
    if (variable) yield variable;
  }
}

/** Parse `.env` content into a table. Throws `MalformedEntryError`. */
export function parse(content: string): EnvironmentTable {
  return buildTable(variables(content));
}
