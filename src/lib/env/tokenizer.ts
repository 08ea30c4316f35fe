import { MalformedEntryError } from '../errors.js';
import { endsWithContinuation, findDelimiter, findUnescaped, isQuote, stripComment } from './scan.js';
import type { Quote } from './scan.js';

export interface RawLine {
  number: number;
  text: string;
}

/**
 * One assignment as written in the file, possibly spanning several physical
 * lines. `value` still carries its quotes and escapes; it is undefined when
 * the entry has no `=`.
 */
export interface LogicalEntry {
  line: number;
  key: string;
  value?: string;
  quoted: boolean;
}

type LineSource = Iterator<RawLine, undefined>;

function* rawLines(content: string): Generator<RawLine, undefined> {
  const lines = content.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const text = lines[i];
    yield { number: i + 1, text: text.endsWith('\r') ? text.slice(0, -1) : text };
  }
  return undefined;
}

/**
 * Split `.env` content into logical entries. Comment and blank lines are
 * skipped; quoted values may span lines; an unescaped trailing backslash
 * joins the next line with its leading whitespace removed.
 *
 * The generator is single pass: continuation and quoted spans pull further
 * lines from the same source.
 */
export function* tokenize(content: string): Generator<LogicalEntry, void> {
  const source = rawLines(content);

  for (let next = source.next(); !next.done; next = source.next()) {
    const { number, text } = next.value;
    const line = text.trimStart();
    if (line.trim() === '' || line.startsWith('#')) continue;

    const eq = findDelimiter(line);
    if (eq === -1) {
      yield { line: number, key: stripComment(line).trim(), quoted: false };
      continue;
    }

    const key = line.slice(0, eq).trim();
    const rest = line.slice(eq + 1).trimStart();
    const quote = rest[0];

    if (isQuote(quote)) {
      yield { line: number, key, value: readQuoted(rest, quote, number, source), quoted: true };
    } else {
      yield { line: number, key, value: readUnquoted(rest, number, source), quoted: false };
    }
  }
}

function readQuoted(first: string, quote: Quote, start: number, source: LineSource): string {
  let span = first;
  let close = findUnescaped(span, quote, 1);

  while (close === -1) {
    const next = source.next();
    if (next.done) {
      throw new MalformedEntryError(start, `unterminated ${quote} quote`);
    }
    span += `\n${next.value.text}`;
    close = findUnescaped(span, quote, 1);
  }

  return (span.slice(0, close + 1) + stripComment(span.slice(close + 1))).trimEnd();
}

function readUnquoted(first: string, start: number, source: LineSource): string {
  let value = '';
  let segment = first;

  for (;;) {
    const text = stripComment(segment).trimEnd();
    if (!endsWithContinuation(text)) return value + text;

    value += text.slice(0, -1);
    const next = source.next();
    if (next.done) {
      throw new MalformedEntryError(start, 'line continuation at end of file');
    }
    segment = next.value.text.trimStart();
  }
}
