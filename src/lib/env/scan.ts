export type Quote = '"' | "'";

export function isQuote(ch: string | undefined): ch is Quote {
  return ch === '"' || ch === "'";
}

/** Index of the first `ch` at or after `from` that no backslash escapes, or -1. */
export function findUnescaped(text: string, ch: string, from = 0): number {
  for (let i = from; i < text.length; i++) {
    if (text[i] === '\\') {
      i++;
      continue;
    }
    if (text[i] === ch) return i;
  }
  return -1;
}

/** Index of the first `=` outside quotes and not escaped, or -1. */
export function findDelimiter(text: string): number {
  let open: Quote | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '\\') {
      i++;
    } else if (open !== null) {
      if (ch === open) open = null;
    } else if (isQuote(ch)) {
      open = ch;
    } else if (ch === '=') {
      return i;
    }
  }
  return -1;
}

/** Drop everything from the first unescaped `#`. */
export function stripComment(text: string): string {
  const hash = findUnescaped(text, '#');
  return hash === -1 ? text : text.slice(0, hash);
}

/** True when `text` ends in an odd run of backslashes. */
export function endsWithContinuation(text: string): boolean {
  let run = 0;
  for (let i = text.length - 1; i >= 0 && text[i] === '\\'; i--) run++;
  return run % 2 === 1;
}
