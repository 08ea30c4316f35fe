import { COMMAND_KEY, STRICT_KEY } from './keys.js';
import type { EnvironmentVariable } from './entry-parser.js';

/**
 * Variables loaded from one file, in the order they were last assigned.
 * Built once and never mutated.
 */
export class EnvironmentTable {
  private readonly vars: ReadonlyMap<string, string>;

  constructor(entries: Iterable<readonly [string, string]> = []) {
    const vars = new Map<string, string>();
    for (const [name, value] of entries) {
      vars.delete(name);
      vars.set(name, value);
    }
    this.vars = vars;
  }

  static empty(): EnvironmentTable {
    return new EnvironmentTable();
  }

  get size(): number {
    return this.vars.size;
  }

  get(name: string): string | undefined {
    return this.vars.get(name);
  }

  has(name: string): boolean {
    return this.vars.has(name);
  }

  keys(): IterableIterator<string> {
    return this.vars.keys();
  }

  entries(): IterableIterator<[string, string]> {
    return this.vars.entries();
  }

  /** Value of `DOTENV_COMMAND`. */
  get commandAlias(): string | undefined {
    return this.vars.get(COMMAND_KEY);
  }

  /** Value of `DOTENV_STRICT`; any non-empty value turns strict mode on. */
  get strictOverride(): string | undefined {
    return this.vars.get(STRICT_KEY);
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.vars);
  }
}

export function buildTable(vars: Iterable<EnvironmentVariable>): EnvironmentTable {
  const entries: Array<[string, string]> = [];
  for (const { name, value } of vars) entries.push([name, value]);
  return new EnvironmentTable(entries);
}
